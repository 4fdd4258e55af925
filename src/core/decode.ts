import { z } from "zod";
import { Connection, Customer, Edge, Label, Thread, TimelineEntry, User } from "../types/contracts.js";
import { decodeActor } from "./actor.js";
import { DateTimeSchema } from "./datetime.js";
import { decodeEntry } from "./entry.js";
import { int, parseStrict, requireRecord, str } from "./schema.js";

const CompanySchema = z.object({ id: str, name: str }).nullish().transform((v) => v ?? null);

const CustomerSchema = z
  .object({
    id: str,
    fullName: str,
    email: z.object({ email: str }).nullish(),
    status: str,
    company: CompanySchema,
    createdAt: DateTimeSchema,
    updatedAt: DateTimeSchema
  })
  .transform((c): Customer => ({ ...c, email: c.email?.email ?? "" }));

// assignedTo comes back either fully selected or as { publicName } only.
const AssigneeSchema = z
  .object({ id: str, fullName: str, email: str, publicName: str })
  .nullish()
  .transform((u): User | null => (u ? { id: u.id, fullName: u.fullName || u.publicName, email: u.email } : null));

const LabelSchema = z.object({
  labelType: z.object({ id: str, name: str, icon: z.string().nullish().transform((v) => v ?? null) })
});

const ThreadFieldsSchema = z.object({
  id: str,
  title: str,
  status: str,
  priority: int,
  customer: CustomerSchema.nullish(),
  assignedTo: AssigneeSchema,
  labels: z.array(LabelSchema).nullish().transform((v): Label[] => v ?? []),
  createdAt: DateTimeSchema,
  updatedAt: DateTimeSchema
});

const EdgeListSchema = z.object({
  edges: z
    .array(z.object({ node: z.unknown(), cursor: str }))
    .nullish()
    .transform((v) => v ?? []),
  pageInfo: z
    .object({
      hasNextPage: z.boolean().nullish().transform((v) => v ?? false),
      endCursor: str
    })
    .nullish()
    .transform((v) => v ?? { hasNextPage: false, endCursor: "" })
});

/**
 * Decode a connection envelope, handing each non-null node to `decodeNode`.
 * Edge order is kept as received.
 */
export function decodeConnection<T>(
  raw: unknown,
  decodeNode: (node: unknown, what: string) => T,
  what = "connection"
): Connection<T> {
  const c = parseStrict(EdgeListSchema, raw, what);
  const edges: Edge<T>[] = [];
  c.edges.forEach((e, i) => {
    if (e.node === null || e.node === undefined) return;
    edges.push({ node: decodeNode(e.node, `${what}.edges.${i}.node`), cursor: e.cursor });
  });
  return { edges, pageInfo: c.pageInfo };
}

export function decodeTimelineEntry(raw: unknown, what = "timelineEntry"): TimelineEntry {
  const obj = requireRecord(raw, what);
  const base = parseStrict(z.object({ id: str, timestamp: DateTimeSchema }), obj, what);
  return Object.freeze({
    id: base.id,
    timestamp: base.timestamp,
    actor: decodeActor(obj.actor, `${what}.actor`),
    entry: decodeEntry(obj.entry, `${what}.entry`)
  });
}

export function decodeCustomer(raw: unknown, what = "customer"): Customer {
  return parseStrict(CustomerSchema, raw, what);
}

export function decodeThread(raw: unknown, what = "thread"): Thread {
  const obj = requireRecord(raw, what);
  const t = parseStrict(ThreadFieldsSchema, obj, what);
  const timeline =
    obj.timelineEntries === undefined || obj.timelineEntries === null
      ? null
      : decodeConnection(obj.timelineEntries, decodeTimelineEntry, `${what}.timelineEntries`);

  return {
    id: t.id,
    title: t.title,
    status: t.status,
    priority: t.priority,
    customer: t.customer ?? null,
    assignee: t.assignedTo,
    labels: t.labels,
    createdAt: t.createdAt,
    updatedAt: t.updatedAt,
    timelineEntries: timeline
  };
}
