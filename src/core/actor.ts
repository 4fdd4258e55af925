import { z } from "zod";
import { Actor, ActorKind } from "../types/contracts.js";
import { UnknownActorTypeError, assertNever } from "./errors.js";
import { has, parseStrict, requireRecord, str } from "./schema.js";

const PersonSchema = z.object({ id: str, fullName: str, email: str });

const CustomerRefSchema = z
  .object({
    id: str,
    fullName: str,
    email: z.object({ email: str }).nullish()
  })
  .transform((c) => ({ id: c.id, fullName: c.fullName, email: c.email?.email ?? "" }));

// Precedence when several shapes are present at once.
const discriminators: [string, ActorKind][] = [
  ["user", "user"],
  ["customer", "customer"],
  ["customerId", "deletedCustomer"],
  ["systemId", "system"],
  ["machineUser", "machineUser"]
];

export function detectActor(raw: Record<string, unknown>): ActorKind | null {
  for (const [key, kind] of discriminators) {
    if (has(raw, key)) return kind;
  }
  return null;
}

/**
 * Decode a "who acted" payload. Strict: an object with none of the five
 * shapes throws UnknownActorTypeError, a discriminator of the wrong JSON shape
 * throws MalformedPayloadError. Nested objects with missing fields decode to
 * empty strings. A null or absent actor carries no shape at all and is
 * reported as unknown.
 */
export function decodeActor(raw: unknown, what = "actor"): Actor {
  if (raw === null || raw === undefined) throw new UnknownActorTypeError([]);
  const obj = requireRecord(raw, what);
  const kind = detectActor(obj);
  if (!kind) throw new UnknownActorTypeError(Object.keys(obj));

  switch (kind) {
    case "user":
      return { kind, user: parseStrict(PersonSchema, obj.user, `${what}.user`) };
    case "customer":
      return { kind, customer: parseStrict(CustomerRefSchema, obj.customer, `${what}.customer`) };
    case "deletedCustomer":
      return { kind, customerId: parseStrict(z.string(), obj.customerId, `${what}.customerId`) };
    case "system":
      return { kind, systemId: parseStrict(z.string(), obj.systemId, `${what}.systemId`) };
    case "machineUser":
      return { kind, machineUser: parseStrict(PersonSchema, obj.machineUser, `${what}.machineUser`) };
    default:
      return assertNever(kind);
  }
}

export function actorId(a: Actor): string {
  switch (a.kind) {
    case "user":
      return a.user.id;
    case "customer":
      return a.customer.id;
    case "deletedCustomer":
      return a.customerId;
    case "system":
      return a.systemId;
    case "machineUser":
      return a.machineUser.id;
    default:
      return assertNever(a);
  }
}

export function actorName(a: Actor): string {
  switch (a.kind) {
    case "user":
      return a.user.fullName;
    case "customer":
      return a.customer.fullName;
    case "deletedCustomer":
      return "[Deleted Customer]";
    case "system":
      return "System";
    case "machineUser":
      return a.machineUser.fullName;
    default:
      return assertNever(a);
  }
}

export function actorEmail(a: Actor): string {
  switch (a.kind) {
    case "user":
      return a.user.email;
    case "customer":
      return a.customer.email;
    case "deletedCustomer":
    case "system":
      return "";
    case "machineUser":
      return a.machineUser.email;
    default:
      return assertNever(a);
  }
}
