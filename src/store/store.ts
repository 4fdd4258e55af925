import { Thread, ThreadRecord } from "../types/contracts.js";

export interface ThreadStore {
  init(): Promise<void>;

  upsertThreads(records: ThreadRecord[]): Promise<void>;
  getThread(id: string): Promise<ThreadRecord | null>;
  countThreads(): Promise<number>;

  close(): Promise<void>;
}

function isoOrNull(dt: Thread["createdAt"]): string | null {
  const d = dt?.tryDate();
  return d ? d.toISOString() : null;
}

export function toThreadRecord(t: Thread): ThreadRecord {
  return {
    id: t.id,
    title: t.title,
    status: t.status,
    labels: t.labels.map((l) => l.labelType.name),
    customer: t.customer?.fullName ?? "",
    company: t.customer?.company?.name ?? "",
    createdAt: isoOrNull(t.createdAt),
    updatedAt: isoOrNull(t.updatedAt)
  };
}
