import type { DateTime } from "../core/datetime.js";

export type ThreadStatus = "TODO" | "SNOOZED" | "DONE" | "OPEN" | "PENDING" | (string & {});

export interface User {
  id: string;
  fullName: string;
  email: string;
}

export interface MachineUser {
  id: string;
  fullName: string;
  email: string;
}

export interface Company {
  id: string;
  name: string;
}

export interface Customer {
  id: string;
  fullName: string;
  email: string; // flattened from { email: { email } }
  status: string;
  company: Company | null;
  createdAt: DateTime | null;
  updatedAt: DateTime | null;
}

export interface LabelType {
  id: string;
  name: string;
  icon: string | null;
}

export interface Label {
  labelType: LabelType;
}

// Which of the five actor shapes a payload carried.
export type Actor =
  | { kind: "user"; user: User }
  | { kind: "customer"; customer: Pick<Customer, "id" | "fullName" | "email"> }
  | { kind: "deletedCustomer"; customerId: string }
  | { kind: "system"; systemId: string }
  | { kind: "machineUser"; machineUser: MachineUser };

export type ActorKind = Actor["kind"];

export interface EmailParticipant {
  name: string;
  email: string;
}

export interface Attachment {
  id: string;
  fileName: string;
  fileExtension: string;
  fileMimeType: string;
  type: string;
}

export interface SlackFields {
  slackMessageLink: string;
  slackWebMessageLink: string;
  text: string;
  customerId: string;
  attachments: Attachment[];
  lastEditedOnSlackAt: DateTime | null;
  deletedOnSlackAt: DateTime | null;
}

export type Entry =
  | { kind: "email"; emailId: string; textContent: string; from: EmailParticipant | null; to: EmailParticipant | null }
  | { kind: "chat"; chatId: string; text: string }
  | { kind: "note"; noteId: string; text: string; markdown: string; attachments: Attachment[] }
  | {
      kind: "custom";
      externalId: string;
      title: string;
      type: string;
      components: Record<string, unknown>[];
      attachments: Attachment[];
    }
  | ({ kind: "slackMessage" } & SlackFields)
  | ({ kind: "slackReply" } & SlackFields & { threadTs: string })
  | { kind: "generic"; raw: Record<string, unknown> };

export type EntryKind = Entry["kind"];

export interface TimelineEntry {
  readonly id: string;
  readonly timestamp: DateTime | null;
  readonly actor: Actor;
  readonly entry: Entry | null;
}

export interface PageInfo {
  hasNextPage: boolean;
  endCursor: string;
}

export interface Edge<T> {
  node: T;
  cursor: string;
}

export interface Connection<T> {
  edges: Edge<T>[];
  pageInfo: PageInfo;
}

export interface Thread {
  id: string;
  title: string;
  status: ThreadStatus;
  priority: number;
  customer: Pick<Customer, "id" | "fullName" | "email" | "company"> | null;
  assignee: User | null;
  labels: Label[];
  createdAt: DateTime | null;
  updatedAt: DateTime | null;
  timelineEntries: Connection<TimelineEntry> | null;
}

// Flattened row kept by the snapshot store.
export interface ThreadRecord {
  id: string;
  title: string;
  status: string;
  labels: string[];
  customer: string;
  company: string;
  createdAt: string | null; // ISO
  updatedAt: string | null; // ISO
}
