export { DateTime, DateTimeSchema } from "./core/datetime.js";
export { DecodeError, UnknownActorTypeError, MalformedPayloadError, DateTimeParseError } from "./core/errors.js";
export { decodeActor, actorId, actorName, actorEmail } from "./core/actor.js";
export { decodeEntry } from "./core/entry.js";
export { decodeThread, decodeCustomer, decodeTimelineEntry, decodeConnection } from "./core/decode.js";
export { extractContent, entrySender, priorityLabel } from "./core/content.js";
export type { EntryCategory } from "./core/content.js";
export { collectAll, sampleCount, DEFAULT_SAMPLE_PAGES } from "./core/paginate.js";
export type { PageFetcher, WalkOptions, CollectResult, SampleResult } from "./core/paginate.js";
export { ApiClient, ApiError, ACTIVE_STATUSES } from "./client/api-client.js";
export type { FetchLike, ThreadFilter } from "./client/api-client.js";
export { SqliteThreadStore } from "./store/sqlite.js";
export { toThreadRecord } from "./store/store.js";
export type { ThreadStore } from "./store/store.js";
export type {
  Actor,
  ActorKind,
  Attachment,
  Company,
  Connection,
  Customer,
  Edge,
  EmailParticipant,
  Entry,
  EntryKind,
  Label,
  LabelType,
  MachineUser,
  PageInfo,
  Thread,
  ThreadRecord,
  ThreadStatus,
  TimelineEntry,
  User
} from "./types/contracts.js";
