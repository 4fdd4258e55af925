import { z } from "zod";
import { Entry, EntryKind } from "../types/contracts.js";
import { DateTimeSchema } from "./datetime.js";
import { assertNever } from "./errors.js";
import { has, parseStrict, requireRecord, str } from "./schema.js";

type TypedKind = Exclude<EntryKind, "generic">;

const ParticipantSchema = z.object({ name: str, email: str }).nullish().transform((v) => v ?? null);

const AttachmentSchema = z.object({
  id: str,
  fileName: str,
  fileExtension: str,
  fileMimeType: str,
  type: str
});

const attachments = z.array(AttachmentSchema).nullish().transform((v) => v ?? []);

// GraphQL fragments alias `text` per entry type (chatText: text, ...).
function textOr(alias: string) {
  return (raw: Record<string, unknown>) => ({ ...raw, text: raw.text ?? raw[alias] });
}

const EmailSchema = z.object({
  emailId: z.string(),
  textContent: str,
  from: ParticipantSchema,
  to: ParticipantSchema
});

const ChatSchema = z.object({ chatId: z.string(), text: str });

const NoteSchema = z.object({ noteId: z.string(), text: str, markdown: str, attachments });

const CustomSchema = z.object({
  externalId: str,
  title: z.string(),
  type: str,
  components: z.array(z.record(z.unknown())),
  attachments
});

const SlackSchema = z.object({
  slackMessageLink: str,
  slackWebMessageLink: str,
  text: str,
  customerId: str,
  attachments,
  lastEditedOnSlackAt: DateTimeSchema,
  deletedOnSlackAt: DateTimeSchema
});

/**
 * Which typed variant a payload looks like, or null when it matches none.
 * Only presence is inspected here; field shapes are checked by the parse step.
 */
export function detectEntry(raw: Record<string, unknown>): TypedKind | null {
  if (has(raw, "emailId")) return "email";
  if (has(raw, "chatId")) return "chat";
  if (has(raw, "noteId")) return "note";
  if (has(raw, "title") && Array.isArray(raw.components)) return "custom";
  if (has(raw, "slackMessageLink") || has(raw, "slackWebMessageLink")) {
    return "threadTs" in raw ? "slackReply" : "slackMessage";
  }
  return null;
}

function parseTyped(kind: TypedKind, raw: Record<string, unknown>, what: string): Entry {
  switch (kind) {
    case "email":
      return { kind, ...parseStrict(EmailSchema, raw, what) };
    case "chat":
      return { kind, ...parseStrict(ChatSchema, textOr("chatText")(raw), what) };
    case "note":
      return { kind, ...parseStrict(NoteSchema, textOr("noteText")(raw), what) };
    case "custom":
      return { kind, ...parseStrict(CustomSchema, raw, what) };
    case "slackMessage":
      return { kind, ...parseStrict(SlackSchema, textOr("slackText")(raw), what) };
    case "slackReply":
      return {
        kind,
        ...parseStrict(SlackSchema, textOr("slackText")(raw), what),
        threadTs: parseStrict(str, raw.threadTs, `${what}.threadTs`)
      };
    default:
      return assertNever(kind);
  }
}

/**
 * Decode a "what happened" payload. An object matching no typed shape decodes
 * to the generic variant with its raw fields kept verbatim; a matched shape
 * with ill-typed fields throws MalformedPayloadError.
 * Null, absent and empty payloads mean "no entry".
 */
export function decodeEntry(raw: unknown, what = "entry"): Entry | null {
  if (raw === null || raw === undefined) return null;
  const obj = requireRecord(raw, what);
  if (Object.keys(obj).length === 0) return null;

  const kind = detectEntry(obj);
  return kind ? parseTyped(kind, obj, what) : { kind: "generic", raw: { ...obj } };
}
