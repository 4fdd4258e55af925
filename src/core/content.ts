import { Actor, Entry } from "../types/contracts.js";
import { actorId, actorName } from "./actor.js";
import { assertNever } from "./errors.js";
import { isRecord } from "./schema.js";

export type EntryCategory =
  | "Email"
  | "Chat"
  | "Note"
  | "Slack"
  | "Slack Reply"
  | "Custom"
  | "Status Change"
  | "Priority Change"
  | "Assignment"
  | "Message"
  | "Event";

export interface EntryContent {
  category: EntryCategory;
  content: string;
}

const PRIORITY_LABELS = ["Urgent", "High", "Medium", "Low"];

export function priorityLabel(priority: number): string {
  return PRIORITY_LABELS[priority] ?? `P${priority}`;
}

// Generic category discriminators, first key present wins.
const CATEGORY_KEYS: [string, EntryCategory][] = [
  ["emailId", "Email"],
  ["chatId", "Chat"],
  ["noteId", "Note"],
  ["slackText", "Slack"],
  ["chatText", "Chat"],
  ["noteText", "Note"],
  ["slackMessageLink", "Slack"],
  ["slackWebMessageLink", "Slack"],
  ["previousStatus", "Status Change"],
  ["previousPriority", "Priority Change"],
  ["previousAssignee", "Assignment"],
  ["externalId", "Custom"]
];

const TEXT_KEYS = ["slackText", "chatText", "noteText", "text", "textContent", "markdown", "title"];
const FALLBACK_KEYS = ["content", "message", "description", "body", "value"];

function firstText(raw: Record<string, unknown>, keys: string[]): string {
  for (const k of keys) {
    const v = raw[k];
    if (typeof v === "string" && v !== "") return v;
  }
  return "";
}

function assigneeName(v: unknown): string {
  if (!isRecord(v)) return "None";
  if (isRecord(v.user)) {
    return typeof v.user.fullName === "string" ? v.user.fullName : "None";
  }
  if (isRecord(v.team) && typeof v.team.name === "string") return `${v.team.name} (Team)`;
  // the timeline query selects the User fragment directly
  if (typeof v.fullName === "string" && v.fullName !== "") return v.fullName;
  return "None";
}

export function genericCategory(raw: Record<string, unknown>): EntryCategory {
  for (const [k, category] of CATEGORY_KEYS) {
    if (k in raw) return category;
  }
  if (typeof raw.type === "string" && raw.type !== "") return "Custom";
  if ("title" in raw) return "Custom";
  if ("text" in raw || "textContent" in raw) return "Message";
  if ("markdown" in raw) return "Note";
  return "Event";
}

export function genericContent(raw: Record<string, unknown>): string {
  const text = firstText(raw, TEXT_KEYS);
  if (text) return text;

  const { previousStatus, nextStatus, previousPriority, nextPriority } = raw;
  if (typeof previousStatus === "string" && typeof nextStatus === "string") {
    return `Status changed from ${previousStatus} to ${nextStatus}`;
  }
  if (typeof previousPriority === "number" && typeof nextPriority === "number") {
    return `Priority changed from ${priorityLabel(previousPriority)} to ${priorityLabel(nextPriority)}`;
  }
  if ("previousAssignee" in raw || (raw.nextAssignee !== undefined && raw.nextAssignee !== null)) {
    return `Assignment changed from ${assigneeName(raw.previousAssignee)} to ${assigneeName(raw.nextAssignee)}`;
  }

  return firstText(raw, FALLBACK_KEYS);
}

/**
 * Display text and category for a timeline entry. Best effort; never throws.
 */
export function extractContent(entry: Entry | null): EntryContent {
  if (!entry) return { category: "Event", content: "" };

  switch (entry.kind) {
    case "email":
      return { category: "Email", content: entry.textContent };
    case "chat":
      return { category: "Chat", content: entry.text };
    case "note":
      return { category: "Note", content: entry.markdown || entry.text };
    case "custom":
      return { category: "Custom", content: entry.title };
    case "slackMessage":
      return { category: "Slack", content: entry.text };
    case "slackReply":
      return { category: "Slack Reply", content: entry.text };
    case "generic":
      return { category: genericCategory(entry.raw), content: genericContent(entry.raw) };
    default:
      return assertNever(entry);
  }
}

export function entrySender(actor: Actor): string {
  return actorName(actor) || actorId(actor) || "Unknown";
}
