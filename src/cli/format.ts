import chalk from "chalk";
import { DateTime } from "../core/datetime.js";
import { priorityLabel } from "../core/content.js";

export { priorityLabel };

export function truncate(s: string, maxLen: number): string {
  if (s.length <= maxLen) return s;
  if (maxLen <= 3) return s.slice(0, maxLen);
  return s.slice(0, maxLen - 3) + "...";
}

function pad2(n: number) {
  return String(n).padStart(2, "0");
}

// "YYYY-MM-DD HH:MM" in UTC, "N/A" when absent or unparsable.
export function formatDate(dt: DateTime | null, withSeconds = false): string {
  const d = dt?.tryDate();
  if (!d) return "N/A";
  const base = `${d.getUTCFullYear()}-${pad2(d.getUTCMonth() + 1)}-${pad2(d.getUTCDate())} ${pad2(d.getUTCHours())}:${pad2(d.getUTCMinutes())}`;
  return withSeconds ? `${base}:${pad2(d.getUTCSeconds())}` : base;
}

/**
 * Left-aligned columns separated by two spaces; a dashed rule under the
 * header as wide as each header word.
 */
export function renderTable(headers: string[], rows: string[][]): string {
  const rule = headers.map((h) => "-".repeat(Math.max(3, h.length)));
  const all = [headers, rule, ...rows];
  const widths = headers.map((_, i) => Math.max(...all.map((r) => (r[i] ?? "").length)));
  return all
    .map((r) => widths.map((w, i) => (i === widths.length - 1 ? (r[i] ?? "") : (r[i] ?? "").padEnd(w + 2))).join(""))
    .join("\n");
}

export function statusColor(status: string): (s: string) => string {
  switch (status) {
    case "TODO":
    case "PENDING":
      return chalk.yellow;
    case "SNOOZED":
      return chalk.blue;
    case "OPEN":
      return chalk.green;
    case "DONE":
      return chalk.gray;
    default:
      return chalk.white;
  }
}

export function priorityColor(priority: number): (s: string) => string {
  switch (priority) {
    case 0:
      return chalk.redBright;
    case 1:
      return chalk.red;
    case 2:
      return chalk.yellow;
    case 3:
      return chalk.green;
    default:
      return chalk.white;
  }
}
