import chalk from "chalk";
import { Command } from "commander";
import { ACTIVE_STATUSES } from "../../client/api-client.js";
import { entrySender, extractContent } from "../../core/content.js";
import { Connection, Thread } from "../../types/contracts.js";
import { CommandContext } from "../context.js";
import { parseLimit } from "../options.js";
import { formatDate, priorityColor, priorityLabel, renderTable, statusColor } from "../format.js";

export function threadRows(conn: Connection<Thread>): string[][] {
  return conn.edges.map(({ node: t }) => [
    t.id,
    t.title,
    t.status,
    priorityLabel(t.priority),
    t.customer?.fullName || "N/A",
    t.customer?.company?.name || "N/A",
    formatDate(t.createdAt)
  ]);
}

export async function runThreadsList(
  ctx: CommandContext,
  opts: { limit?: number; cursor?: string; status?: string; all?: boolean }
): Promise<void> {
  const statuses = opts.status ? [opts.status] : opts.all ? undefined : ACTIVE_STATUSES;
  const threads = await ctx.api.getThreads({ statuses, first: opts.limit ?? ctx.pageSize, after: opts.cursor }, ctx.signal);

  if (threads.edges.length === 0) {
    ctx.out.line("No threads found");
    return;
  }

  ctx.out.line(
    renderTable(["ID", "TITLE", "STATUS", "PRIORITY", "CUSTOMER", "COMPANY", "CREATED"], threadRows(threads))
  );
  if (threads.pageInfo.hasNextPage) {
    ctx.out.line();
    ctx.out.line(`Next page cursor: ${threads.pageInfo.endCursor}`);
  }
}

function threadHeader(ctx: CommandContext, t: Thread) {
  ctx.out.line("Thread Details:");
  ctx.out.line(`  ID: ${t.id}`);
  ctx.out.line(`  Title: ${t.title}`);
  ctx.out.line(`  Status: ${statusColor(t.status)(t.status)}`);
  ctx.out.line(`  Priority: ${priorityColor(t.priority)(priorityLabel(t.priority))}`);
  if (t.customer) ctx.out.line(`  Customer: ${t.customer.fullName} (${t.customer.email})`);
  if (t.assignee) ctx.out.line(`  Assignee: ${t.assignee.fullName}`);
  if (t.labels.length) ctx.out.line(`  Labels: ${t.labels.map((l) => l.labelType.name).join(", ")}`);
  if (t.createdAt) ctx.out.line(`  Created: ${formatDate(t.createdAt, true)}`);
  if (t.updatedAt) ctx.out.line(`  Updated: ${formatDate(t.updatedAt, true)}`);
}

export async function runThreadsGet(ctx: CommandContext, id: string): Promise<void> {
  const thread = await ctx.api.getThread(id, ctx.signal);
  if (!thread) {
    ctx.out.line(`Thread with ID '${id}' not found`);
    return;
  }
  threadHeader(ctx, thread);
}

/**
 * Thread header followed by its timeline, printed in reverse of the order the
 * API returns it.
 */
export async function runThreadsShow(ctx: CommandContext, id: string): Promise<void> {
  const thread = await ctx.api.getThreadWithTimeline(id, ctx.signal);
  if (!thread) {
    ctx.out.line(`Thread with ID '${id}' not found`);
    return;
  }
  threadHeader(ctx, thread);
  ctx.out.line();
  ctx.out.line(chalk.bold("Messages"));
  ctx.out.line("─".repeat(50));

  const edges = thread.timelineEntries?.edges ?? [];
  if (edges.length === 0) {
    ctx.out.line("No messages in this thread");
    return;
  }

  [...edges].reverse().forEach(({ node }, i) => {
    const { category, content } = extractContent(node.entry);
    const when = node.timestamp ? formatDate(node.timestamp, true) : "";
    const sender = chalk.bold.green(entrySender(node.actor));
    if (i > 0) ctx.out.line("─".repeat(30));
    ctx.out.line(when ? `${sender} ${chalk.gray(when)}` : sender);
    ctx.out.line(`${chalk.cyan(`[${category}]`)} ${content || "(no content)"}`);
  });
}

export function registerThreadsCommand(program: Command, makeContext: () => CommandContext) {
  const threads = program.command("threads").description("Browse threads");

  threads
    .command("list")
    .description("List active threads (TODO and SNOOZED)")
    .option("-l, --limit <n>", "number of threads to retrieve (default: ui.page_size)", parseLimit)
    .option("-c, --cursor <cursor>", "cursor for pagination")
    .option("-s, --status <status>", "filter by status (TODO, SNOOZED, DONE)")
    .action(async (opts: { limit?: number; cursor?: string; status?: string }) => {
      await runThreadsList(makeContext(), opts);
    });

  threads
    .command("all")
    .description("List all threads, including done")
    .option("-l, --limit <n>", "number of threads to retrieve (default: ui.page_size)", parseLimit)
    .option("-c, --cursor <cursor>", "cursor for pagination")
    .action(async (opts: { limit?: number; cursor?: string }) => {
      await runThreadsList(makeContext(), { ...opts, all: true });
    });

  threads
    .command("get <id>")
    .description("Show one thread")
    .action(async (id: string) => {
      await runThreadsGet(makeContext(), id);
    });

  threads
    .command("show <id>")
    .description("Show one thread with its timeline")
    .action(async (id: string) => {
      await runThreadsShow(makeContext(), id);
    });
}
