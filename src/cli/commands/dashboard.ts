import chalk from "chalk";
import { Command } from "commander";
import { ACTIVE_STATUSES } from "../../client/api-client.js";
import { sampleCount } from "../../core/paginate.js";
import { log } from "../../lib/logger.js";
import { Thread } from "../../types/contracts.js";
import { CommandContext } from "../context.js";

const SAMPLE_PAGE_SIZE = 50;
const RECENT_PAGE_SIZE = 100;

interface Tile {
  title: string;
  load(): Promise<string>;
}

function utcDay(d: Date): string {
  return d.toISOString().slice(0, 10);
}

export function countCreatedOn(threads: Thread[], day: Date): number {
  const want = utcDay(day);
  return threads.filter((t) => {
    const created = t.createdAt?.tryDate();
    return created ? utcDay(created) === want : false;
  }).length;
}

export function countUnassigned(threads: Thread[]): number {
  return threads.filter((t) => t.assignee === null).length;
}

/**
 * Summary tiles, loaded concurrently. A tile that fails shows its error
 * and does not hold up the others.
 */
export async function runDashboard(ctx: CommandContext, opts: { now?: Date } = {}): Promise<void> {
  const now = opts.now ?? new Date();
  const walk = { pageSize: SAMPLE_PAGE_SIZE, signal: ctx.signal };

  const sampled = (statuses?: string[]) => async () => {
    const r = await sampleCount(ctx.api.threadPages({ statuses }), walk);
    return r.isEstimate ? `${r.count}+` : String(r.count);
  };

  const firstPage = async (statuses?: string[]) => {
    const args = statuses ? { statuses, first: RECENT_PAGE_SIZE } : { first: RECENT_PAGE_SIZE };
    const c = await ctx.api.getThreads(args, ctx.signal);
    return c.edges.map((e) => e.node);
  };

  const tiles: Tile[] = [
    { title: "Todo", load: sampled(["TODO"]) },
    { title: "Snoozed", load: sampled(["SNOOZED"]) },
    { title: "All threads", load: sampled() },
    // all statuses, DONE included
    { title: "Created today", load: async () => String(countCreatedOn(await firstPage(), now)) },
    { title: "Unassigned", load: async () => String(countUnassigned(await firstPage(ACTIVE_STATUSES))) }
  ];

  const results = await Promise.allSettled(tiles.map((t) => t.load()));
  const width = Math.max(...tiles.map((t) => t.title.length)) + 2;

  ctx.out.line(chalk.bold("=== Dashboard ==="));
  tiles.forEach((tile, i) => {
    const r = results[i];
    let value: string;
    if (r.status === "fulfilled") {
      value = chalk.bold(r.value);
    } else {
      const message = r.reason instanceof Error ? r.reason.message : String(r.reason);
      log.error({ err: r.reason, tile: tile.title }, "dashboard: tile failed");
      value = chalk.red(`error: ${message}`);
    }
    ctx.out.line(`${`${tile.title}:`.padEnd(width)}${value}`);
  });
}

export function registerDashboardCommand(program: Command, makeContext: () => CommandContext) {
  program
    .command("dashboard")
    .description("Show thread counts at a glance")
    .action(async () => {
      await runDashboard(makeContext());
    });
}
