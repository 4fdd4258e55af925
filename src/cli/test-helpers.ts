import { DateTime } from "../core/datetime.js";
import { Connection, Thread } from "../types/contracts.js";
import { CommandContext, Output, ThreadApi } from "./context.js";

// In-process stand-ins for command tests.

export function fakeApi(overrides: Partial<ThreadApi> = {}): ThreadApi {
  const unexpected = (name: string) => () => Promise.reject(new Error(`unexpected call: ${name}`));
  return {
    getThreads: unexpected("getThreads"),
    getThread: unexpected("getThread"),
    getThreadWithTimeline: unexpected("getThreadWithTimeline"),
    getCustomers: unexpected("getCustomers"),
    getCustomerByEmail: unexpected("getCustomerByEmail"),
    searchCustomers: unexpected("searchCustomers"),
    threadPages: () => unexpected("threadPages"),
    threadsUpdatedSincePages: () => unexpected("threadsUpdatedSincePages"),
    ...overrides
  };
}

export function captureOutput(): { out: Output; lines: string[] } {
  const lines: string[] = [];
  return {
    lines,
    out: {
      line(text = "") {
        lines.push(...text.split("\n"));
      }
    }
  };
}

export function testContext(api: ThreadApi, pageSize = 20): { ctx: CommandContext; lines: string[] } {
  const { out, lines } = captureOutput();
  return { ctx: { api, out, pageSize }, lines };
}

export function makeThread(
  t: Partial<Omit<Thread, "createdAt" | "updatedAt">> & { id: string; createdAt?: string; updatedAt?: string }
): Thread {
  return {
    title: "",
    status: "TODO",
    priority: 2,
    customer: null,
    assignee: null,
    labels: [],
    timelineEntries: null,
    ...t,
    createdAt: t.createdAt ? new DateTime(t.createdAt) : null,
    updatedAt: t.updatedAt ? new DateTime(t.updatedAt) : null
  };
}

export function connection<T>(nodes: T[], hasNextPage = false, endCursor = ""): Connection<T> {
  return { edges: nodes.map((node, i) => ({ node, cursor: `c${i}` })), pageInfo: { hasNextPage, endCursor } };
}
