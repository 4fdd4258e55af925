import { describe, it, before } from "node:test";
import assert from "node:assert";
import chalk from "chalk";
import { Connection, Thread, ThreadRecord } from "../../types/contracts.js";
import { ThreadStore } from "../../store/store.js";
import { connection, fakeApi, makeThread, testContext } from "../test-helpers.js";
import { rangeStart, runReport } from "./report.js";

const now = new Date("2024-06-10T12:00:00Z");

const t1 = makeThread({
  id: "t1",
  title: "Login broken",
  status: "TODO",
  labels: [
    { labelType: { id: "l1", name: "bug", icon: null } },
    { labelType: { id: "l2", name: "auth", icon: null } }
  ],
  customer: { id: "c1", fullName: "Ana", email: "ana@example.com", company: { id: "co1", name: "Acme" } },
  createdAt: "2024-06-04T08:00:00Z",
  updatedAt: "2024-06-09T10:30:00Z"
});
const t2 = makeThread({ id: "t2", title: "Printer jam", status: "DONE" });
const t3 = makeThread({
  id: "t3",
  title: "Refund",
  status: "TODO",
  customer: { id: "c2", fullName: "Bo", email: "", company: null }
});

function reportApi(pages: Record<string, Connection<Thread>>) {
  const seen: { since: string[]; pageSizes: number[] } = { since: [], pageSizes: [] };
  const api = fakeApi({
    threadsUpdatedSincePages: (since) => {
      seen.since.push(since);
      return async (cursor, pageSize) => {
        seen.pageSizes.push(pageSize);
        return pages[cursor];
      };
    }
  });
  return { api, seen };
}

class MemoryStore implements ThreadStore {
  records: ThreadRecord[] = [];
  closed = false;
  async init() {}
  async upsertThreads(records: ThreadRecord[]) {
    this.records.push(...records);
  }
  async getThread(id: string) {
    return this.records.find((r) => r.id === id) ?? null;
  }
  async countThreads() {
    return this.records.length;
  }
  async close() {
    this.closed = true;
  }
}

describe("runReport", () => {
  before(() => {
    chalk.level = 0;
  });

  it("computes the range start", () => {
    assert.strictEqual(rangeStart("1d", now).toISOString(), "2024-06-09T12:00:00.000Z");
    assert.strictEqual(rangeStart("60d", now).toISOString(), "2024-04-11T12:00:00.000Z");
  });

  it("walks every page and prints the table and summary", async () => {
    const { api, seen } = reportApi({
      "": connection([t1, t2], true, "p2"),
      p2: connection([t3], false, "")
    });
    const { ctx, lines } = testContext(api);
    await runReport(ctx, { range: "7d", now });

    assert.deepStrictEqual(seen.since, ["2024-06-03T12:00:00.000Z"]);
    assert.deepStrictEqual(seen.pageSizes, [100, 100]);
    assert.deepStrictEqual(lines, [
      "Generating report for threads from 2024-06-03 12:00 to 2024-06-10 12:00",
      "",
      "=== Thread Report (7d) ===",
      "Total threads found: 3",
      "",
      "ID   TITLE         STATUS  LABELS     CUSTOMER  COMPANY  CREATED           UPDATED",
      "---  -----         ------  ------     --------  -------  -------           -------",
      "t1   Login broken  TODO    bug, auth  Ana       Acme     2024-06-04 08:00  2024-06-09 10:30",
      "t2   Printer jam   DONE    N/A        N/A       N/A      N/A               N/A",
      "t3   Refund        TODO    N/A        Bo        N/A      N/A               N/A",
      "",
      "=== Summary ===",
      "Thread counts by status:",
      "  TODO: 2",
      "  DONE: 1"
    ]);
  });

  it("prints only the summary when asked", async () => {
    const { api } = reportApi({ "": connection([t1, t2, t3], false, "") });
    const { ctx, lines } = testContext(api);
    await runReport(ctx, { range: "1d", summary: true, now });
    assert.deepStrictEqual(lines.slice(1), ["", "=== Summary ===", "Thread counts by status:", "  TODO: 2", "  DONE: 1"]);
  });

  it("says so when nothing was updated", async () => {
    const { api } = reportApi({ "": connection<Thread>([], false, "") });
    const { ctx, lines } = testContext(api);
    await runReport(ctx, { range: "30d", now });
    assert.deepStrictEqual(lines.slice(1), ["No threads found for the specified date range"]);
  });

  it("marks an incomplete walk", async () => {
    const { api } = reportApi({ "": connection([t2], true, "") });
    const { ctx, lines } = testContext(api);
    await runReport(ctx, { range: "1d", now });
    assert.strictEqual(lines[3], "Total threads found: 1 (incomplete)");
  });

  it("saves snapshot records and closes the store", async () => {
    const { api } = reportApi({ "": connection([t1, t2], false, "") });
    const { ctx } = testContext(api);
    const store = new MemoryStore();
    const opened: string[] = [];
    await runReport(ctx, {
      range: "7d",
      summary: true,
      save: "snap.db",
      now,
      openStore: (file) => {
        opened.push(file);
        return store;
      }
    });

    assert.deepStrictEqual(opened, ["snap.db"]);
    assert.strictEqual(store.closed, true);
    assert.deepStrictEqual(store.records[0], {
      id: "t1",
      title: "Login broken",
      status: "TODO",
      labels: ["bug", "auth"],
      customer: "Ana",
      company: "Acme",
      createdAt: "2024-06-04T08:00:00.000Z",
      updatedAt: "2024-06-09T10:30:00.000Z"
    });
    assert.strictEqual(store.records[1].customer, "");
  });
});
