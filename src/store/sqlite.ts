import sqlite3 from "sqlite3";
import { z } from "zod";
import { ThreadStore } from "./store.js";
import { ThreadRecord } from "../types/contracts.js";

type Param = string | number | null;

function run(db: sqlite3.Database, sql: string, params: Param[] = []) {
  return new Promise<void>((resolve, reject) => {
    db.run(sql, params, (err) => (err ? reject(err) : resolve()));
  });
}
function get(db: sqlite3.Database, sql: string, params: Param[] = []) {
  return new Promise<unknown>((resolve, reject) => {
    db.get(sql, params, (err, row) => (err ? reject(err) : resolve(row)));
  });
}

const ThreadRow = z.object({
  id: z.string(),
  title: z.string(),
  status: z.string(),
  labels_json: z.string(),
  customer: z.string(),
  company: z.string(),
  created_at: z.string().nullable(),
  updated_at: z.string().nullable()
});

const LabelNames = z.array(z.string());

export class SqliteThreadStore implements ThreadStore {
  private db: sqlite3.Database;

  constructor(private dbPath: string) {
    this.db = new sqlite3.Database(dbPath);
  }

  async init(): Promise<void> {
    if (this.dbPath !== ":memory:") await run(this.db, `pragma journal_mode = wal;`);
    await run(this.db, `
      create table if not exists threads (
        id text primary key,
        title text not null,
        status text not null,
        labels_json text not null,
        customer text not null,
        company text not null,
        created_at text,
        updated_at text
      );
    `);
    await run(this.db, `create index if not exists idx_threads_status on threads(status);`);
  }

  async upsertThreads(records: ThreadRecord[]): Promise<void> {
    for (const t of records) {
      await run(this.db, `
        insert into threads (id, title, status, labels_json, customer, company, created_at, updated_at)
        values (?,?,?,?,?,?,?,?)
        on conflict(id) do update set
          title=excluded.title,
          status=excluded.status,
          labels_json=excluded.labels_json,
          customer=excluded.customer,
          company=excluded.company,
          created_at=excluded.created_at,
          updated_at=excluded.updated_at
      `, [
        t.id, t.title, t.status, JSON.stringify(t.labels),
        t.customer, t.company, t.createdAt, t.updatedAt
      ]);
    }
  }

  async getThread(id: string): Promise<ThreadRecord | null> {
    const row = await get(this.db, `select * from threads where id=?`, [id]);
    return row ? this.rowToRecord(row) : null;
  }

  async countThreads(): Promise<number> {
    const row = await get(this.db, `select count(*) as n from threads`);
    return z.object({ n: z.number() }).parse(row).n;
  }

  close(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.db.close((err) => (err ? reject(err) : resolve()));
    });
  }

  private rowToRecord(raw: unknown): ThreadRecord {
    const r = ThreadRow.parse(raw);
    return {
      id: r.id,
      title: r.title,
      status: r.status,
      labels: LabelNames.parse(JSON.parse(r.labels_json)),
      customer: r.customer,
      company: r.company,
      createdAt: r.created_at,
      updatedAt: r.updated_at
    };
  }
}
