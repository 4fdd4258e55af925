import { z } from "zod";
import { Connection, Customer, Thread, ThreadStatus } from "../types/contracts.js";
import { decodeConnection, decodeCustomer, decodeThread } from "../core/decode.js";
import { PageFetcher } from "../core/paginate.js";
import * as Q from "./queries.js";
import { log } from "../lib/logger.js";

export class ApiError extends Error {
  readonly status?: number;

  constructor(message: string, status?: number) {
    super(message);
    this.name = "ApiError";
    this.status = status;
  }
}

const GraphQLResponse = z.object({
  data: z.record(z.unknown()).nullish(),
  errors: z.array(z.object({ message: z.string() }).passthrough()).nullish()
});

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export interface ThreadFilter {
  statuses?: ThreadStatus[];
}

export const ACTIVE_STATUSES: ThreadStatus[] = ["TODO", "SNOOZED"];

export class ApiClient {
  private endpoint: string;
  private apiKey: string;
  private fetchImpl: FetchLike;

  constructor(args: { endpoint: string; apiKey: string; fetchImpl?: FetchLike }) {
    this.endpoint = args.endpoint;
    this.apiKey = args.apiKey;
    this.fetchImpl = args.fetchImpl ?? fetch;
  }

  /**
   * POST one GraphQL operation and return the named field of `data`.
   * HTTP failures and GraphQL `errors` both raise ApiError.
   */
  async request(
    operation: string,
    query: string,
    variables: Record<string, unknown>,
    field: string,
    signal?: AbortSignal
  ): Promise<unknown> {
    const started = Date.now();
    const r = await this.fetchImpl(this.endpoint, {
      method: "POST",
      headers: {
        "Authorization": `Bearer ${this.apiKey}`,
        "Content-Type": "application/json"
      },
      body: JSON.stringify({ query, variables }),
      signal
    });

    if (!r.ok) {
      const txt = await r.text().catch(() => "");
      throw new ApiError(`${operation}: HTTP ${r.status}${txt ? `: ${txt.slice(0, 200)}` : ""}`, r.status);
    }

    const parsed = GraphQLResponse.safeParse(await r.json());
    if (!parsed.success) throw new ApiError(`${operation}: unexpected response shape`, r.status);

    const { data, errors } = parsed.data;
    if (errors && errors.length) {
      throw new ApiError(`${operation}: ${errors.map((e) => e.message).join("; ")}`, r.status);
    }

    log.debug({ operation, ms: Date.now() - started }, "api: request");
    return data?.[field] ?? null;
  }

  async getThreads(args: ThreadFilter & { first: number; after?: string }, signal?: AbortSignal): Promise<Connection<Thread>> {
    const raw = await this.request(
      "getThreads",
      Q.THREADS,
      { first: args.first, after: args.after || null, statuses: args.statuses ?? null },
      "threads",
      signal
    );
    return decodeConnection(raw, decodeThread, "threads");
  }

  async getThreadsUpdatedSince(
    args: { since: string; first: number; after?: string },
    signal?: AbortSignal
  ): Promise<Connection<Thread>> {
    const raw = await this.request(
      "getThreadsUpdatedSince",
      Q.THREADS_UPDATED_SINCE,
      { first: args.first, after: args.after || null, since: args.since },
      "threads",
      signal
    );
    return decodeConnection(raw, decodeThread, "threads");
  }

  async getThread(threadId: string, signal?: AbortSignal): Promise<Thread | null> {
    const raw = await this.request("getThread", Q.THREAD, { threadId }, "thread", signal);
    return raw === null ? null : decodeThread(raw);
  }

  async getThreadWithTimeline(threadId: string, signal?: AbortSignal): Promise<Thread | null> {
    const raw = await this.request("getThreadWithTimeline", Q.THREAD_WITH_TIMELINE, { threadId }, "thread", signal);
    return raw === null ? null : decodeThread(raw);
  }

  async getCustomers(args: { first: number; after?: string }, signal?: AbortSignal): Promise<Connection<Customer>> {
    const raw = await this.request(
      "getCustomers",
      Q.CUSTOMERS,
      { first: args.first, after: args.after || null },
      "customers",
      signal
    );
    return decodeConnection(raw, decodeCustomer, "customers");
  }

  async getCustomerByEmail(email: string, signal?: AbortSignal): Promise<Customer | null> {
    const raw = await this.request("getCustomerByEmail", Q.CUSTOMER_BY_EMAIL, { email }, "customerByEmail", signal);
    return raw === null ? null : decodeCustomer(raw);
  }

  async searchCustomers(query: string, first: number, signal?: AbortSignal): Promise<Customer[]> {
    const raw = await this.request("searchCustomers", Q.SEARCH_CUSTOMERS, { query, first }, "customers", signal);
    return decodeConnection(raw, decodeCustomer, "customers").edges.map((e) => e.node);
  }

  threadPages(filter: ThreadFilter = {}): PageFetcher<Thread> {
    return (cursor, pageSize, signal) => this.getThreads({ ...filter, first: pageSize, after: cursor }, signal);
  }

  threadsUpdatedSincePages(since: string): PageFetcher<Thread> {
    return (cursor, pageSize, signal) => this.getThreadsUpdatedSince({ since, first: pageSize, after: cursor }, signal);
  }

  customerPages(): PageFetcher<Customer> {
    return (cursor, pageSize, signal) => this.getCustomers({ first: pageSize, after: cursor }, signal);
  }
}
