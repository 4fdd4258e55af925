import { ApiClient } from "../client/api-client.js";

// The slice of the API client the commands use; tests hand in fakes.
export type ThreadApi = Pick<
  ApiClient,
  | "getThreads"
  | "getThread"
  | "getThreadWithTimeline"
  | "getCustomers"
  | "getCustomerByEmail"
  | "searchCustomers"
  | "threadPages"
  | "threadsUpdatedSincePages"
>;

export interface Output {
  line(text?: string): void;
}

export const stdout: Output = {
  line(text = "") {
    process.stdout.write(text + "\n");
  }
};

export interface CommandContext {
  api: ThreadApi;
  out: Output;
  pageSize: number;
  signal?: AbortSignal;
}
