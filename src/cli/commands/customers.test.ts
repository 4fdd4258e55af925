import { describe, it } from "node:test";
import assert from "node:assert";
import { DateTime } from "../../core/datetime.js";
import { Customer } from "../../types/contracts.js";
import { fakeApi, testContext } from "../test-helpers.js";
import { runCustomersGet, runCustomersSearch } from "./customers.js";

const bo: Customer = {
  id: "c_1",
  fullName: "Bo Lind",
  email: "bo@example.com",
  status: "ACTIVE",
  company: { id: "co_1", name: "Acme" },
  createdAt: new DateTime("2024-01-02T03:04:05Z"),
  updatedAt: null
};

describe("customers commands", () => {
  it("prints customer details", async () => {
    const { ctx, lines } = testContext(fakeApi({ getCustomerByEmail: async () => bo }));
    await runCustomersGet(ctx, "bo@example.com");
    assert.deepStrictEqual(lines, [
      "Customer Details:",
      "  ID: c_1",
      "  Name: Bo Lind",
      "  Email: bo@example.com",
      "  Status: ACTIVE",
      "  Company: Acme",
      "  Created: 2024-01-02 03:04:05"
    ]);
  });

  it("reports an unknown email", async () => {
    const { ctx, lines } = testContext(fakeApi({ getCustomerByEmail: async () => null }));
    await runCustomersGet(ctx, "nobody@example.com");
    assert.deepStrictEqual(lines, ["Customer with email 'nobody@example.com' not found"]);
  });

  it("searches with the given limit", async () => {
    const calls: [string, number][] = [];
    const api = fakeApi({
      searchCustomers: async (query, first) => {
        calls.push([query, first]);
        return [bo];
      }
    });
    const { ctx, lines } = testContext(api);
    await runCustomersSearch(ctx, "Bo", { limit: 10 });
    assert.deepStrictEqual(calls, [["Bo", 10]]);
    assert.strictEqual(lines[2], "c_1  Bo Lind  bo@example.com  ACTIVE  2024-01-02 03:04");
  });
});
