import { Command } from "commander";
import { Customer } from "../../types/contracts.js";
import { CommandContext } from "../context.js";
import { formatDate, renderTable } from "../format.js";
import { parseLimit } from "../options.js";

const HEADERS = ["ID", "NAME", "EMAIL", "STATUS", "CREATED"];

function customerRow(c: Customer): string[] {
  return [c.id, c.fullName, c.email, c.status, formatDate(c.createdAt)];
}

export async function runCustomersList(ctx: CommandContext, opts: { limit?: number; cursor?: string }) {
  const customers = await ctx.api.getCustomers({ first: opts.limit ?? ctx.pageSize, after: opts.cursor }, ctx.signal);
  if (customers.edges.length === 0) {
    ctx.out.line("No customers found");
    return;
  }
  ctx.out.line(renderTable(HEADERS, customers.edges.map((e) => customerRow(e.node))));
  if (customers.pageInfo.hasNextPage) {
    ctx.out.line();
    ctx.out.line(`Next page cursor: ${customers.pageInfo.endCursor}`);
  }
}

export async function runCustomersGet(ctx: CommandContext, email: string) {
  const c = await ctx.api.getCustomerByEmail(email, ctx.signal);
  if (!c) {
    ctx.out.line(`Customer with email '${email}' not found`);
    return;
  }
  ctx.out.line("Customer Details:");
  ctx.out.line(`  ID: ${c.id}`);
  ctx.out.line(`  Name: ${c.fullName}`);
  ctx.out.line(`  Email: ${c.email}`);
  ctx.out.line(`  Status: ${c.status}`);
  if (c.company) ctx.out.line(`  Company: ${c.company.name}`);
  if (c.createdAt) ctx.out.line(`  Created: ${formatDate(c.createdAt, true)}`);
  if (c.updatedAt) ctx.out.line(`  Updated: ${formatDate(c.updatedAt, true)}`);
}

export async function runCustomersSearch(ctx: CommandContext, query: string, opts: { limit: number }) {
  const found = await ctx.api.searchCustomers(query, opts.limit, ctx.signal);
  if (found.length === 0) {
    ctx.out.line(`No customers found matching '${query}'`);
    return;
  }
  ctx.out.line(renderTable(HEADERS, found.map(customerRow)));
}

export function registerCustomersCommand(program: Command, makeContext: () => CommandContext) {
  const customers = program.command("customers").description("Look up customers");

  customers
    .command("list")
    .description("List customers")
    .option("-l, --limit <n>", "number of customers to retrieve (default: ui.page_size)", parseLimit)
    .option("-c, --cursor <cursor>", "cursor for pagination")
    .action(async (opts: { limit?: number; cursor?: string }) => {
      await runCustomersList(makeContext(), opts);
    });

  customers
    .command("get <email>")
    .description("Get a customer by email address")
    .action(async (email: string) => {
      await runCustomersGet(makeContext(), email);
    });

  customers
    .command("search <query>")
    .description("Search customers by name")
    .option("-l, --limit <n>", "number of results", parseLimit, 10)
    .action(async (query: string, opts: { limit: number }) => {
      await runCustomersSearch(makeContext(), query, opts);
    });
}
