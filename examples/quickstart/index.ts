/**
 * Dwolla Quickstart
 *
 * Walks the sandbox through a payout:
 * 1. Retrieve the master account and its funding sources
 * 2. Create a personal customer and attach a bank account
 * 3. Send a transfer from the account to the customer
 *
 * Requires DWOLLA_CLIENT_ID and DWOLLA_CLIENT_SECRET for a sandbox
 * application (read from .env).
 */
import { DwollaClient, isDwollaError } from "@dwolla-node/core";
import dotenv from "dotenv";

dotenv.config();

const colors = {
  reset: "\x1b[0m",
  bright: "\x1b[1m",
  dim: "\x1b[2m",
  green: "\x1b[32m",
  red: "\x1b[31m",
};

function log(message: string, color: keyof typeof colors = "reset") {
  console.log(`${colors[color]}${message}${colors.reset}`);
}

function logSection(title: string) {
  console.log("");
  log(`  ${title}`, "bright");
}

async function main() {
  const dwolla = new DwollaClient({ environment: "sandbox" });

  logSection("Master account");
  const account = await dwolla.retrieveAccount();
  log(`  ✓ ${account.name ?? account.id}`, "green");

  const sources = await dwolla.accounts.listFundingSources(account, {
    removed: false,
  });
  const bank = sources.find((source) => source.type === "bank");
  if (!bank) {
    log("  ✗ account has no bank funding source", "red");
    return;
  }
  log(`    paying from ${bank.name ?? bank.id}`, "dim");

  logSection("Customer");
  const customerId = await dwolla.createCustomer({
    firstName: "Jane",
    lastName: "Doe",
    email: `jane+${Date.now()}@example.com`,
    type: "personal",
    address1: "1 Main St",
    city: "Des Moines",
    state: "IA",
    postalCode: "50309",
    dateOfBirth: "1980-01-01",
    ssn: "1234",
  });
  const customer = await dwolla.getCustomer(customerId);
  log(`  ✓ ${customer.firstName} ${customer.lastName} (${customer.status})`, "green");

  const destinationId = await dwolla.customers.createFundingSource(customer, {
    routingNumber: "222222226",
    accountNumber: `${Date.now()}`.slice(-9),
    bankAccountType: "checking",
    name: "Jane's Checking",
  });
  log(`    funding source ${destinationId}`, "dim");

  logSection("Transfer");
  const transferId = await dwolla.createTransfer({
    source: bank.id,
    destination: destinationId,
    amount: { currency: "USD", value: "10.00" },
    metadata: { note: "quickstart" },
  });
  const transfer = await dwolla.getTransfer(transferId);
  log(`  ✓ ${transfer.amount?.value} ${transfer.amount?.currency} ${transfer.status}`, "green");
}

main().catch((error: unknown) => {
  if (isDwollaError(error)) {
    log(`  ✗ ${error.operation}: ${error.message}`, "red");
  } else {
    console.error(error);
  }
  process.exitCode = 1;
});
