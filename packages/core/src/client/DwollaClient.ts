import axios from "axios";

import { createLogger } from "../lib/logger";
import type { Account } from "../types/account";
import { DwollaClientConfig, DwollaEnvironment, resolveConfig } from "../types/config";
import type {
  CreateCustomerRequest,
  Customer,
  Document,
  ListCustomersParams,
} from "../types/customer";
import type { FundingSource } from "../types/funding";
import type {
  CreateTransferRequest,
  OnDemandAuthorization,
  Transfer,
} from "../types/transfer";
import { AccountAPI } from "./AccountAPI";
import { AuthClient } from "./AuthClient";
import { CustomerAPI } from "./CustomerAPI";
import { FundingSourceAPI } from "./FundingSourceAPI";
import { HttpClient } from "./HttpClient";
import { TransferAPI } from "./TransferAPI";

/**
 * Main client for interacting with the Dwolla API
 *
 * @example
 * ```typescript
 * import { DwollaClient } from "@dwolla-node/core";
 *
 * // Reads DWOLLA_CLIENT_ID / DWOLLA_CLIENT_SECRET when omitted
 * const dwolla = new DwollaClient({ environment: "sandbox" });
 *
 * const account = await dwolla.retrieveAccount();
 * const customers = await dwolla.customers.list({ status: "verified" });
 * ```
 */
export class DwollaClient {
  public readonly environment: DwollaEnvironment;
  public readonly auth: AuthClient;
  public readonly accounts: AccountAPI;
  public readonly customers: CustomerAPI;
  public readonly fundingSources: FundingSourceAPI;
  public readonly transfers: TransferAPI;

  constructor(config: DwollaClientConfig = {}) {
    const resolved = resolveConfig(config);
    const logger = config.logger ?? createLogger();
    const axiosInstance = config.axiosInstance ?? axios.create();

    this.environment = resolved.environment;
    this.auth = new AuthClient(axiosInstance, {
      clientId: resolved.clientId,
      clientSecret: resolved.clientSecret,
      rootURL: resolved.rootURL,
      timeout: resolved.timeout,
      logger,
    });

    const httpClient = new HttpClient(axiosInstance, this.auth, {
      timeout: resolved.timeout,
      headers: resolved.headers,
      logger,
    });

    // Initialize API modules
    this.accounts = new AccountAPI(httpClient);
    this.customers = new CustomerAPI(httpClient);
    this.fundingSources = new FundingSourceAPI(httpClient);
    this.transfers = new TransferAPI(httpClient);
  }

  /**
   * Root URL of the configured environment
   */
  rootURL(): string {
    return this.auth.rootURL();
  }

  retrieveAccount(): Promise<Account> {
    return this.accounts.retrieve();
  }

  createCustomer(data: CreateCustomerRequest): Promise<string> {
    return this.customers.create(data);
  }

  listCustomers(params?: ListCustomersParams): Promise<Customer[]> {
    return this.customers.list(params);
  }

  getCustomer(customerId: string): Promise<Customer> {
    return this.customers.get(customerId);
  }

  getDocument(documentId: string): Promise<Document> {
    return this.customers.getDocument(documentId);
  }

  getFundingSource(fundingSourceId: string): Promise<FundingSource> {
    return this.fundingSources.get(fundingSourceId);
  }

  createTransfer(data: CreateTransferRequest): Promise<string> {
    return this.transfers.create(data);
  }

  getTransfer(transferId: string): Promise<Transfer> {
    return this.transfers.get(transferId);
  }

  createOnDemandAuthorization(): Promise<OnDemandAuthorization> {
    return this.transfers.createOnDemandAuthorization();
  }
}
