import { Account, accountSchema, rootResourceSchema } from "../types/account";
import { FundingSource, fundingSourceSchema, ListFundingSourcesParams } from "../types/funding";
import { ListTransfersParams, Transfer, transferSchema } from "../types/transfer";
import type { HttpClient } from "./HttpClient";
import { transferQuery } from "./TransferAPI";

/**
 * An account ID, or an account record obtained from this client
 */
export type AccountReference = string | Pick<Account, "id" | "_links">;

export class AccountAPI {
  constructor(private readonly httpClient: HttpClient) {}

  /**
   * Retrieve the master account tied to the client credentials
   *
   * Reads the API root and follows its `account` link.
   */
  async retrieve(): Promise<Account> {
    const errors = { action: "retrieve the account", resource: "account" };
    const root = await this.httpClient.requestEntity(
      { operation: "accounts.retrieve", method: "GET", url: "/", errors },
      rootResourceSchema,
    );

    return await this.httpClient.requestEntity(
      {
        operation: "accounts.retrieve",
        method: "GET",
        url: root._links.account.href,
        errors,
      },
      accountSchema,
    );
  }

  /**
   * List the account's own funding sources (bank accounts and balance)
   */
  async listFundingSources(
    account: AccountReference,
    params: ListFundingSourcesParams = {},
  ): Promise<FundingSource[]> {
    return await this.httpClient.requestList(
      {
        operation: "accounts.listFundingSources",
        method: "GET",
        url: `${this.accountURL(account)}/funding-sources`,
        params: { removed: params.removed },
        errors: { action: "list funding sources", resource: "account" },
      },
      "funding-sources",
      fundingSourceSchema,
    );
  }

  /**
   * List transfers made by the account
   */
  async listTransfers(
    account: AccountReference,
    params: ListTransfersParams = {},
  ): Promise<Transfer[]> {
    return await this.httpClient.requestList(
      {
        operation: "accounts.listTransfers",
        method: "GET",
        url: `${this.accountURL(account)}/transfers`,
        params: transferQuery(params),
        errors: { action: "list transfers", resource: "account" },
      },
      "transfers",
      transferSchema,
    );
  }

  private accountURL(account: AccountReference): string {
    if (typeof account !== "string") {
      const self = account._links?.self?.href;
      if (self) {
        return self;
      }
      return `/accounts/${encodeURIComponent(account.id)}`;
    }
    return `/accounts/${encodeURIComponent(account)}`;
  }
}
