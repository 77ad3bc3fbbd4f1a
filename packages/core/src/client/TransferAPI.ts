import {
  CreateTransferRequest,
  ListTransfersParams,
  OnDemandAuthorization,
  onDemandAuthorizationSchema,
  Transfer,
  transferSchema,
} from "../types/transfer";
import { resolveURL } from "../lib/utils";
import type { HttpClient } from "./HttpClient";

/**
 * Query string for the transfer list endpoints
 */
export function transferQuery(
  params: ListTransfersParams,
): Record<string, string | number | undefined> {
  return {
    limit: params.limit,
    offset: params.offset,
    status: params.status,
    correlationId: params.correlationId,
  };
}

export class TransferAPI {
  constructor(private readonly httpClient: HttpClient) {}

  /**
   * Move money between two funding sources
   * @returns ID of the new transfer
   *
   * @example
   * ```typescript
   * const transferId = await dwolla.transfers.create({
   *   source: accountFundingSourceId,
   *   destination: customerFundingSourceId,
   *   amount: { currency: "USD", value: "12.50" },
   * });
   * ```
   */
  async create(data: CreateTransferRequest): Promise<string> {
    return await this.httpClient.requestCreated(
      {
        operation: "transfers.create",
        method: "POST",
        url: "/transfers",
        body: {
          _links: {
            source: { href: this.fundingSourceURL(data.source) },
            destination: { href: this.fundingSourceURL(data.destination) },
          },
          amount: data.amount,
          metadata: data.metadata,
          clearing: data.clearing,
          correlationId: data.correlationId,
        },
        errors: {
          action: "create transfers",
          resource: "funding source",
          invalid: "duplicate transfer or validation error",
        },
      },
      "transfers",
    );
  }

  /**
   * Get a specific transfer by ID
   */
  async get(transferId: string): Promise<Transfer> {
    return await this.httpClient.requestEntity(
      {
        operation: "transfers.get",
        method: "GET",
        url: `/transfers/${encodeURIComponent(transferId)}`,
        errors: { action: "retrieve the transfer", resource: "transfer" },
      },
      transferSchema,
    );
  }

  /**
   * Cancel a transfer that is still pending
   */
  async cancel(transferId: string): Promise<Transfer> {
    return await this.httpClient.requestEntity(
      {
        operation: "transfers.cancel",
        method: "POST",
        url: `/transfers/${encodeURIComponent(transferId)}`,
        body: { status: "cancelled" },
        errors: { action: "cancel the transfer", resource: "transfer" },
      },
      transferSchema,
    );
  }

  /**
   * Create an on-demand authorization, the consent a customer gives before
   * their bank can be debited for variable amounts
   */
  async createOnDemandAuthorization(): Promise<OnDemandAuthorization> {
    return await this.httpClient.requestEntity(
      {
        operation: "transfers.createOnDemandAuthorization",
        method: "POST",
        url: "/on-demand-authorizations",
        errors: {
          action: "create on-demand authorizations",
          resource: "account",
        },
      },
      onDemandAuthorizationSchema,
    );
  }

  private fundingSourceURL(idOrURL: string): string {
    return resolveURL(
      this.httpClient.rootURL(),
      /^https?:\/\//i.test(idOrURL)
        ? idOrURL
        : `/funding-sources/${encodeURIComponent(idOrURL)}`,
    );
  }
}
