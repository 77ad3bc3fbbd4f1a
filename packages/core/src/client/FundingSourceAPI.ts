import { FundingSource, fundingSourceSchema } from "../types/funding";
import type { HttpClient } from "./HttpClient";

export class FundingSourceAPI {
  constructor(private readonly httpClient: HttpClient) {}

  /**
   * Get a funding source by ID
   */
  async get(fundingSourceId: string): Promise<FundingSource> {
    return await this.httpClient.requestEntity(
      {
        operation: "fundingSources.get",
        method: "GET",
        url: `/funding-sources/${encodeURIComponent(fundingSourceId)}`,
        errors: {
          action: "retrieve the funding source",
          resource: "funding source",
        },
      },
      fundingSourceSchema,
    );
  }

  /**
   * Soft-delete a funding source. The vendor keeps the record and sets
   * `removed: true` on it.
   */
  async remove(fundingSourceId: string): Promise<FundingSource> {
    return await this.httpClient.requestEntity(
      {
        operation: "fundingSources.remove",
        method: "POST",
        url: `/funding-sources/${encodeURIComponent(fundingSourceId)}`,
        body: { removed: true },
        errors: {
          action: "remove the funding source",
          resource: "funding source",
        },
      },
      fundingSourceSchema,
    );
  }
}
