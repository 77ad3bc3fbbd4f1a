import { z } from "zod";

import { halLinksSchema } from "./hal";

export const fundingSourceSchema = z
  .object({
    id: z.string(),
    status: z.string().optional(),
    type: z.string().optional(),
    bankAccountType: z.string().optional(),
    name: z.string().optional(),
    bankName: z.string().optional(),
    accountNumber: z.string().optional(),
    routingNumber: z.string().optional(),
    fingerprint: z.string().optional(),
    created: z.string().optional(),
    /** Set by the vendor once the source is soft-deleted */
    removed: z.boolean().optional(),
    channels: z.array(z.string()).optional(),
    _links: halLinksSchema.optional(),
  })
  .passthrough();

/**
 * A linked bank account or balance usable as a transfer endpoint
 */
export type FundingSource = z.infer<typeof fundingSourceSchema>;

export interface CreateFundingSourceRequest {
  routingNumber: string;
  accountNumber: string;
  bankAccountType: "checking" | "savings";
  /** Nickname shown to the customer */
  name: string;
  plaidToken?: string;
  channels?: string[];
  /** Link to an on-demand authorization for ACH debits */
  onDemandAuthorization?: string;
}

export interface ListFundingSourcesParams {
  /** `false` hides soft-deleted sources */
  removed?: boolean;
}
