import { z } from "zod";

import { halLinksSchema } from "./hal";

export const amountSchema = z.object({
  value: z.string(),
  currency: z.string(),
});

export type Amount = z.infer<typeof amountSchema>;

export const transferSchema = z
  .object({
    id: z.string(),
    status: z.string().optional(),
    amount: amountSchema.optional(),
    created: z.string().optional(),
    clearing: z.record(z.string()).optional(),
    metadata: z.record(z.string()).optional(),
    correlationId: z.string().optional(),
    individualAchId: z.string().optional(),
    _links: halLinksSchema.optional(),
  })
  .passthrough();

/**
 * A money movement between two funding sources. Status changes happen
 * server-side only.
 */
export type Transfer = z.infer<typeof transferSchema>;

export interface CreateTransferRequest {
  /** Source funding source ID or URL */
  source: string;
  /** Destination funding source ID or URL */
  destination: string;
  amount: Amount;
  metadata?: Record<string, string>;
  clearing?: { source?: "standard"; destination?: "next-available" };
  correlationId?: string;
}

export interface ListTransfersParams {
  limit?: number;
  offset?: number;
  status?: string;
  correlationId?: string;
}

export const onDemandAuthorizationSchema = z
  .object({
    bodyText: z.string(),
    buttonText: z.string(),
    _links: halLinksSchema.optional(),
  })
  .passthrough();

/**
 * Consent text to show before linking a bank for on-demand debits
 */
export type OnDemandAuthorization = z.infer<typeof onDemandAuthorizationSchema>;
