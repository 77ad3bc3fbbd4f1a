import { z } from "zod";

import { halLinkSchema, halLinksSchema } from "./hal";

export const accountSchema = z
  .object({
    id: z.string(),
    name: z.string().optional(),
    timezoneOffset: z.number().optional(),
    type: z.string().optional(),
    _links: halLinksSchema.optional(),
  })
  .passthrough();

/**
 * The master account tied to the client credentials
 */
export type Account = z.infer<typeof accountSchema>;

/**
 * API root resource; its `account` link points at the master account
 */
export const rootResourceSchema = z
  .object({
    _links: z.object({ account: halLinkSchema }).passthrough(),
  })
  .passthrough();
