import { z } from "zod";

/**
 * Media type the vendor uses for both `Accept` and `Content-Type`
 */
export const HAL_MEDIA_TYPE = "application/vnd.dwolla.v1.hal+json";

export const halLinkSchema = z
  .object({
    href: z.string(),
    type: z.string().optional(),
    "resource-type": z.string().optional(),
  })
  .passthrough();

export type HalLink = z.infer<typeof halLinkSchema>;

/**
 * Hypermedia links keyed by relation name (`self`, `customer`, ...)
 */
export const halLinksSchema = z.record(halLinkSchema);

export type HalLinks = z.infer<typeof halLinksSchema>;

/**
 * List envelope: `{ _links, _embedded: { <collection>: [...] }, total }`
 */
export const halEnvelopeSchema = z
  .object({
    _links: halLinksSchema.optional(),
    _embedded: z.record(z.unknown()).optional(),
    total: z.number().optional(),
  })
  .passthrough();

export type HalEnvelope = z.infer<typeof halEnvelopeSchema>;

/**
 * Wrapper returned by the funding-source and IAV token endpoints
 */
export const tokenWrapperSchema = z
  .object({
    token: z.string(),
    _links: halLinksSchema.optional(),
  })
  .passthrough();

export type TokenWrapper = z.infer<typeof tokenWrapperSchema>;

