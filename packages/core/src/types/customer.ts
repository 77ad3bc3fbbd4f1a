import { z } from "zod";

import { halLinksSchema } from "./hal";

export type CustomerType =
  | "unverified"
  | "personal"
  | "business"
  | "receive-only";

export type CustomerStatus =
  | "unverified"
  | "retry"
  | "document"
  | "verified"
  | "suspended"
  | "deactivated";

export const customerSchema = z
  .object({
    id: z.string(),
    firstName: z.string().optional(),
    lastName: z.string().optional(),
    email: z.string().optional(),
    type: z.string().optional(),
    status: z.string().optional(),
    businessName: z.string().optional(),
    ipAddress: z.string().optional(),
    dateOfBirth: z.string().optional(),
    ssn: z.string().optional(),
    address1: z.string().optional(),
    address2: z.string().optional(),
    city: z.string().optional(),
    state: z.string().optional(),
    postalCode: z.string().optional(),
    phone: z.string().optional(),
    correlationId: z.string().optional(),
    created: z.string().optional(),
    _links: halLinksSchema.optional(),
  })
  .passthrough();

/**
 * An individual or business the master account transacts with
 */
export type Customer = z.infer<typeof customerSchema>;

/**
 * A customer ID, or a customer record obtained from this client
 */
export type CustomerReference = string | Pick<Customer, "id" | "_links">;

export interface CreateCustomerRequest {
  firstName: string;
  lastName: string;
  email: string;
  /** Omit to create an unverified customer */
  type?: CustomerType;
  ipAddress?: string;
  businessName?: string;
  /** `YYYY-MM-DD` */
  dateOfBirth?: string;
  /** Last four digits for personal customers, full SSN for retry */
  ssn?: string;
  address1?: string;
  address2?: string;
  city?: string;
  /** Two-letter state code */
  state?: string;
  postalCode?: string;
  phone?: string;
  correlationId?: string;
}

export interface ListCustomersParams {
  limit?: number;
  offset?: number;
  /** Matches first name, last name, business name or email */
  search?: string;
  email?: string;
  status?: CustomerStatus;
}

/**
 * Sparse customer update.
 *
 * The same request edits, upgrades, suspends, deactivates, reactivates or
 * retries verification; which of these happens depends on the fields sent.
 * Undefined fields are left out of the payload.
 */
export interface CustomerPatch {
  /** Profile edit; also required when upgrading or retrying verification */
  firstName?: string;
  lastName?: string;
  /** Profile edit */
  email?: string;
  ipAddress?: string;
  /** Profile edit */
  phone?: string;
  /** Profile edit */
  businessName?: string;
  /** Profile edit for verified customers */
  address1?: string;
  address2?: string;
  city?: string;
  state?: string;
  postalCode?: string;
  /** `"personal"` or `"business"` upgrades an unverified customer */
  type?: "personal" | "business";
  /** Verification upgrade or retry */
  dateOfBirth?: string;
  /** Four digits on upgrade, nine on retry */
  ssn?: string;
  /**
   * `"suspended"` and `"deactivated"` suspend or deactivate;
   * `"reactivated"` brings a deactivated customer back
   */
  status?: "suspended" | "deactivated" | "reactivated";
}

export type DocumentType = "passport" | "license" | "idCard" | "other";

export const documentSchema = z
  .object({
    id: z.string(),
    status: z.string().optional(),
    type: z.string().optional(),
    created: z.string().optional(),
    failureReason: z.string().optional(),
    _links: halLinksSchema.optional(),
  })
  .passthrough();

/**
 * A file submitted for customer verification
 */
export type Document = z.infer<typeof documentSchema>;

export interface DocumentUpload {
  documentType: DocumentType;
  file: Blob | Buffer;
  filename: string;
  /** MIME type for a Buffer; a Blob keeps its own */
  contentType?: string;
}
