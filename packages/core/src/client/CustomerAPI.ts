import {
  CreateCustomerRequest,
  Customer,
  CustomerPatch,
  CustomerReference,
  customerSchema,
  Document,
  documentSchema,
  DocumentUpload,
  ListCustomersParams,
} from "../types/customer";
import {
  CreateFundingSourceRequest,
  FundingSource,
  fundingSourceSchema,
  ListFundingSourcesParams,
} from "../types/funding";
import { tokenWrapperSchema } from "../types/hal";
import { ListTransfersParams, Transfer, transferSchema } from "../types/transfer";
import type { HttpClient } from "./HttpClient";
import { transferQuery } from "./TransferAPI";

/**
 * Customers and everything hanging off them: documents, funding sources,
 * tokens for the drop-in bank linking flows, and transfers.
 *
 * Records returned here are plain data. Operations on an existing customer
 * take the record (or its ID) as an argument.
 *
 * @example
 * ```typescript
 * const customerId = await dwolla.customers.create({
 *   firstName: "Jane",
 *   lastName: "Doe",
 *   email: "jane@example.com",
 * });
 * const customer = await dwolla.customers.get(customerId);
 * const transfers = await dwolla.customers.listTransfers(customer);
 * ```
 */
export class CustomerAPI {
  constructor(private readonly httpClient: HttpClient) {}

  /**
   * Create a customer
   * @returns ID of the new customer, read from the `Location` header
   */
  async create(data: CreateCustomerRequest): Promise<string> {
    return await this.httpClient.requestCreated(
      {
        operation: "customers.create",
        method: "POST",
        url: "/customers",
        body: data,
        errors: {
          action: "create customers",
          resource: "account",
          invalid: "duplicate customer or validation error",
        },
      },
      "customers",
    );
  }

  /**
   * List customers of the master account
   */
  async list(params: ListCustomersParams = {}): Promise<Customer[]> {
    return await this.httpClient.requestList(
      {
        operation: "customers.list",
        method: "GET",
        url: "/customers",
        params: {
          limit: params.limit,
          offset: params.offset,
          search: params.search,
          email: params.email,
          status: params.status,
        },
        errors: { action: "list customers", resource: "account" },
      },
      "customers",
      customerSchema,
    );
  }

  /**
   * Get a customer by ID
   */
  async get(customerId: string): Promise<Customer> {
    return await this.httpClient.requestEntity(
      {
        operation: "customers.get",
        method: "GET",
        url: `/customers/${encodeURIComponent(customerId)}`,
        errors: { action: "retrieve the customer", resource: "account" },
      },
      customerSchema,
    );
  }

  /**
   * Submit a sparse patch to a customer
   *
   * One endpoint covers profile edits, verification upgrades and retries,
   * suspension, deactivation and reactivation; see {@link CustomerPatch}.
   *
   * @returns The customer as the vendor now holds it
   */
  async update(
    customer: CustomerReference,
    patch: CustomerPatch,
  ): Promise<Customer> {
    return await this.httpClient.requestEntity(
      {
        operation: "customers.update",
        method: "POST",
        url: this.customerPath(customer),
        body: patch,
        errors: { action: "update the customer", resource: "account" },
      },
      customerSchema,
    );
  }

  /**
   * Upload an identity document for verification.
   * Succeeds only on 201; the response body is ignored.
   */
  async uploadDocument(
    customer: CustomerReference,
    upload: DocumentUpload,
  ): Promise<void> {
    const file =
      upload.file instanceof Blob
        ? upload.file
        : new Blob([upload.file], { type: upload.contentType });
    const form = new FormData();
    form.append("documentType", upload.documentType);
    form.append("file", file, upload.filename);

    await this.httpClient.requestNoContent({
      operation: "customers.uploadDocument",
      method: "POST",
      url: `${this.customerPath(customer)}/documents`,
      form,
      expectedStatus: 201,
      errors: {
        action: "upload document to customer",
        resource: "account",
      },
    });
  }

  /**
   * List documents submitted for a customer
   */
  async listDocuments(customer: CustomerReference): Promise<Document[]> {
    return await this.httpClient.requestList(
      {
        operation: "customers.listDocuments",
        method: "GET",
        url: `${this.customerPath(customer)}/documents`,
        errors: { action: "list documents", resource: "account" },
      },
      "documents",
      documentSchema,
    );
  }

  /**
   * Get a document by ID
   */
  async getDocument(documentId: string): Promise<Document> {
    return await this.httpClient.requestEntity(
      {
        operation: "customers.getDocument",
        method: "GET",
        url: `/documents/${encodeURIComponent(documentId)}`,
        errors: { action: "retrieve the document", resource: "document" },
      },
      documentSchema,
    );
  }

  /**
   * Attach a bank account to a customer
   * @returns ID of the new funding source
   */
  async createFundingSource(
    customer: CustomerReference,
    data: CreateFundingSourceRequest,
  ): Promise<string> {
    const { onDemandAuthorization, ...fields } = data;
    return await this.httpClient.requestCreated(
      {
        operation: "customers.createFundingSource",
        method: "POST",
        url: `${this.customerPath(customer)}/funding-sources`,
        body: onDemandAuthorization
          ? {
              ...fields,
              _links: {
                "on-demand-authorization": { href: onDemandAuthorization },
              },
            }
          : fields,
        errors: {
          action: "create funding source",
          resource: "customer",
          invalid:
            "duplicate funding source or validation error. Authorization already associated to a funding source",
        },
      },
      "funding-sources",
    );
  }

  /**
   * Token for adding a bank account through the vendor's drop-in
   * components
   */
  async createFundingSourceToken(customer: CustomerReference): Promise<string> {
    const wrapper = await this.httpClient.requestEntity(
      {
        operation: "customers.createFundingSourceToken",
        method: "POST",
        url: `${this.customerPath(customer)}/funding-sources-token`,
        errors: {
          action: "create a funding source token",
          resource: "customer",
        },
      },
      tokenWrapperSchema,
    );
    return wrapper.token;
  }

  /**
   * Token for adding and instantly verifying a bank account (IAV)
   */
  async createIAVToken(customer: CustomerReference): Promise<string> {
    const wrapper = await this.httpClient.requestEntity(
      {
        operation: "customers.createIAVToken",
        method: "POST",
        url: `${this.customerPath(customer)}/iav-token`,
        errors: { action: "create an IAV token", resource: "customer" },
      },
      tokenWrapperSchema,
    );
    return wrapper.token;
  }

  /**
   * List a customer's funding sources
   */
  async listFundingSources(
    customer: CustomerReference,
    params: ListFundingSourcesParams = {},
  ): Promise<FundingSource[]> {
    return await this.httpClient.requestList(
      {
        operation: "customers.listFundingSources",
        method: "GET",
        url: `${this.customerPath(customer)}/funding-sources`,
        params: { removed: params.removed },
        errors: { action: "list funding sources", resource: "customer" },
      },
      "funding-sources",
      fundingSourceSchema,
    );
  }

  /**
   * List a customer's transfers. Follows the customer's `self` link when
   * the record carries one.
   */
  async listTransfers(
    customer: CustomerReference,
    params: ListTransfersParams = {},
  ): Promise<Transfer[]> {
    return await this.httpClient.requestList(
      {
        operation: "customers.listTransfers",
        method: "GET",
        url: `${this.customerURL(customer)}/transfers`,
        params: transferQuery(params),
        errors: { action: "list transfers", resource: "customer" },
      },
      "transfers",
      transferSchema,
    );
  }

  private customerPath(customer: CustomerReference): string {
    const id = typeof customer === "string" ? customer : customer.id;
    return `/customers/${encodeURIComponent(id)}`;
  }

  private customerURL(customer: CustomerReference): string {
    if (typeof customer !== "string") {
      const self = customer._links?.self?.href;
      if (self) {
        return self;
      }
    }
    return this.customerPath(customer);
  }
}
