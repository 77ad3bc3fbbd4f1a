// Main client
export { DwollaClient } from "./client/DwollaClient";
export { AuthClient } from "./client/AuthClient";
export type { AuthClientOptions } from "./client/AuthClient";
export { AccountAPI } from "./client/AccountAPI";
export type { AccountReference } from "./client/AccountAPI";
export { CustomerAPI } from "./client/CustomerAPI";
export { FundingSourceAPI } from "./client/FundingSourceAPI";
export { TransferAPI } from "./client/TransferAPI";

// Errors
export {
  DwollaError,
  ConfigurationError,
  AuthenticationError,
  ValidationError,
  AuthorizationError,
  NotFoundError,
  PassthroughError,
  NetworkError,
  SerializationError,
  isDwollaError,
} from "./errors/DwollaError";
export type { DwollaErrorStage, DwollaErrorContext } from "./errors/DwollaError";

// Configuration
export { ENVIRONMENT_URLS, resolveConfig } from "./types/config";
export type {
  DwollaClientConfig,
  DwollaEnvironment,
  ResolvedConfig,
} from "./types/config";
export { createLogger } from "./lib/logger";
export type { Logger, LogLevel } from "./lib/logger";

// Types
export { HAL_MEDIA_TYPE } from "./types/hal";
export type { HalLink, HalLinks, TokenWrapper } from "./types/hal";
export type { Account } from "./types/account";
export type {
  Customer,
  CustomerType,
  CustomerStatus,
  CustomerReference,
  CreateCustomerRequest,
  ListCustomersParams,
  CustomerPatch,
  Document,
  DocumentType,
  DocumentUpload,
} from "./types/customer";
export type {
  FundingSource,
  CreateFundingSourceRequest,
  ListFundingSourcesParams,
} from "./types/funding";
export type {
  Amount,
  Transfer,
  CreateTransferRequest,
  ListTransfersParams,
  OnDemandAuthorization,
} from "./types/transfer";

// Default export for convenience
export { DwollaClient as default } from "./client/DwollaClient";
