import type { AxiosInstance } from "axios";
import { z } from "zod";

import { ConfigurationError } from "../errors/DwollaError";
import type { Logger } from "../lib/logger";

export type DwollaEnvironment = "production" | "sandbox";

/**
 * Root URL of each vendor environment
 */
export const ENVIRONMENT_URLS: Record<DwollaEnvironment, string> = {
  production: "https://api.dwolla.com",
  sandbox: "https://api-sandbox.dwolla.com",
};

/**
 * Configuration options for initializing a DwollaClient
 */
export interface DwollaClientConfig {
  /**
   * Application key
   * @default process.env.DWOLLA_CLIENT_ID
   */
  clientId?: string;

  /**
   * Application secret
   * @default process.env.DWOLLA_CLIENT_SECRET
   */
  clientSecret?: string;

  /**
   * @default process.env.DWOLLA_ENVIRONMENT ?? "sandbox"
   */
  environment?: DwollaEnvironment;

  /**
   * Overrides the environment's root URL
   */
  baseURL?: string;

  /**
   * Request timeout in milliseconds. No timeout when omitted.
   */
  timeout?: number;

  /**
   * Additional headers to include with all requests
   */
  headers?: Record<string, string>;

  /**
   * Logger for request tracing, e.g. `console`. Defaults to
   * {@link createLogger}, silent unless DWOLLA_LOG_LEVEL is set.
   */
  logger?: Logger;

  /**
   * Axios instance used for every request, token requests included
   */
  axiosInstance?: AxiosInstance;
}

/**
 * Configuration after environment fallbacks and validation
 */
export interface ResolvedConfig {
  clientId: string;
  clientSecret: string;
  environment: DwollaEnvironment;
  rootURL: string;
  timeout?: number;
  headers: Record<string, string>;
}

const resolvedConfigSchema = z.object({
  clientId: z.string().min(1, "clientId is required (or set DWOLLA_CLIENT_ID)"),
  clientSecret: z
    .string()
    .min(1, "clientSecret is required (or set DWOLLA_CLIENT_SECRET)"),
  environment: z.enum(["production", "sandbox"], {
    errorMap: () => ({
      message: 'environment must be "production" or "sandbox"',
    }),
  }),
  rootURL: z.string().url("baseURL must be an absolute URL"),
  timeout: z.number().int().positive().optional(),
  headers: z.record(z.string()),
});

const TRAILING_SLASH = /\/+$/;

/**
 * Apply environment-variable fallbacks and validate
 *
 * @throws ConfigurationError listing every problem found
 */
export function resolveConfig(
  config: DwollaClientConfig = {},
  env: NodeJS.ProcessEnv = process.env,
): ResolvedConfig {
  const environment =
    config.environment ?? env.DWOLLA_ENVIRONMENT ?? "sandbox";
  const knownEnvironment =
    environment === "production" || environment === "sandbox"
      ? ENVIRONMENT_URLS[environment]
      : undefined;
  const rootURL = (config.baseURL ?? knownEnvironment ?? "").replace(
    TRAILING_SLASH,
    "",
  );

  const result = resolvedConfigSchema.safeParse({
    clientId: config.clientId ?? env.DWOLLA_CLIENT_ID ?? "",
    clientSecret: config.clientSecret ?? env.DWOLLA_CLIENT_SECRET ?? "",
    environment,
    rootURL,
    timeout: config.timeout,
    headers: config.headers ?? {},
  });

  if (!result.success) {
    const issues = result.error.issues.map((issue) => issue.message);
    throw new ConfigurationError(
      `Invalid Dwolla client configuration: ${issues.join("; ")}`,
      issues,
    );
  }

  return result.data;
}
