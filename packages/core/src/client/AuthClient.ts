import type { AxiosInstance, AxiosResponse } from "axios";
import { z } from "zod";

import {
  AuthenticationError,
  describeCause,
} from "../errors/DwollaError";
import type { Logger } from "../lib/logger";

const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  token_type: z.string(),
  expires_in: z.number().positive(),
});

/** Tokens are refreshed this long before the vendor says they expire */
const EXPIRY_MARGIN_MS = 60_000;

export interface AuthClientOptions {
  clientId: string;
  clientSecret: string;
  rootURL: string;
  timeout?: number;
  logger: Logger;
}

interface CachedToken {
  accessToken: string;
  expiresAt: number;
}

/**
 * Owns the vendor root URL and client credentials.
 *
 * Tokens come from the OAuth2 client-credentials grant and are cached until
 * shortly before they expire. Concurrent callers share a single in-flight
 * refresh; a failed refresh leaves nothing cached.
 */
export class AuthClient {
  private cached?: CachedToken;
  private pending?: Promise<string>;

  constructor(
    private readonly axiosInstance: AxiosInstance,
    private readonly options: AuthClientOptions,
  ) {}

  /**
   * Base URL of the configured environment
   */
  rootURL(): string {
    return this.options.rootURL;
  }

  /**
   * A valid bearer token, fetched or refreshed as needed
   * @throws AuthenticationError when credentials are rejected or the vendor is unreachable
   */
  async token(): Promise<string> {
    if (this.cached && Date.now() < this.cached.expiresAt) {
      return this.cached.accessToken;
    }

    if (!this.pending) {
      this.pending = this.fetchToken().finally(() => {
        this.pending = undefined;
      });
    }

    return this.pending;
  }

  /**
   * Drop the cached token so the next call fetches a fresh one
   */
  invalidate(): void {
    this.cached = undefined;
  }

  private async fetchToken(): Promise<string> {
    const url = `${this.options.rootURL}/token`;
    const credentials = Buffer.from(
      `${this.options.clientId}:${this.options.clientSecret}`,
    ).toString("base64");

    this.options.logger.debug("requesting access token", { url });

    let response: AxiosResponse<unknown>;
    try {
      response = await this.axiosInstance.request<unknown>({
        method: "POST",
        url,
        data: new URLSearchParams({
          grant_type: "client_credentials",
        }).toString(),
        headers: {
          Authorization: `Basic ${credentials}`,
          "Content-Type": "application/x-www-form-urlencoded",
          Accept: "application/json",
        },
        timeout: this.options.timeout,
        validateStatus: () => true,
      });
    } catch (error) {
      throw new AuthenticationError(
        `failed to get auth token: ${describeCause(error)}`,
        { operation: "auth.token", stage: "send", cause: error },
      );
    }

    if (response.status !== 200) {
      throw new AuthenticationError(
        `failed to get auth token: ${`${response.status} ${response.statusText ?? ""}`.trim()}`,
        {
          operation: "auth.token",
          stage: "status",
          statusCode: response.status,
          body: response.data,
        },
      );
    }

    const parsed = tokenResponseSchema.safeParse(response.data);
    if (!parsed.success) {
      throw new AuthenticationError(
        "failed to get auth token: malformed token response",
        { operation: "auth.token", stage: "decode", cause: parsed.error },
      );
    }

    const { access_token: accessToken, expires_in: expiresIn } = parsed.data;
    this.cached = {
      accessToken,
      expiresAt: Date.now() + expiresIn * 1000 - EXPIRY_MARGIN_MS,
    };
    this.options.logger.debug("access token issued", { expiresIn });

    return accessToken;
  }
}
