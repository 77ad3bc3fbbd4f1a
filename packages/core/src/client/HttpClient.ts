import type { AxiosInstance, AxiosResponse } from "axios";
import { z } from "zod";

import {
  AuthenticationError,
  AuthorizationError,
  describeCause,
  DwollaError,
  DwollaErrorContext,
  NetworkError,
  NotFoundError,
  PassthroughError,
  SerializationError,
  ValidationError,
} from "../errors/DwollaError";
import type { Logger } from "../lib/logger";
import { getHeader, idFromLocation, resolveURL } from "../lib/utils";
import { HAL_MEDIA_TYPE, halEnvelopeSchema } from "../types/hal";
import type { AuthClient } from "./AuthClient";

export type HttpMethod = "GET" | "POST";

/**
 * Messages for the statuses every operation classifies
 */
export interface ErrorMessages {
  /** Completes "not authorized to <action>" (403) */
  action: string;
  /** Completes "<resource> not found" (404) */
  resource: string;
  /** Replaces the default 400 message */
  invalid?: string;
}

export interface HttpRequestConfig {
  /** Operation name carried by errors and log lines, e.g. `customers.get` */
  operation: string;
  method: HttpMethod;
  /** Path relative to the root URL, or an absolute hypermedia link */
  url: string;
  params?: Record<string, string | number | boolean | undefined>;
  /** JSON payload */
  body?: unknown;
  /** Multipart payload; takes the place of `body` */
  form?: FormData;
  /** @default 200 */
  expectedStatus?: 200 | 201;
  errors: ErrorMessages;
}

export interface HttpResponse {
  status: number;
  headers: Record<string, string>;
  /** Decoded JSON body, or undefined when the body was empty */
  data: unknown;
}

export interface HttpClientOptions {
  timeout?: number;
  headers: Record<string, string>;
  logger: Logger;
}

const DEFAULT_INVALID_MESSAGE = "duplicate resource or validation error";

/**
 * Internal request executor used by every resource API.
 *
 * Attaches the bearer token and vendor media types, sends the request and
 * turns any status other than the expected one into a classified error.
 * Nothing is retried.
 */
export class HttpClient {
  constructor(
    private readonly axiosInstance: AxiosInstance,
    private readonly auth: AuthClient,
    private readonly options: HttpClientOptions,
  ) {}

  rootURL(): string {
    return this.auth.rootURL();
  }

  /**
   * Execute a request and return the response once its status matches
   * `expectedStatus`
   */
  async request(config: HttpRequestConfig): Promise<HttpResponse> {
    const response = await this.send(config);
    return {
      status: response.status,
      headers: normalizeHeaders(response.headers),
      data: decodeBody(response.data, config.operation),
    };
  }

  /**
   * Execute a request whose response body is discarded unread
   */
  async requestNoContent(config: HttpRequestConfig): Promise<void> {
    await this.send(config);
  }

  /**
   * Execute a request and decode its body with `schema`
   */
  async requestEntity<T>(
    config: HttpRequestConfig,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  ): Promise<T> {
    const response = await this.request(config);
    return decodeWith(schema, response.data, config.operation);
  }

  /**
   * Execute a request and pull the `key` collection out of the HAL
   * envelope. A missing or empty collection yields an empty array.
   */
  async requestList<T>(
    config: HttpRequestConfig,
    key: string,
    itemSchema: z.ZodType<T, z.ZodTypeDef, unknown>,
  ): Promise<T[]> {
    const response = await this.request(config);
    const envelope = decodeWith(
      halEnvelopeSchema,
      response.data ?? {},
      config.operation,
    );
    return decodeWith(
      z.array(itemSchema),
      envelope._embedded?.[key] ?? [],
      config.operation,
    );
  }

  /**
   * Execute a create request (201) and return the new resource's ID taken
   * from the `Location` header. The body is not read.
   */
  async requestCreated(
    config: Omit<HttpRequestConfig, "expectedStatus">,
    collection: string,
  ): Promise<string> {
    const response = await this.send({ ...config, expectedStatus: 201 });
    const location = getHeader(normalizeHeaders(response.headers), "location");
    if (!location) {
      throw new SerializationError("created resource has no Location header", {
        operation: config.operation,
        stage: "decode",
        statusCode: response.status,
      });
    }
    return idFromLocation(location, this.auth.rootURL(), collection);
  }

  private async send(config: HttpRequestConfig): Promise<AxiosResponse<unknown>> {
    const token = await this.authenticate(config.operation);
    const url = resolveURL(this.auth.rootURL(), config.url);
    const { data, contentHeaders } = this.encode(config);

    const startedAt = Date.now();
    let response: AxiosResponse<unknown>;
    try {
      response = await this.axiosInstance.request<unknown>({
        method: config.method,
        url,
        params: config.params,
        data,
        headers: {
          ...this.options.headers,
          ...contentHeaders,
          Authorization: `Bearer ${token}`,
          Accept: HAL_MEDIA_TYPE,
        },
        timeout: this.options.timeout,
        validateStatus: () => true,
        transformResponse: (raw: unknown) => raw,
      });
    } catch (error) {
      this.options.logger.error("request failed before a response arrived", {
        operation: config.operation,
        method: config.method,
        url,
      });
      throw new NetworkError(
        `failed to make request to dwolla api: ${describeCause(error)}`,
        { operation: config.operation, stage: "send", cause: error },
      );
    }

    this.options.logger.debug("dwolla request", {
      operation: config.operation,
      method: config.method,
      url,
      status: response.status,
      durationMs: Date.now() - startedAt,
    });

    const expected = config.expectedStatus ?? 200;
    if (response.status !== expected) {
      if (response.status === 401) {
        // Rejected token: the next call fetches a new one
        this.auth.invalidate();
      }
      throw this.classify(config, response);
    }

    return response;
  }

  private async authenticate(operation: string): Promise<string> {
    try {
      return await this.auth.token();
    } catch (error) {
      if (error instanceof AuthenticationError) {
        throw new AuthenticationError(error.message, {
          operation,
          stage: "authenticate",
          statusCode: error.statusCode,
          body: error.body,
          cause: error,
        });
      }
      throw error;
    }
  }

  private encode(config: HttpRequestConfig): {
    data: string | FormData | undefined;
    contentHeaders: Record<string, string>;
  } {
    if (config.form) {
      return {
        data: config.form,
        // axios appends the boundary when it serialises the form
        contentHeaders: {
          "Content-Type": "multipart/form-data",
          "Cache-Control": "no-cache",
        },
      };
    }

    if (config.method === "GET") {
      return { data: undefined, contentHeaders: {} };
    }

    let data: string | undefined;
    if (config.body !== undefined) {
      try {
        data = JSON.stringify(config.body);
      } catch (error) {
        throw new SerializationError(
          `error encoding request body: ${describeCause(error)}`,
          { operation: config.operation, stage: "encode", cause: error },
        );
      }
    }

    return { data, contentHeaders: { "Content-Type": HAL_MEDIA_TYPE } };
  }

  private classify(
    config: HttpRequestConfig,
    response: AxiosResponse<unknown>,
  ): DwollaError {
    const context: DwollaErrorContext = {
      operation: config.operation,
      stage: "status",
      statusCode: response.status,
      body: tryDecodeBody(response.data),
    };

    switch (response.status) {
      case 400:
        this.options.logger.warn("request rejected by dwolla", {
          operation: config.operation,
          body: context.body,
        });
        return new ValidationError(
          config.errors.invalid ?? DEFAULT_INVALID_MESSAGE,
          context,
        );
      case 403:
        return new AuthorizationError(
          `not authorized to ${config.errors.action}`,
          context,
        );
      case 404:
        return new NotFoundError(`${config.errors.resource} not found`, context);
      default: {
        const statusText = response.statusText ?? "";
        return new PassthroughError(
          `${response.status} ${statusText}`.trim(),
          context,
          statusText,
        );
      }
    }
  }
}

function normalizeHeaders(raw: object | undefined): Record<string, string> {
  const headers: Record<string, string> = {};
  for (const [key, value] of Object.entries(raw ?? {})) {
    if (typeof value === "string") {
      headers[key] = value;
    }
  }
  return headers;
}

function decodeBody(raw: unknown, operation: string): unknown {
  if (raw === undefined || raw === null || raw === "") {
    return undefined;
  }
  if (typeof raw !== "string") {
    return raw;
  }
  try {
    return JSON.parse(raw);
  } catch (error) {
    throw new SerializationError(
      `error parsing JSON response: ${describeCause(error)}`,
      { operation, stage: "decode", cause: error },
    );
  }
}

function tryDecodeBody(raw: unknown): unknown {
  if (typeof raw !== "string") {
    return raw ?? undefined;
  }
  try {
    return JSON.parse(raw);
  } catch {
    return raw;
  }
}

function decodeWith<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  data: unknown,
  operation: string,
): T {
  const result = schema.safeParse(data);
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new SerializationError(`unexpected response shape: ${detail}`, {
      operation,
      stage: "decode",
      cause: result.error,
    });
  }
  return result.data;
}
