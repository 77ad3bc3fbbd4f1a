import axios from "axios";
import MockAdapter from "axios-mock-adapter";

import {
  AuthorizationError,
  NotFoundError,
  ValidationError,
} from "../errors/DwollaError";
import { createLogger } from "../lib/logger";
import { DwollaClient } from "./DwollaClient";

/**
 * Client wired to an in-process axios mock with a token endpoint that
 * always succeeds
 */
export function createMockedClient(baseURL?: string): {
  client: DwollaClient;
  mock: MockAdapter;
  root: string;
} {
  const axiosInstance = axios.create();
  const mock = new MockAdapter(axiosInstance);
  const client = new DwollaClient({
    clientId: "test-client",
    clientSecret: "test-secret",
    environment: "sandbox",
    baseURL,
    axiosInstance,
    logger: createLogger("silent"),
  });
  const root = client.rootURL();

  mock.onPost(`${root}/token`).reply(200, {
    access_token: "test-token",
    token_type: "bearer",
    expires_in: 3600,
  });

  return { client, mock, root };
}

/**
 * Requests sent to `url`, token requests excluded
 */
export function sentTo(mock: MockAdapter, method: "get" | "post", url: string) {
  return mock.history[method].filter((config) => config.url === url);
}

/**
 * One operation and the messages it must produce for 400, 403 and 404
 */
export interface StatusErrorCase {
  /** Operation name carried by the error */
  operation: string;
  method: "get" | "post";
  /** Path below the root URL */
  path: string;
  call: (client: DwollaClient) => Promise<unknown>;
  /** 400 message; the shared default when omitted */
  invalid?: string;
  action: string;
  resource: string;
}

/**
 * Asserts the error class and exact message of every case for 400, 403
 * and 404
 */
export function describeStatusErrors(cases: StatusErrorCase[]): void {
  describe.each(cases)("$operation error statuses", (testCase) => {
    it.each([
      [
        400,
        ValidationError,
        testCase.invalid ?? "duplicate resource or validation error",
      ],
      [403, AuthorizationError, `not authorized to ${testCase.action}`],
      [404, NotFoundError, `${testCase.resource} not found`],
    ])("should map %i", async (status, errorClass, message) => {
      const { client, mock, root } = createMockedClient();
      const url = `${root}${testCase.path}`;
      const handler = testCase.method === "get" ? mock.onGet(url) : mock.onPost(url);
      handler.reply(status, { code: "Error" });

      const error = await testCase.call(client).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(errorClass);
      expect(error).toMatchObject({
        message,
        operation: testCase.operation,
        stage: "status",
        statusCode: status,
      });
    });
  });
}
