import { NotFoundError, ValidationError } from "../errors/DwollaError";
import { createMockedClient, describeStatusErrors, sentTo } from "./testing";

describe("TransferAPI", () => {
  describe("create", () => {
    it("should link both funding sources and return the transfer ID", async () => {
      const { client, mock, root } = createMockedClient();
      mock.onPost(`${root}/transfers`).reply(201, undefined, {
        Location: `${root}/transfers/t-1`,
      });

      const id = await client.createTransfer({
        source: "fs-src",
        destination: "fs-dst",
        amount: { value: "12.50", currency: "USD" },
        metadata: { invoice: "inv-7" },
      });

      expect(id).toBe("t-1");
      const [sent] = sentTo(mock, "post", `${root}/transfers`);
      expect(JSON.parse(sent.data)).toEqual({
        _links: {
          source: { href: `${root}/funding-sources/fs-src` },
          destination: { href: `${root}/funding-sources/fs-dst` },
        },
        amount: { value: "12.50", currency: "USD" },
        metadata: { invoice: "inv-7" },
      });
    });

    it("should keep funding source URLs as given", async () => {
      const { client, mock, root } = createMockedClient();
      mock.onPost(`${root}/transfers`).reply(201, undefined, {
        Location: `${root}/transfers/t-2`,
      });

      await client.transfers.create({
        source: `${root}/funding-sources/fs-src`,
        destination: `${root}/funding-sources/fs-dst`,
        amount: { value: "1.00", currency: "USD" },
        clearing: { destination: "next-available" },
      });

      const [sent] = sentTo(mock, "post", `${root}/transfers`);
      expect(JSON.parse(sent.data)).toEqual({
        _links: {
          source: { href: `${root}/funding-sources/fs-src` },
          destination: { href: `${root}/funding-sources/fs-dst` },
        },
        amount: { value: "1.00", currency: "USD" },
        clearing: { destination: "next-available" },
      });
    });

    it("should report a rejected transfer", async () => {
      const { client, mock, root } = createMockedClient();
      mock.onPost(`${root}/transfers`).reply(400, { code: "ValidationError" });

      const error = await client.transfers
        .create({
          source: "fs-src",
          destination: "fs-dst",
          amount: { value: "0.00", currency: "USD" },
        })
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ValidationError);
      expect(error).toMatchObject({
        message: "duplicate transfer or validation error",
      });
    });

    it("should report a missing funding source", async () => {
      const { client, mock, root } = createMockedClient();
      mock.onPost(`${root}/transfers`).reply(404);

      await expect(
        client.transfers.create({
          source: "fs-src",
          destination: "fs-dst",
          amount: { value: "1.00", currency: "USD" },
        }),
      ).rejects.toThrow("funding source not found");
    });
  });

  describe("get", () => {
    it("should decode the transfer", async () => {
      const { client, mock, root } = createMockedClient();
      mock.onGet(`${root}/transfers/t-1`).reply(200, {
        id: "t-1",
        status: "pending",
        amount: { value: "12.50", currency: "USD" },
        created: "2024-03-01T12:00:00.000Z",
        individualAchId: "IDPAMZ8C",
      });

      await expect(client.getTransfer("t-1")).resolves.toEqual({
        id: "t-1",
        status: "pending",
        amount: { value: "12.50", currency: "USD" },
        created: "2024-03-01T12:00:00.000Z",
        individualAchId: "IDPAMZ8C",
      });
    });

    it("should report a missing transfer", async () => {
      const { client, mock, root } = createMockedClient();
      mock.onGet(`${root}/transfers/t-1`).reply(404);

      await expect(client.transfers.get("t-1")).rejects.toThrow(NotFoundError);
    });
  });

  describe("cancel", () => {
    it("should post the cancelled status", async () => {
      const { client, mock, root } = createMockedClient();
      mock
        .onPost(`${root}/transfers/t-1`)
        .reply(200, { id: "t-1", status: "cancelled" });

      await expect(client.transfers.cancel("t-1")).resolves.toEqual({
        id: "t-1",
        status: "cancelled",
      });
      const [sent] = sentTo(mock, "post", `${root}/transfers/t-1`);
      expect(sent.data).toBe('{"status":"cancelled"}');
    });
  });

  describe("createOnDemandAuthorization", () => {
    it("should return the consent text", async () => {
      const { client, mock, root } = createMockedClient();
      mock.onPost(`${root}/on-demand-authorizations`).reply(200, {
        bodyText: "I agree that future payments will be processed.",
        buttonText: "Agree & Continue",
        _links: { self: { href: `${root}/on-demand-authorizations/oda-1` } },
      });

      const authorization = await client.createOnDemandAuthorization();

      expect(authorization.buttonText).toBe("Agree & Continue");
      expect(authorization._links?.self?.href).toBe(
        `${root}/on-demand-authorizations/oda-1`,
      );
    });

    it("should report a forbidden request", async () => {
      const { client, mock, root } = createMockedClient();
      mock.onPost(`${root}/on-demand-authorizations`).reply(403);

      await expect(client.transfers.createOnDemandAuthorization()).rejects.toThrow(
        "not authorized to create on-demand authorizations",
      );
    });
  });

  describeStatusErrors([
    {
      operation: "transfers.create",
      method: "post",
      path: "/transfers",
      call: (client) =>
        client.transfers.create({
          source: "fs-src",
          destination: "fs-dst",
          amount: { value: "2.00", currency: "USD" },
        }),
      invalid: "duplicate transfer or validation error",
      action: "create transfers",
      resource: "funding source",
    },
    {
      operation: "transfers.get",
      method: "get",
      path: "/transfers/t-1",
      call: (client) => client.transfers.get("t-1"),
      action: "retrieve the transfer",
      resource: "transfer",
    },
    {
      operation: "transfers.cancel",
      method: "post",
      path: "/transfers/t-1",
      call: (client) => client.transfers.cancel("t-1"),
      action: "cancel the transfer",
      resource: "transfer",
    },
    {
      operation: "transfers.createOnDemandAuthorization",
      method: "post",
      path: "/on-demand-authorizations",
      call: (client) => client.transfers.createOnDemandAuthorization(),
      action: "create on-demand authorizations",
      resource: "account",
    },
  ]);
});
