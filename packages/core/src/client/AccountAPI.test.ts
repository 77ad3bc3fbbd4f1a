import { NotFoundError, SerializationError } from "../errors/DwollaError";
import { createMockedClient, describeStatusErrors, sentTo } from "./testing";

describe("AccountAPI", () => {
  describe("retrieve", () => {
    it("should follow the root resource's account link", async () => {
      const { client, mock, root } = createMockedClient();
      mock.onGet(`${root}/`).reply(200, {
        _links: {
          account: {
            href: `${root}/accounts/a-1`,
            type: "application/vnd.dwolla.v1.hal+json",
            "resource-type": "account",
          },
        },
      });
      mock.onGet(`${root}/accounts/a-1`).reply(200, {
        id: "a-1",
        name: "Acme Payroll",
        _links: { self: { href: `${root}/accounts/a-1` } },
      });

      const account = await client.retrieveAccount();

      expect(account).toEqual({
        id: "a-1",
        name: "Acme Payroll",
        _links: { self: { href: `${root}/accounts/a-1` } },
      });
      expect(sentTo(mock, "get", `${root}/`)).toHaveLength(1);
      expect(sentTo(mock, "get", `${root}/accounts/a-1`)).toHaveLength(1);
    });

    it("should fail when the root has no account link", async () => {
      const { client, mock, root } = createMockedClient();
      mock.onGet(`${root}/`).reply(200, { _links: {} });

      const error = await client.accounts.retrieve().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(SerializationError);
      expect(error).toMatchObject({ operation: "accounts.retrieve", stage: "decode" });
    });

    it("should report a missing account", async () => {
      const { client, mock, root } = createMockedClient();
      mock.onGet(`${root}/`).reply(200, {
        _links: { account: { href: `${root}/accounts/a-1` } },
      });
      mock.onGet(`${root}/accounts/a-1`).reply(404);

      const error = await client.accounts.retrieve().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(NotFoundError);
      expect(error).toMatchObject({ message: "account not found" });
    });
  });

  describe("listFundingSources", () => {
    it("should use the account's self link", async () => {
      const { client, mock } = createMockedClient();
      const self = "https://api-sandbox.dwolla.com/accounts/a-1";
      mock.onGet(`${self}/funding-sources`).reply(200, {
        _embedded: {
          "funding-sources": [
            { id: "fs-balance", type: "balance", name: "Balance" },
            { id: "fs-bank", type: "bank", name: "Operating", bankAccountType: "checking" },
          ],
        },
      });

      const sources = await client.accounts.listFundingSources(
        { id: "a-1", _links: { self: { href: self } } },
        { removed: false },
      );

      expect(sources.map((source) => source.id)).toEqual(["fs-balance", "fs-bank"]);
      expect(sentTo(mock, "get", `${self}/funding-sources`)[0].params).toEqual({
        removed: false,
      });
    });

    it("should return [] for an empty collection", async () => {
      const { client, mock, root } = createMockedClient();
      mock
        .onGet(`${root}/accounts/a-1/funding-sources`)
        .reply(200, { _embedded: { "funding-sources": [] } });

      await expect(client.accounts.listFundingSources("a-1")).resolves.toEqual([]);
    });
  });

  describe("listTransfers", () => {
    it("should pass paging and filters", async () => {
      const { client, mock, root } = createMockedClient();
      mock.onGet(`${root}/accounts/a-1/transfers`).reply(200, {
        _embedded: { transfers: [{ id: "t-1", status: "processed" }] },
        total: 1,
      });

      const transfers = await client.accounts.listTransfers("a-1", {
        limit: 5,
        offset: 10,
        status: "processed",
      });

      expect(transfers).toEqual([{ id: "t-1", status: "processed" }]);
      expect(
        sentTo(mock, "get", `${root}/accounts/a-1/transfers`)[0].params,
      ).toEqual({ limit: 5, offset: 10, status: "processed" });
    });

    it("should report a forbidden list", async () => {
      const { client, mock, root } = createMockedClient();
      mock.onGet(`${root}/accounts/a-1/transfers`).reply(403);

      await expect(client.accounts.listTransfers("a-1")).rejects.toThrow(
        "not authorized to list transfers",
      );
    });
  });

  describeStatusErrors([
    {
      operation: "accounts.retrieve",
      method: "get",
      path: "/",
      call: (client) => client.accounts.retrieve(),
      action: "retrieve the account",
      resource: "account",
    },
    {
      operation: "accounts.listFundingSources",
      method: "get",
      path: "/accounts/a-1/funding-sources",
      call: (client) => client.accounts.listFundingSources("a-1"),
      action: "list funding sources",
      resource: "account",
    },
    {
      operation: "accounts.listTransfers",
      method: "get",
      path: "/accounts/a-1/transfers",
      call: (client) => client.accounts.listTransfers("a-1"),
      action: "list transfers",
      resource: "account",
    },
  ]);
});
