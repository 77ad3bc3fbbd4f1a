import { getHeader, idFromLocation, resolveURL } from "./utils";

describe("getHeader", () => {
  it("should find headers regardless of case", () => {
    const headers = { Location: "https://api.dwolla.com/customers/abc" };

    expect(getHeader(headers, "location")).toBe(
      "https://api.dwolla.com/customers/abc",
    );
    expect(getHeader(headers, "LOCATION")).toBe(
      "https://api.dwolla.com/customers/abc",
    );
  });

  it("should return the first value of a repeated header", () => {
    expect(getHeader({ "set-cookie": ["a=1", "b=2"] }, "Set-Cookie")).toBe("a=1");
  });

  it("should return undefined when absent", () => {
    expect(getHeader({}, "location")).toBeUndefined();
  });
});

describe("resolveURL", () => {
  const root = "https://api-sandbox.dwolla.com";

  it("should join relative paths to the root", () => {
    expect(resolveURL(root, "/customers")).toBe(
      "https://api-sandbox.dwolla.com/customers",
    );
    expect(resolveURL(root, "customers")).toBe(
      "https://api-sandbox.dwolla.com/customers",
    );
  });

  it("should pass absolute links through", () => {
    expect(resolveURL(root, "https://api.dwolla.com/accounts/a1/transfers")).toBe(
      "https://api.dwolla.com/accounts/a1/transfers",
    );
  });
});

describe("idFromLocation", () => {
  const root = "https://api-sandbox.example.com";

  it("should strip the collection prefix", () => {
    expect(
      idFromLocation(
        "https://api-sandbox.example.com/customers/abc-123",
        root,
        "customers",
      ),
    ).toBe("abc-123");
  });

  it("should return a location outside the prefix unchanged", () => {
    expect(
      idFromLocation("https://elsewhere.test/customers/abc", root, "customers"),
    ).toBe("https://elsewhere.test/customers/abc");
  });
});
