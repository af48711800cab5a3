import { describe, test, expect } from "vitest";
import { ZodError } from "zod";
import { loadConfig } from "@/lib/config";

describe("loadConfig", () => {
  test("defaults", () => {
    const config = loadConfig({});

    expect(config.databaseUrl).toBeNull();
    expect(config.defaultUserId).toBe(1);
    expect(config.retailer).toEqual({
      apiBase: "https://gw.meijer.com",
      storefrontSearchUrl: "https://www.meijer.com/shopping/search.html",
      paths: {
        search: "/product/api/v1/search",
        listRead: "/loyalty/shoppinglist/GetList",
        listAdd: "/loyalty/shoppinglist/AddListItem",
      },
      storeId: "217",
      authToken: "",
      refreshToken: "",
      userAgent: "Meijer/8.71.0 (Android)",
      timeoutMs: 15000,
      tokenTtlHours: 24,
    });
  });

  test("reads overrides and coerces numbers", () => {
    const config = loadConfig({
      DATABASE_URL: "postgres://localhost/test",
      RETAILER_API_BASE: "https://retailer.test/",
      RETAILER_STORE_ID: "104",
      RETAILER_AUTH_TOKEN: "test-token",
      RETAILER_TIMEOUT_MS: "2500",
      DEFAULT_USER_ID: "3",
    });

    expect(config.databaseUrl).toBe("postgres://localhost/test");
    expect(config.defaultUserId).toBe(3);
    expect(config.retailer.apiBase).toBe("https://retailer.test");
    expect(config.retailer.storeId).toBe("104");
    expect(config.retailer.authToken).toBe("test-token");
    expect(config.retailer.timeoutMs).toBe(2500);
  });

  test("blank values fall back to defaults", () => {
    const config = loadConfig({ RETAILER_STORE_ID: "", RETAILER_TIMEOUT_MS: "" });
    expect(config.retailer.storeId).toBe("217");
    expect(config.retailer.timeoutMs).toBe(15000);
  });

  test("rejects malformed values", () => {
    expect(() => loadConfig({ RETAILER_TIMEOUT_MS: "-5" })).toThrow(ZodError);
    expect(() => loadConfig({ RETAILER_API_BASE: "not a url" })).toThrow(ZodError);
    expect(() => loadConfig({ RETAILER_SEARCH_PATH: "search" })).toThrow(ZodError);
  });
});
