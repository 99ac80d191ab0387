import * as path from "node:path";
import { describe, it, expect } from "vitest";
import { loadConfig, normalizeShopDomain, requireCredentials } from "../src/config/env.js";

const CWD = path.resolve("/srv/importer");

describe("loadConfig", () => {
  it("fills defaults", () => {
    expect(loadConfig({}, CWD)).toEqual({
      ok: true,
      data: {
        shop: undefined,
        accessToken: undefined,
        apiVersion: "2025-10",
        dataDir: path.join(CWD, "data"),
        logDir: path.join(CWD, "logs"),
        rateLimitDelayMs: 500,
        vendor: "Catalog Importer",
        currency: "JPY",
      },
    });
  });

  it("reads and trims every variable", () => {
    const result = loadConfig(
      {
        SHOPIFY_SHOP_DOMAIN: " https://Test-Shop.myshopify.com/ ",
        SHOPIFY_ACCESS_TOKEN: "test-secret",
        SHOPIFY_API_VERSION: "2025-07",
        DATA_DIR: "catalog",
        LOG_DIR: "/var/log/importer",
        RATE_LIMIT_DELAY_MS: "0",
        DEFAULT_VENDOR: "Used Laptops",
        DEFAULT_CURRENCY: "USD",
      },
      CWD
    );

    expect(result).toEqual({
      ok: true,
      data: {
        shop: "test-shop.myshopify.com",
        accessToken: "test-secret",
        apiVersion: "2025-07",
        dataDir: path.join(CWD, "catalog"),
        logDir: path.resolve("/var/log/importer"),
        rateLimitDelayMs: 0,
        vendor: "Used Laptops",
        currency: "USD",
      },
    });
  });

  it("treats blank values as unset", () => {
    const result = loadConfig({ SHOPIFY_ACCESS_TOKEN: "  ", RATE_LIMIT_DELAY_MS: "" }, CWD);
    expect(result.ok && result.data.accessToken).toBeUndefined();
    expect(result.ok && result.data.rateLimitDelayMs).toBe(500);
  });

  it.each([
    ["RATE_LIMIT_DELAY_MS", "soon"],
    ["RATE_LIMIT_DELAY_MS", "-1"],
    ["DEFAULT_CURRENCY", "XYZ"],
  ])("rejects %s=%s", (name, value) => {
    const result = loadConfig({ [name]: value }, CWD);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.message).toBe("Invalid environment configuration");
    expect(result.error.details).toHaveLength(1);
    expect(result.error.details?.[0].startsWith(`${name}: `)).toBe(true);
  });
});

describe("normalizeShopDomain", () => {
  it.each([
    ["test-shop", "test-shop.myshopify.com"],
    ["test-shop.myshopify.com", "test-shop.myshopify.com"],
    ["https://TEST-SHOP.myshopify.com/", "test-shop.myshopify.com"],
    ["shop.example.com", "shop.example.com"],
  ])("normalizes %s", (input, expected) => {
    expect(normalizeShopDomain(input)).toBe(expected);
  });
});

describe("requireCredentials", () => {
  it("names every missing variable", () => {
    const result = requireCredentials({ apiVersion: "2025-10" });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.message).toBe(
      "Missing Shopify credentials. Set SHOPIFY_SHOP_DOMAIN and SHOPIFY_ACCESS_TOKEN."
    );
    expect(result.error.details).toEqual(["SHOPIFY_SHOP_DOMAIN", "SHOPIFY_ACCESS_TOKEN"]);
  });

  it("returns the credentials when both are set", () => {
    expect(
      requireCredentials({
        shop: "test-shop.myshopify.com",
        accessToken: "test-secret",
        apiVersion: "2025-10",
      })
    ).toEqual({
      ok: true,
      data: { shop: "test-shop.myshopify.com", accessToken: "test-secret", apiVersion: "2025-10" },
    });
  });
});
