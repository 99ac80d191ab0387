import { describe, it, expect } from "vitest";
import { RestClient, parseNextLink, restFieldErrors } from "../src/rest/client.js";
import {
  type RestProduct,
  deleteProduct,
  getProduct,
  isDuplicateHandleError,
  listProductMetafields,
  listProducts,
  productIdFromGid,
  updateProduct,
} from "../src/shopify/products.js";
import { ShopifyApiError, ShopifyUserError } from "../src/utils/types.js";
import {
  clientConfig,
  jsonResponse,
  mockFetch,
  requestBody,
  statusResponse,
} from "./helpers.js";

const BASE = "https://test-shop.myshopify.com/admin/api/2025-10";

function restProduct(id: number, overrides: Partial<RestProduct> = {}): RestProduct {
  return {
    id,
    title: `Laptop ${id}`,
    handle: `laptop-${id}`,
    vendor: "Catalog Importer",
    product_type: "Laptop",
    status: "active",
    tags: "laptop",
    variants: [],
    ...overrides,
  };
}

describe("RestClient", () => {
  it("builds URLs with query parameters", () => {
    const rest = new RestClient(clientConfig(mockFetch()));
    expect(rest.url("/products.json", { vendor: "Catalog Importer", limit: 5, skip: undefined })).toBe(
      `${BASE}/products.json?vendor=Catalog+Importer&limit=5`
    );
  });

  it("turns a 422 into a ShopifyUserError without retrying", async () => {
    const fetch = mockFetch().mockResolvedValueOnce(
      jsonResponse({ errors: { handle: ["has already been taken"] } }, 422)
    );
    const rest = new RestClient(clientConfig(fetch));

    const result = await rest.post("products.json", { product: { title: "X" } });

    expect(fetch).toHaveBeenCalledTimes(1);
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(ShopifyUserError);
    expect(result.error.message).toBe(
      "POST /admin/api/2025-10/products.json failed: handle: has already been taken"
    );
    expect(isDuplicateHandleError(result.error)).toBe(true);
  });

  it("retries a 429 and then returns the body", async () => {
    const fetch = mockFetch()
      .mockResolvedValueOnce(statusResponse(429, "Too Many Requests", { "Retry-After": "1" }))
      .mockResolvedValueOnce(jsonResponse({ product: restProduct(7) }, 200));
    const rest = new RestClient(clientConfig(fetch));

    const result = await getProduct(rest, 7);

    expect(fetch).toHaveBeenCalledTimes(2);
    expect(result).toEqual({ ok: true, data: restProduct(7) });
  });

  it("reports other HTTP failures as ShopifyApiError", async () => {
    const fetch = mockFetch().mockResolvedValueOnce(statusResponse(404, "Not Found"));
    const rest = new RestClient(clientConfig(fetch));

    const result = await deleteProduct(rest, 99);

    expect(fetch).toHaveBeenCalledTimes(1);
    expect(fetch.mock.calls[0][0]).toBe(`${BASE}/products/99.json`);
    expect(fetch.mock.calls[0][1].method).toBe("DELETE");
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(ShopifyApiError);
      expect(result.error.message).toBe("HTTP 404: Not Found");
    }
  });

  it("deletes with an empty response body", async () => {
    const fetch = mockFetch().mockResolvedValueOnce(statusResponse(200, "OK"));
    const result = await deleteProduct(new RestClient(clientConfig(fetch)), 5);
    expect(result).toEqual({ ok: true, data: undefined });
  });

  it("follows Link headers across pages", async () => {
    const next = `${BASE}/products.json?limit=250&page_info=page-2`;
    const fetch = mockFetch()
      .mockResolvedValueOnce(
        jsonResponse({ products: [restProduct(1), restProduct(2)] }, 200, {
          Link: `<${next}>; rel="next"`,
        })
      )
      .mockResolvedValueOnce(jsonResponse({ products: [restProduct(3)] }));
    const rest = new RestClient(clientConfig(fetch));

    const result = await listProducts(rest, { vendor: "Catalog Importer" });

    expect(result.ok && result.data.map((p) => p.id)).toEqual([1, 2, 3]);
    expect(fetch.mock.calls.map(([url]) => url)).toEqual([
      `${BASE}/products.json?limit=250&vendor=Catalog+Importer`,
      next,
    ]);
  });

  it("sends updates with the numeric id", async () => {
    const fetch = mockFetch().mockResolvedValueOnce(
      jsonResponse({ product: restProduct(12, { status: "draft" }) })
    );
    const rest = new RestClient(clientConfig(fetch));

    const result = await updateProduct(rest, "12", { status: "draft" });

    expect(result.ok && result.data.status).toBe("draft");
    expect(fetch.mock.calls[0][1].method).toBe("PUT");
    expect(requestBody(fetch, 0)).toEqual({ product: { id: 12, status: "draft" } });
  });

  it("lists a product's metafields", async () => {
    const metafield = { id: 1, namespace: "custom", key: "02_ram", type: "single_line_text_field", value: "16GB" };
    const fetch = mockFetch().mockResolvedValueOnce(jsonResponse({ metafields: [metafield] }));

    const result = await listProductMetafields(new RestClient(clientConfig(fetch)), 12);

    expect(result).toEqual({ ok: true, data: [metafield] });
    expect(fetch.mock.calls[0][0]).toBe(`${BASE}/products/12/metafields.json`);
  });
});

describe("parseNextLink", () => {
  it("picks the next link out of a combined header", () => {
    const header =
      `<${BASE}/products.json?page_info=prev>; rel="previous", ` +
      `<${BASE}/products.json?page_info=next>; rel="next"`;
    expect(parseNextLink(header)).toBe(`${BASE}/products.json?page_info=next`);
    expect(parseNextLink(null)).toBeUndefined();
  });
});

describe("restFieldErrors", () => {
  it("reads every shape Shopify uses", () => {
    expect(restFieldErrors({ errors: { title: ["can't be blank", "is too short"] } })).toEqual([
      { field: ["title"], message: "can't be blank" },
      { field: ["title"], message: "is too short" },
    ]);
    expect(restFieldErrors({ errors: ["Invalid price"] })).toEqual([{ message: "Invalid price" }]);
    expect(restFieldErrors({ errors: "Not allowed" })).toEqual([{ message: "Not allowed" }]);
    expect(restFieldErrors(undefined)).toEqual([]);
  });
});

describe("productIdFromGid", () => {
  it("accepts GIDs and bare ids", () => {
    expect(productIdFromGid("gid://shopify/Product/123")).toBe("123");
    expect(productIdFromGid("456")).toBe("456");
  });
});
