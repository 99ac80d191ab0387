import { describe, it, expect, vi } from "vitest";
import { GraphQLClient } from "../src/graphql/client.js";
import { ShopifyApiError } from "../src/utils/types.js";
import {
  clientConfig,
  jsonResponse,
  mockFetch,
  requestBody,
  statusResponse,
} from "./helpers.js";

const ENDPOINT = "https://test-shop.myshopify.com/admin/api/2025-10/graphql.json";

describe("GraphQLClient", () => {
  it("posts the query with the access token and returns data", async () => {
    const fetch = mockFetch().mockResolvedValueOnce(jsonResponse({ data: { shop: { name: "Test" } } }));
    const client = new GraphQLClient(clientConfig(fetch));

    const result = await client.request<{ shop: { name: string } }>({
      query: "{ shop { name } }",
    });

    expect(result).toEqual({ ok: true, data: { shop: { name: "Test" } } });
    expect(fetch).toHaveBeenCalledTimes(1);
    const [url, init] = fetch.mock.calls[0];
    expect(url).toBe(ENDPOINT);
    expect(init.method).toBe("POST");
    expect(init.headers).toEqual({
      "Content-Type": "application/json",
      "X-Shopify-Access-Token": "test-secret",
    });
  });

  it("retries once after a 429 and then succeeds", async () => {
    const sleep = vi.fn(async (_ms: number) => {});
    const fetch = mockFetch()
      .mockResolvedValueOnce(statusResponse(429, "Too Many Requests", { "Retry-After": "2.0" }))
      .mockResolvedValueOnce(jsonResponse({ data: { ok: true } }));
    const client = new GraphQLClient({ ...clientConfig(fetch), retry: { sleep, jitterMs: 0 } });

    const result = await client.request<{ ok: boolean }>({ query: "{ ok }" });

    expect(result).toEqual({ ok: true, data: { ok: true } });
    expect(fetch).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledTimes(1);
    expect(sleep).toHaveBeenCalledWith(2000);
  });

  it("retries a THROTTLED error returned with HTTP 200", async () => {
    const fetch = mockFetch()
      .mockResolvedValueOnce(
        jsonResponse({ errors: [{ message: "Throttled", extensions: { code: "THROTTLED" } }] })
      )
      .mockResolvedValueOnce(jsonResponse({ data: { ok: true } }));
    const client = new GraphQLClient(clientConfig(fetch));

    const result = await client.request<{ ok: boolean }>({ query: "{ ok }" });

    expect(result.ok).toBe(true);
    expect(fetch).toHaveBeenCalledTimes(2);
  });

  it("gives up after the maximum number of attempts", async () => {
    const fetch = mockFetch().mockImplementation(async () =>
      statusResponse(429, "Too Many Requests")
    );
    const client = new GraphQLClient(clientConfig(fetch));

    const result = await client.request({ query: "{ ok }" });

    expect(fetch).toHaveBeenCalledTimes(4);
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.status).toBe(429);
  });

  it("does not retry server errors", async () => {
    const fetch = mockFetch().mockResolvedValueOnce(statusResponse(500, "Internal Server Error"));
    const client = new GraphQLClient(clientConfig(fetch));

    const result = await client.request({ query: "{ ok }" });

    expect(fetch).toHaveBeenCalledTimes(1);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(ShopifyApiError);
      expect(result.error.message).toBe("HTTP 500: Internal Server Error");
      expect(result.error.status).toBe(500);
    }
  });

  it("reports transport failures without retrying", async () => {
    const fetch = mockFetch().mockRejectedValueOnce(new Error("socket hang up"));
    const client = new GraphQLClient(clientConfig(fetch));

    const result = await client.request({ query: "{ ok }" });

    expect(fetch).toHaveBeenCalledTimes(1);
    expect(result.ok || result.error.message).toBe("Network error: socket hang up");
  });

  it("surfaces the first GraphQL error", async () => {
    const fetch = mockFetch().mockResolvedValueOnce(
      jsonResponse({ errors: [{ message: "Field 'nope' doesn't exist on type 'QueryRoot'" }] })
    );
    const client = new GraphQLClient(clientConfig(fetch));

    const result = await client.request({ query: "{ nope }" });

    expect(fetch).toHaveBeenCalledTimes(1);
    expect(result.ok || result.error.message).toBe(
      "Field 'nope' doesn't exist on type 'QueryRoot'"
    );
  });

  it("follows cursors while paginating", async () => {
    const page = (ids: string[], hasNextPage: boolean, endCursor: string | null) =>
      jsonResponse({
        data: {
          items: {
            edges: ids.map((id) => ({ node: { id } })),
            pageInfo: { hasNextPage, endCursor },
          },
        },
      });
    const fetch = mockFetch()
      .mockResolvedValueOnce(page(["a", "b"], true, "cursor-1"))
      .mockResolvedValueOnce(page(["c"], false, null));
    const client = new GraphQLClient(clientConfig(fetch));

    const ids: string[] = [];
    for await (const node of client.paginate<
      { items: { edges: Array<{ node: { id: string } }>; pageInfo: { hasNextPage: boolean; endCursor: string | null } } },
      { id: string }
    >("query items", { type: "processor" }, { pageSize: 2, getConnection: (data) => data.items })) {
      ids.push(node.id);
    }

    expect(ids).toEqual(["a", "b", "c"]);
    expect(requestBody(fetch, 0)).toEqual({
      query: "query items",
      variables: { type: "processor", first: 2 },
    });
    expect(requestBody(fetch, 1)).toEqual({
      query: "query items",
      variables: { type: "processor", first: 2, after: "cursor-1" },
    });
  });

  it("keeps the token out of its endpoint description", () => {
    const client = new GraphQLClient(clientConfig(mockFetch()));
    expect(client.getSafeEndpoint()).toBe(ENDPOINT);
    expect(client.getShop()).toBe("test-shop.myshopify.com");
  });
});
