import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { fileURLToPath } from "node:url";
import { vi } from "vitest";
import type { FetchFn, ShopifyClientConfig } from "../src/graphql/client.js";

export const FIXTURE_DATA_DIR = fileURLToPath(new URL("./fixtures/data", import.meta.url));

export const GID = (n: number): string => `gid://shopify/Metaobject/${n}`;

export function makeTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), "catalog-importer-"));
}

/**
 * Copy the fixture data directory somewhere writable.
 */
export function copyFixtureData(): string {
  const dataDir = path.join(makeTempDir(), "data");
  fs.cpSync(FIXTURE_DATA_DIR, dataDir, { recursive: true });
  return dataDir;
}

export function jsonResponse(
  body: unknown,
  status = 200,
  headers: Record<string, string> = {}
): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json", ...headers },
  });
}

export function statusResponse(
  status: number,
  statusText: string,
  headers: Record<string, string> = {}
): Response {
  return new Response("", { status, statusText, headers });
}

export function mockFetch() {
  return vi.fn<FetchFn>();
}

export function clientConfig(fetch: FetchFn): ShopifyClientConfig {
  return {
    shop: "test-shop.myshopify.com",
    accessToken: "test-secret",
    fetch,
    retry: { sleep: async () => {}, jitterMs: 0 },
  };
}

/**
 * Request body of the n-th fetch call, parsed.
 */
export function requestBody(fetch: ReturnType<typeof mockFetch>, call: number): unknown {
  const init = fetch.mock.calls[call][1];
  return JSON.parse(String(init.body));
}
