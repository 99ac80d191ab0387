/**
 * REST client for Shopify Admin API: `https://{shop}/admin/api/{version}/{path}`.
 * Shares authentication, retry and error handling with the GraphQL client.
 */

import { SHOPIFY_API_VERSION_DEFAULT } from "../config/env.js";
import { type FetchFn, type ShopifyClientConfig, readBody } from "../graphql/client.js";
import { logger } from "../utils/logger.js";
import { safeError } from "../utils/redact.js";
import { parseRetryAfter, withBackoff } from "../utils/retry.js";
import {
  type Result,
  type ShopifyFieldError,
  ok,
  err,
  errorMessage,
  ShopifyApiError,
  ShopifyUserError,
} from "../utils/types.js";

export type RestError = ShopifyApiError | ShopifyUserError;
export type QueryParams = Record<string, string | number | undefined>;

type HttpMethod = "GET" | "POST" | "PUT" | "DELETE";

interface RestResponse<T> {
  body: T;
  nextUrl?: string;
}

/**
 * Pull the `rel="next"` URL out of a Link header.
 *
 * @example
 * parseNextLink('<https://s.myshopify.com/admin/api/2025-10/products.json?page_info=abc>; rel="next"')
 * // "https://s.myshopify.com/admin/api/2025-10/products.json?page_info=abc"
 */
export function parseNextLink(header: string | null): string | undefined {
  if (!header) return undefined;
  for (const part of header.split(",")) {
    const match = /<([^>]+)>\s*;\s*rel="?next"?/.exec(part.trim());
    if (match) return match[1];
  }
  return undefined;
}

/**
 * Field errors from a REST 422 body: `{"errors": {"handle": ["has already been taken"]}}`,
 * `{"errors": ["..."]}` or `{"errors": "..."}`.
 */
export function restFieldErrors(body: unknown): ShopifyFieldError[] {
  if (typeof body !== "object" || body === null || !("errors" in body)) {
    return typeof body === "string" && body !== "" ? [{ message: body }] : [];
  }

  const errors: unknown = body.errors;
  if (typeof errors === "string") return [{ message: errors }];
  if (Array.isArray(errors)) return errors.map((message) => ({ message: String(message) }));
  if (typeof errors === "object" && errors !== null) {
    return Object.entries(errors).flatMap(([field, messages]) =>
      (Array.isArray(messages) ? messages : [messages]).map((message) => ({
        field: [field],
        message: String(message),
      }))
    );
  }
  return [];
}

export class RestClient {
  private readonly baseUrl: string;
  private readonly headers: Record<string, string>;
  private readonly fetchFn: FetchFn;

  constructor(private readonly config: ShopifyClientConfig) {
    const apiVersion = config.apiVersion || SHOPIFY_API_VERSION_DEFAULT;
    this.baseUrl = `https://${config.shop}/admin/api/${apiVersion}`;
    this.headers = {
      "Content-Type": "application/json",
      Accept: "application/json",
      "X-Shopify-Access-Token": config.accessToken,
    };
    this.fetchFn = config.fetch ?? ((input, init) => fetch(input, init));
  }

  url(path: string, query: QueryParams = {}): string {
    const url = new URL(`${this.baseUrl}/${path.replace(/^\/+/, "")}`);
    for (const [key, value] of Object.entries(query)) {
      if (value !== undefined) url.searchParams.set(key, String(value));
    }
    return url.toString();
  }

  async get<T>(path: string, query?: QueryParams): Promise<Result<T, RestError>> {
    return this.unwrapBody(this.request<T>("GET", this.url(path, query)));
  }

  async post<T>(path: string, body: unknown): Promise<Result<T, RestError>> {
    return this.unwrapBody(this.request<T>("POST", this.url(path), body));
  }

  async put<T>(path: string, body: unknown): Promise<Result<T, RestError>> {
    return this.unwrapBody(this.request<T>("PUT", this.url(path), body));
  }

  async delete(path: string): Promise<Result<void, RestError>> {
    const result = await this.request<unknown>("DELETE", this.url(path));
    return result.ok ? ok(undefined) : result;
  }

  /**
   * Yield every item of a list endpoint, following `Link: rel="next"`.
   *
   * @example
   * for await (const product of rest.paginate<RestProduct>("products.json", "products")) { ... }
   */
  async *paginate<T>(
    path: string,
    key: string,
    query: QueryParams = {}
  ): AsyncGenerator<T, void, undefined> {
    let nextUrl: string | undefined = this.url(path, { limit: 250, ...query });

    while (nextUrl) {
      const result: Result<RestResponse<Record<string, T[] | undefined>>, RestError> =
        await this.request<Record<string, T[] | undefined>>("GET", nextUrl);
      if (!result.ok) {
        throw result.error;
      }

      for (const item of result.data.body[key] ?? []) {
        yield item;
      }
      nextUrl = result.data.nextUrl;
    }
  }

  getShop(): string {
    return this.config.shop;
  }

  private async unwrapBody<T>(
    pending: Promise<Result<RestResponse<T>, RestError>>
  ): Promise<Result<T, RestError>> {
    const result = await pending;
    return result.ok ? ok(result.data.body) : result;
  }

  private async request<T>(
    method: HttpMethod,
    url: string,
    body?: unknown
  ): Promise<Result<RestResponse<T>, RestError>> {
    try {
      const response = await withBackoff(
        () => this.send<T>(method, url, body),
        this.config.retry
      );
      return ok(response);
    } catch (error: unknown) {
      if (error instanceof ShopifyApiError || error instanceof ShopifyUserError) {
        return err(error);
      }
      logger.error("REST request failed", safeError(error));
      return err(new ShopifyApiError(errorMessage(error), undefined, error));
    }
  }

  private async send<T>(
    method: HttpMethod,
    url: string,
    body?: unknown
  ): Promise<RestResponse<T>> {
    let response: Response;
    try {
      response = await this.fetchFn(url, {
        method,
        headers: this.headers,
        body: body === undefined ? undefined : JSON.stringify(body),
      });
    } catch (error: unknown) {
      throw new ShopifyApiError(`Network error: ${errorMessage(error)}`, undefined, error);
    }

    logger.debug("REST request", {
      method,
      path: new URL(url).pathname,
      status: response.status,
      callLimit: response.headers.get("X-Shopify-Shop-Api-Call-Limit") ?? undefined,
    });

    if (response.status === 422) {
      const errors = restFieldErrors(await readBody(response));
      if (errors.length === 0) errors.push({ message: "Unprocessable entity" });
      throw ShopifyUserError.fromUserErrors(`${method} ${new URL(url).pathname}`, errors);
    }

    if (!response.ok) {
      throw new ShopifyApiError(
        `HTTP ${response.status}: ${response.statusText}`,
        response.status,
        await readBody(response),
        parseRetryAfter(response.headers.get("Retry-After"))
      );
    }

    const parsed = await readBody(response);
    return {
      body: parsed as T,
      nextUrl: parseNextLink(response.headers.get("Link")),
    };
  }
}

export function createRestClient(config: ShopifyClientConfig): RestClient {
  return new RestClient(config);
}
