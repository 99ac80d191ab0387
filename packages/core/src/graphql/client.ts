/**
 * GraphQL client for Shopify Admin API.
 * Handles authentication, request/response, and error handling.
 */

import { SHOPIFY_API_VERSION_DEFAULT } from "../config/env.js";
import { logger } from "../utils/logger.js";
import { redactToken, safeError } from "../utils/redact.js";
import { type RetryOptions, parseRetryAfter, withBackoff } from "../utils/retry.js";
import { ShopifyApiError, type Result, ok, err, errorMessage } from "../utils/types.js";

export type FetchFn = (input: string, init: RequestInit) => Promise<Response>;

export interface ShopifyClientConfig {
  shop: string;
  accessToken: string;
  apiVersion?: string;
  /** Defaults to the global fetch. */
  fetch?: FetchFn;
  retry?: RetryOptions;
}

export type GraphQLVariables = Record<string, unknown>;

export interface GraphQLRequest {
  query: string;
  variables?: GraphQLVariables;
}

export interface GraphQLError {
  message: string;
  extensions?: {
    code?: string;
    [key: string]: unknown;
  };
}

export interface GraphQLResponse<T> {
  data?: T;
  errors?: GraphQLError[];
  extensions?: {
    cost?: {
      requestedQueryCost: number;
      actualQueryCost: number;
      throttleStatus: {
        maximumAvailable: number;
        currentlyAvailable: number;
        restoreRate: number;
      };
    };
  };
}

export interface PageInfo {
  hasNextPage: boolean;
  endCursor?: string | null;
}

export interface Connection<TNode> {
  edges: Array<{ node: TNode }>;
  pageInfo: PageInfo;
}

/**
 * GraphQL client for Shopify Admin API.
 * Automatically retries on rate limits (429/430) with exponential backoff.
 */
export class GraphQLClient {
  private readonly endpoint: string;
  private readonly headers: Record<string, string>;
  private readonly fetchFn: FetchFn;

  constructor(private readonly config: ShopifyClientConfig) {
    const apiVersion = config.apiVersion || SHOPIFY_API_VERSION_DEFAULT;
    this.endpoint = `https://${config.shop}/admin/api/${apiVersion}/graphql.json`;
    this.headers = {
      "Content-Type": "application/json",
      "X-Shopify-Access-Token": config.accessToken,
    };
    this.fetchFn = config.fetch ?? ((input, init) => fetch(input, init));
  }

  /**
   * Execute a GraphQL query or mutation. Resolves to `data`; top-level
   * GraphQL errors and HTTP failures come back as a ShopifyApiError.
   */
  async request<T>(request: GraphQLRequest): Promise<Result<T, ShopifyApiError>> {
    try {
      const data = await withBackoff(() => this.send<T>(request), this.config.retry);
      return ok(data);
    } catch (error: unknown) {
      if (error instanceof ShopifyApiError) {
        return err(error);
      }
      logger.error("GraphQL request failed", safeError(error));
      return err(new ShopifyApiError(errorMessage(error), undefined, error));
    }
  }

  private async send<T>(request: GraphQLRequest): Promise<T> {
    const startTime = Date.now();

    let response: Response;
    try {
      response = await this.fetchFn(this.endpoint, {
        method: "POST",
        headers: this.headers,
        body: JSON.stringify(request),
      });
    } catch (error: unknown) {
      throw new ShopifyApiError(
        `Network error: ${errorMessage(error)}`,
        undefined,
        error
      );
    }

    const duration = Date.now() - startTime;

    if (!response.ok) {
      const body = await readBody(response);
      throw new ShopifyApiError(
        `HTTP ${response.status}: ${response.statusText}`,
        response.status,
        body,
        parseRetryAfter(response.headers.get("Retry-After"))
      );
    }

    const responseData = (await response.json()) as GraphQLResponse<T>;

    if (responseData.extensions?.cost) {
      const cost = responseData.extensions.cost;
      logger.debug("GraphQL request cost", {
        actualCost: cost.actualQueryCost,
        available: cost.throttleStatus.currentlyAvailable,
        maximum: cost.throttleStatus.maximumAvailable,
        duration,
      });

      const availablePercent =
        (cost.throttleStatus.currentlyAvailable /
          cost.throttleStatus.maximumAvailable) *
        100;
      if (availablePercent < 20) {
        logger.warn("Approaching GraphQL cost limit", {
          availablePercent: availablePercent.toFixed(1),
          currentlyAvailable: cost.throttleStatus.currentlyAvailable,
        });
      }
    }

    if (responseData.errors && responseData.errors.length > 0) {
      const firstError = responseData.errors[0];
      // THROTTLED arrives with HTTP 200
      const status =
        firstError.extensions?.code === "THROTTLED" ? 430 : response.status;
      throw new ShopifyApiError(firstError.message, status, responseData);
    }

    if (responseData.data === undefined) {
      throw new ShopifyApiError("GraphQL response has no data", response.status, responseData);
    }

    return responseData.data;
  }

  /**
   * Follow cursor-based pagination, yielding every node.
   * `$first` and `$after` are supplied; `getConnection` picks the connection out of `data`.
   */
  async *paginate<TData, TNode>(
    query: string,
    variables: GraphQLVariables,
    options: {
      pageSize?: number;
      getConnection: (data: TData) => Connection<TNode> | null | undefined;
    }
  ): AsyncGenerator<TNode, void, undefined> {
    const pageSize = options.pageSize || 250;
    let cursor: string | undefined;

    for (;;) {
      const result = await this.request<TData>({
        query,
        variables: { ...variables, first: pageSize, after: cursor },
      });

      if (!result.ok) {
        throw result.error;
      }

      const connection = options.getConnection(result.data);
      if (!connection) return;

      for (const edge of connection.edges) {
        yield edge.node;
      }

      if (!connection.pageInfo.hasNextPage || !connection.pageInfo.endCursor) return;
      cursor = connection.pageInfo.endCursor;
    }
  }

  getShop(): string {
    return this.config.shop;
  }

  /**
   * Get a safe representation of the endpoint (with token redacted).
   */
  getSafeEndpoint(): string {
    return redactToken(this.endpoint);
  }
}

/**
 * Response body for error reporting: JSON when it parses, text otherwise.
 */
export async function readBody(response: Response): Promise<unknown> {
  const text = await response.text();
  if (text === "") return undefined;
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

export function createGraphQLClient(config: ShopifyClientConfig): GraphQLClient {
  return new GraphQLClient(config);
}
