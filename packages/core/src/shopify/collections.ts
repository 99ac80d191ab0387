/**
 * Collections
 *
 * Looks up collections by title and adds products to them. Collection ids are
 * cached per client for the lifetime of a batch.
 */

import type { GraphQLClient } from "../graphql/client.js";
import { COLLECTIONS_BY_TITLE_QUERY, COLLECTION_ADD_PRODUCTS } from "../graphql/queries.js";
import { logger } from "../utils/logger.js";
import {
  type Result,
  type ShopifyFieldError,
  ok,
  err,
  ShopifyApiError,
  ShopifyUserError,
  NotFoundError,
} from "../utils/types.js";

export interface CollectionNode {
  id: string;
  title: string;
  handle: string;
}

interface CollectionsPage {
  collections: {
    edges: Array<{ node: CollectionNode }>;
    pageInfo: { hasNextPage: boolean; endCursor?: string | null };
  } | null;
}

export type CollectionError = ShopifyApiError | ShopifyUserError | NotFoundError;

/**
 * Collection search syntax: `title:'All Products'`, with quotes escaped.
 */
export function titleQuery(title: string): string {
  return `title:'${title.replace(/\\/g, "\\\\").replace(/'/g, "\\'")}'`;
}

export class CollectionService {
  private readonly ids = new Map<string, string>();

  constructor(private readonly client: GraphQLClient) {}

  /**
   * Exact (case-insensitive) title match; the search itself is fuzzy.
   */
  async findByTitle(title: string): Promise<Result<CollectionNode | undefined, ShopifyApiError>> {
    const wanted = title.trim().toLowerCase();
    try {
      for await (const node of this.client.paginate<CollectionsPage, CollectionNode>(
        COLLECTIONS_BY_TITLE_QUERY,
        { query: titleQuery(title) },
        { pageSize: 50, getConnection: (data) => data.collections }
      )) {
        if (node.title.trim().toLowerCase() === wanted) {
          return ok(node);
        }
      }
    } catch (error: unknown) {
      if (error instanceof ShopifyApiError) return err(error);
      throw error;
    }
    return ok(undefined);
  }

  async resolveId(title: string): Promise<Result<string, ShopifyApiError | NotFoundError>> {
    const key = title.trim().toLowerCase();
    const cached = this.ids.get(key);
    if (cached) return ok(cached);

    const found = await this.findByTitle(title);
    if (!found.ok) return found;
    if (!found.data) {
      return err(new NotFoundError(`Collection not found: ${title}`, title));
    }

    this.ids.set(key, found.data.id);
    return ok(found.data.id);
  }

  async addProducts(
    collectionId: string,
    productIds: string[]
  ): Promise<Result<void, ShopifyApiError | ShopifyUserError>> {
    const result = await this.client.request<{
      collectionAddProducts: { userErrors: ShopifyFieldError[] } | null;
    }>({
      query: COLLECTION_ADD_PRODUCTS,
      variables: { id: collectionId, productIds },
    });
    if (!result.ok) return result;

    const userErrors = result.data.collectionAddProducts?.userErrors ?? [];
    if (userErrors.length > 0) {
      return err(ShopifyUserError.fromUserErrors("collectionAddProducts", userErrors));
    }
    return ok(undefined);
  }

  /**
   * Add one product to every named collection. Failures are collected per
   * collection and never stop the remaining ones.
   */
  async assignProduct(
    productGid: string,
    titles: readonly string[]
  ): Promise<{ assigned: string[]; failed: Array<{ title: string; error: CollectionError }> }> {
    const assigned: string[] = [];
    const failed: Array<{ title: string; error: CollectionError }> = [];

    for (const title of titles) {
      const id = await this.resolveId(title);
      if (!id.ok) {
        failed.push({ title, error: id.error });
        continue;
      }

      const added = await this.addProducts(id.data, [productGid]);
      if (!added.ok) {
        failed.push({ title, error: added.error });
        continue;
      }
      assigned.push(title);
    }

    if (assigned.length > 0) {
      logger.debug("Assigned product to collections", { productGid, collections: assigned });
    }
    return { assigned, failed };
  }
}
