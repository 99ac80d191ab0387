/**
 * Products
 *
 * Product CRUD goes through the REST API (one call creates the product, its
 * variant and its metafields). Metafields on an existing product are written
 * with GraphQL `metafieldsSet`, 25 per call.
 */

import type { GraphQLClient } from "../graphql/client.js";
import { METAFIELDS_SET, PRODUCT_UPDATE_CATEGORY } from "../graphql/queries.js";
import type { ProductMetafield } from "../mapping/resolve.js";
import type { ProductPayload } from "../product/payload.js";
import type { RestClient, RestError, QueryParams } from "../rest/client.js";
import { chunkArray } from "../utils/chunk.js";
import { logger } from "../utils/logger.js";
import {
  type Result,
  type ShopifyFieldError,
  ok,
  err,
  ShopifyApiError,
  ShopifyUserError,
} from "../utils/types.js";

export interface RestVariant {
  id: number;
  price: string;
  sku: string | null;
  inventory_quantity: number;
}

export interface RestProduct {
  id: number;
  admin_graphql_api_id?: string;
  title: string;
  handle: string;
  vendor: string;
  product_type: string;
  status: string;
  tags: string;
  variants: RestVariant[];
}

export interface RestMetafield {
  id: number;
  namespace: string;
  key: string;
  type: string;
  value: string;
}

const METAFIELDS_SET_LIMIT = 25;

export function productGid(id: number | string): string {
  return `gid://shopify/Product/${id}`;
}

/**
 * Numeric id from `gid://shopify/Product/123` or a bare id.
 */
export function productIdFromGid(gid: string): string {
  const tail = gid.split("/").pop() ?? gid;
  return tail.trim();
}

export function isDuplicateHandleError(error: unknown): boolean {
  if (!(error instanceof ShopifyUserError)) return false;
  return error.userErrors.some((e) => {
    const field = Array.isArray(e.field) ? e.field.join(".") : e.field ?? "";
    return field.includes("handle") && /taken|exists|already/i.test(e.message);
  });
}

export async function createProduct(
  rest: RestClient,
  payload: ProductPayload
): Promise<Result<RestProduct, RestError>> {
  const result = await rest.post<{ product?: RestProduct }>("products.json", {
    product: payload,
  });
  if (!result.ok) return result;
  if (!result.data.product) {
    return err(new ShopifyApiError("Product create returned no product", 201, result.data));
  }

  logger.debug("Created product", {
    id: result.data.product.id,
    handle: result.data.product.handle,
  });
  return ok(result.data.product);
}

export async function getProduct(
  rest: RestClient,
  id: number | string
): Promise<Result<RestProduct, RestError>> {
  const result = await rest.get<{ product?: RestProduct }>(`products/${id}.json`);
  if (!result.ok) return result;
  if (!result.data.product) {
    return err(new ShopifyApiError(`Product ${id} not found`, 404, result.data));
  }
  return ok(result.data.product);
}

export async function updateProduct(
  rest: RestClient,
  id: number | string,
  fields: Partial<Omit<ProductPayload, "metafields">>
): Promise<Result<RestProduct, RestError>> {
  const result = await rest.put<{ product?: RestProduct }>(`products/${id}.json`, {
    product: { id: Number(id), ...fields },
  });
  if (!result.ok) return result;
  if (!result.data.product) {
    return err(new ShopifyApiError(`Product ${id} update returned no product`, 200, result.data));
  }
  return ok(result.data.product);
}

export async function deleteProduct(
  rest: RestClient,
  id: number | string
): Promise<Result<void, RestError>> {
  const result = await rest.delete(`products/${id}.json`);
  if (result.ok) logger.debug("Deleted product", { id });
  return result;
}

/**
 * Every product matching `query` (e.g. `{ vendor: "Catalog Importer" }`).
 */
export async function listProducts(
  rest: RestClient,
  query: QueryParams = {}
): Promise<Result<RestProduct[], RestError>> {
  const products: RestProduct[] = [];
  try {
    for await (const product of rest.paginate<RestProduct>("products.json", "products", query)) {
      products.push(product);
    }
  } catch (error: unknown) {
    if (error instanceof ShopifyApiError || error instanceof ShopifyUserError) {
      return err(error);
    }
    throw error;
  }
  return ok(products);
}

export async function listProductMetafields(
  rest: RestClient,
  id: number | string
): Promise<Result<RestMetafield[], RestError>> {
  const result = await rest.get<{ metafields?: RestMetafield[] }>(
    `products/${id}/metafields.json`
  );
  if (!result.ok) return result;
  return ok(result.data.metafields ?? []);
}

interface MetafieldsSetResponse {
  metafieldsSet: {
    metafields: Array<{ id: string; namespace: string; key: string }> | null;
    userErrors: ShopifyFieldError[];
  } | null;
}

/**
 * Upsert metafields on an existing product. Returns how many were written.
 */
export async function setProductMetafields(
  client: GraphQLClient,
  productId: string,
  metafields: readonly ProductMetafield[]
): Promise<Result<number, ShopifyApiError | ShopifyUserError>> {
  const ownerId = productId.startsWith("gid://") ? productId : productGid(productId);
  let written = 0;

  for (const chunk of chunkArray(metafields, METAFIELDS_SET_LIMIT)) {
    const result = await client.request<MetafieldsSetResponse>({
      query: METAFIELDS_SET,
      variables: {
        metafields: chunk.map((metafield) => ({ ownerId, ...metafield })),
      },
    });
    if (!result.ok) return result;

    const payload = result.data.metafieldsSet;
    if (payload && payload.userErrors.length > 0) {
      return err(ShopifyUserError.fromUserErrors("metafieldsSet", payload.userErrors));
    }
    written += payload?.metafields?.length ?? 0;
  }

  return ok(written);
}

interface ProductCategoryResponse {
  productUpdate: {
    product: { id: string; category: { id: string; name: string } | null } | null;
    userErrors: ShopifyFieldError[];
  } | null;
}

/**
 * Set a product's standard taxonomy category. Returns the category name.
 */
export async function updateProductCategory(
  client: GraphQLClient,
  productId: string,
  categoryId: string
): Promise<Result<string, ShopifyApiError | ShopifyUserError>> {
  const id = productId.startsWith("gid://") ? productId : productGid(productId);
  const result = await client.request<ProductCategoryResponse>({
    query: PRODUCT_UPDATE_CATEGORY,
    variables: { product: { id, category: categoryId } },
  });
  if (!result.ok) return result;

  const payload = result.data.productUpdate;
  if (payload && payload.userErrors.length > 0) {
    return err(ShopifyUserError.fromUserErrors("productUpdate", payload.userErrors));
  }
  const category = payload?.product?.category;
  if (!category) {
    return err(new ShopifyApiError("productUpdate returned no category", 200, result.data));
  }
  logger.debug("Set product category", { productId: id, category: category.name });
  return ok(category.name);
}
