/**
 * Metaobjects
 *
 * Component entries (a CPU model, a display panel, a color) live in Shopify as
 * metaobjects. These helpers create and refresh them, and rebuild the local
 * display name → GID tables from what the store actually holds.
 */

import type { ComponentCategory, GidTable } from "../catalog/schemas.js";
import type { GraphQLClient } from "../graphql/client.js";
import {
  METAOBJECTS_BY_TYPE_QUERY,
  METAOBJECT_CREATE,
  METAOBJECT_UPDATE,
  METAOBJECT_UPSERT,
} from "../graphql/queries.js";
import { slugify } from "../product/handle.js";
import { logger } from "../utils/logger.js";
import {
  type Result,
  type ShopifyFieldError,
  ok,
  err,
  ShopifyApiError,
  ShopifyUserError,
} from "../utils/types.js";

/** Metaobject definition type behind each component category. */
export const METAOBJECT_TYPES: Record<ComponentCategory, string> = {
  processor: "processor",
  vga: "vga",
  graphics: "graphics",
  display: "display",
  storage: "storage",
  color: "shopify--color-pattern",
  os: "operating_system",
  keyboard_layout: "keyboard_layout",
  keyboard_backlight: "keyboard_backlight",
  product_rank: "product_rank",
  product_inclusion: "product_inclusion",
  minus: "minus",
  sim_carrier: "sim_carrier",
  ram_size: "ram_size",
};

/** Field holding the display name on every component metaobject. */
export const LABEL_FIELD = "label";

export interface MetaobjectNode {
  id: string;
  type: string;
  handle: string;
  displayName: string;
}

export type MetaobjectFields = Record<string, string>;

type MetaobjectError = ShopifyApiError | ShopifyUserError;

interface MetaobjectMutationPayload {
  metaobject: MetaobjectNode | null;
  userErrors: ShopifyFieldError[];
}

function toFieldInputs(fields: MetaobjectFields): Array<{ key: string; value: string }> {
  return Object.entries(fields).map(([key, value]) => ({ key, value }));
}

export function metaobjectHandle(label: string): string {
  return slugify(label);
}

function mutationResult(
  operation: string,
  payload: MetaobjectMutationPayload | null | undefined
): Result<MetaobjectNode, MetaobjectError> {
  if (!payload) {
    return err(new ShopifyApiError(`${operation} returned no payload`));
  }
  if (payload.userErrors.length > 0) {
    return err(ShopifyUserError.fromUserErrors(operation, payload.userErrors));
  }
  if (!payload.metaobject) {
    return err(new ShopifyApiError(`${operation} returned no metaobject`));
  }
  return ok(payload.metaobject);
}

export async function createMetaobject(
  client: GraphQLClient,
  input: { type: string; handle?: string; fields: MetaobjectFields }
): Promise<Result<MetaobjectNode, MetaobjectError>> {
  const result = await client.request<{
    metaobjectCreate: MetaobjectMutationPayload | null;
  }>({
    query: METAOBJECT_CREATE,
    variables: {
      metaobject: {
        type: input.type,
        ...(input.handle ? { handle: input.handle } : {}),
        fields: toFieldInputs(input.fields),
      },
    },
  });
  if (!result.ok) return result;
  return mutationResult("metaobjectCreate", result.data.metaobjectCreate);
}

export async function updateMetaobject(
  client: GraphQLClient,
  id: string,
  fields: MetaobjectFields
): Promise<Result<MetaobjectNode, MetaobjectError>> {
  const result = await client.request<{
    metaobjectUpdate: MetaobjectMutationPayload | null;
  }>({
    query: METAOBJECT_UPDATE,
    variables: { id, metaobject: { fields: toFieldInputs(fields) } },
  });
  if (!result.ok) return result;
  return mutationResult("metaobjectUpdate", result.data.metaobjectUpdate);
}

/**
 * Create or update by (type, handle).
 */
export async function upsertMetaobject(
  client: GraphQLClient,
  type: string,
  handle: string,
  fields: MetaobjectFields
): Promise<Result<MetaobjectNode, MetaobjectError>> {
  const result = await client.request<{
    metaobjectUpsert: MetaobjectMutationPayload | null;
  }>({
    query: METAOBJECT_UPSERT,
    variables: {
      handle: { type, handle },
      metaobject: { fields: toFieldInputs(fields) },
    },
  });
  if (!result.ok) return result;
  return mutationResult("metaobjectUpsert", result.data.metaobjectUpsert);
}

interface MetaobjectsPage {
  metaobjects: {
    edges: Array<{ node: MetaobjectNode }>;
    pageInfo: { hasNextPage: boolean; endCursor?: string | null };
  } | null;
}

export async function listMetaobjects(
  client: GraphQLClient,
  type: string
): Promise<Result<MetaobjectNode[], ShopifyApiError>> {
  const nodes: MetaobjectNode[] = [];
  try {
    for await (const node of client.paginate<MetaobjectsPage, MetaobjectNode>(
      METAOBJECTS_BY_TYPE_QUERY,
      { type },
      { getConnection: (data) => data.metaobjects }
    )) {
      nodes.push(node);
    }
  } catch (error: unknown) {
    if (error instanceof ShopifyApiError) return err(error);
    throw error;
  }
  return ok(nodes);
}

/**
 * Build the display name → GID table for a category from the live store.
 * When two metaobjects share a display name the first one listed wins.
 */
export async function fetchGidTable(
  client: GraphQLClient,
  category: ComponentCategory
): Promise<Result<GidTable, ShopifyApiError>> {
  const type = METAOBJECT_TYPES[category];
  const result = await listMetaobjects(client, type);
  if (!result.ok) return result;

  const table: GidTable = {};
  for (const node of result.data) {
    if (Object.hasOwn(table, node.displayName)) {
      logger.warn("Duplicate metaobject display name", {
        type,
        displayName: node.displayName,
        kept: table[node.displayName],
        ignored: node.id,
      });
      continue;
    }
    table[node.displayName] = node.id;
  }

  logger.info(`Fetched ${Object.keys(table).length} ${category} metaobjects`, { type });
  return ok(table);
}
