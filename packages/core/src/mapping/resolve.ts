/**
 * Turns a product's attributes into product metafields.
 *
 * Text fields pass through, reference fields resolve to metaobject GIDs and
 * list references to a JSON array of GIDs. A value without a GID never fails
 * the product: its metafield is left out and the value is reported as missing.
 */

import type { GidLookup } from "../catalog/gid-repository.js";
import type { ComponentCategory } from "../catalog/schemas.js";
import type { LaptopProduct } from "../product/laptop.js";
import type { SmartphoneProduct } from "../product/smartphone.js";
import { logger } from "../utils/logger.js";
import {
  LAPTOP_METAFIELDS,
  SMARTPHONE_METAFIELDS,
  type LaptopAttribute,
  type MetafieldDefinition,
  type MetafieldType,
  type ProductAttribute,
  type SmartphoneAttribute,
  metafieldId,
} from "./definitions.js";
import type { MissingContext, MissingRecorder } from "./missing-log.js";

export interface ProductMetafield {
  namespace: string;
  key: string;
  type: MetafieldType;
  value: string;
}

export interface MissingValue {
  attribute: ProductAttribute;
  category: ComponentCategory;
  value: string;
}

export interface MetafieldResolution {
  metafields: ProductMetafield[];
  missing: MissingValue[];
}

export interface GidSource {
  getGid(category: string, displayName: string): GidLookup;
}

export interface ResolveOptions {
  missingLog?: MissingRecorder;
  context?: MissingContext;
}

export type ResolvableLaptop = Pick<
  LaptopProduct,
  "specs" | "rank" | "inclusions" | "minus"
> &
  Partial<Pick<LaptopProduct, "title" | "brand" | "model">>;

export type ResolvableSmartphone = Pick<
  SmartphoneProduct,
  "sim_carriers" | "rank" | "inclusions" | "ram_size" | "minus" | "color"
> &
  Partial<Pick<SmartphoneProduct, "title" | "brand" | "model">>;

function present(value: string | undefined): string[] {
  const trimmed = value?.trim() ?? "";
  return trimmed ? [trimmed] : [];
}

function laptopValues(product: ResolvableLaptop, attribute: LaptopAttribute): string[] {
  switch (attribute) {
    case "rank":
      return product.rank ? [product.rank] : [];
    case "inclusions":
      return product.inclusions;
    case "minus":
      return product.minus;
    default: {
      const value = product.specs[attribute].trim();
      return value ? [value] : [];
    }
  }
}

/**
 * Shorter names a processor may be stored under.
 *
 * @example
 * processorAliases("Intel Core i7-12700H (16 CPUs), ~2.3GHz")
 * // ["Intel Core i7-12700H", "i7-12700H"]
 * processorAliases("AMD Ryzen 7 4800HS (16 CPUs), ~2.9GHz")
 * // ["AMD Ryzen 7 4800HS", "Ryzen 7 4800HS"]
 */
export function processorAliases(name: string): string[] {
  const base = name.split("(")[0].trim();
  const aliases = [base];

  if (base.includes("Intel Core")) {
    const model = base.split(/\s+/)[2];
    if (model) aliases.push(model);
  } else if (base.includes("AMD Ryzen")) {
    aliases.push(base.replace("AMD ", ""));
  } else if (base.includes("Apple M")) {
    aliases.push(base.replace(" Chip", "").trim());
  }

  return [...new Set(aliases)].filter((alias) => alias !== "" && alias !== name);
}

function lookup(
  gids: GidSource,
  category: ComponentCategory,
  value: string
): string | undefined {
  const direct = gids.getGid(category, value);
  if (direct.found) return direct.gid;

  if (category === "processor") {
    for (const alias of processorAliases(value)) {
      const match = gids.getGid(category, alias);
      if (match.found) {
        logger.debug("Processor matched by alias", { value, alias });
        return match.gid;
      }
    }
  }
  return undefined;
}

function smartphoneValues(
  product: ResolvableSmartphone,
  attribute: SmartphoneAttribute
): string[] {
  switch (attribute) {
    case "sim_carriers":
      return product.sim_carriers;
    case "rank":
      return present(product.rank);
    case "inclusions":
      return product.inclusions;
    case "ram_size":
      return present(product.ram_size);
    case "minus":
      return product.minus;
    case "color":
      return present(product.color);
  }
}

function resolveDefinition(
  definition: MetafieldDefinition,
  values: string[],
  gids: GidSource,
  missing: MissingValue[]
): ProductMetafield | undefined {
  const base = { namespace: definition.namespace, key: definition.key };

  if (definition.type === "single_line_text_field") {
    return { ...base, type: definition.type, value: values[0] };
  }

  const found: string[] = [];
  for (const value of definition.type === "metaobject_reference" ? values.slice(0, 1) : values) {
    const gid = lookup(gids, definition.category, value);
    if (gid) {
      if (!found.includes(gid)) found.push(gid);
    } else {
      missing.push({ attribute: definition.attribute, category: definition.category, value });
    }
  }

  if (found.length === 0) return undefined;
  return definition.type === "metaobject_reference"
    ? { ...base, type: definition.type, value: found[0] }
    : { ...base, type: definition.type, value: JSON.stringify(found) };
}

function resolveAll<A extends ProductAttribute>(
  definitions: readonly MetafieldDefinition<A>[],
  valuesOf: (attribute: A) => string[],
  identity: Partial<Record<"title" | "brand" | "model", string>>,
  gids: GidSource,
  options: ResolveOptions
): MetafieldResolution {
  const byId = new Map<string, ProductMetafield>();
  const missing: MissingValue[] = [];

  for (const definition of definitions) {
    const values = valuesOf(definition.attribute);
    if (values.length === 0) continue;

    const metafield = resolveDefinition(definition, values, gids, missing);
    if (metafield && !byId.has(metafieldId(metafield))) {
      byId.set(metafieldId(metafield), metafield);
    }
  }

  const context: MissingContext = {
    ...(identity.title ? { title: identity.title } : {}),
    ...(identity.brand ? { brand: identity.brand } : {}),
    ...(identity.model ? { model: identity.model } : {}),
    ...options.context,
  };

  for (const entry of missing) {
    logger.warn("No metaobject for value, skipping field", {
      category: entry.category,
      value: entry.value,
    });
    options.missingLog?.record(entry.category, entry.value, context);
  }

  return { metafields: [...byId.values()], missing };
}

export function resolveLaptopMetafields(
  product: ResolvableLaptop,
  gids: GidSource,
  options: ResolveOptions = {}
): MetafieldResolution {
  return resolveAll(
    LAPTOP_METAFIELDS,
    (attribute) => laptopValues(product, attribute),
    product,
    gids,
    options
  );
}

export function resolveSmartphoneMetafields(
  product: ResolvableSmartphone,
  gids: GidSource,
  options: ResolveOptions = {}
): MetafieldResolution {
  return resolveAll(
    SMARTPHONE_METAFIELDS,
    (attribute) => smartphoneValues(product, attribute),
    product,
    gids,
    options
  );
}
