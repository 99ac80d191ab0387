/**
 * REST product-creation bodies: laptops carry one variant, smartphones one
 * variant per SIM carrier.
 */

import type { ProductMetafield, MetafieldResolution } from "../mapping/resolve.js";
import { type Result, ok, ValidationError } from "../utils/types.js";
import { slugify } from "./handle.js";
import type { LaptopProduct, ProductStatus } from "./laptop.js";
import { formatPrice } from "./price.js";
import { type SmartphoneProduct, splitInventory } from "./smartphone.js";

export type ProductLine = "laptop" | "smartphone";

export const LAPTOP_PRODUCT_TYPE = "Laptop";
/** Smartphones are typed by taxonomy category, not product_type. */
export const SMARTPHONE_PRODUCT_TYPE = "";
export const SIM_CARRIER_OPTION = "SIM Carriers";

export interface VariantPayload {
  option1?: string;
  price: string;
  sku?: string;
  inventory_quantity: number;
  inventory_management: "shopify";
  inventory_policy: "deny";
  taxable: boolean;
  requires_shipping: boolean;
}

export interface ProductPayload {
  title: string;
  body_html?: string;
  vendor: string;
  product_type: string;
  handle: string;
  tags: string;
  status: ProductStatus;
  options?: Array<{ name: string; values: string[] }>;
  variants: VariantPayload[];
  metafields: ProductMetafield[];
}

export interface PayloadOptions {
  /** Used when the product carries no vendor of its own. */
  vendor: string;
  handle: string;
}

function uniqueTags(tags: string[]): string[] {
  const seen = new Set<string>();
  return tags.filter((tag) => {
    const key = tag.toLowerCase();
    if (tag === "" || seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}

/**
 * Tags written on every laptop: the product's own, then "laptop", brand and rank.
 */
export function productTags(product: Pick<LaptopProduct, "tags" | "brand" | "rank">): string[] {
  return uniqueTags([...product.tags, "laptop", product.brand, product.rank ?? ""]);
}

/**
 * Smartphone tags: the product's own, then "smartphone", brand and model.
 */
export function smartphoneTags(
  product: Pick<SmartphoneProduct, "tags" | "brand" | "model">
): string[] {
  return uniqueTags([...product.tags, "smartphone", product.brand, product.model ?? ""]);
}

export function buildProductPayload(
  product: LaptopProduct,
  resolution: Pick<MetafieldResolution, "metafields">,
  options: PayloadOptions
): Result<ProductPayload, ValidationError> {
  const price = formatPrice(product.price, product.currency);
  if (!price.ok) return price;

  const variant: VariantPayload = {
    price: price.data,
    inventory_quantity: product.quantity,
    inventory_management: "shopify",
    inventory_policy: "deny",
    taxable: product.taxable,
    requires_shipping: true,
  };
  if (product.sku) variant.sku = product.sku;

  const payload: ProductPayload = {
    title: product.title,
    vendor: product.vendor ?? options.vendor,
    product_type: LAPTOP_PRODUCT_TYPE,
    handle: options.handle,
    tags: productTags(product).join(", "),
    status: product.status,
    variants: [variant],
    metafields: resolution.metafields.map((metafield) => ({ ...metafield })),
  };
  if (product.description) payload.body_html = product.description;

  return ok(payload);
}

/**
 * One variant per SIM carrier with the stock split between them, or a single
 * variant when no carrier is given.
 */
export function buildSmartphonePayload(
  product: SmartphoneProduct,
  resolution: Pick<MetafieldResolution, "metafields">,
  options: PayloadOptions
): Result<ProductPayload, ValidationError> {
  const price = formatPrice(product.price, product.currency);
  if (!price.ok) return price;

  const base = {
    price: price.data,
    inventory_management: "shopify",
    inventory_policy: "deny",
    taxable: product.taxable,
    requires_shipping: true,
  } as const;

  const carriers = product.sim_carriers;
  let variants: VariantPayload[];
  if (carriers.length === 0) {
    variants = [{ ...base, inventory_quantity: product.quantity }];
    if (product.sku) variants[0].sku = product.sku;
  } else {
    const stock = splitInventory(product.quantity, carriers.length);
    variants = carriers.map((carrier, i) => {
      const variant: VariantPayload = {
        ...base,
        option1: carrier,
        inventory_quantity: stock[i],
      };
      if (product.sku) variant.sku = `${product.sku}-${slugify(carrier)}`;
      return variant;
    });
  }

  const payload: ProductPayload = {
    title: product.title,
    vendor: product.vendor ?? options.vendor,
    product_type: SMARTPHONE_PRODUCT_TYPE,
    handle: options.handle,
    tags: smartphoneTags(product).join(", "),
    status: product.status,
    variants,
    metafields: resolution.metafields.map((metafield) => ({ ...metafield })),
  };
  if (carriers.length > 0) {
    payload.options = [{ name: SIM_CARRIER_OPTION, values: [...carriers] }];
  }
  if (product.description) payload.body_html = product.description;

  return ok(payload);
}
