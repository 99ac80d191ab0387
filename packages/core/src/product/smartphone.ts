/**
 * Operator-facing smartphone product input.
 *
 * Smartphones sell as one product per device with a variant per SIM carrier;
 * condition rank, inclusions and defects use the same metaobjects as laptops.
 */

import { z } from "zod";
import { type Result, ok, err, ValidationError } from "../utils/types.js";
import { LAPTOP_RANKS, PRODUCT_STATUSES, nameList, priceSchema } from "./laptop.js";
import { SUPPORTED_CURRENCIES } from "./price.js";

export const SMARTPHONE_DEFAULT_COLLECTIONS = ["All Products", "Smartphone"] as const;

/** Shopify standard taxonomy: Electronics > Communications > Telephony > Mobile & Smart Phones. */
export const SMARTPHONE_CATEGORY_ID = "gid://shopify/TaxonomyCategory/el-4-8-5";

const optionalText = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

export const smartphoneProductSchema = z.object({
  title: z.string().trim().min(1, "Title cannot be empty"),
  brand: z.string().trim().min(1, "Brand cannot be empty"),
  model: optionalText,
  storage: optionalText,
  price: priceSchema,
  currency: z.enum(SUPPORTED_CURRENCIES).default("JPY"),
  quantity: z.number().int().min(1).default(1),
  sku: z.string().trim().optional(),
  color: optionalText,
  ram_size: optionalText,
  sim_carriers: nameList,
  rank: z.enum(LAPTOP_RANKS).optional(),
  inclusions: nameList,
  minus: nameList,
  collections: nameList.transform((values) => {
    const merged = [...values];
    for (const name of SMARTPHONE_DEFAULT_COLLECTIONS) {
      if (!merged.includes(name)) merged.push(name);
    }
    return merged;
  }),
  tags: nameList,
  status: z.enum(PRODUCT_STATUSES).default("active"),
  vendor: z.string().trim().min(1).optional(),
  handle: z.string().trim().min(1).optional(),
  description: z.string().optional(),
  taxable: z.boolean().default(false),
  images: nameList,
});

export type SmartphoneProduct = z.infer<typeof smartphoneProductSchema>;
export type SmartphoneProductInput = z.input<typeof smartphoneProductSchema>;

export function parseSmartphoneProduct(
  input: unknown
): Result<SmartphoneProduct, ValidationError> {
  const parsed = smartphoneProductSchema.safeParse(input);
  if (!parsed.success) {
    const details = parsed.error.issues.map(
      (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`
    );
    return err(new ValidationError(`Invalid smartphone product: ${details[0]}`, details));
  }
  return ok(parsed.data);
}

/**
 * Split `quantity` across `count` variants; the remainder goes to the first ones.
 *
 * @example
 * splitInventory(5, 3) // [2, 2, 1]
 */
export function splitInventory(quantity: number, count: number): number[] {
  if (count <= 0) return [];
  const base = Math.floor(quantity / count);
  const remainder = quantity % count;
  return Array.from({ length: count }, (_, i) => base + (i < remainder ? 1 : 0));
}
