/**
 * Operator-facing laptop product input, validated before anything is sent to Shopify.
 */

import { z } from "zod";
import { type Result, ok, err, ValidationError } from "../utils/types.js";
import { SUPPORTED_CURRENCIES, parseAmount } from "./price.js";

export const LAPTOP_RANKS = ["A", "A+", "S", "S+", "BNWB", "BNOB", "BNIB"] as const;
export type LaptopRank = (typeof LAPTOP_RANKS)[number];

export function isLaptopRank(value: string): value is LaptopRank {
  return (LAPTOP_RANKS as readonly string[]).includes(value);
}

/** Every laptop lands in these collections. */
export const DEFAULT_COLLECTIONS = ["All Products", "Laptop"] as const;

export const PRODUCT_STATUSES = ["active", "draft"] as const;
export type ProductStatus = (typeof PRODUCT_STATUSES)[number];

const text = z.string().trim().optional().default("");

export const laptopSpecsSchema = z.object({
  cpu: text,
  ram: text,
  /** dedicated graphics */
  vga: text,
  /** integrated graphics */
  gpu: text,
  display: text,
  storage: text,
  color: text,
  os: text,
  keyboard_layout: text,
  keyboard_backlight: text,
});
export type LaptopSpecs = z.infer<typeof laptopSpecsSchema>;
export type SpecField = keyof LaptopSpecs;

export const nameList = z
  .array(z.string().trim())
  .optional()
  .default([])
  .transform((values) => [...new Set(values.filter((value) => value !== ""))]);

export const priceSchema = z.union([z.string(), z.number()]).transform((value, ctx) => {
  const parsed = parseAmount(value);
  if (!parsed.ok) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: parsed.error.message });
    return z.NEVER;
  }
  if (parsed.data <= 0) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: "Price must be greater than 0" });
    return z.NEVER;
  }
  return parsed.data;
});

export const laptopProductSchema = z.object({
  title: z.string().trim().min(1, "Title cannot be empty"),
  brand: z.string().trim().min(1, "Brand cannot be empty"),
  model: z.string().trim().min(1, "Model cannot be empty"),
  price: priceSchema,
  currency: z.enum(SUPPORTED_CURRENCIES).default("JPY"),
  quantity: z.number().int().min(1).default(1),
  sku: z.string().trim().optional(),
  specs: laptopSpecsSchema.default({}),
  rank: z.enum(LAPTOP_RANKS).optional(),
  inclusions: nameList,
  minus: nameList,
  collections: nameList.transform((values) => {
    const merged = [...values];
    for (const name of DEFAULT_COLLECTIONS) {
      if (!merged.includes(name)) merged.push(name);
    }
    return merged;
  }),
  tags: nameList,
  status: z.enum(PRODUCT_STATUSES).default("active"),
  vendor: z.string().trim().min(1).optional(),
  handle: z.string().trim().min(1).optional(),
  description: z.string().optional(),
  taxable: z.boolean().default(true),
  /** local image files, uploaded in order after the product is created */
  images: nameList,
});

export type LaptopProduct = z.infer<typeof laptopProductSchema>;
export type LaptopProductInput = z.input<typeof laptopProductSchema>;

export function parseLaptopProduct(input: unknown): Result<LaptopProduct, ValidationError> {
  const parsed = laptopProductSchema.safeParse(input);
  if (!parsed.success) {
    const details = parsed.error.issues.map(
      (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`
    );
    return err(new ValidationError(`Invalid laptop product: ${details[0]}`, details));
  }
  return ok(parsed.data);
}

/**
 * Core specs that are still empty, for operator warnings.
 */
export function missingSpecs(product: Pick<LaptopProduct, "specs">): SpecField[] {
  const core: SpecField[] = ["cpu", "ram", "display", "storage"];
  return core.filter((field) => product.specs[field] === "");
}

/**
 * One-line summary, e.g. "Ryzen 7 4800H | 16GB | VGA: RTX 3050 | 512GB SSD".
 */
export function specSummary(specs: LaptopSpecs): string {
  const parts = [
    specs.cpu,
    specs.ram,
    specs.vga && `VGA: ${specs.vga}`,
    specs.gpu && `iGPU: ${specs.gpu}`,
    specs.storage,
  ].filter((part) => part !== "");
  return parts.length > 0 ? parts.join(" | ") : "No specs available";
}
