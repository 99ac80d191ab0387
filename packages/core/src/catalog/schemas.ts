/**
 * Shapes of the static JSON data files.
 */

import { z } from "zod";

export const COMPONENT_CATEGORIES = [
  "processor",
  "vga",
  "graphics",
  "display",
  "storage",
  "color",
  "os",
  "keyboard_layout",
  "keyboard_backlight",
  "product_rank",
  "product_inclusion",
  "minus",
  "sim_carrier",
  "ram_size",
] as const;

export type ComponentCategory = (typeof COMPONENT_CATEGORIES)[number];

export function isComponentCategory(value: string): value is ComponentCategory {
  return (COMPONENT_CATEGORIES as readonly string[]).includes(value);
}

/**
 * File under `<dataDir>/metaobjects/` holding each category's table.
 */
export const CATEGORY_FILES: Record<ComponentCategory, string> = {
  processor: "processors.json",
  vga: "vga.json",
  graphics: "graphics.json",
  display: "displays.json",
  storage: "storage.json",
  color: "colors.json",
  os: "os.json",
  keyboard_layout: "keyboard_layouts.json",
  keyboard_backlight: "keyboard_backlights.json",
  product_rank: "product_rank_laptop.json",
  product_inclusion: "product_inclusion_laptop.json",
  minus: "minus.json",
  sim_carrier: "sim_carriers.json",
  ram_size: "ram_sizes.json",
};

export const GID_PATTERN = /^gid:\/\/shopify\/[A-Za-z]+\/\d+$/;

export const gidSchema = z.string().regex(GID_PATTERN, "Expected a Shopify GID");

/** display name → GID */
export const gidTableSchema = z.record(z.string().min(1), gidSchema);
export type GidTable = z.infer<typeof gidTableSchema>;

export const laptopConfigurationSchema = z.object({
  cpu: z.string(),
  ram: z.string(),
  vga: z.string().optional().default(""),
  gpu: z.string().optional().default(""),
  display: z.string(),
  storage: z.string(),
  os: z.string().optional().default("Windows 11"),
  keyboard_layout: z.string().optional().default("US"),
  keyboard_backlight: z.string().optional().default(""),
  color: z.string().optional(),
});
export type LaptopConfiguration = z.infer<typeof laptopConfigurationSchema>;

export const productModelSchema = z.object({
  display_name: z.string().optional(),
  series: z.string().optional(),
  year: z.number().int().optional(),
  category: z.string().optional(),
  colors: z.array(z.string()).optional().default([]),
  configurations: z.array(laptopConfigurationSchema).optional().default([]),
});
export type ProductModel = z.infer<typeof productModelSchema>;

export const brandFileSchema = z.object({
  brand: z.string().min(1),
  models: z.record(z.string().min(1), productModelSchema),
});
export type BrandFile = z.infer<typeof brandFileSchema>;

/**
 * A model together with the brand it was loaded from.
 */
export interface CatalogModel extends ProductModel {
  brand: string;
  modelKey: string;
}
