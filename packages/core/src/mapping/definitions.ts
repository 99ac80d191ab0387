/**
 * Product metafields written for laptops and smartphones. Laptop spec keys
 * carry a numeric prefix so the storefront renders them in spec-sheet order;
 * `custom.minus` and `shopify.color-pattern` are shared by both product lines.
 */

import type { ComponentCategory } from "../catalog/schemas.js";

export type MetafieldType =
  | "metaobject_reference"
  | "list.metaobject_reference"
  | "single_line_text_field";

/**
 * Laptop attributes that map onto a metafield.
 */
export type LaptopAttribute =
  | "cpu"
  | "ram"
  | "gpu"
  | "display"
  | "storage"
  | "vga"
  | "os"
  | "inclusions"
  | "rank"
  | "keyboard_layout"
  | "keyboard_backlight"
  | "minus"
  | "color";

/**
 * Smartphone attributes that map onto a metafield.
 */
export type SmartphoneAttribute =
  | "sim_carriers"
  | "rank"
  | "inclusions"
  | "ram_size"
  | "minus"
  | "color";

export type ProductAttribute = LaptopAttribute | SmartphoneAttribute;

interface BaseDefinition<A extends ProductAttribute> {
  attribute: A;
  name: string;
  namespace: string;
  key: string;
}

export interface TextMetafieldDefinition<A extends ProductAttribute = ProductAttribute>
  extends BaseDefinition<A> {
  type: "single_line_text_field";
}

export interface ReferenceMetafieldDefinition<A extends ProductAttribute = ProductAttribute>
  extends BaseDefinition<A> {
  type: "metaobject_reference" | "list.metaobject_reference";
  category: ComponentCategory;
}

export type MetafieldDefinition<A extends ProductAttribute = ProductAttribute> =
  | TextMetafieldDefinition<A>
  | ReferenceMetafieldDefinition<A>;

export const LAPTOP_METAFIELDS: readonly MetafieldDefinition<LaptopAttribute>[] = [
  { attribute: "cpu", name: "01 Processor", namespace: "custom", key: "01_processor", type: "metaobject_reference", category: "processor" },
  { attribute: "ram", name: "02 RAM", namespace: "custom", key: "02_ram", type: "single_line_text_field" },
  { attribute: "gpu", name: "03 Graphics", namespace: "custom", key: "03_graphics", type: "metaobject_reference", category: "graphics" },
  { attribute: "display", name: "04 Display", namespace: "custom", key: "04_display", type: "metaobject_reference", category: "display" },
  { attribute: "storage", name: "05 Storage", namespace: "custom", key: "05_storage", type: "metaobject_reference", category: "storage" },
  { attribute: "vga", name: "06 VGA", namespace: "custom", key: "06_vga", type: "metaobject_reference", category: "vga" },
  { attribute: "os", name: "07 OS", namespace: "custom", key: "07_os", type: "metaobject_reference", category: "os" },
  { attribute: "inclusions", name: "08 Kelengkapan", namespace: "custom", key: "08_kelengkapan", type: "list.metaobject_reference", category: "product_inclusion" },
  { attribute: "rank", name: "09 Rank", namespace: "custom", key: "09_rank", type: "metaobject_reference", category: "product_rank" },
  { attribute: "keyboard_layout", name: "10 Keyboard Layout", namespace: "custom", key: "10_keyboard_layout", type: "metaobject_reference", category: "keyboard_layout" },
  { attribute: "keyboard_backlight", name: "11 Keyboard Backlight", namespace: "custom", key: "11_keyboard_backlight", type: "metaobject_reference", category: "keyboard_backlight" },
  { attribute: "minus", name: "Minus", namespace: "custom", key: "minus", type: "list.metaobject_reference", category: "minus" },
  { attribute: "color", name: "Color", namespace: "shopify", key: "color-pattern", type: "list.metaobject_reference", category: "color" },
];

export const SMARTPHONE_METAFIELDS: readonly MetafieldDefinition<SmartphoneAttribute>[] = [
  { attribute: "sim_carriers", name: "SIM Carriers", namespace: "custom", key: "sim_carriers", type: "list.metaobject_reference", category: "sim_carrier" },
  { attribute: "rank", name: "Product Rank", namespace: "custom", key: "product_rank", type: "metaobject_reference", category: "product_rank" },
  { attribute: "inclusions", name: "Product Inclusions", namespace: "custom", key: "product_inclusions", type: "list.metaobject_reference", category: "product_inclusion" },
  { attribute: "ram_size", name: "RAM Size", namespace: "custom", key: "ram_size", type: "list.metaobject_reference", category: "ram_size" },
  { attribute: "minus", name: "Minus", namespace: "custom", key: "minus", type: "list.metaobject_reference", category: "minus" },
  { attribute: "color", name: "Color", namespace: "shopify", key: "color-pattern", type: "list.metaobject_reference", category: "color" },
];

export function metafieldId(definition: Pick<MetafieldDefinition, "namespace" | "key">): string {
  return `${definition.namespace}.${definition.key}`;
}
