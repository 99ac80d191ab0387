/**
 * Shopify product CSV export.
 *
 * One row per variant: the first row of a product carries every product
 * column and its metafields, later rows only the handle, option value and
 * variant columns. Metafield columns are named the way Shopify's importer
 * expects, e.g. `Minus (product.metafields.custom.minus)`.
 */

import { stringify } from "csv-stringify/sync";
import {
  LAPTOP_METAFIELDS,
  SMARTPHONE_METAFIELDS,
  metafieldId,
} from "../mapping/definitions.js";
import type { ProductLine, ProductPayload, VariantPayload } from "../product/payload.js";

export const PRODUCT_CATEGORY_NAMES: Record<ProductLine, string> = {
  laptop: "Electronics > Computers > Laptops",
  smartphone: "Electronics > Communications > Telephony > Mobile & Smart Phones",
};

export const PRODUCT_CSV_COLUMNS = [
  "Handle",
  "Title",
  "Body (HTML)",
  "Vendor",
  "Product Category",
  "Type",
  "Tags",
  "Published",
  "Option1 Name",
  "Option1 Value",
  "Variant SKU",
  "Variant Inventory Tracker",
  "Variant Inventory Qty",
  "Variant Inventory Policy",
  "Variant Price",
  "Variant Requires Shipping",
  "Variant Taxable",
  "Status",
] as const;

export interface ExportProduct {
  line: ProductLine;
  payload: ProductPayload;
}

interface MetafieldColumn {
  id: string;
  header: string;
}

const bool = (value: boolean): string => (value ? "TRUE" : "FALSE");

/**
 * Metafield columns for the metafields present in `products`, in definition order.
 */
function metafieldColumns(products: readonly ExportProduct[]): MetafieldColumn[] {
  const present = new Set(
    products.flatMap(({ payload }) => payload.metafields.map(metafieldId))
  );
  const columns = new Map<string, MetafieldColumn>();

  for (const definition of [...LAPTOP_METAFIELDS, ...SMARTPHONE_METAFIELDS]) {
    const id = metafieldId(definition);
    if (present.has(id) && !columns.has(id)) {
      columns.set(id, { id, header: `${definition.name} (product.metafields.${id})` });
    }
  }
  return [...columns.values()];
}

function variantCells(variant: VariantPayload): string[] {
  return [
    variant.sku ?? "",
    variant.inventory_management,
    String(variant.inventory_quantity),
    variant.inventory_policy,
    variant.price,
    bool(variant.requires_shipping),
    bool(variant.taxable),
  ];
}

export function exportProductsCsv(products: readonly ExportProduct[]): string {
  const metafields = metafieldColumns(products);
  const header = [...PRODUCT_CSV_COLUMNS, ...metafields.map((column) => column.header)];
  const rows: string[][] = [header];

  for (const { line, payload } of products) {
    const optionName = payload.options?.[0]?.name ?? "Title";
    const values = new Map(payload.metafields.map((m) => [metafieldId(m), m.value]));

    payload.variants.forEach((variant, index) => {
      const optionValue = variant.option1 ?? "Default Title";
      if (index === 0) {
        rows.push([
          payload.handle,
          payload.title,
          payload.body_html ?? "",
          payload.vendor,
          PRODUCT_CATEGORY_NAMES[line],
          payload.product_type,
          payload.tags,
          bool(payload.status === "active"),
          optionName,
          optionValue,
          ...variantCells(variant),
          payload.status,
          ...metafields.map((column) => values.get(column.id) ?? ""),
        ]);
        return;
      }
      rows.push([
        payload.handle,
        ...Array<string>(7).fill(""),
        "",
        optionValue,
        ...variantCells(variant),
        "",
        ...metafields.map(() => ""),
      ]);
    });
  }

  return stringify(rows);
}
