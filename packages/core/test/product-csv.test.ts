import { describe, it, expect } from "vitest";
import { PRODUCT_CSV_COLUMNS, exportProductsCsv } from "../src/export/product-csv.js";
import { parseLaptopProduct } from "../src/product/laptop.js";
import { buildProductPayload, buildSmartphonePayload } from "../src/product/payload.js";
import { parseSmartphoneProduct } from "../src/product/smartphone.js";
import { GID } from "./helpers.js";

function laptopPayload() {
  const product = parseLaptopProduct({
    title: "ASUS TUF Gaming A15",
    brand: "ASUS",
    model: "ASUS TUF Gaming A15",
    price: 128000,
    sku: "TUF-001",
    quantity: 2,
    rank: "A",
  });
  if (!product.ok) throw product.error;
  const payload = buildProductPayload(
    product.data,
    {
      metafields: [
        { namespace: "custom", key: "02_ram", type: "single_line_text_field", value: "16GB" },
        {
          namespace: "custom",
          key: "minus",
          type: "list.metaobject_reference",
          value: JSON.stringify([GID(1001101)]),
        },
      ],
    },
    { vendor: "Catalog Importer", handle: "h1" }
  );
  if (!payload.ok) throw payload.error;
  return payload.data;
}

function phonePayload() {
  const product = parseSmartphoneProduct({
    title: "Google Pixel 7",
    brand: "Google",
    model: "Pixel 7",
    price: 45000,
    quantity: 3,
    sim_carriers: ["SIM Free", "Docomo"],
  });
  if (!product.ok) throw product.error;
  const payload = buildSmartphonePayload(
    product.data,
    {
      metafields: [
        {
          namespace: "custom",
          key: "sim_carriers",
          type: "list.metaobject_reference",
          value: JSON.stringify([GID(1001201), GID(1001202)]),
        },
      ],
    },
    { vendor: "Catalog Importer", handle: "h2" }
  );
  if (!payload.ok) throw payload.error;
  return payload.data;
}

describe("exportProductsCsv", () => {
  it("writes a row per variant with metafield columns", () => {
    const csv = exportProductsCsv([
      { line: "laptop", payload: laptopPayload() },
      { line: "smartphone", payload: phonePayload() },
    ]);

    expect(csv.split("\n")).toEqual([
      [
        ...PRODUCT_CSV_COLUMNS,
        "02 RAM (product.metafields.custom.02_ram)",
        "Minus (product.metafields.custom.minus)",
        "SIM Carriers (product.metafields.custom.sim_carriers)",
      ].join(","),
      'h1,ASUS TUF Gaming A15,,Catalog Importer,Electronics > Computers > Laptops,Laptop,"laptop, ASUS, A",TRUE,Title,Default Title,TUF-001,shopify,2,deny,128000,TRUE,TRUE,active,16GB,"[""gid://shopify/Metaobject/1001101""]",',
      'h2,Google Pixel 7,,Catalog Importer,Electronics > Communications > Telephony > Mobile & Smart Phones,,"smartphone, Google, Pixel 7",TRUE,SIM Carriers,SIM Free,,shopify,2,deny,45000,TRUE,FALSE,active,,,"[""gid://shopify/Metaobject/1001201"",""gid://shopify/Metaobject/1001202""]"',
      "h2,,,,,,,,,Docomo,,shopify,1,deny,45000,TRUE,FALSE,,,,",
      "",
    ]);
  });

  it("writes only the product columns when there are no metafields", () => {
    const payload = { ...laptopPayload(), metafields: [], status: "draft" as const };

    const lines = exportProductsCsv([{ line: "laptop", payload }]).split("\n");

    expect(lines[0]).toBe(PRODUCT_CSV_COLUMNS.join(","));
    expect(lines[1].split(",").slice(-4)).toEqual(["128000", "TRUE", "TRUE", "draft"]);
    expect(lines[1]).toContain(",FALSE,Title,Default Title,");
  });
});
