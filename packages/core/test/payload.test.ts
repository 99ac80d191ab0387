import { describe, it, expect } from "vitest";
import type { ProductMetafield } from "../src/mapping/resolve.js";
import { type LaptopProduct, parseLaptopProduct } from "../src/product/laptop.js";
import {
  buildProductPayload,
  buildSmartphonePayload,
  productTags,
  smartphoneTags,
} from "../src/product/payload.js";
import { type SmartphoneProduct, parseSmartphoneProduct } from "../src/product/smartphone.js";
import { GID } from "./helpers.js";

function product(overrides: Record<string, unknown> = {}): LaptopProduct {
  const result = parseLaptopProduct({
    title: "ASUS TUF Gaming A15",
    brand: "ASUS",
    model: "ASUS TUF Gaming A15",
    price: "128000.50",
    sku: "TUF-001",
    quantity: 2,
    rank: "A",
    tags: ["Gaming", "laptop"],
    ...overrides,
  });
  if (!result.ok) throw result.error;
  return result.data;
}

const processor: ProductMetafield = {
  namespace: "custom",
  key: "01_processor",
  type: "metaobject_reference",
  value: GID(1000001),
};

describe("buildProductPayload", () => {
  it("builds a single-variant laptop product", () => {
    const result = buildProductPayload(product(), { metafields: [processor] }, {
      vendor: "Catalog Importer",
      handle: "asus-tuf-gaming-a15-250715-001",
    });

    expect(result).toEqual({
      ok: true,
      data: {
        title: "ASUS TUF Gaming A15",
        vendor: "Catalog Importer",
        product_type: "Laptop",
        handle: "asus-tuf-gaming-a15-250715-001",
        tags: "Gaming, laptop, ASUS, A",
        status: "active",
        variants: [
          {
            price: "128000",
            sku: "TUF-001",
            inventory_quantity: 2,
            inventory_management: "shopify",
            inventory_policy: "deny",
            taxable: true,
            requires_shipping: true,
          },
        ],
        metafields: [processor],
      },
    });
  });

  it("prefers the product's own vendor and carries the description", () => {
    const result = buildProductPayload(
      product({ vendor: "Reseller", description: "<p>Clean unit</p>", status: "draft" }),
      { metafields: [] },
      { vendor: "Catalog Importer", handle: "h" }
    );

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.data.vendor).toBe("Reseller");
    expect(result.data.body_html).toBe("<p>Clean unit</p>");
    expect(result.data.status).toBe("draft");
  });

  it("sends custom.minus with the other metafields", () => {
    const minus: ProductMetafield = {
      namespace: "custom",
      key: "minus",
      type: "list.metaobject_reference",
      value: JSON.stringify([GID(1001101)]),
    };
    const result = buildProductPayload(product({ minus: ["Scratch on lid"] }), { metafields: [processor, minus] }, {
      vendor: "v",
      handle: "h",
    });

    expect(result.ok && result.data.metafields).toEqual([
      processor,
      {
        namespace: "custom",
        key: "minus",
        type: "list.metaobject_reference",
        value: '["gid://shopify/Metaobject/1001101"]',
      },
    ]);
  });

  it("formats USD prices with cents", () => {
    const result = buildProductPayload(product({ currency: "USD", price: 899 }), { metafields: [] }, {
      vendor: "v",
      handle: "h",
    });
    expect(result.ok && result.data.variants[0].price).toBe("899.00");
  });
});

describe("productTags", () => {
  it("adds laptop, brand and rank once each", () => {
    expect(productTags({ tags: ["asus"], brand: "ASUS", rank: undefined })).toEqual([
      "asus",
      "laptop",
    ]);
  });
});

function phone(overrides: Record<string, unknown> = {}): SmartphoneProduct {
  const result = parseSmartphoneProduct({
    title: "Google Pixel 7 128GB",
    brand: "Google",
    model: "Pixel 7",
    price: 45000,
    sku: "PX7",
    quantity: 5,
    sim_carriers: ["SIM Free", "Docomo", "Rakuten Mobile"],
    ...overrides,
  });
  if (!result.ok) throw result.error;
  return result.data;
}

describe("buildSmartphonePayload", () => {
  it("builds a variant per SIM carrier with the stock split", () => {
    const result = buildSmartphonePayload(phone(), { metafields: [] }, {
      vendor: "Catalog Importer",
      handle: "google-pixel-7-128gb-250715-001",
    });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.data.product_type).toBe("");
    expect(result.data.tags).toBe("smartphone, Google, Pixel 7");
    expect(result.data.options).toEqual([
      { name: "SIM Carriers", values: ["SIM Free", "Docomo", "Rakuten Mobile"] },
    ]);
    expect(result.data.variants).toEqual([
      {
        option1: "SIM Free",
        price: "45000",
        sku: "PX7-sim-free",
        inventory_quantity: 2,
        inventory_management: "shopify",
        inventory_policy: "deny",
        taxable: false,
        requires_shipping: true,
      },
      {
        option1: "Docomo",
        price: "45000",
        sku: "PX7-docomo",
        inventory_quantity: 2,
        inventory_management: "shopify",
        inventory_policy: "deny",
        taxable: false,
        requires_shipping: true,
      },
      {
        option1: "Rakuten Mobile",
        price: "45000",
        sku: "PX7-rakuten-mobile",
        inventory_quantity: 1,
        inventory_management: "shopify",
        inventory_policy: "deny",
        taxable: false,
        requires_shipping: true,
      },
    ]);
  });

  it("falls back to one variant without carriers", () => {
    const result = buildSmartphonePayload(phone({ sim_carriers: [] }), { metafields: [] }, {
      vendor: "v",
      handle: "h",
    });

    expect(result.ok && result.data.options).toBeUndefined();
    expect(result.ok && result.data.variants).toEqual([
      {
        price: "45000",
        sku: "PX7",
        inventory_quantity: 5,
        inventory_management: "shopify",
        inventory_policy: "deny",
        taxable: false,
        requires_shipping: true,
      },
    ]);
  });
});

describe("smartphoneTags", () => {
  it("adds smartphone, brand and model once each", () => {
    expect(smartphoneTags({ tags: ["Used", "google"], brand: "Google", model: undefined })).toEqual([
      "Used",
      "google",
      "smartphone",
    ]);
  });
});
