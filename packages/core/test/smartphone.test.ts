import { describe, it, expect } from "vitest";
import { parseSmartphoneProduct, splitInventory } from "../src/product/smartphone.js";

describe("parseSmartphoneProduct", () => {
  it("applies defaults", () => {
    const result = parseSmartphoneProduct({
      title: " Apple iPhone 13 ",
      brand: "Apple",
      price: "¥64,800",
      model: "",
    });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.data).toEqual({
      title: "Apple iPhone 13",
      brand: "Apple",
      model: undefined,
      storage: undefined,
      price: 64800,
      currency: "JPY",
      quantity: 1,
      color: undefined,
      ram_size: undefined,
      sim_carriers: [],
      inclusions: [],
      minus: [],
      collections: ["All Products", "Smartphone"],
      tags: [],
      status: "active",
      taxable: false,
      images: [],
    });
  });

  it("de-duplicates carriers", () => {
    const result = parseSmartphoneProduct({
      title: "Pixel 7",
      brand: "Google",
      price: 1,
      sim_carriers: ["Docomo", " Docomo", "", "AU"],
    });
    expect(result.ok && result.data.sim_carriers).toEqual(["Docomo", "AU"]);
  });

  it("names the first problem", () => {
    const result = parseSmartphoneProduct({ title: "Pixel 7", brand: "", price: 1 });
    expect(result.ok || result.error.message).toBe(
      "Invalid smartphone product: brand: Brand cannot be empty"
    );
  });

  it("rejects an unknown rank", () => {
    const result = parseSmartphoneProduct({ title: "Pixel 7", brand: "Google", price: 1, rank: "B" });
    expect(result.ok).toBe(false);
  });
});

describe("splitInventory", () => {
  it.each([
    [5, 3, [2, 2, 1]],
    [3, 2, [2, 1]],
    [1, 3, [1, 0, 0]],
    [4, 1, [4]],
    [4, 0, []],
  ])("splits %i over %i variants", (quantity, count, expected) => {
    expect(splitInventory(quantity, count)).toEqual(expected);
  });
});
