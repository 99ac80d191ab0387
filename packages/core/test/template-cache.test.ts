import * as fs from "node:fs";
import { beforeEach, describe, it, expect } from "vitest";
import { ProductDataRepository } from "../src/catalog/product-data-repository.js";
import { parseLaptopProduct } from "../src/product/laptop.js";
import { TemplateCache, templateToLaptopInput } from "../src/templates/template-cache.js";
import { copyFixtureData } from "./helpers.js";

const TUF_BLACK =
  "ASUS TUF Gaming A15 [Ryzen 7 4800H/16GB/RTX 3050/144Hz/512GB SSD] [Graphite Black]";
const TUF_GRAY =
  "ASUS TUF Gaming A15 [Ryzen 7 4800H/16GB/RTX 3050/144Hz/512GB SSD] [Fortress Gray]";
const ZENBOOK = "ASUS Zenbook 14 [i7-1165G7/16GB//14-inch FHD/512GB SSD] [Ponder Blue]";

const GENERATED_AT = new Date(Date.UTC(2025, 6, 15, 9, 30));

describe("TemplateCache", () => {
  let dataDir: string;
  let products: ProductDataRepository;
  let cache: TemplateCache;

  beforeEach(() => {
    dataDir = copyFixtureData();
    products = new ProductDataRepository(dataDir);
    cache = new TemplateCache(products, dataDir, () => GENERATED_AT);
  });

  it("generates every model, configuration and color combination", () => {
    expect(cache.getAllTemplates()).toEqual([TUF_GRAY, TUF_BLACK, ZENBOOK]);
  });

  it("writes the cache file", () => {
    cache.getAllTemplates();

    const saved: unknown = JSON.parse(fs.readFileSync(cache.cacheFile, "utf-8"));
    expect(saved).toMatchObject({
      generated_at: "2025-07-15T09:30:00.000Z",
      total_templates: 3,
      templates: [TUF_GRAY, TUF_BLACK, ZENBOOK],
      version: "1.0",
    });
  });

  it("regenerates only when a brand file is newer than the cache", () => {
    expect(cache.needsRegeneration()).toBe(true);
    cache.getAllTemplates();
    expect(cache.needsRegeneration()).toBe(false);

    const future = new Date(Date.now() + 60_000);
    fs.utimesSync(products.brandFilePath("asus"), future, future);
    expect(cache.needsRegeneration()).toBe(true);
  });

  it("regenerates a corrupt cache", () => {
    cache.getAllTemplates();
    fs.writeFileSync(cache.cacheFile, "{ nope");
    const later = new Date(Date.now() + 60_000);
    fs.utimesSync(cache.cacheFile, later, later);

    expect(cache.getAllTemplates()).toEqual([TUF_GRAY, TUF_BLACK, ZENBOOK]);
    expect(cache.getCacheInfo()).toMatchObject({ exists: true, totalTemplates: 3 });
  });

  it("describes the cache file", () => {
    expect(cache.getCacheInfo()).toEqual({ exists: false });

    cache.getAllTemplates();
    expect(cache.getCacheInfo()).toEqual({
      exists: true,
      generatedAt: "2025-07-15T09:30:00.000Z",
      totalTemplates: 3,
      version: "1.0",
      fileSize: fs.statSync(cache.cacheFile).size,
      needsRegeneration: false,
    });
  });

  it("clears the cache file", () => {
    cache.getAllTemplates();
    expect(cache.clear()).toBe(true);
    expect(fs.existsSync(cache.cacheFile)).toBe(false);
    expect(cache.clear()).toBe(false);
  });

  describe("parseTemplate", () => {
    it("maps a template back to full component names", () => {
      expect(cache.parseTemplate(TUF_BLACK)).toEqual({
        template: TUF_BLACK,
        brand: "ASUS",
        model: "ASUS TUF Gaming A15",
        color: "Graphite Black",
        cpu: "AMD Ryzen 7 4800H (16 CPUs), ~2.9GHz",
        ram: "16GB",
        vga: "NVIDIA GeForce RTX 3050 4GB",
        gpu: "AMD Radeon Graphics",
        display: "15.6-inch FHD (144Hz)",
        storage: "512GB SSD",
        os: "Windows 11",
        keyboard_layout: "US",
        keyboard_backlight: "RGB",
      });
    });

    it("handles a configuration without a graphics card", () => {
      expect(cache.parseTemplate(ZENBOOK)).toMatchObject({
        vga: "",
        gpu: "Intel Iris Xe Graphics",
        display: "14-inch FHD",
      });
    });

    it("rejects unknown colors, configurations and shapes", () => {
      expect(cache.parseTemplate(TUF_BLACK.replace("Graphite Black", "Ponder Blue"))).toBeUndefined();
      expect(cache.parseTemplate(TUF_BLACK.replace("16GB", "32GB"))).toBeUndefined();
      expect(cache.parseTemplate("ASUS TUF Gaming A15 [Graphite Black]")).toBeUndefined();
      expect(cache.parseTemplate("Dell XPS 13 [i7/16GB//FHD/1TB SSD] [Silver]")).toBeUndefined();
    });
  });

  it("turns a parsed template into a valid laptop product", () => {
    const parsed = cache.parseTemplate(TUF_BLACK);
    if (!parsed) throw new Error("template did not parse");

    const product = parseLaptopProduct(
      templateToLaptopInput(parsed, { price: 128000, rank: "A", inclusions: ["Charger"] })
    );

    expect(product.ok).toBe(true);
    if (!product.ok) return;
    expect(product.data).toMatchObject({
      title: TUF_BLACK,
      brand: "ASUS",
      model: "ASUS TUF Gaming A15",
      price: 128000,
      rank: "A",
      inclusions: ["Charger"],
    });
    expect(product.data.specs).toMatchObject({
      cpu: "AMD Ryzen 7 4800H (16 CPUs), ~2.9GHz",
      color: "Graphite Black",
      keyboard_backlight: "RGB",
    });
  });
});
