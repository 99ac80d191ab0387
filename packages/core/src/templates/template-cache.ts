/**
 * Every model × configuration × color template across all brands, cached in
 * `<dataDir>/cache/template_cache.json`. The cache is rebuilt whenever a brand
 * file is newer than it.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { z } from "zod";
import type { ProductDataRepository } from "../catalog/product-data-repository.js";
import { readJsonFile } from "../catalog/json-file.js";
import type { LaptopConfiguration } from "../catalog/schemas.js";
import type { LaptopProductInput } from "../product/laptop.js";
import { logger } from "../utils/logger.js";
import { abbreviateComponent, generateTemplateString, splitTemplate } from "./template.js";

export const TEMPLATE_CACHE_VERSION = "1.0";

const templateCacheSchema = z.object({
  generated_at: z.string(),
  total_templates: z.number().int().nonnegative(),
  templates: z.array(z.string()),
  version: z.string(),
  source_files: z.array(z.string()).default([]),
});
export type TemplateCacheFile = z.infer<typeof templateCacheSchema>;

export interface ParsedTemplate extends LaptopConfiguration {
  template: string;
  brand: string;
  model: string;
  color: string;
}

export type TemplateCacheInfo =
  | { exists: false }
  | {
      exists: true;
      generatedAt: string;
      totalTemplates: number;
      version: string;
      fileSize: number;
      needsRegeneration: boolean;
    };

export class TemplateCache {
  readonly cacheFile: string;

  constructor(
    private readonly products: ProductDataRepository,
    dataDir: string,
    private readonly now: () => Date = () => new Date()
  ) {
    this.cacheFile = path.join(dataDir, "cache", "template_cache.json");
  }

  private sourceFiles(): string[] {
    return this.products
      .getAllBrands()
      .map((brand) => this.products.brandFilePath(brand));
  }

  needsRegeneration(): boolean {
    if (!fs.existsSync(this.cacheFile)) return true;

    const cacheTime = fs.statSync(this.cacheFile).mtimeMs;
    return this.sourceFiles().some((file) => fs.statSync(file).mtimeMs > cacheTime);
  }

  /**
   * Generate every template, write the cache file and return the templates.
   */
  regenerate(): string[] {
    logger.info("Regenerating template cache...");
    this.products.clearCache();

    const templates: string[] = [];
    for (const model of this.products.getAllModels()) {
      for (const config of model.configurations) {
        for (const color of model.colors) {
          templates.push(generateTemplateString(model.modelKey, config, color));
        }
      }
    }
    templates.sort((a, b) => a.localeCompare(b));

    const data: TemplateCacheFile = {
      generated_at: this.now().toISOString(),
      total_templates: templates.length,
      templates,
      version: TEMPLATE_CACHE_VERSION,
      source_files: this.sourceFiles(),
    };
    fs.mkdirSync(path.dirname(this.cacheFile), { recursive: true });
    fs.writeFileSync(this.cacheFile, JSON.stringify(data, null, 2), "utf-8");

    logger.info(`Generated ${templates.length} templates`, { file: this.cacheFile });
    return templates;
  }

  getAllTemplates(): string[] {
    if (this.needsRegeneration()) {
      return this.regenerate();
    }

    const cached = readJsonFile(this.cacheFile, templateCacheSchema);
    if (!cached.ok) {
      logger.warn("Template cache unreadable, regenerating", {
        error: cached.error.message,
      });
      return this.regenerate();
    }
    return cached.data.templates;
  }

  /**
   * Map a template back to the full component names it was generated from.
   */
  parseTemplate(template: string): ParsedTemplate | undefined {
    const parts = splitTemplate(template);
    if (!parts) return undefined;

    const model = this.products.getModel(parts.model);
    if (!model || !model.colors.includes(parts.color)) return undefined;

    const [cpu, ram, vga, display, storage] = parts.spec;
    const config = model.configurations.find(
      (candidate) =>
        abbreviateComponent(candidate.cpu, "cpu") === cpu &&
        candidate.ram === ram &&
        abbreviateComponent(candidate.vga, "vga") === vga &&
        abbreviateComponent(candidate.display, "display") === display &&
        candidate.storage === storage
    );
    if (!config) return undefined;

    return {
      ...config,
      template,
      brand: model.brand,
      model: model.modelKey,
      color: parts.color,
    };
  }

  getCacheInfo(): TemplateCacheInfo {
    if (!fs.existsSync(this.cacheFile)) return { exists: false };

    const cached = readJsonFile(this.cacheFile, templateCacheSchema);
    if (!cached.ok) return { exists: false };

    return {
      exists: true,
      generatedAt: cached.data.generated_at,
      totalTemplates: cached.data.total_templates,
      version: cached.data.version,
      fileSize: fs.statSync(this.cacheFile).size,
      needsRegeneration: this.needsRegeneration(),
    };
  }

  clear(): boolean {
    if (!fs.existsSync(this.cacheFile)) return false;
    fs.rmSync(this.cacheFile);
    return true;
  }
}

/**
 * Laptop input for a parsed template. The template itself becomes the title.
 */
export function templateToLaptopInput(
  parsed: ParsedTemplate,
  extras: Omit<LaptopProductInput, "title" | "brand" | "model" | "specs">
): LaptopProductInput {
  return {
    ...extras,
    title: parsed.template,
    brand: parsed.brand,
    model: parsed.model,
    specs: {
      cpu: parsed.cpu,
      ram: parsed.ram,
      vga: parsed.vga,
      gpu: parsed.gpu,
      display: parsed.display,
      storage: parsed.storage,
      color: parsed.color,
      os: parsed.os,
      keyboard_layout: parsed.keyboard_layout,
      keyboard_backlight: parsed.keyboard_backlight,
    },
  };
}
