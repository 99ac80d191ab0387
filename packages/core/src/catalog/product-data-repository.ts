/**
 * Per-brand laptop model tables under `<dataDir>/products/laptops/<brand>.json`.
 * New brands and models arrive by CSV import.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { logger } from "../utils/logger.js";
import { type Result, ok, err, NotFoundError, ValidationError } from "../utils/types.js";
import { type SkippedRow, parseBrandCsv } from "./brand-csv.js";
import { readJsonFile } from "./json-file.js";
import {
  type BrandFile,
  type CatalogModel,
  type ProductModel,
  brandFileSchema,
} from "./schemas.js";

/** Files that sit beside the brand tables but are not brands. */
const NON_BRAND_FILES = new Set(["brands_index.json", "template_cache.json"]);

const REQUIRED_CONFIG_FIELDS = ["cpu", "ram", "display", "storage"] as const;

export interface BrandValidation {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

export interface BrandMerge {
  data: BrandFile;
  /** Model keys that replaced an existing model. */
  conflicts: string[];
  created: boolean;
}

export interface CsvImportOptions {
  /** Keep the brand's existing models; imported keys still win. */
  merge?: boolean;
  /** Parse and merge without writing the brand file. */
  dryRun?: boolean;
}

export interface CsvImportSummary {
  brand: string;
  file: string;
  imported: string[];
  conflicts: string[];
  totalModels: number;
  skipped: SkippedRow[];
  warnings: string[];
  written: boolean;
}

export class ProductDataRepository {
  readonly laptopsDir: string;
  private readonly cache = new Map<string, BrandFile>();

  constructor(dataDir: string) {
    this.laptopsDir = path.join(dataDir, "products", "laptops");
  }

  brandFilePath(brand: string): string {
    const exact = path.join(this.laptopsDir, `${brand}.json`);
    return fs.existsSync(exact)
      ? exact
      : path.join(this.laptopsDir, `${brand.toLowerCase()}.json`);
  }

  /**
   * Brand file names (without extension), sorted.
   */
  getAllBrands(): string[] {
    if (!fs.existsSync(this.laptopsDir)) {
      logger.warn("Laptop data directory not found", { dir: this.laptopsDir });
      return [];
    }

    return fs
      .readdirSync(this.laptopsDir)
      .filter((file) => file.endsWith(".json") && !NON_BRAND_FILES.has(file))
      .map((file) => file.slice(0, -".json".length))
      .sort((a, b) => a.localeCompare(b));
  }

  getBrandData(brand: string): Result<BrandFile, NotFoundError | ValidationError> {
    const key = brand.toLowerCase();
    const cached = this.cache.get(key);
    if (cached) return ok(cached);

    const result = readJsonFile(this.brandFilePath(brand), brandFileSchema);
    if (!result.ok) return result;

    this.cache.set(key, result.data);
    return ok(result.data);
  }

  getModelsByBrand(brand: string): CatalogModel[] {
    const data = this.getBrandData(brand);
    if (!data.ok) {
      logger.warn("Brand data unavailable", { brand, error: data.error.message });
      return [];
    }

    return Object.entries(data.data.models).map(([modelKey, model]) => ({
      ...model,
      brand: data.data.brand,
      modelKey,
    }));
  }

  getAllModels(): CatalogModel[] {
    return this.getAllBrands().flatMap((brand) => this.getModelsByBrand(brand));
  }

  /**
   * Look up a model by key, in one brand or across all of them.
   */
  getModel(modelKey: string, brand?: string): CatalogModel | undefined {
    const models = brand ? this.getModelsByBrand(brand) : this.getAllModels();
    return models.find((model) => model.modelKey === modelKey);
  }

  /**
   * Case-insensitive substring match on the model key and display name.
   */
  searchModels(term: string, brand?: string): CatalogModel[] {
    const needle = term.trim().toLowerCase();
    const models = brand ? this.getModelsByBrand(brand) : this.getAllModels();

    return models
      .filter(
        (model) =>
          needle === "" ||
          model.modelKey.toLowerCase().includes(needle) ||
          (model.display_name ?? "").toLowerCase().includes(needle)
      )
      .sort((a, b) => a.modelKey.localeCompare(b.modelKey));
  }

  getBrandCount(): number {
    return this.getAllBrands().length;
  }

  getModelCount(brand?: string): number {
    return brand
      ? this.getModelsByBrand(brand).length
      : this.getAllModels().length;
  }

  getConfigurationCount(brand?: string): number {
    const models = brand ? this.getModelsByBrand(brand) : this.getAllModels();
    return models.reduce((sum, model) => sum + model.configurations.length, 0);
  }

  /**
   * Structural checks beyond the schema: models need configurations,
   * configurations need their core fields, and models should list colors.
   */
  validateBrandData(brand: string): BrandValidation {
    const data = this.getBrandData(brand);
    if (!data.ok) {
      const details =
        data.error instanceof ValidationError ? data.error.details ?? [] : [];
      return { valid: false, errors: [data.error.message, ...details], warnings: [] };
    }

    const errors: string[] = [];
    const warnings: string[] = [];

    for (const [modelKey, model] of Object.entries(data.data.models)) {
      if (model.configurations.length === 0) {
        errors.push(`Model '${modelKey}' has no configurations`);
      }
      if (model.colors.length === 0) {
        warnings.push(`Model '${modelKey}' has no colors`);
      }

      model.configurations.forEach((config, index) => {
        for (const field of REQUIRED_CONFIG_FIELDS) {
          if (config[field].trim() === "") {
            warnings.push(
              `Model '${modelKey}' configuration ${index + 1} has an empty ${field}`
            );
          }
        }
      });
    }

    return { valid: errors.length === 0, errors, warnings };
  }

  /**
   * Add `models` to a brand, replacing models with the same key. A brand
   * without a file starts empty; an unreadable brand file is an error.
   */
  mergeBrand(
    brand: string,
    models: Record<string, ProductModel>
  ): Result<BrandMerge, ValidationError> {
    const existing = this.getBrandData(brand);
    if (!existing.ok && existing.error instanceof ValidationError) {
      return err(existing.error);
    }

    const current = existing.ok ? existing.data.models : {};
    const conflicts = Object.keys(models).filter((key) => Object.hasOwn(current, key));
    if (conflicts.length > 0) {
      logger.warn("Imported models replace existing ones", { brand, conflicts });
    }

    return ok({
      data: {
        brand: existing.ok ? existing.data.brand : brand,
        models: { ...current, ...models },
      },
      conflicts,
      created: !existing.ok,
    });
  }

  /**
   * Write a brand file and drop its cached copy. Returns the file path.
   */
  saveBrand(data: BrandFile): string {
    const file = this.brandFilePath(data.brand);
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, `${JSON.stringify(data, null, 2)}\n`, "utf-8");
    this.cache.delete(data.brand.toLowerCase());
    logger.info("Saved brand data", { brand: data.brand, file, models: Object.keys(data.models).length });
    return file;
  }

  /**
   * Import laptop models for `brand` from CSV text.
   */
  importCsv(
    brand: string,
    csvText: string,
    options: CsvImportOptions = {}
  ): Result<CsvImportSummary, ValidationError> {
    const parsed = parseBrandCsv(csvText);
    if (!parsed.ok) return parsed;
    const { models, skipped, warnings } = parsed.data;

    let data: BrandFile = { brand, models };
    let conflicts: string[] = [];
    if (options.merge) {
      const merged = this.mergeBrand(brand, models);
      if (!merged.ok) return merged;
      ({ data, conflicts } = merged.data);
    }

    const written = !options.dryRun;
    const file = written ? this.saveBrand(data) : this.brandFilePath(brand);

    return ok({
      brand: data.brand,
      file,
      imported: Object.keys(models),
      conflicts,
      totalModels: Object.keys(data.models).length,
      skipped,
      warnings,
      written,
    });
  }

  clearCache(): void {
    this.cache.clear();
  }
}
