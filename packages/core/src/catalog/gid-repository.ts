/**
 * Lookup of metaobject GIDs by component category and display name.
 *
 * Tables live in `<dataDir>/metaobjects/<file>.json` as `{ "<display name>": "<gid>" }`
 * and are loaded lazily, once per category, then served from memory.
 * Matching is exact: "Intel Core i7-12700H" and "intel core i7-12700h" are different names.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { logger } from "../utils/logger.js";
import {
  type Result,
  ok,
  err,
  NotFoundError,
  ValidationError,
} from "../utils/types.js";
import { readJsonFile } from "./json-file.js";
import {
  CATEGORY_FILES,
  COMPONENT_CATEGORIES,
  type ComponentCategory,
  type GidTable,
  gidTableSchema,
  isComponentCategory,
} from "./schemas.js";

export type GidLookup =
  | { found: true; gid: string }
  | { found: false };

export interface ComponentMapping {
  category: ComponentCategory;
  displayName: string;
  gid: string;
}

export class GidRepository {
  private readonly baseDir: string;
  private readonly cache = new Map<ComponentCategory, GidTable>();

  constructor(dataDir: string) {
    this.baseDir = path.join(dataDir, "metaobjects");
  }

  getCategories(): ComponentCategory[] {
    return [...COMPONENT_CATEGORIES];
  }

  filePath(category: ComponentCategory): string {
    return path.join(this.baseDir, CATEGORY_FILES[category]);
  }

  /**
   * Load (or return the cached) table for a category.
   */
  getMapping(
    category: ComponentCategory
  ): Result<GidTable, NotFoundError | ValidationError> {
    const cached = this.cache.get(category);
    if (cached) return ok(cached);

    const result = readJsonFile(this.filePath(category), gidTableSchema);
    if (!result.ok) return result;

    this.cache.set(category, result.data);
    logger.debug("Loaded GID table", {
      category,
      entries: Object.keys(result.data).length,
    });
    return ok(result.data);
  }

  /**
   * Resolve a display name. Unknown categories, missing names and unreadable
   * tables all report `found: false`; unreadable tables are logged.
   */
  getGid(category: string, displayName: string): GidLookup {
    if (!isComponentCategory(category)) {
      logger.warn("Unknown component category", { category });
      return { found: false };
    }

    const mapping = this.getMapping(category);
    if (!mapping.ok) {
      logger.warn("GID table unavailable", {
        category,
        error: mapping.error.message,
      });
      return { found: false };
    }

    const gid = Object.hasOwn(mapping.data, displayName)
      ? mapping.data[displayName]
      : undefined;
    return gid ? { found: true, gid } : { found: false };
  }

  /**
   * Sorted display names for a category; empty when the table is missing.
   */
  getOptions(category: ComponentCategory): string[] {
    const mapping = this.getMapping(category);
    if (!mapping.ok) return [];
    return Object.keys(mapping.data).sort((a, b) => a.localeCompare(b));
  }

  /**
   * Every (category, display name, GID) triple across readable tables.
   */
  listMappings(): ComponentMapping[] {
    const mappings: ComponentMapping[] = [];
    for (const category of COMPONENT_CATEGORIES) {
      const mapping = this.getMapping(category);
      if (!mapping.ok) continue;
      for (const [displayName, gid] of Object.entries(mapping.data)) {
        mappings.push({ category, displayName, gid });
      }
    }
    return mappings;
  }

  /**
   * Replace a category's table on disk and in the cache.
   */
  writeMapping(
    category: ComponentCategory,
    table: GidTable
  ): Result<string, ValidationError> {
    const parsed = gidTableSchema.safeParse(table);
    if (!parsed.success) {
      return err(
        new ValidationError(
          `Refusing to write invalid ${category} table`,
          parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`)
        )
      );
    }

    const sorted = Object.fromEntries(
      Object.entries(parsed.data).sort(([a], [b]) => a.localeCompare(b))
    );
    const filePath = this.filePath(category);
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, `${JSON.stringify(sorted, null, 2)}\n`, "utf-8");
    this.cache.set(category, sorted);
    return ok(filePath);
  }

  clearCache(): void {
    this.cache.clear();
  }

  /**
   * file name → entry count for every cached table.
   */
  getCacheInfo(): Record<string, number> {
    const info: Record<string, number> = {};
    for (const [category, table] of this.cache) {
      info[CATEGORY_FILES[category]] = Object.keys(table).length;
    }
    return info;
  }
}
