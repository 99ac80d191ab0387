/**
 * Brand CSV import: one laptop model per row, turned into a brand file's `models`.
 *
 * Columns: model_key, display_name, series, year, category, cpu, ram, vga,
 * gpu, display, storage, os, keyboard_layout, keyboard_backlight, colors
 * (pipe-separated, e.g. "Space Gray|Silver").
 */

import { parse } from "csv-parse/sync";
import { z } from "zod";
import { logger } from "../utils/logger.js";
import { type Result, ok, err, errorMessage, ValidationError } from "../utils/types.js";
import type { ProductModel } from "./schemas.js";

export const BRAND_CSV_COLUMNS = [
  "model_key",
  "display_name",
  "series",
  "year",
  "category",
  "cpu",
  "ram",
  "vga",
  "gpu",
  "display",
  "storage",
  "os",
  "keyboard_layout",
  "keyboard_backlight",
  "colors",
] as const;

type BrandCsvColumn = (typeof BRAND_CSV_COLUMNS)[number];

const REQUIRED_COLUMNS: readonly BrandCsvColumn[] = [
  "model_key",
  "cpu",
  "ram",
  "vga",
  "gpu",
  "display",
  "storage",
  "colors",
];

export const CSV_DEFAULTS = {
  series: "Standard",
  year: 2023,
  category: "Laptop",
  os: "Windows 11",
  keyboard_layout: "US - International Keyboard",
  keyboard_backlight: "Backlit",
  color: "Black",
} as const;

const MIN_YEAR = 2010;
const MAX_YEAR = 2030;

const csvRowsSchema = z.array(z.array(z.string()));

export interface SkippedRow {
  /** 1-based line number; the header is line 1. */
  row: number;
  reason: string;
}

export interface BrandCsvImport {
  models: Record<string, ProductModel>;
  skipped: SkippedRow[];
  warnings: string[];
}

function parseYear(value: string, row: number, warnings: string[]): number {
  if (value === "") return CSV_DEFAULTS.year;
  if (!/^\d+$/.test(value)) {
    warnings.push(`Row ${row}: invalid year '${value}', using ${CSV_DEFAULTS.year}`);
    return CSV_DEFAULTS.year;
  }
  const year = Number(value);
  if (year < MIN_YEAR || year > MAX_YEAR) {
    warnings.push(`Row ${row}: year ${year} out of range, using ${CSV_DEFAULTS.year}`);
    return CSV_DEFAULTS.year;
  }
  return year;
}

/**
 * Parse CSV text into laptop models. Rows missing a required value are
 * skipped; a later row with the same model_key replaces an earlier one.
 */
export function parseBrandCsv(text: string): Result<BrandCsvImport, ValidationError> {
  let records: string[][];
  try {
    const parsed: unknown = parse(text, { skip_empty_lines: true, bom: true, trim: true });
    records = csvRowsSchema.parse(parsed);
  } catch (error: unknown) {
    return err(new ValidationError(`Could not parse CSV: ${errorMessage(error)}`));
  }

  const [header = [], ...rows] = records;
  const missingColumns = REQUIRED_COLUMNS.filter((column) => !header.includes(column));
  if (missingColumns.length > 0) {
    return err(new ValidationError(`Missing required columns: ${missingColumns.join(", ")}`));
  }

  const models: Record<string, ProductModel> = {};
  const skipped: SkippedRow[] = [];
  const warnings: string[] = [];

  rows.forEach((cells, index) => {
    const row = index + 2;
    const value = (column: BrandCsvColumn): string => {
      const position = header.indexOf(column);
      return position === -1 ? "" : (cells[position] ?? "").trim();
    };

    const empty = REQUIRED_COLUMNS.filter((column) => value(column) === "");
    if (empty.length > 0) {
      const reason = `missing ${empty.join(", ")}`;
      logger.warn("Skipping CSV row", { row, reason });
      skipped.push({ row, reason });
      return;
    }

    const modelKey = value("model_key");
    const colors = value("colors")
      .split("|")
      .map((color) => color.trim())
      .filter((color) => color !== "");
    if (colors.length === 0) {
      warnings.push(`Row ${row}: no colors, using ${CSV_DEFAULTS.color}`);
      colors.push(CSV_DEFAULTS.color);
    }

    models[modelKey] = {
      display_name: value("display_name") || modelKey,
      series: value("series") || CSV_DEFAULTS.series,
      year: parseYear(value("year"), row, warnings),
      category: value("category") || CSV_DEFAULTS.category,
      colors,
      configurations: [
        {
          cpu: value("cpu"),
          ram: value("ram"),
          vga: value("vga"),
          gpu: value("gpu"),
          display: value("display"),
          storage: value("storage"),
          os: value("os") || CSV_DEFAULTS.os,
          keyboard_layout: value("keyboard_layout") || CSV_DEFAULTS.keyboard_layout,
          keyboard_backlight: value("keyboard_backlight") || CSV_DEFAULTS.keyboard_backlight,
        },
      ],
    };
  });

  if (Object.keys(models).length === 0) {
    return err(new ValidationError("No valid models found in CSV file"));
  }
  return ok({ models, skipped, warnings });
}
