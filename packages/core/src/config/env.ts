/**
 * Runtime configuration read from the environment (the CLI loads `.env` first).
 */

import * as path from "node:path";
import { z } from "zod";
import { type Result, ok, err, ValidationError } from "../utils/types.js";
import { SUPPORTED_CURRENCIES } from "../product/price.js";

export const SHOPIFY_API_VERSION_DEFAULT = "2025-10";

const optionalTrimmed = z
  .string()
  .optional()
  .transform((value) => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
  });

const envSchema = z.object({
  SHOPIFY_SHOP_DOMAIN: optionalTrimmed,
  SHOPIFY_ACCESS_TOKEN: optionalTrimmed,
  SHOPIFY_API_VERSION: optionalTrimmed,
  DATA_DIR: optionalTrimmed,
  LOG_DIR: optionalTrimmed,
  RATE_LIMIT_DELAY_MS: optionalTrimmed.pipe(
    z.coerce.number().int().nonnegative().optional()
  ),
  DEFAULT_VENDOR: optionalTrimmed,
  DEFAULT_CURRENCY: optionalTrimmed.pipe(z.enum(SUPPORTED_CURRENCIES).optional()),
});

export interface ShopifyCredentials {
  shop: string;
  accessToken: string;
  apiVersion: string;
}

export interface ImporterConfig {
  shop?: string;
  accessToken?: string;
  apiVersion: string;
  dataDir: string;
  logDir: string;
  rateLimitDelayMs: number;
  vendor: string;
  currency: (typeof SUPPORTED_CURRENCIES)[number];
}

type EnvSource = Record<string, string | undefined>;

/**
 * Parse the importer configuration. Relative directories resolve against `cwd`.
 */
export function loadConfig(
  env: EnvSource = process.env,
  cwd: string = process.cwd()
): Result<ImporterConfig, ValidationError> {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues.map(
      (issue) => `${issue.path.join(".")}: ${issue.message}`
    );
    return err(new ValidationError("Invalid environment configuration", details));
  }

  const values = parsed.data;
  return ok({
    shop: values.SHOPIFY_SHOP_DOMAIN
      ? normalizeShopDomain(values.SHOPIFY_SHOP_DOMAIN)
      : undefined,
    accessToken: values.SHOPIFY_ACCESS_TOKEN,
    apiVersion: values.SHOPIFY_API_VERSION ?? SHOPIFY_API_VERSION_DEFAULT,
    dataDir: path.resolve(cwd, values.DATA_DIR ?? "data"),
    logDir: path.resolve(cwd, values.LOG_DIR ?? "logs"),
    rateLimitDelayMs: values.RATE_LIMIT_DELAY_MS ?? 500,
    vendor: values.DEFAULT_VENDOR ?? "Catalog Importer",
    currency: values.DEFAULT_CURRENCY ?? "JPY",
  });
}

/**
 * Accept "my-store", "my-store.myshopify.com" or a full https URL.
 */
export function normalizeShopDomain(input: string): string {
  let domain = input.trim().replace(/^https?:\/\//, "").replace(/\/+$/, "");
  if (!domain.includes(".")) {
    domain = `${domain}.myshopify.com`;
  }
  return domain.toLowerCase();
}

/**
 * Credentials are only required by commands that talk to Shopify.
 */
export function requireCredentials(
  config: Pick<ImporterConfig, "shop" | "accessToken" | "apiVersion">
): Result<ShopifyCredentials, ValidationError> {
  const missing: string[] = [];
  if (!config.shop) missing.push("SHOPIFY_SHOP_DOMAIN");
  if (!config.accessToken) missing.push("SHOPIFY_ACCESS_TOKEN");

  if (!config.shop || !config.accessToken) {
    return err(
      new ValidationError(
        `Missing Shopify credentials. Set ${missing.join(" and ")}.`,
        missing
      )
    );
  }

  return ok({
    shop: config.shop,
    accessToken: config.accessToken,
    apiVersion: config.apiVersion,
  });
}
