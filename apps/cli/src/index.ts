#!/usr/bin/env tsx

/**
 * Laptop and Smartphone Catalog Importer CLI
 *
 * Commands:
 * - brands - List brand files with model and configuration counts
 * - brands:import - Create or merge a brand file from a CSV of models
 * - models - List or search models
 * - templates - Search, regenerate or inspect the template cache
 * - resolve - Show the metafields a template resolves to
 * - import - Create one laptop product from a template
 * - import:smartphone - Create one smartphone product
 * - import:bulk - Create laptop or smartphone products from a JSON file
 * - export:csv - Write a Shopify product CSV from a JSON import file
 * - import:interactive - Search, confirm and create products at the terminal
 * - validate - Check brand files and GID tables
 * - metaobjects:sync - Refresh local GID tables from the store
 * - metaobjects:upsert - Create or update component metaobjects
 * - missing:report - Summarise values that had no metaobject
 * - products:show - Show a product and its metafields
 * - products:metafields - Rewrite a product's metafields from a template
 * - products:delete - Delete products by id or vendor
 */

import { Command } from "commander";
import dotenv from "dotenv";
import * as fs from "fs";
import { createInterface, type Interface } from "readline";
import { resolve, dirname, join } from "path";
import { fileURLToPath } from "url";
import {
  COMPONENT_CATEGORIES,
  DEFAULT_COLLECTIONS,
  SMARTPHONE_DEFAULT_COLLECTIONS,
  GidRepository,
  LABEL_FIELD,
  LAPTOP_RANKS,
  METAOBJECT_TYPES,
  MissingMetaobjectLog,
  ProductDataRepository,
  ProductImporter,
  TemplateCache,
  HandleCounter,
  createGraphQLClient,
  createRestClient,
  deleteProduct,
  displayPrice,
  exportProductsCsv,
  fetchGidTable,
  formatFieldError,
  isComponentCategory,
  isCurrency,
  isLaptopRank,
  laptopSpecsSchema,
  listProducts,
  loadConfig,
  logger,
  metaobjectHandle,
  parseLogFormat,
  parseLogLevel,
  processSequentially,
  requireCredentials,
  resolveLaptopMetafields,
  searchTemplates,
  specSummary,
  templateToLaptopInput,
  upsertMetaobject,
  NotFoundError,
  ShopifyUserError,
  parseLaptopProduct,
  getProduct,
  listProductMetafields,
  missingSpecs,
  productIdFromGid,
  setProductMetafields,
  updateProduct,
  type ComponentCategory,
  type ExportProduct,
  type ProductLine,
  type SmartphoneProductInput,
  type GidTable,
  type ImportStats,
  type ImporterConfig,
  type ImporterOptions,
  type LaptopProductInput,
  type LaptopRank,
  type MetafieldResolution,
  type ParsedTemplate,
  type ProductStatus,
  type GraphQLClient,
  type RestClient,
} from "@catalog-importer/core";

// Load environment variables from the workspace root
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const workspaceRoot = resolve(__dirname, "../../../");
dotenv.config({ path: resolve(workspaceRoot, ".env") });

interface GlobalOptions {
  shop?: string;
  token?: string;
  apiVersion?: string;
  dataDir?: string;
  logDir?: string;
  logFormat?: string;
  verbose: boolean;
}

interface CliContext {
  config: ImporterConfig;
  gids: GidRepository;
  products: ProductDataRepository;
  templates: TemplateCache;
  missingLog: MissingMetaobjectLog;
  handles: HandleCounter;
}

/**
 * Format statistics as a readable table
 */
function formatStatsTable(
  title: string,
  stats: {
    total?: number;
    created?: number;
    updated?: number;
    deleted?: number;
    skipped?: number;
    failed?: number;
  }
): string {
  const lines: string[] = [];
  lines.push(`\n${title}:`);
  lines.push("─".repeat(40));

  if (stats.total !== undefined)
    lines.push(`  Total:    ${stats.total.toString().padStart(6)}`);
  if (stats.created !== undefined)
    lines.push(`  Created:  ${stats.created.toString().padStart(6)}`);
  if (stats.updated !== undefined)
    lines.push(`  Updated:  ${stats.updated.toString().padStart(6)}`);
  if (stats.deleted !== undefined)
    lines.push(`  Deleted:  ${stats.deleted.toString().padStart(6)}`);
  if (stats.skipped !== undefined)
    lines.push(`  Skipped:  ${stats.skipped.toString().padStart(6)}`);
  if (stats.failed !== undefined)
    lines.push(`  Failed:   ${stats.failed.toString().padStart(6)}`);

  return lines.join("\n");
}

function ask(rl: Interface, question: string): Promise<string> {
  return new Promise((resolve) => {
    rl.question(question, (answer) => resolve(answer.trim()));
  });
}

/**
 * Prompt user for confirmation by typing a word
 */
async function promptConfirmation(confirmWord: string): Promise<boolean> {
  const rl = createInterface({
    input: process.stdin,
    output: process.stdout,
  });

  const answer = await ask(rl, `Type '${confirmWord}' to confirm: `);
  rl.close();
  return answer.toLowerCase() === confirmWord.toLowerCase();
}

function splitList(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item !== "");
}

function parseCount(value: string, label: string): number {
  const count = Number(value);
  if (!Number.isInteger(count) || count < 1) {
    logger.error(`${label} must be a positive whole number`, { value });
    process.exit(1);
  }
  return count;
}

function parseRank(value: string | undefined): LaptopRank | undefined {
  if (value === undefined || value === "") return undefined;
  if (!isLaptopRank(value)) {
    logger.error(`Rank must be one of: ${LAPTOP_RANKS.join(", ")}`, { rank: value });
    process.exit(1);
  }
  return value;
}

function parseStatus(value: string): ProductStatus {
  if (value !== "active" && value !== "draft") {
    logger.error("Status must be 'active' or 'draft'", { status: value });
    process.exit(1);
  }
  return value;
}

function parseCategory(value: string): ComponentCategory {
  if (!isComponentCategory(value)) {
    logger.error(`Unknown category. Use one of: ${COMPONENT_CATEGORIES.join(", ")}`, {
      category: value,
    });
    process.exit(1);
  }
  return value;
}

const program = new Command();

program
  .name("catalog-importer")
  .description("Import laptop and smartphone catalog data into a Shopify store")
  .version("1.0.0");

/**
 * Global options for all commands
 */
program
  .option("--shop <domain>", "Shop domain (overrides SHOPIFY_SHOP_DOMAIN)")
  .option("--token <token>", "Admin API access token (overrides SHOPIFY_ACCESS_TOKEN)")
  .option("--api-version <version>", "Shopify API version (overrides SHOPIFY_API_VERSION)")
  .option("--data-dir <dir>", "Data directory (overrides DATA_DIR)")
  .option("--log-dir <dir>", "Log directory (overrides LOG_DIR)")
  .option("--log-format <format>", "pretty or json (overrides LOG_FORMAT)")
  .option("--verbose", "Enable debug logging", false);

/**
 * Resolve configuration (flags over environment) and build the local repositories.
 */
function loadContext(): CliContext {
  const globalOpts = program.opts<GlobalOptions>();

  logger.setLevel(
    globalOpts.verbose ? "debug" : parseLogLevel(process.env.LOG_LEVEL) ?? "info"
  );
  const format = parseLogFormat(globalOpts.logFormat ?? process.env.LOG_FORMAT);
  if (format) logger.setFormat(format);

  const overrides: Record<string, string> = {};
  if (globalOpts.shop) overrides.SHOPIFY_SHOP_DOMAIN = globalOpts.shop;
  if (globalOpts.token) overrides.SHOPIFY_ACCESS_TOKEN = globalOpts.token;
  if (globalOpts.apiVersion) overrides.SHOPIFY_API_VERSION = globalOpts.apiVersion;
  if (globalOpts.dataDir) overrides.DATA_DIR = globalOpts.dataDir;
  if (globalOpts.logDir) overrides.LOG_DIR = globalOpts.logDir;

  const configResult = loadConfig({ ...process.env, ...overrides }, workspaceRoot);
  if (!configResult.ok) {
    logger.error(configResult.error.message, { details: configResult.error.details });
    process.exit(1);
  }

  const config = configResult.data;
  const products = new ProductDataRepository(config.dataDir);
  return {
    config,
    gids: new GidRepository(config.dataDir),
    products,
    templates: new TemplateCache(products, config.dataDir),
    missingLog: new MissingMetaobjectLog(join(config.logDir, "missing_metaobjects.json")),
    handles: new HandleCounter(join(config.dataDir, "cache", "handle_counter.json")),
  };
}

function shopifyClients(config: ImporterConfig): { rest: RestClient; graphql: GraphQLClient } {
  const credentials = requireCredentials(config);
  if (!credentials.ok) {
    logger.error(credentials.error.message);
    process.exit(1);
  }

  const graphql = createGraphQLClient(credentials.data);
  logger.debug("Using shop", {
    shop: credentials.data.shop,
    endpoint: graphql.getSafeEndpoint(),
  });
  return { rest: createRestClient(credentials.data), graphql };
}

function parseTemplateOrExit(ctx: CliContext, template: string): ParsedTemplate {
  const parsed = ctx.templates.parseTemplate(template);
  if (parsed) return parsed;

  logger.error("Template not recognised", { template });
  const model = template.split("[")[0].trim();
  const suggestions = searchTemplates(ctx.templates.getAllTemplates(), model, 5);
  if (suggestions.length > 0) {
    console.log("\nDid you mean:");
    suggestions.forEach((s) => console.log(`  ${s}`));
  }
  process.exit(1);
}

function printResolution(resolution: MetafieldResolution): void {
  console.log(`\nMetafields (${resolution.metafields.length}):`);
  for (const metafield of resolution.metafields) {
    const id = `${metafield.namespace}.${metafield.key}`;
    console.log(`  ${id.padEnd(30)} ${metafield.value}`);
  }

  if (resolution.missing.length > 0) {
    console.log(`\nNo metaobject (${resolution.missing.length}):`);
    for (const missing of resolution.missing) {
      console.log(`  ${missing.category.padEnd(20)} ${missing.value}`);
    }
  }
}

function printImportErrors(stats: ImportStats): void {
  if (stats.errors.length === 0) return;
  logger.warn("Import errors:");
  stats.errors.slice(0, 10).forEach((e) => logger.warn(`  ${e.title}: ${e.error}`));
  if (stats.errors.length > 10) {
    logger.warn(`  ... and ${stats.errors.length - 10} more`);
  }
}

function createImporter(
  ctx: CliContext,
  dryRun: boolean,
  extra: Pick<ImporterOptions, "imageDir" | "reserveHandles"> = {}
): ProductImporter {
  const clients = dryRun ? undefined : shopifyClients(ctx.config);
  if (!dryRun) {
    const removed = ctx.handles.cleanup();
    if (removed > 0) logger.debug(`Dropped ${removed} old handle counter(s)`);
  }
  return new ProductImporter(
    {
      gids: ctx.gids,
      handles: ctx.handles,
      rest: clients?.rest,
      graphql: clients?.graphql,
      missingLog: ctx.missingLog,
    },
    {
      vendor: ctx.config.vendor,
      rateLimitDelayMs: ctx.config.rateLimitDelayMs,
      dryRun,
      ...extra,
    }
  );
}

/**
 * CATALOG COMMANDS
 */

program
  .command("brands")
  .description("List brand files with model and configuration counts")
  .action(() => {
    const { products } = loadContext();
    const brands = products.getAllBrands();

    if (brands.length === 0) {
      logger.warn(`No brand files found in ${products.laptopsDir}`);
      return;
    }

    for (const brand of brands) {
      const models = products.getModelCount(brand);
      const configs = products.getConfigurationCount(brand);
      console.log(
        `  ${brand.padEnd(16)} ${models.toString().padStart(4)} models ${configs
          .toString()
          .padStart(5)} configurations`
      );
    }
    console.log(
      `\n  ${brands.length} brands, ${products.getModelCount()} models, ${products.getConfigurationCount()} configurations`
    );
  });

program
  .command("brands:import")
  .description("Create or merge a brand file from a CSV of laptop models")
  .argument("<csv>", "CSV file with model_key, cpu, ram, vga, gpu, display, storage, colors, ...")
  .requiredOption("-b, --brand <brand>", "Brand name, e.g. ASUS")
  .option("--merge", "Keep the brand's existing models", false)
  .option("--dry-run", "Parse and report without writing the brand file", false)
  .action((csv: string, options: { brand: string; merge: boolean; dryRun: boolean }) => {
    const { products } = loadContext();
    const csvPath = resolve(workspaceRoot, csv);

    let text: string;
    try {
      text = fs.readFileSync(csvPath, "utf-8");
    } catch (error: unknown) {
      logger.error("Could not read CSV file", {
        file: csvPath,
        error: error instanceof Error ? error.message : String(error),
      });
      process.exit(1);
    }

    const result = products.importCsv(options.brand, text, {
      merge: options.merge,
      dryRun: options.dryRun,
    });
    if (!result.ok) {
      logger.error("Brand import failed", { error: result.error.message });
      process.exit(1);
    }

    const summary = result.data;
    summary.skipped.forEach((s) => logger.warn(`Row ${s.row} skipped: ${s.reason}`));
    summary.warnings.forEach((w) => logger.warn(w));
    if (summary.conflicts.length > 0) {
      logger.warn(`Replaced ${summary.conflicts.length} existing model(s): ${summary.conflicts.join(", ")}`);
    }

    const prefix = summary.written ? "" : "[DRY RUN] ";
    logger.info(
      `${prefix}${summary.brand}: ${summary.imported.length} model(s) imported, ${summary.totalModels} total`,
      { file: summary.file }
    );
  });

program
  .command("models")
  .description("List or search laptop models")
  .option("-b, --brand <brand>", "Only this brand")
  .option("-s, --search <term>", "Substring to match on model names", "")
  .action((options: { brand?: string; search: string }) => {
    const { products } = loadContext();
    const models = products.searchModels(options.search, options.brand);

    if (models.length === 0) {
      logger.warn("No models found", { brand: options.brand, search: options.search });
      return;
    }

    for (const model of models) {
      const year = model.year ? ` (${model.year})` : "";
      console.log(
        `  ${model.brand.padEnd(10)} ${model.modelKey}${year}  ${model.configurations.length} configs, ${model.colors.length} colors`
      );
    }
  });

program
  .command("templates")
  .description("Search templates, or manage the template cache")
  .argument("[query...]", "Search terms (all must match)")
  .option("-l, --limit <n>", "Maximum results", "20")
  .option("--regenerate", "Rebuild the template cache", false)
  .option("--info", "Show cache metadata", false)
  .option("--clear", "Delete the cache file", false)
  .action(
    (
      query: string[],
      options: { limit: string; regenerate: boolean; info: boolean; clear: boolean }
    ) => {
      const { templates } = loadContext();

      if (options.clear) {
        const removed = templates.clear();
        logger.info(removed ? "Template cache removed" : "No template cache to remove");
        return;
      }

      if (options.info) {
        console.log(JSON.stringify(templates.getCacheInfo(), null, 2));
        return;
      }

      const all = options.regenerate ? templates.regenerate() : templates.getAllTemplates();
      const matches = searchTemplates(all, query.join(" "), parseCount(options.limit, "Limit"));

      matches.forEach((template) => console.log(`  ${template}`));
      logger.info(`${matches.length} of ${all.length} templates shown`);
    }
  );

program
  .command("resolve")
  .description("Show the metafields a template resolves to, without calling Shopify")
  .argument("<template>", "Template string")
  .option("--rank <rank>", `Condition rank (${LAPTOP_RANKS.join(", ")})`)
  .option("--inclusions <items>", "Comma-separated inclusions")
  .option("--minus <items>", "Comma-separated defects")
  .action(
    (template: string, options: { rank?: string; inclusions?: string; minus?: string }) => {
      const ctx = loadContext();
      const parsed = parseTemplateOrExit(ctx, template);

      const resolution = resolveLaptopMetafields(
        {
          specs: laptopSpecsSchema.parse(parsed),
          rank: parseRank(options.rank),
          inclusions: splitList(options.inclusions),
          minus: splitList(options.minus),
        },
        ctx.gids
      );

      console.log(`\n${parsed.brand} ${parsed.model}`);
      console.log(`  ${specSummary(laptopSpecsSchema.parse(parsed))}`);
      printResolution(resolution);
    }
  );

/**
 * IMPORT COMMANDS
 */

interface ImportCommandOptions {
  template: string;
  price: string;
  currency?: string;
  quantity: string;
  sku?: string;
  rank?: string;
  inclusions?: string;
  minus?: string;
  collections?: string;
  tags?: string;
  images?: string;
  status: string;
  dryRun: boolean;
}

program
  .command("import")
  .description("Create one laptop product from a template")
  .requiredOption("-t, --template <template>", "Template string (see `templates`)")
  .requiredOption("-p, --price <price>", "Price, e.g. 128000 or ¥128,000")
  .option("--currency <code>", "Currency (defaults to DEFAULT_CURRENCY)")
  .option("-q, --quantity <n>", "Inventory quantity", "1")
  .option("--sku <sku>", "Variant SKU")
  .option("--rank <rank>", `Condition rank (${LAPTOP_RANKS.join(", ")})`)
  .option("--inclusions <items>", "Comma-separated inclusions")
  .option("--minus <items>", "Comma-separated defects")
  .option("--collections <names>", `Extra collections (always: ${DEFAULT_COLLECTIONS.join(", ")})`)
  .option("--tags <tags>", "Comma-separated tags")
  .option("--images <files>", "Comma-separated image files, uploaded in order")
  .option("--status <status>", "active or draft", "active")
  .option("--dry-run", "Build the payload without calling Shopify", false)
  .action(async (options: ImportCommandOptions) => {
    const ctx = loadContext();
    const parsed = parseTemplateOrExit(ctx, options.template);

    const currency = options.currency ?? ctx.config.currency;
    if (!isCurrency(currency)) {
      logger.error("Unsupported currency", { currency });
      process.exit(1);
    }

    const input: LaptopProductInput = templateToLaptopInput(parsed, {
      price: options.price,
      currency,
      quantity: parseCount(options.quantity, "Quantity"),
      sku: options.sku,
      rank: parseRank(options.rank),
      inclusions: splitList(options.inclusions),
      minus: splitList(options.minus),
      collections: splitList(options.collections),
      tags: splitList(options.tags),
      images: splitList(options.images),
      status: parseStatus(options.status),
    });

    const empty = missingSpecs({ specs: laptopSpecsSchema.parse(parsed) });
    if (empty.length > 0) {
      logger.warn(`Template has empty specs: ${empty.join(", ")}`);
    }

    const importer = createImporter(ctx, options.dryRun, { imageDir: workspaceRoot });
    reportImport(await importer.importLaptop(input));
  });

function reportImport(result: Awaited<ReturnType<ProductImporter["importLaptop"]>>): void {
  if (!result.ok) {
    logger.error("Import failed", { error: result.error.message });
    if (result.error instanceof ShopifyUserError) {
      result.error.userErrors.forEach((e) => logger.error(`  ${formatFieldError(e)}`));
    }
    process.exit(1);
  }

  const outcome = result.data;
  if (outcome.status === "dry-run") {
    logger.info("[DRY RUN] Would create product:");
    console.log(JSON.stringify({ product: outcome.payload }, null, 2));
  } else {
    logger.info(`Created ${outcome.title}`, {
      id: outcome.productId,
      handle: outcome.handle,
      collections: outcome.collections,
      category: outcome.category,
      images: outcome.images.length,
    });
  }
  outcome.warnings.forEach((w) => logger.warn(w));
}

interface SmartphoneCommandOptions {
  title: string;
  brand: string;
  model?: string;
  storage?: string;
  price: string;
  currency?: string;
  quantity: string;
  sku?: string;
  simCarriers?: string;
  rank?: string;
  inclusions?: string;
  minus?: string;
  ramSize?: string;
  color?: string;
  collections?: string;
  tags?: string;
  images?: string;
  status: string;
  dryRun: boolean;
}

program
  .command("import:smartphone")
  .description("Create one smartphone product, one variant per SIM carrier")
  .requiredOption("--title <title>", "Product title")
  .requiredOption("--brand <brand>", "Brand, e.g. Google")
  .requiredOption("-p, --price <price>", "Price, e.g. 54800 or ¥54,800")
  .option("--model <model>", "Model name")
  .option("--storage <storage>", "Storage, e.g. 128GB")
  .option("--currency <code>", "Currency (defaults to DEFAULT_CURRENCY)")
  .option("-q, --quantity <n>", "Inventory quantity, split across carriers", "1")
  .option("--sku <sku>", "Base SKU; each carrier variant gets a suffix")
  .option("--sim-carriers <names>", "Comma-separated SIM carriers")
  .option("--rank <rank>", `Condition rank (${LAPTOP_RANKS.join(", ")})`)
  .option("--inclusions <items>", "Comma-separated inclusions")
  .option("--minus <items>", "Comma-separated defects")
  .option("--ram-size <size>", "RAM size, e.g. 8GB")
  .option("--color <color>", "Color")
  .option(
    "--collections <names>",
    `Extra collections (always: ${SMARTPHONE_DEFAULT_COLLECTIONS.join(", ")})`
  )
  .option("--tags <tags>", "Comma-separated tags")
  .option("--images <files>", "Comma-separated image files, uploaded in order")
  .option("--status <status>", "active or draft", "active")
  .option("--dry-run", "Build the payload without calling Shopify", false)
  .action(async (options: SmartphoneCommandOptions) => {
    const ctx = loadContext();

    const currency = options.currency ?? ctx.config.currency;
    if (!isCurrency(currency)) {
      logger.error("Unsupported currency", { currency });
      process.exit(1);
    }

    const input: SmartphoneProductInput = {
      title: options.title,
      brand: options.brand,
      model: options.model,
      storage: options.storage,
      price: options.price,
      currency,
      quantity: parseCount(options.quantity, "Quantity"),
      sku: options.sku,
      sim_carriers: splitList(options.simCarriers),
      rank: parseRank(options.rank),
      inclusions: splitList(options.inclusions),
      minus: splitList(options.minus),
      ram_size: options.ramSize,
      color: options.color,
      collections: splitList(options.collections),
      tags: splitList(options.tags),
      images: splitList(options.images),
      status: parseStatus(options.status),
    };

    const importer = createImporter(ctx, options.dryRun, { imageDir: workspaceRoot });
    reportImport(await importer.importSmartphone(input));
  });

program
  .command("import:bulk")
  .description("Create laptop products from a JSON array of products or templates")
  .argument("<file>", "JSON file: [{ template, price, ... }] or full product objects")
  .option("--line <line>", "laptop or smartphone", "laptop")
  .option("--images <dir>", "Directory that relative image paths resolve against")
  .option("--dry-run", "Build payloads without calling Shopify", false)
  .action(async (file: string, options: { line: string; images?: string; dryRun: boolean }) => {
    const ctx = loadContext();
    const line = parseLine(options.line);
    const filePath = resolve(workspaceRoot, file);
    const inputs = readImportFile(ctx, filePath, line);
    const imageDir = resolve(workspaceRoot, options.images ?? dirname(filePath));

    logger.info(`Importing ${inputs.length} products from ${filePath}`);
    const stats = await createImporter(ctx, options.dryRun, { imageDir }).importMany(inputs, line);

    const label = line === "laptop" ? "Laptops" : "Smartphones";
    logger.info(`\n=== ${label.slice(0, -1)} Import Complete ===`);
    console.log(formatStatsTable(label, stats));
    printImportErrors(stats);

    if (stats.failed > 0) {
      process.exit(1);
    }
  });

/**
 * Fields a bulk entry may set on top of its template.
 */
function pickOverrides(extras: object): Record<string, unknown> {
  const allowed = new Set([
    "price",
    "currency",
    "quantity",
    "sku",
    "rank",
    "inclusions",
    "minus",
    "collections",
    "tags",
    "status",
    "vendor",
    "handle",
    "description",
    "taxable",
    "title",
    "images",
  ]);
  return Object.fromEntries(Object.entries(extras).filter(([key]) => allowed.has(key)));
}

function parseLine(value: string): ProductLine {
  if (value !== "laptop" && value !== "smartphone") {
    logger.error("Line must be 'laptop' or 'smartphone'", { line: value });
    process.exit(1);
  }
  return value;
}

/**
 * Read a JSON import file. Laptop entries with a `template` are expanded
 * from the catalog; an unknown template stops the whole file.
 */
function readImportFile(ctx: CliContext, filePath: string, line: ProductLine): unknown[] {
  let entries: unknown;
  try {
    entries = JSON.parse(fs.readFileSync(filePath, "utf-8"));
  } catch (error: unknown) {
    logger.error("Could not read import file", {
      file: filePath,
      error: error instanceof Error ? error.message : String(error),
    });
    process.exit(1);
  }

  if (!Array.isArray(entries)) {
    logger.error("Import file must contain a JSON array", { file: filePath });
    process.exit(1);
  }
  if (line === "smartphone") return entries;

  const unknownTemplates: string[] = [];
  const inputs = entries.map((entry: unknown) => {
    if (typeof entry !== "object" || entry === null || !("template" in entry)) {
      return entry;
    }
    const { template, ...extras } = entry;
    if (typeof template !== "string") return entry;

    const parsed = ctx.templates.parseTemplate(template);
    if (!parsed) {
      unknownTemplates.push(template);
      return entry;
    }
    return { ...extras, ...templateToLaptopInput(parsed, { price: 0 }), ...pickOverrides(extras) };
  });

  if (unknownTemplates.length > 0) {
    logger.error(`${unknownTemplates.length} template(s) not recognised, nothing imported`);
    unknownTemplates.slice(0, 10).forEach((t) => logger.error(`  ${t}`));
    process.exit(1);
  }
  return inputs;
}

program
  .command("export:csv")
  .description("Write a Shopify product CSV from a JSON import file, without calling Shopify")
  .argument("<file>", "JSON file in the import:bulk format")
  .requiredOption("-o, --out <csv>", "CSV file to write")
  .option("--line <line>", "laptop or smartphone", "laptop")
  .action(async (file: string, options: { out: string; line: string }) => {
    const ctx = loadContext();
    const line = parseLine(options.line);
    const filePath = resolve(workspaceRoot, file);
    const inputs = readImportFile(ctx, filePath, line);

    const importer = createImporter(ctx, true, { reserveHandles: true });
    const products: ExportProduct[] = [];
    const failures: string[] = [];

    for (const [index, input] of inputs.entries()) {
      const result =
        line === "laptop" ? await importer.importLaptop(input) : await importer.importSmartphone(input);
      if (!result.ok) {
        failures.push(`#${index + 1}: ${result.error.message}`);
        continue;
      }
      products.push({ line, payload: result.data.payload });
    }

    if (failures.length > 0) {
      logger.error(`${failures.length} product(s) invalid, nothing written`);
      failures.slice(0, 10).forEach((f) => logger.error(`  ${f}`));
      process.exit(1);
    }

    const outPath = resolve(workspaceRoot, options.out);
    fs.writeFileSync(outPath, exportProductsCsv(products), "utf-8");
    logger.info(`Wrote ${products.length} product(s) to ${outPath}`);
  });

program
  .command("import:interactive")
  .description("Search templates, review the mapping and create products one by one")
  .option("--dry-run", "Build payloads without calling Shopify", false)
  .action(async (options: { dryRun: boolean }) => {
    const ctx = loadContext();
    const importer = createImporter(ctx, options.dryRun);
    const allTemplates = ctx.templates.getAllTemplates();
    logger.info(`${allTemplates.length} templates loaded`);

    const rl = createInterface({ input: process.stdin, output: process.stdout });
    let created = 0;

    try {
      for (;;) {
        const query = await ask(rl, "\nSearch templates (empty to quit): ");
        if (query === "") break;

        const matches = searchTemplates(allTemplates, query, 10);
        if (matches.length === 0) {
          console.log("  No templates match.");
          continue;
        }
        matches.forEach((t, i) => console.log(`  ${String(i + 1).padStart(2)}. ${t}`));

        const choice = Number(await ask(rl, `Select [1-${matches.length}]: `));
        const template = Number.isInteger(choice) ? matches[choice - 1] : undefined;
        if (!template) {
          console.log("  Invalid selection.");
          continue;
        }

        const parsed = ctx.templates.parseTemplate(template);
        if (!parsed) {
          logger.error("Template no longer matches the catalog; run `templates --regenerate`");
          continue;
        }
        console.log(`\n  ${parsed.brand} ${parsed.model}`);
        console.log(`  ${specSummary(laptopSpecsSchema.parse(parsed))}`);

        const price = await ask(rl, `Price (${ctx.config.currency}): `);
        const rankAnswer = await ask(rl, `Rank (${LAPTOP_RANKS.join(", ")}) [none]: `);
        const rank = rankAnswer === "" ? undefined : rankAnswer.toUpperCase();
        if (rank !== undefined && !isLaptopRank(rank)) {
          console.log("  Unknown rank.");
          continue;
        }
        const inclusions = splitList(await ask(rl, "Inclusions (comma-separated) [none]: "));
        const minus = splitList(await ask(rl, "Minus (comma-separated) [none]: "));
        const quantity = (await ask(rl, "Quantity [1]: ")) || "1";

        const input = templateToLaptopInput(parsed, {
          price,
          currency: ctx.config.currency,
          quantity: Number(quantity),
          rank,
          inclusions,
          minus,
        });

        const preview = parseLaptopProduct(input);
        if (!preview.ok) {
          logger.error("Invalid product", { error: preview.error.message });
          continue;
        }
        console.log(`\n  ${preview.data.title}`);
        console.log(`  ${displayPrice(preview.data.price, preview.data.currency)} x ${preview.data.quantity}`);
        printResolution(resolveLaptopMetafields(preview.data, ctx.gids));

        const confirm = await ask(rl, "\nCreate this product? (y/N): ");
        if (confirm.toLowerCase() !== "y") {
          console.log("  Skipped.");
          continue;
        }

        const result = await importer.importLaptop(input);
        if (!result.ok) {
          logger.error("Import failed", { error: result.error.message });
          continue;
        }
        created++;
        logger.info(`Created ${result.data.title}`, {
          id: result.data.productId,
          handle: result.data.handle,
        });
        result.data.warnings.forEach((w) => logger.warn(w));
      }
    } finally {
      rl.close();
    }

    const misses = ctx.missingLog.getSessionEntries();
    logger.info(`Session finished, ${created} product(s) created`);
    if (misses.length > 0) {
      logger.warn(`${misses.length} value(s) had no metaobject this session; see missing:report`);
    }
  });

/**
 * MAINTENANCE COMMANDS
 */

program
  .command("validate")
  .description("Check brand files and GID tables")
  .argument("[brands...]", "Brands to check (default: all)")
  .action((brands: string[]) => {
    const { products, gids } = loadContext();
    const targets = brands.length > 0 ? brands : products.getAllBrands();
    let errorCount = 0;

    for (const brand of targets) {
      const report = products.validateBrandData(brand);
      errorCount += report.errors.length;

      const status = report.valid ? "ok" : "INVALID";
      console.log(`  ${brand.padEnd(16)} ${status}`);
      report.errors.forEach((e) => logger.error(`    ${e}`));
      report.warnings.forEach((w) => logger.warn(`    ${w}`));
    }

    console.log("");
    for (const category of gids.getCategories()) {
      const table = gids.getMapping(category);
      if (table.ok) {
        console.log(`  ${category.padEnd(20)} ${Object.keys(table.data).length} entries`);
      } else if (table.error instanceof NotFoundError) {
        logger.warn(`  ${category.padEnd(20)} ${table.error.message}`);
      } else {
        errorCount++;
        logger.error(`  ${category.padEnd(20)} ${table.error.message}`);
      }
    }

    if (errorCount > 0) {
      logger.error(`Validation found ${errorCount} error(s)`);
      process.exit(1);
    }
    logger.info("Validation passed");
  });

program
  .command("metaobjects:sync")
  .description("Rebuild local GID tables from the metaobjects in the store")
  .option("-c, --category <category>", "Only this category")
  .option("--dry-run", "Report changes without writing files", false)
  .action(async (options: { category?: string; dryRun: boolean }) => {
    const ctx = loadContext();
    const { graphql } = shopifyClients(ctx.config);
    const categories = options.category
      ? [parseCategory(options.category)]
      : ctx.gids.getCategories();

    const stats = { total: categories.length, updated: 0, skipped: 0, failed: 0 };

    for (const category of categories) {
      const remote = await fetchGidTable(graphql, category);
      if (!remote.ok) {
        stats.failed++;
        logger.error(`Failed to fetch ${category}`, { error: remote.error.message });
        continue;
      }

      const local = ctx.gids.getMapping(category);
      const before: GidTable = local.ok ? local.data : {};
      const added = Object.keys(remote.data).filter((name) => !(name in before));
      const removed = Object.keys(before).filter((name) => !(name in remote.data));

      if (options.dryRun) {
        logger.info(`[DRY RUN] ${category}: +${added.length} -${removed.length}`);
        stats.skipped++;
        continue;
      }

      const written = ctx.gids.writeMapping(category, remote.data);
      if (!written.ok) {
        stats.failed++;
        logger.error(written.error.message, { details: written.error.details });
        continue;
      }
      stats.updated++;
      logger.info(`${category}: ${Object.keys(remote.data).length} entries (+${added.length} -${removed.length})`, {
        file: written.data,
      });
    }

    console.log(formatStatsTable("Metaobject tables", stats));
    if (stats.failed > 0) process.exit(1);
  });

program
  .command("metaobjects:upsert")
  .description("Create or update component metaobjects and record their GIDs")
  .argument("<category>", `One of: ${COMPONENT_CATEGORIES.join(", ")}`)
  .argument("[labels...]", "Display names to upsert")
  .option("--from-missing [limit]", "Use the most frequent missing values for the category")
  .action(
    async (
      categoryArg: string,
      labels: string[],
      options: { fromMissing?: string | boolean }
    ) => {
      const ctx = loadContext();
      const category = parseCategory(categoryArg);
      const targets = [...labels];

      if (options.fromMissing !== undefined) {
        const limit =
          typeof options.fromMissing === "string" ? parseCount(options.fromMissing, "Limit") : 20;
        const missing = ctx.missingLog.getSummary()[category] ?? [];
        targets.push(...missing.slice(0, limit).map((entry) => entry.value));
      }

      if (targets.length === 0) {
        logger.warn("Nothing to upsert");
        return;
      }

      const { graphql } = shopifyClients(ctx.config);
      const type = METAOBJECT_TYPES[category];
      const stats = { total: targets.length, updated: 0, failed: 0 };
      const local = ctx.gids.getMapping(category);
      const table: GidTable = { ...(local.ok ? local.data : {}) };

      await processSequentially(targets, ctx.config.rateLimitDelayMs, async (label) => {
        const result = await upsertMetaobject(graphql, type, metaobjectHandle(label), {
          [LABEL_FIELD]: label,
        });
        if (!result.ok) {
          stats.failed++;
          logger.error(`Failed to upsert '${label}'`, { error: result.error.message });
          return;
        }
        stats.updated++;
        table[label] = result.data.id;
        logger.info(`${label} → ${result.data.id}`);
      });

      const written = ctx.gids.writeMapping(category, table);
      if (!written.ok) {
        logger.error(written.error.message, { details: written.error.details });
        process.exit(1);
      }

      console.log(formatStatsTable(`Metaobjects (${type})`, stats));
      if (stats.failed > 0) process.exit(1);
    }
  );

program
  .command("missing:report")
  .description("Summarise component values that had no metaobject")
  .option("-c, --category <category>", "Only this category")
  .option("-n, --top <n>", "Values shown per category", "10")
  .option("--json", "Print the raw summary and statistics as JSON", false)
  .option("--clear", "Reset the log", false)
  .action((options: { category?: string; top: string; json: boolean; clear: boolean }) => {
    const { missingLog } = loadContext();

    if (options.clear) {
      missingLog.clear();
      logger.info("Missing metaobject log cleared");
      return;
    }

    const summary = missingLog.getSummary();
    const statistics = missingLog.getStatistics();

    if (options.json) {
      console.log(JSON.stringify({ statistics, summary }, null, 2));
      return;
    }

    if (statistics.totalUniqueValues === 0) {
      logger.info("No missing metaobjects recorded");
      return;
    }

    console.log(
      `\n${statistics.totalUniqueValues} missing values in ${statistics.totalCategories} categories (${statistics.totalFrequency} lookups)`
    );

    const top = parseCount(options.top, "Top");
    const categories = options.category
      ? [parseCategory(options.category)]
      : Object.keys(summary);

    for (const category of categories) {
      const entries = summary[category] ?? [];
      if (entries.length === 0) continue;
      console.log(`\n${category}:`);
      for (const entry of entries.slice(0, top)) {
        console.log(`  ${entry.frequency.toString().padStart(4)}×  ${entry.value}  (last ${entry.lastSeen})`);
      }
      if (entries.length > top) {
        console.log(`  ... and ${entries.length - top} more`);
      }
    }
  });

program
  .command("products:show")
  .description("Show a product and its metafields")
  .argument("<id>", "Product id or GID")
  .action(async (idArg: string) => {
    const ctx = loadContext();
    const { rest } = shopifyClients(ctx.config);
    const id = productIdFromGid(idArg);

    const product = await getProduct(rest, id);
    if (!product.ok) {
      logger.error("Failed to fetch product", { id, error: product.error.message });
      process.exit(1);
    }
    const metafields = await listProductMetafields(rest, id);
    if (!metafields.ok) {
      logger.error("Failed to fetch metafields", { id, error: metafields.error.message });
      process.exit(1);
    }

    const p = product.data;
    console.log(`\n${p.title}`);
    console.log(`  handle:  ${p.handle}`);
    console.log(`  status:  ${p.status}`);
    console.log(`  vendor:  ${p.vendor}`);
    console.log(`  tags:    ${p.tags}`);
    p.variants.forEach((v) =>
      console.log(`  variant: ${v.price} sku=${v.sku ?? "-"} qty=${v.inventory_quantity}`)
    );
    printResolution({
      metafields: metafields.data.map(({ namespace, key, type, value }) => ({
        namespace,
        key,
        type,
        value,
      })),
      missing: [],
    });
  });

program
  .command("products:metafields")
  .description("Re-resolve a template and write its metafields onto an existing product")
  .argument("<id>", "Product id or GID")
  .requiredOption("-t, --template <template>", "Template string")
  .option("--rank <rank>", `Condition rank (${LAPTOP_RANKS.join(", ")})`)
  .option("--inclusions <items>", "Comma-separated inclusions")
  .option("--minus <items>", "Comma-separated defects")
  .option("--status <status>", "Also set the product status (active or draft)")
  .action(
    async (
      idArg: string,
      options: {
        template: string;
        rank?: string;
        inclusions?: string;
        minus?: string;
        status?: string;
      }
    ) => {
      const ctx = loadContext();
      const parsed = parseTemplateOrExit(ctx, options.template);
      const { rest, graphql } = shopifyClients(ctx.config);
      const id = productIdFromGid(idArg);

      const resolution = resolveLaptopMetafields(
        {
          title: parsed.template,
          brand: parsed.brand,
          model: parsed.model,
          specs: laptopSpecsSchema.parse(parsed),
          rank: parseRank(options.rank),
          inclusions: splitList(options.inclusions),
          minus: splitList(options.minus),
        },
        ctx.gids,
        { missingLog: ctx.missingLog }
      );

      const written = await setProductMetafields(graphql, id, resolution.metafields);
      if (!written.ok) {
        logger.error("Failed to set metafields", { id, error: written.error.message });
        process.exit(1);
      }
      logger.info(`Wrote ${written.data} metafield(s) to product ${id}`);

      if (options.status) {
        const updated = await updateProduct(rest, id, { status: parseStatus(options.status) });
        if (!updated.ok) {
          logger.error("Failed to update status", { id, error: updated.error.message });
          process.exit(1);
        }
        logger.info(`Product ${id} is now ${updated.data.status}`);
      }

      resolution.missing.forEach((m) =>
        logger.warn(`No metaobject for ${m.category} '${m.value}'`)
      );
    }
  );

program
  .command("products:delete")
  .description("Delete products by id, or every product of a vendor")
  .argument("[ids...]", "Product ids or GIDs")
  .option("--vendor <vendor>", "Delete every product with this vendor")
  .option("--yes", "Skip the confirmation prompt", false)
  .action(async (ids: string[], options: { vendor?: string; yes: boolean }) => {
    const ctx = loadContext();
    const { rest } = shopifyClients(ctx.config);

    const targets = ids.map(productIdFromGid);
    if (options.vendor) {
      const listed = await listProducts(rest, { vendor: options.vendor, fields: "id,title" });
      if (!listed.ok) {
        logger.error("Failed to list products", { error: listed.error.message });
        process.exit(1);
      }
      targets.push(...listed.data.map((p) => String(p.id)));
    }

    if (targets.length === 0) {
      logger.warn("No products to delete");
      return;
    }

    logger.warn(`About to delete ${targets.length} product(s) from ${ctx.config.shop ?? "the store"}`);
    if (!options.yes) {
      const confirmed = await promptConfirmation("delete");
      if (!confirmed) {
        logger.info("Aborted. No products were deleted.");
        process.exit(0);
      }
    }

    const stats = { total: targets.length, deleted: 0, failed: 0 };
    await processSequentially(targets, ctx.config.rateLimitDelayMs, async (id) => {
      const result = await deleteProduct(rest, id);
      if (result.ok) {
        stats.deleted++;
      } else {
        stats.failed++;
        logger.error(`Failed to delete product ${id}`, { error: result.error.message });
      }
    });

    console.log(formatStatsTable("Products", stats));
    if (stats.failed > 0) process.exit(1);
  });

// Parse and execute
await program.parseAsync(process.argv);
