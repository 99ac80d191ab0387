/**
 * Product Import
 *
 * validate → resolve metafields → build payload → REST create → category,
 * images, collections.
 *
 * Behaviour:
 * - Missing GIDs never block a product: the metafield is left out and reported
 * - Shopify validation errors (REST 422) abort that product only
 * - A taken handle gets exactly one retry with a freshly generated handle
 * - Category, image and collection failures are warnings on a created product
 * - Batches run one product at a time with a fixed pause in between
 */

import type { GraphQLClient } from "../graphql/client.js";
import type { MissingRecorder } from "../mapping/missing-log.js";
import {
  type GidSource,
  type MetafieldResolution,
  type MissingValue,
  resolveLaptopMetafields,
  resolveSmartphoneMetafields,
} from "../mapping/resolve.js";
import type { HandleSource } from "../product/handle.js";
import { parseLaptopProduct } from "../product/laptop.js";
import {
  type ProductLine,
  type ProductPayload,
  buildProductPayload,
  buildSmartphonePayload,
} from "../product/payload.js";
import { SMARTPHONE_CATEGORY_ID, parseSmartphoneProduct } from "../product/smartphone.js";
import type { RestClient } from "../rest/client.js";
import { CollectionService } from "../shopify/collections.js";
import { uploadProductImages } from "../shopify/images.js";
import {
  type RestProduct,
  createProduct,
  isDuplicateHandleError,
  productGid,
  updateProductCategory,
} from "../shopify/products.js";
import { processSequentially } from "../utils/chunk.js";
import { logger } from "../utils/logger.js";
import { sleep } from "../utils/retry.js";
import {
  type Result,
  ok,
  err,
  errorMessage,
  ShopifyApiError,
  ShopifyUserError,
  ValidationError,
} from "../utils/types.js";

const log = logger.child({ component: "importer" });

export interface ImporterDeps {
  gids: GidSource;
  handles: HandleSource;
  /** Required unless every import is a dry run. */
  rest?: RestClient;
  /** Needed for collection assignment and smartphone categories. */
  graphql?: GraphQLClient;
  missingLog?: MissingRecorder;
}

export interface ImporterOptions {
  vendor: string;
  rateLimitDelayMs: number;
  dryRun?: boolean;
  /** Dry runs take real handles from the counter, for payloads that will be imported elsewhere. */
  reserveHandles?: boolean;
  assignCollections?: boolean;
  /** Skip every product's `images`. */
  skipImages?: boolean;
  /** Relative image paths resolve against this directory. */
  imageDir?: string;
  imageDelayMs?: number;
  pause?: (ms: number) => Promise<void>;
}

export interface ImportOutcome {
  status: "created" | "dry-run";
  title: string;
  handle: string;
  productId?: number;
  productGid?: string;
  payload: ProductPayload;
  missing: MissingValue[];
  collections: string[];
  /** Image ids, in upload order. */
  images: number[];
  category?: string;
  warnings: string[];
}

/**
 * A thrown error that is not one of Shopify's becomes a plain `Error`.
 */
export type ImportError = ValidationError | ShopifyApiError | ShopifyUserError | Error;

/** What both product lines hand to the shared create path. */
interface PreparedProduct {
  title: string;
  handle?: string;
  collections: readonly string[];
  images: readonly string[];
  categoryId?: string;
  resolution: MetafieldResolution;
  build: (handle: string) => Result<ProductPayload, ValidationError>;
}

export interface ImportRecord {
  index: number;
  title: string;
  status: "created" | "skipped" | "failed";
  handle?: string;
  productId?: number;
  error?: string;
  /** Class name of the failure, e.g. "ValidationError". */
  errorType?: string;
}

export interface ImportStats {
  total: number;
  created: number;
  failed: number;
  /** Dry-run products: validated and built, never sent. */
  skipped: number;
  records: ImportRecord[];
  errors: Array<{ title: string; error: string }>;
}

function titleOf(input: unknown, index: number): string {
  if (typeof input === "object" && input !== null && "title" in input) {
    const title: unknown = input.title;
    if (typeof title === "string" && title.trim() !== "") return title.trim();
  }
  return `#${index + 1}`;
}

export class ProductImporter {
  private readonly collections?: CollectionService;

  constructor(
    private readonly deps: ImporterDeps,
    private readonly options: ImporterOptions
  ) {
    if (deps.graphql) this.collections = new CollectionService(deps.graphql);
  }

  /**
   * Import one laptop. Accepts raw input (validated here) or a parsed product.
   */
  async importLaptop(input: unknown): Promise<Result<ImportOutcome, ImportError>> {
    const parsed = parseLaptopProduct(input);
    if (!parsed.ok) return parsed;
    const product = parsed.data;

    const resolution = resolveLaptopMetafields(product, this.deps.gids, {
      missingLog: this.deps.missingLog,
    });
    return this.importPrepared({
      ...product,
      resolution,
      build: (handle) =>
        buildProductPayload(product, resolution, { vendor: this.options.vendor, handle }),
    });
  }

  /**
   * Import one smartphone: a variant per SIM carrier, and the Mobile & Smart
   * Phones taxonomy category set once the product exists.
   */
  async importSmartphone(input: unknown): Promise<Result<ImportOutcome, ImportError>> {
    const parsed = parseSmartphoneProduct(input);
    if (!parsed.ok) return parsed;
    const product = parsed.data;

    const resolution = resolveSmartphoneMetafields(product, this.deps.gids, {
      missingLog: this.deps.missingLog,
    });
    return this.importPrepared({
      ...product,
      categoryId: SMARTPHONE_CATEGORY_ID,
      resolution,
      build: (handle) =>
        buildSmartphonePayload(product, resolution, { vendor: this.options.vendor, handle }),
    });
  }

  private async importPrepared(
    product: PreparedProduct
  ): Promise<Result<ImportOutcome, ImportError>> {
    const { resolution } = product;
    const dryRun = this.options.dryRun ?? false;
    const preview = dryRun && !this.options.reserveHandles;
    const handle =
      product.handle ??
      (preview ? this.deps.handles.preview(product.title) : this.deps.handles.next(product.title));

    const built = product.build(handle);
    if (!built.ok) return built;
    const payload = built.data;

    const base = {
      title: product.title,
      missing: resolution.missing,
      warnings: resolution.missing.map(
        (m) => `No metaobject for ${m.category} '${m.value}'`
      ),
    };

    if (dryRun) {
      log.info("Dry run, product not sent", { title: product.title, handle });
      const outcome: ImportOutcome = {
        ...base,
        status: "dry-run",
        handle,
        payload,
        collections: [],
        images: [],
      };
      return ok(outcome);
    }

    const created = await this.create(product.title, payload);
    if (!created.ok) return created;
    const { product: restProduct, payload: sent } = created.data;

    const gid = restProduct.admin_graphql_api_id ?? productGid(restProduct.id);
    const warnings = [...base.warnings];
    const category = product.categoryId
      ? await this.setCategory(gid, product.categoryId, warnings)
      : undefined;
    const images = await this.uploadImages(restProduct.id, product.images, warnings);
    const assigned = await this.assignCollections(gid, product.collections, warnings);

    log.info("Created product", {
      title: product.title,
      handle: restProduct.handle,
      id: restProduct.id,
      metafields: sent.metafields.length,
      missing: resolution.missing.length,
    });

    const outcome: ImportOutcome = {
      ...base,
      status: "created",
      handle: restProduct.handle,
      productId: restProduct.id,
      productGid: gid,
      payload: sent,
      collections: assigned,
      images,
      warnings,
    };
    if (category) outcome.category = category;
    return ok(outcome);
  }

  private async create(
    title: string,
    payload: ProductPayload
  ): Promise<Result<{ product: RestProduct; payload: ProductPayload }, ImportError>> {
    const rest = this.deps.rest;
    if (!rest) {
      return err(new ValidationError("A REST client is required to create products"));
    }

    const first = await createProduct(rest, payload);
    if (first.ok) return ok({ product: first.data, payload });
    if (!isDuplicateHandleError(first.error)) return first;

    const retryPayload = { ...payload, handle: this.deps.handles.next(title) };
    log.warn("Handle already taken, retrying with a new handle", {
      handle: payload.handle,
      retryHandle: retryPayload.handle,
    });

    const second = await createProduct(rest, retryPayload);
    if (!second.ok) return second;
    return ok({ product: second.data, payload: retryPayload });
  }

  private async setCategory(
    gid: string,
    categoryId: string,
    warnings: string[]
  ): Promise<string | undefined> {
    if (!this.deps.graphql) {
      warnings.push("Category skipped: no GraphQL client");
      return undefined;
    }
    const result = await updateProductCategory(this.deps.graphql, gid, categoryId);
    if (!result.ok) {
      log.warn("Product category update failed", { productGid: gid, error: result.error.message });
      warnings.push(`Category: ${result.error.message}`);
      return undefined;
    }
    return result.data;
  }

  private async uploadImages(
    productId: number,
    files: readonly string[],
    warnings: string[]
  ): Promise<number[]> {
    if (this.options.skipImages || files.length === 0 || !this.deps.rest) return [];

    const { uploaded, failed } = await uploadProductImages(this.deps.rest, productId, files, {
      baseDir: this.options.imageDir,
      delayMs: this.options.imageDelayMs,
      pause: this.options.pause,
    });
    for (const failure of failed) {
      warnings.push(`Image '${failure.file}': ${failure.error}`);
    }
    return uploaded.map((image) => image.id);
  }

  private async assignCollections(
    gid: string,
    titles: readonly string[],
    warnings: string[]
  ): Promise<string[]> {
    if (this.options.assignCollections === false || titles.length === 0) return [];
    if (!this.collections) {
      warnings.push("Collections skipped: no GraphQL client");
      return [];
    }

    const { assigned, failed } = await this.collections.assignProduct(gid, titles);
    for (const failure of failed) {
      const message = `Collection '${failure.title}': ${failure.error.message}`;
      log.warn("Collection assignment failed", { productGid: gid, error: message });
      warnings.push(message);
    }
    return assigned;
  }

  /**
   * Import products one after another, pausing `rateLimitDelayMs` between them.
   */
  async importMany(
    inputs: readonly unknown[],
    line: ProductLine = "laptop"
  ): Promise<ImportStats> {
    const stats: ImportStats = {
      total: inputs.length,
      created: 0,
      failed: 0,
      skipped: 0,
      records: [],
      errors: [],
    };

    await processSequentially(
      inputs,
      this.options.rateLimitDelayMs,
      async (input, index) => {
        const title = titleOf(input, index);
        log.info(`Importing ${index + 1}/${inputs.length}`, { title });

        let result: Result<ImportOutcome, ImportError>;
        try {
          result =
            line === "smartphone"
              ? await this.importSmartphone(input)
              : await this.importLaptop(input);
        } catch (error: unknown) {
          result = err(
            error instanceof ShopifyApiError || error instanceof ShopifyUserError
              ? error
              : new Error(errorMessage(error), { cause: error })
          );
        }

        if (!result.ok) {
          stats.failed++;
          stats.errors.push({ title, error: result.error.message });
          stats.records.push({
            index,
            title,
            status: "failed",
            error: result.error.message,
            errorType: result.error.name,
          });
          log.error("Product import failed", { title, error: result.error.message });
          return;
        }

        const outcome = result.data;
        if (outcome.status === "created") {
          stats.created++;
        } else {
          stats.skipped++;
        }
        stats.records.push({
          index,
          title: outcome.title,
          status: outcome.status === "created" ? "created" : "skipped",
          handle: outcome.handle,
          productId: outcome.productId,
        });
      },
      this.options.pause ?? sleep
    );

    return stats;
  }
}
