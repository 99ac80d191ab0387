/**
 * @catalog-importer/core
 *
 * Maps laptop and smartphone data onto Shopify metaobject references and
 * creates products through the Shopify Admin API.
 */

// Utils
export * from "./utils/logger.js";
export * from "./utils/types.js";
export * from "./utils/retry.js";
export * from "./utils/redact.js";
export * from "./utils/chunk.js";

// Configuration
export * from "./config/env.js";

// Static data
export * from "./catalog/schemas.js";
export * from "./catalog/json-file.js";
export * from "./catalog/gid-repository.js";
export * from "./catalog/product-data-repository.js";
export * from "./catalog/brand-csv.js";

// Mapping
export * from "./mapping/definitions.js";
export * from "./mapping/resolve.js";
export * from "./mapping/missing-log.js";

// Product payloads
export * from "./product/price.js";
export * from "./product/handle.js";
export * from "./product/laptop.js";
export * from "./product/smartphone.js";
export * from "./product/payload.js";

// API clients
export * from "./graphql/client.js";
export * from "./graphql/queries.js";
export * from "./rest/client.js";

// Shopify operations
export * from "./shopify/products.js";
export * from "./shopify/metaobjects.js";
export * from "./shopify/collections.js";
export * from "./shopify/images.js";

// Import pipeline
export * from "./import/importer.js";
export * from "./export/product-csv.js";

// Templates
export * from "./templates/template.js";
export * from "./templates/template-cache.js";
export * from "./templates/search.js";
