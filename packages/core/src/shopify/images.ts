/**
 * Product image upload.
 *
 * Local files are sent base64-encoded to `products/{id}/images.json`, one at a
 * time with a short pause. A file that fails (bad type, too large, unreadable,
 * rejected by Shopify) is reported and the rest carry on.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import type { RestClient, RestError } from "../rest/client.js";
import { logger } from "../utils/logger.js";
import { processSequentially } from "../utils/chunk.js";
import { sleep } from "../utils/retry.js";
import { type Result, ok, err, errorMessage, ShopifyApiError, ValidationError } from "../utils/types.js";

export const SUPPORTED_IMAGE_EXTENSIONS = [".jpg", ".jpeg", ".png", ".webp", ".gif"] as const;
export const MAX_IMAGE_BYTES = 10 * 1024 * 1024;
export const IMAGE_UPLOAD_DELAY_MS = 500;

export interface UploadedImage {
  file: string;
  id: number;
  position: number;
  src?: string;
}

export interface FailedImage {
  file: string;
  error: string;
}

export interface ImageUploadResult {
  uploaded: UploadedImage[];
  failed: FailedImage[];
}

export interface ImageUploadOptions {
  /** Relative paths resolve against this directory. */
  baseDir?: string;
  delayMs?: number;
  pause?: (ms: number) => Promise<void>;
}

interface RestImage {
  id: number;
  position: number;
  src?: string;
}

/**
 * Check a file can be sent and return its base64 contents.
 */
export function readImageAttachment(file: string): Result<string, ValidationError> {
  const extension = path.extname(file).toLowerCase();
  if (!(SUPPORTED_IMAGE_EXTENSIONS as readonly string[]).includes(extension)) {
    return err(
      new ValidationError(
        `Unsupported image type '${extension || "(none)"}', expected one of ${SUPPORTED_IMAGE_EXTENSIONS.join(", ")}`
      )
    );
  }

  let stat: fs.Stats;
  try {
    stat = fs.statSync(file);
  } catch (error: unknown) {
    return err(new ValidationError(`Image not readable: ${errorMessage(error)}`));
  }
  if (!stat.isFile()) {
    return err(new ValidationError(`Not a file: ${file}`));
  }
  if (stat.size > MAX_IMAGE_BYTES) {
    return err(
      new ValidationError(`Image is ${(stat.size / 1024 / 1024).toFixed(1)}MB, the limit is 10MB`)
    );
  }

  return ok(fs.readFileSync(file).toString("base64"));
}

export async function uploadProductImage(
  rest: RestClient,
  productId: number | string,
  file: string,
  position: number
): Promise<Result<UploadedImage, ValidationError | RestError>> {
  const attachment = readImageAttachment(file);
  if (!attachment.ok) return attachment;

  const result = await rest.post<{ image?: RestImage }>(`products/${productId}/images.json`, {
    image: { attachment: attachment.data, filename: path.basename(file), position },
  });
  if (!result.ok) return result;
  if (!result.data.image) {
    return err(new ShopifyApiError("Image upload returned no image", 200, result.data));
  }

  const image = result.data.image;
  return ok({ file, id: image.id, position: image.position, src: image.src });
}

/**
 * Upload `files` in order as positions 1..n.
 */
export async function uploadProductImages(
  rest: RestClient,
  productId: number | string,
  files: readonly string[],
  options: ImageUploadOptions = {}
): Promise<ImageUploadResult> {
  const uploaded: UploadedImage[] = [];
  const failed: FailedImage[] = [];

  await processSequentially(
    files,
    options.delayMs ?? IMAGE_UPLOAD_DELAY_MS,
    async (file, index) => {
      const fullPath = options.baseDir ? path.resolve(options.baseDir, file) : file;
      const result = await uploadProductImage(rest, productId, fullPath, index + 1);
      if (result.ok) {
        uploaded.push(result.data);
        return;
      }
      logger.warn("Image upload failed", { productId, file, error: result.error.message });
      failed.push({ file, error: result.error.message });
    },
    options.pause ?? sleep
  );

  logger.info("Uploaded product images", {
    productId,
    uploaded: uploaded.length,
    failed: failed.length,
  });
  return { uploaded, failed };
}
