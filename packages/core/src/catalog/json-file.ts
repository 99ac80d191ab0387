import * as fs from "node:fs";
import { type ZodType, type ZodTypeDef } from "zod";
import {
  type Result,
  ok,
  err,
  NotFoundError,
  ValidationError,
  errorMessage,
} from "../utils/types.js";

/**
 * Read a JSON file and validate it against `schema`.
 */
export function readJsonFile<T>(
  filePath: string,
  schema: ZodType<T, ZodTypeDef, unknown>
): Result<T, NotFoundError | ValidationError> {
  if (!fs.existsSync(filePath)) {
    return err(new NotFoundError(`Data file not found: ${filePath}`, filePath));
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, "utf-8"));
  } catch (error) {
    return err(
      new ValidationError(`Invalid JSON in ${filePath}: ${errorMessage(error)}`)
    );
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.issues.map(
      (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`
    );
    return err(
      new ValidationError(`Unexpected data in ${filePath}: ${details[0]}`, details)
    );
  }
  return ok(parsed.data);
}
