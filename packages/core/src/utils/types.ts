/**
 * Result type and error classes shared by every operation.
 * Operations return a discriminated union instead of throwing across module seams.
 */

export type Result<T, E = Error> =
  | { ok: true; data: T }
  | { ok: false; error: E };

export function ok<T>(data: T): Result<T, never> {
  return { ok: true, data };
}

export function err<E = Error>(error: E): Result<never, E> {
  return { ok: false, error };
}

/**
 * A field-level error reported by Shopify (GraphQL `userErrors` or REST 422 `errors`).
 */
export interface ShopifyFieldError {
  field?: string[] | string | null;
  message: string;
  code?: string | null;
}

/**
 * HTTP or transport failure talking to Shopify.
 * `status` is undefined for transport failures; 430 marks a GraphQL THROTTLED error.
 */
export class ShopifyApiError extends Error {
  constructor(
    message: string,
    public readonly status?: number,
    public readonly response?: unknown,
    public readonly retryAfterMs?: number
  ) {
    super(message);
    this.name = "ShopifyApiError";
  }

  get isRateLimited(): boolean {
    return this.status === 429 || this.status === 430;
  }
}

/**
 * Shopify accepted the request but rejected its content.
 */
export class ShopifyUserError extends Error {
  constructor(
    message: string,
    public readonly userErrors: ShopifyFieldError[]
  ) {
    super(message);
    this.name = "ShopifyUserError";
  }

  static fromUserErrors(
    operation: string,
    userErrors: ShopifyFieldError[]
  ): ShopifyUserError {
    const details = userErrors.map(formatFieldError).join("; ");
    return new ShopifyUserError(`${operation} failed: ${details}`, userErrors);
  }
}

export function formatFieldError(error: ShopifyFieldError): string {
  const field = Array.isArray(error.field) ? error.field.join(".") : error.field;
  return field ? `${field}: ${error.message}` : error.message;
}

export class ValidationError extends Error {
  constructor(message: string, public readonly details?: string[]) {
    super(message);
    this.name = "ValidationError";
  }
}

export class NotFoundError extends Error {
  constructor(message: string, public readonly resource?: string) {
    super(message);
    this.name = "NotFoundError";
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
