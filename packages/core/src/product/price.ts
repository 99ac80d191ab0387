/**
 * Price normalisation for variant payloads.
 * JPY has no minor unit, so its prices are always emitted as whole numbers.
 */

import { type Result, ok, err, ValidationError } from "../utils/types.js";

export const SUPPORTED_CURRENCIES = ["JPY", "USD", "EUR", "GBP", "CAD", "AUD"] as const;
export type Currency = (typeof SUPPORTED_CURRENCIES)[number];

const ZERO_DECIMAL_CURRENCIES: ReadonlySet<Currency> = new Set(["JPY"]);

const CURRENCY_SYMBOLS: Record<Currency, string> = {
  JPY: "¥",
  USD: "$",
  EUR: "€",
  GBP: "£",
  CAD: "C$",
  AUD: "A$",
};

export function isCurrency(value: string): value is Currency {
  return (SUPPORTED_CURRENCIES as readonly string[]).includes(value);
}

/** Digits with an optional fraction, once symbol and grouping are gone. */
const AMOUNT_PATTERN = /^-?\d+(\.\d+)?$/;

/**
 * Parse an operator-entered amount such as "¥128,000", "128000.00" or 128000.
 * Strings must be plain decimal digits after the currency symbol and grouping
 * are removed; exponents, hex and a bare symbol are rejected.
 */
export function parseAmount(input: string | number): Result<number, ValidationError> {
  let amount: number;
  if (typeof input === "number") {
    amount = input;
  } else {
    if (input.trim() === "") {
      return err(new ValidationError("Price is empty"));
    }
    const digits = input.trim().replace(/^(C\$|A\$|[¥$€£])/, "").replace(/[,\s]/g, "");
    if (!AMOUNT_PATTERN.test(digits)) {
      return err(new ValidationError(`Price is not a number: ${input}`));
    }
    amount = Number(digits);
  }

  if (!Number.isFinite(amount)) {
    return err(new ValidationError(`Price is not a number: ${String(input)}`));
  }
  if (amount < 0) {
    return err(new ValidationError("Price cannot be negative"));
  }
  return ok(amount);
}

/**
 * Format an amount the way Shopify's REST API expects variant prices.
 * Zero-decimal currencies drop any fraction (truncated, never rounded up).
 *
 * @example
 * formatPrice("¥128,000.75", "JPY") // ok("128000")
 * formatPrice(12.5, "USD")          // ok("12.50")
 */
export function formatPrice(
  input: string | number,
  currency: Currency = "JPY"
): Result<string, ValidationError> {
  const parsed = parseAmount(input);
  if (!parsed.ok) return parsed;

  if (ZERO_DECIMAL_CURRENCIES.has(currency)) {
    return ok(String(Math.trunc(parsed.data)));
  }
  return ok(parsed.data.toFixed(2));
}

/**
 * Human-readable price for terminal output, e.g. "¥128,000".
 */
export function displayPrice(amount: number, currency: Currency = "JPY"): string {
  const zeroDecimal = ZERO_DECIMAL_CURRENCIES.has(currency);
  const value = zeroDecimal ? Math.trunc(amount) : amount;
  const formatted = value.toLocaleString("en-US", {
    minimumFractionDigits: zeroDecimal ? 0 : 2,
    maximumFractionDigits: zeroDecimal ? 0 : 2,
  });
  return `${CURRENCY_SYMBOLS[currency]}${formatted}`;
}
