/**
 * Keep admin tokens out of logs and error output.
 */

const SENSITIVE_KEYS = ["token", "password", "secret", "apikey", "accesstoken"];

/**
 * Redact Shopify admin tokens from a URL, header dump or stack trace.
 *
 * @example
 * redactToken("X-Shopify-Access-Token: shpat_abc123")
 * // "X-Shopify-Access-Token: ***"
 */
export function redactToken(input: string): string {
  return input
    .replace(/(X-Shopify-Access-Token:\s*)[a-zA-Z0-9_-]+/gi, "$1***")
    .replace(/shpat_[a-zA-Z0-9]+/g, "shpat_***")
    .replace(/([?&]access_token=)[a-zA-Z0-9_-]+/gi, "$1***");
}

function redactValue(value: unknown, depth: number): unknown {
  if (typeof value === "string") return redactToken(value);
  if (depth > 5 || value === null || typeof value !== "object") return value;
  if (Array.isArray(value)) return value.map((v) => redactValue(v, depth + 1));

  const redacted: Record<string, unknown> = {};
  for (const [key, inner] of Object.entries(value)) {
    const lowerKey = key.toLowerCase();
    redacted[key] = SENSITIVE_KEYS.some((k) => lowerKey.includes(k))
      ? "***"
      : redactValue(inner, depth + 1);
  }
  return redacted;
}

/**
 * Log-safe view of an unknown thrown value.
 */
export function safeError(error: unknown): Record<string, unknown> {
  if (!(error instanceof Error)) {
    return { message: redactToken(String(error)) };
  }

  const safe: Record<string, unknown> = {
    name: error.name,
    message: redactToken(error.message),
  };
  if (error.stack) safe.stack = redactToken(error.stack);

  for (const [key, value] of Object.entries(error)) {
    if (key in safe) continue;
    safe[key] = redactValue(value, 0);
  }
  return safe;
}
