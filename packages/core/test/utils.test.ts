import { describe, it, expect, vi } from "vitest";
import { chunkArray, processSequentially } from "../src/utils/chunk.js";
import { Logger, type LogLevel } from "../src/utils/logger.js";
import { redactToken, safeError } from "../src/utils/redact.js";
import { parseRetryAfter, withBackoff } from "../src/utils/retry.js";
import { ShopifyApiError, ShopifyUserError, ValidationError } from "../src/utils/types.js";

describe("withBackoff", () => {
  it("doubles the delay between rate-limited attempts", async () => {
    const sleep = vi.fn(async (_ms: number) => {});
    const fn = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new ShopifyApiError("HTTP 429", 429))
      .mockRejectedValueOnce(new ShopifyApiError("Throttled", 430))
      .mockRejectedValueOnce(new ShopifyApiError("HTTP 429", 429))
      .mockResolvedValueOnce("done");

    await expect(withBackoff(fn, { sleep, jitterMs: 0 })).resolves.toBe("done");
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([1000, 2000, 4000]);
  });

  it("caps the Retry-After delay", async () => {
    const sleep = vi.fn(async (_ms: number) => {});
    const fn = vi
      .fn<() => Promise<number>>()
      .mockRejectedValueOnce(new ShopifyApiError("HTTP 429", 429, undefined, 60_000))
      .mockResolvedValueOnce(1);

    await withBackoff(fn, { sleep, maxDelayMs: 5000 });
    expect(sleep).toHaveBeenCalledWith(5000);
  });

  it("rethrows other errors at once", async () => {
    const sleep = vi.fn(async (_ms: number) => {});
    const failure = new ShopifyApiError("HTTP 500", 500);
    const fn = vi.fn<() => Promise<void>>().mockRejectedValue(failure);

    await expect(withBackoff(fn, { sleep })).rejects.toBe(failure);
    expect(fn).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it("stops after maxAttempts", async () => {
    const sleep = vi.fn(async (_ms: number) => {});
    const fn = vi.fn<() => Promise<void>>().mockRejectedValue(new ShopifyApiError("HTTP 429", 429));

    await expect(withBackoff(fn, { sleep, maxAttempts: 2, jitterMs: 0 })).rejects.toThrow("HTTP 429");
    expect(fn).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledTimes(1);
  });
});

describe("parseRetryAfter", () => {
  it.each([
    ["2.0", 2000],
    ["0.5", 500],
    ["soon", undefined],
    ["-1", undefined],
    [null, undefined],
  ])("reads %s", (header, expected) => {
    expect(parseRetryAfter(header)).toBe(expected);
  });
});

describe("redactToken", () => {
  it("hides tokens in headers, query strings and raw values", () => {
    expect(redactToken("X-Shopify-Access-Token: test-secret")).toBe("X-Shopify-Access-Token: ***");
    expect(redactToken("https://shop/admin?access_token=test-secret&x=1")).toBe(
      "https://shop/admin?access_token=***&x=1"
    );
    expect(redactToken("token shpat_test123 leaked")).toBe("token shpat_*** leaked");
  });
});

describe("safeError", () => {
  it("redacts messages and sensitive properties", () => {
    const error = new ShopifyApiError("HTTP 401", 401, {
      accessToken: "test-secret",
      url: "https://shop/admin?access_token=test-secret",
    });

    const safe = safeError(error);

    expect(safe).toMatchObject({
      name: "ShopifyApiError",
      message: "HTTP 401",
      status: 401,
      response: { accessToken: "***", url: "https://shop/admin?access_token=***" },
    });
  });

  it("keeps user errors", () => {
    const error = ShopifyUserError.fromUserErrors("productCreate", [
      { field: ["title"], message: "can't be blank" },
    ]);
    expect(safeError(error)).toMatchObject({
      message: "productCreate failed: title: can't be blank",
      userErrors: [{ field: ["title"], message: "can't be blank" }],
    });
  });

  it("wraps non-errors", () => {
    expect(safeError("shpat_abc")).toEqual({ message: "shpat_***" });
  });
});

describe("chunkArray", () => {
  it("splits into fixed-size chunks", () => {
    expect(chunkArray([1, 2, 3, 4, 5], 2)).toEqual([[1, 2], [3, 4], [5]]);
    expect(chunkArray([], 25)).toEqual([]);
  });

  it("rejects a non-positive size", () => {
    expect(() => chunkArray([1], 0)).toThrow("Chunk size must be greater than 0");
  });
});

describe("processSequentially", () => {
  it("pauses between items but not after the last", async () => {
    const pause = vi.fn(async (_ms: number) => {});
    const seen: string[] = [];

    const results = await processSequentially(
      ["a", "b", "c"],
      250,
      async (item, index) => {
        seen.push(item);
        return `${index}:${item}`;
      },
      pause
    );

    expect(results).toEqual(["0:a", "1:b", "2:c"]);
    expect(seen).toEqual(["a", "b", "c"]);
    expect(pause).toHaveBeenCalledTimes(2);
    expect(pause).toHaveBeenCalledWith(250);
  });

  it("does not pause with a zero delay", async () => {
    const pause = vi.fn(async (_ms: number) => {});
    await processSequentially([1, 2], 0, async (n) => n, pause);
    expect(pause).not.toHaveBeenCalled();
  });
});

describe("Logger", () => {
  function capture(level: LogLevel = "debug") {
    const lines: Array<{ level: LogLevel; line: string }> = [];
    const log = new Logger({
      level,
      format: "json",
      sink: (lineLevel, line) => lines.push({ level: lineLevel, line }),
    });
    return { log, lines };
  }

  it("writes one JSON object per line", () => {
    const { log, lines } = capture();
    log.warn("Rate limited", { attempt: 1 });

    expect(lines).toHaveLength(1);
    expect(lines[0].level).toBe("warn");
    expect(JSON.parse(lines[0].line)).toMatchObject({
      level: "warn",
      message: "Rate limited",
      attempt: 1,
    });
  });

  it("filters below the configured level", () => {
    const { log, lines } = capture("warn");
    log.info("hidden");
    log.error("shown");
    expect(lines.map((l) => l.level)).toEqual(["error"]);
  });

  it("stamps child lines and follows the parent's level", () => {
    const { log, lines } = capture("info");
    const child = log.child({ component: "importer" });

    child.info("Created", { handle: "x" });
    log.setLevel("error");
    child.info("hidden");

    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0].line)).toMatchObject({
      message: "Created",
      component: "importer",
      handle: "x",
    });
  });

  it("prints level and message in pretty format", () => {
    const lines: string[] = [];
    const log = new Logger({ level: "info", format: "pretty", sink: (_level, line) => lines.push(line) });
    log.info("Ready");
    expect(lines[0]).toContain("[INFO]");
    expect(lines[0].endsWith(" Ready")).toBe(true);
  });
});

describe("ValidationError", () => {
  it("carries details", () => {
    const error = new ValidationError("Invalid", ["price: required"]);
    expect(error.name).toBe("ValidationError");
    expect(error.details).toEqual(["price: required"]);
  });
});
