import { describe, it, expect } from "vitest";
import { displayPrice, formatPrice, isCurrency, parseAmount } from "../src/product/price.js";

describe("formatPrice", () => {
  it.each([
    ["¥128,000", "128000"],
    ["128000.00", "128000"],
    [128000.9, "128000"],
    [" 99 800 ", "99800"],
  ])("emits JPY %s without a decimal component", (input, expected) => {
    expect(formatPrice(input, "JPY")).toEqual({ ok: true, data: expected });
  });

  it("defaults to JPY", () => {
    expect(formatPrice("1500.5")).toEqual({ ok: true, data: "1500" });
  });

  it("emits two decimals for other currencies", () => {
    expect(formatPrice(12.5, "USD")).toEqual({ ok: true, data: "12.50" });
    expect(formatPrice("C$99", "CAD")).toEqual({ ok: true, data: "99.00" });
    expect(formatPrice("€1,299.999", "EUR")).toEqual({ ok: true, data: "1300.00" });
  });

  it("rejects negative, empty and non-numeric prices", () => {
    const negative = formatPrice(-1);
    const empty = formatPrice("  ");
    const text = formatPrice("abc");

    expect(negative.ok || negative.error.message).toBe("Price cannot be negative");
    expect(empty.ok || empty.error.message).toBe("Price is empty");
    expect(text.ok || text.error.message).toBe("Price is not a number: abc");
  });
});

describe("parseAmount", () => {
  it("strips currency symbols and grouping", () => {
    expect(parseAmount("$1,234.56")).toEqual({ ok: true, data: 1234.56 });
    expect(parseAmount("-500")).toEqual({
      ok: false,
      error: expect.objectContaining({ message: "Price cannot be negative" }),
    });
  });

  it.each(["¥", ",", "1e3", "0x1F", "12.", ".5", "1.2.3", "Infinity"])(
    "rejects %s",
    (input) => {
      const result = parseAmount(input);
      expect(result.ok || result.error.message).toBe(`Price is not a number: ${input}`);
    }
  );
});

describe("displayPrice", () => {
  it("formats for the terminal", () => {
    expect(displayPrice(128000)).toBe("¥128,000");
    expect(displayPrice(1234.5, "USD")).toBe("$1,234.50");
  });
});

describe("isCurrency", () => {
  it("accepts supported codes only", () => {
    expect(isCurrency("GBP")).toBe(true);
    expect(isCurrency("jpy")).toBe(false);
  });
});
