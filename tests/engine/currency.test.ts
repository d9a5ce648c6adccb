import { describe, it, expect } from "vitest";
import {
  ValidationError,
  convertAmount,
  createRateLookup,
  formatAmount,
  isSupportedCurrency,
  minorUnits,
  normalizeCurrency,
} from "../../src/engine/index.js";
import type { ExchangeRate } from "../../src/types/index.js";

describe("currency codes", () => {
  it("normalizes case and whitespace", () => {
    expect(normalizeCurrency(" usd ")).toBe("USD");
    expect(isSupportedCurrency("vnd")).toBe(true);
  });

  it("rejects unknown codes", () => {
    expect(isSupportedCurrency("XYZ")).toBe(false);
    expect(() => normalizeCurrency("xyz")).toThrow(ValidationError);
    expect(() => normalizeCurrency("xyz")).toThrow("Unsupported currency: xyz");
  });

  it("knows minor units", () => {
    expect(minorUnits("USD")).toBe(2);
    expect(minorUnits("VND")).toBe(0);
    expect(minorUnits("jpy")).toBe(0);
  });
});

describe("convertAmount", () => {
  it("accounts for different minor units", () => {
    // $10.00 -> 250000 VND
    expect(convertAmount(1000, "USD", "VND", 25000)).toBe(250000);
    // 10.00 EUR -> 1600 JPY
    expect(convertAmount(1000, "EUR", "JPY", 160)).toBe(1600);
    expect(convertAmount(250000, "VND", "USD", 0.00004)).toBe(1000);
  });

  it("rounds to the nearest minor unit", () => {
    expect(convertAmount(1001, "USD", "EUR", 0.5)).toBe(501);
    expect(convertAmount(999, "USD", "EUR", 0.5)).toBe(500);
  });
});

describe("formatAmount", () => {
  it("renders major units", () => {
    expect(formatAmount(1050, "USD")).toBe("10.50");
    expect(formatAmount(300000, "VND")).toBe("300000");
    expect(formatAmount(-250, "EUR")).toBe("-2.50");
  });
});

describe("createRateLookup", () => {
  const rates: ExchangeRate[] = [
    { from: "USD", to: "VND", rate: 24000, effectiveDate: new Date("2026-01-01T00:00:00Z") },
    { from: "USD", to: "VND", rate: 25000, effectiveDate: new Date("2026-02-01T00:00:00Z") },
  ];
  const lookup = createRateLookup(rates);

  it("uses the latest rate effective on the transaction date", () => {
    expect(lookup("USD", "VND", new Date("2026-01-15T00:00:00Z"))).toBe(24000);
    expect(lookup("USD", "VND", new Date("2026-02-01T00:00:00Z"))).toBe(25000);
    expect(lookup("USD", "VND", new Date("2026-06-01T00:00:00Z"))).toBe(25000);
  });

  it("has no rate before the first effective date", () => {
    expect(lookup("USD", "VND", new Date("2025-12-31T00:00:00Z"))).toBeUndefined();
  });

  it("falls back to the inverse of the reverse pair", () => {
    expect(lookup("VND", "USD", new Date("2026-03-01T00:00:00Z"))).toBeCloseTo(0.00004, 10);
  });

  it("returns 1 for the same currency and undefined for unknown pairs", () => {
    expect(lookup("EUR", "EUR", new Date())).toBe(1);
    expect(lookup("EUR", "GBP", new Date())).toBeUndefined();
  });
});
