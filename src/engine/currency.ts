import { readFileSync } from "node:fs";
import { z } from "zod";
import { ValidationError } from "./errors.js";
import type { ExchangeRate, ExchangeRateLookup } from "../types/index.js";

const currencyTableSchema = z.array(
  z.object({
    code: z.string().regex(/^[A-Z]{3}$/),
    minorUnits: z.number().int().min(0),
  })
);

const currencyTable = currencyTableSchema.parse(
  JSON.parse(readFileSync(new URL("../../data/currencies.json", import.meta.url), "utf8"))
);

const minorUnitsByCode = new Map(currencyTable.map((c) => [c.code, c.minorUnits]));

export function isSupportedCurrency(code: string): boolean {
  return minorUnitsByCode.has(code.trim().toUpperCase());
}

/**
 * Trim and upper-case a currency code
 * @throws ValidationError if the code is not a supported ISO 4217 currency
 */
export function normalizeCurrency(code: string): string {
  const normalized = code.trim().toUpperCase();
  if (!minorUnitsByCode.has(normalized)) {
    throw new ValidationError(`Unsupported currency: ${code}`, "invalid_currency");
  }
  return normalized;
}

/**
 * Number of decimal digits in the currency's minor unit (2 for USD, 0 for VND)
 */
export function minorUnits(code: string): number {
  return minorUnitsByCode.get(normalizeCurrency(code)) ?? 2;
}

/**
 * Multiplier that turns a minor-unit amount in `from` into a minor-unit amount in `to`
 */
export function conversionFactor(from: string, to: string, rate: number): number {
  const shift = minorUnits(to) - minorUnits(from);
  // 10 ** -n is not exact in binary floating point
  return shift >= 0 ? rate * 10 ** shift : rate / 10 ** -shift;
}

export function convertAmount(
  amount: number,
  from: string,
  to: string,
  rate: number
): number {
  return Math.round(amount * conversionFactor(from, to, rate));
}

/**
 * Build a rate lookup over stored exchange rates.
 * Picks the most recent rate effective on or before the transaction date,
 * falling back to the inverse of the reverse pair.
 */
export function createRateLookup(rates: ExchangeRate[]): ExchangeRateLookup {
  const byPair = new Map<string, ExchangeRate[]>();

  for (const rate of rates) {
    const key = `${rate.from}>${rate.to}`;
    const list = byPair.get(key) ?? [];
    list.push(rate);
    byPair.set(key, list);
  }

  // Newest first
  for (const list of byPair.values()) {
    list.sort((a, b) => b.effectiveDate.getTime() - a.effectiveDate.getTime());
  }

  const find = (from: string, to: string, date: Date): number | undefined =>
    byPair
      .get(`${from}>${to}`)
      ?.find((r) => r.effectiveDate.getTime() <= date.getTime())?.rate;

  return (from, to, date) => {
    if (from === to) {
      return 1;
    }

    const direct = find(from, to, date);
    if (direct !== undefined) {
      return direct;
    }

    const reverse = find(to, from, date);
    if (reverse !== undefined && reverse !== 0) {
      return 1 / reverse;
    }

    return undefined;
  };
}

/**
 * Render a minor-unit amount in major units, e.g. 1050 USD -> "10.50", 300000 VND -> "300000"
 */
export function formatAmount(amount: number, currency: string): string {
  const digits = minorUnits(currency);
  return (amount / 10 ** digits).toFixed(digits);
}
