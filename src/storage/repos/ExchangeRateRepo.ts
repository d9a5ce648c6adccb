import { randomUUID } from "node:crypto";
import { and, asc, eq, or } from "drizzle-orm";
import type { Db } from "../db.js";
import { exchangeRates } from "../schema.js";
import type { ExchangeRate } from "../../types/index.js";

export class ExchangeRateRepo {
  private db: Db;

  constructor(db: Db) {
    this.db = db;
  }

  /**
   * Insert a rate, replacing any rate already stored for the same pair and date
   */
  async upsert(rate: ExchangeRate): Promise<ExchangeRate> {
    this.db.transaction((tx) => {
      const existing = tx
        .select({ id: exchangeRates.id })
        .from(exchangeRates)
        .where(
          and(
            eq(exchangeRates.fromCurrency, rate.from),
            eq(exchangeRates.toCurrency, rate.to),
            eq(exchangeRates.effectiveDate, rate.effectiveDate)
          )
        )
        .get();

      if (existing) {
        tx.update(exchangeRates)
          .set({ rate: rate.rate })
          .where(eq(exchangeRates.id, existing.id))
          .run();
        return;
      }

      tx.insert(exchangeRates)
        .values({
          id: randomUUID(),
          fromCurrency: rate.from,
          toCurrency: rate.to,
          rate: rate.rate,
          effectiveDate: rate.effectiveDate,
        })
        .run();
    });

    return rate;
  }

  /**
   * All rates converting into or out of the given currency
   */
  async findForCurrency(currency: string): Promise<ExchangeRate[]> {
    const rows = await this.db
      .select()
      .from(exchangeRates)
      .where(or(eq(exchangeRates.fromCurrency, currency), eq(exchangeRates.toCurrency, currency)))
      .orderBy(asc(exchangeRates.effectiveDate));

    return rows.map((row) => ({
      from: row.fromCurrency,
      to: row.toCurrency,
      rate: row.rate,
      effectiveDate: row.effectiveDate,
    }));
  }
}
