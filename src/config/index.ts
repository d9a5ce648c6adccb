import { normalizeCurrency } from "../engine/currency.js";

export interface AppConfig {
  port: number;
  databasePath: string;
  defaultCurrency: string;
}

/**
 * Read configuration from the environment. Callers load `.env` first
 * (the API entry point imports "dotenv/config").
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const port = Number.parseInt(env.PORT || "3000", 10);
  if (Number.isNaN(port) || port < 0 || port > 65535) {
    throw new Error(`Invalid PORT: ${env.PORT}`);
  }

  return {
    port,
    databasePath: env.DATABASE_PATH || "./data/tabsplit.db",
    defaultCurrency: normalizeCurrency(env.DEFAULT_CURRENCY || "VND"),
  };
}
