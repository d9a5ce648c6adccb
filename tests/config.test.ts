import { describe, it, expect } from "vitest";
import { loadConfig } from "../src/config/index.js";

describe("loadConfig", () => {
  it("falls back to defaults", () => {
    expect(loadConfig({})).toEqual({
      port: 3000,
      databasePath: "./data/tabsplit.db",
      defaultCurrency: "VND",
    });
  });

  it("reads the environment", () => {
    const config = loadConfig({
      PORT: "8080",
      DATABASE_PATH: "/tmp/test.db",
      DEFAULT_CURRENCY: "eur",
    });

    expect(config).toEqual({ port: 8080, databasePath: "/tmp/test.db", defaultCurrency: "EUR" });
  });

  it("rejects bad values", () => {
    expect(() => loadConfig({ PORT: "abc" })).toThrow("Invalid PORT: abc");
    expect(() => loadConfig({ DEFAULT_CURRENCY: "XYZ" })).toThrow("Unsupported currency: XYZ");
  });
});
