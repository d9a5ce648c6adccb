import "dotenv/config";
import { loadConfig } from "../config/index.js";
import { createDatabase } from "../storage/index.js";
import { createServices } from "../services/index.js";
import { createApp } from "./app.js";

const config = loadConfig();
const db = createDatabase(config.databasePath);

const services = createServices(db, {
  defaultCurrency: config.defaultCurrency,
  onResult: (result) => {
    console.log(
      `[feed] Group ${result.groupId}: ${result.plan.length} suggested payment(s)` +
        (result.report.hasMixedCurrencyWarning ? " (mixed currencies)" : "")
    );
  },
});

const app = createApp(services);

process.on("unhandledRejection", (reason) => {
  console.error("Unhandled rejection:", reason);
});

app.listen(config.port, () => {
  console.log(`🌐 tabsplit API running on http://localhost:${config.port}`);
  console.log(`💾 Database: ${config.databasePath} (default currency ${config.defaultCurrency})`);
});
