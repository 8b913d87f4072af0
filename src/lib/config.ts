export const config = {
  dbPath: process.env.DB_PATH || "data/megane-vehicles.db",
  scrapeDelayMs: parseInt(process.env.SCRAPE_DELAY_MS || "500", 10),
  requestTimeoutMs: parseInt(process.env.REQUEST_TIMEOUT_MS || "15000", 10),
  maxPages: parseInt(process.env.MAX_PAGES || "20", 10),
  baseUrl: process.env.BASE_URL || "https://fr.renew.auto",
  searchUrl:
    process.env.SEARCH_URL ||
    "https://fr.renew.auto/achat-vehicules-occasions.html" +
      "?prices.customerDisplayPrice=19000-25000" +
      "&query=renault%20megane%20e-tech%20electrique" +
      "&finishing.label.raw=Iconic",
  trimLabel: process.env.TRIM_LABEL || "Iconic",
  chargeLabel: process.env.CHARGE_LABEL || "Optimum Charge",
  debugDumpPath: process.env.DEBUG_DUMP_PATH || "debug_fail_page.html",
  reportOutputFile: process.env.REPORT_OUTPUT_FILE || "vehicle_report.html",
  csvOutputFile: process.env.CSV_OUTPUT_FILE || "",
  userAgents: [
    "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36",
    "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36",
    "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/17.2 Safari/605.1.15",
  ],
  getRandomUserAgent(): string {
    return this.userAgents[Math.floor(Math.random() * this.userAgents.length)];
  },
};
