import path from "path";
import { config } from "../lib/config";
import { openDatabase, SqliteVehicleStore } from "../lib/db";
import { runCrawl } from "../lib/pipeline";
import { writeReport } from "../lib/report";
import { writeCsv } from "../lib/csv";
import { Statistics } from "../lib/types";

interface CliArgs {
  dbPath: string;
  reportPath: string;
  csvPath: string | null;
  statsOnly: boolean;
  noDb: boolean;
}

function parseArgs(args: string[]): CliArgs {
  const parsed: CliArgs = {
    dbPath: config.dbPath,
    reportPath: config.reportOutputFile,
    csvPath: config.csvOutputFile || null,
    statsOnly: false,
    noDb: false,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === "--db" && args[i + 1]) {
      parsed.dbPath = args[++i];
    } else if (arg === "--report" && args[i + 1]) {
      parsed.reportPath = args[++i];
    } else if (arg === "--csv") {
      const next = args[i + 1];
      parsed.csvPath = next && !next.startsWith("--") ? args[++i] : "megane_listings.csv";
    } else if (arg === "--stats") {
      parsed.statsOnly = true;
    } else if (arg === "--no-db") {
      parsed.noDb = true;
    } else if (arg === "--help" || arg === "-h") {
      console.log("Usage: scrape [--db <path>] [--report <path>] [--csv [path]] [--stats] [--no-db]");
      process.exit(0);
    } else {
      console.error(`Unknown argument: ${arg}`);
      process.exit(1);
    }
  }

  return parsed;
}

function printStats(stats: Statistics): void {
  console.log(`\n=== Statistics ===`);
  console.log(`Total vehicles: ${stats.totalVehicles}`);
  console.log(`Available now:  ${stats.availableVehicles}`);
  console.log(`Sold:           ${stats.soldVehicles}`);
  console.log(`New (24h):      ${stats.newVehicles24h}`);
  console.log(`Price tracked:  ${stats.vehiclesWithPriceHistory}`);
}

async function main() {
  const args = parseArgs(process.argv.slice(2));
  const dbPath = args.noDb ? ":memory:" : path.resolve(process.cwd(), args.dbPath);
  const db = openDatabase(dbPath);
  const store = new SqliteVehicleStore(db);

  try {
    if (args.statsOnly) {
      printStats(store.getStatistics());
      return;
    }

    console.log(`Database: ${args.noDb ? "disabled (in-memory)" : dbPath}`);
    const summary = await runCrawl({ store });

    if (args.csvPath && summary.vehicles.length > 0) {
      writeCsv(args.csvPath, summary.vehicles);
    }

    if (!args.noDb) {
      writeReport(args.reportPath, {
        vehicles: store.getAllVehicles(),
        histories: store.getAllPriceHistories(),
        stats: store.getStatistics(),
      });
      printStats(store.getStatistics());
    }

    if (summary.vehicles.length === 0) {
      console.log("\nNo vehicles matched all criteria in this scrape.");
    }
  } finally {
    db.close();
  }
}

main()
  .then(() => process.exit(0))
  .catch((err) => {
    console.error("Fatal error:", err);
    process.exit(1);
  });
