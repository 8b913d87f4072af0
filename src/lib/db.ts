import Database from "better-sqlite3";
import fs from "fs";
import path from "path";
import { config } from "./config";
import {
  PriceHistoryEntry,
  SeatType,
  Statistics,
  UpsertResult,
  Vehicle,
  VehicleRecord,
  VehicleStore,
  VehicleWithHistory,
} from "./types";

const NEW_VEHICLE_WINDOW_MS = 24 * 60 * 60 * 1000;

let db: Database.Database | null = null;
let store: SqliteVehicleStore | null = null;

export function openDatabase(dbPath: string): Database.Database {
  if (dbPath !== ":memory:") {
    const dir = path.dirname(dbPath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
  }

  const database = new Database(dbPath);
  database.pragma("journal_mode = WAL");
  database.pragma("foreign_keys = ON");

  initSchema(database);
  return database;
}

export function getDb(): Database.Database {
  if (db) return db;
  const dbPath = path.resolve(process.cwd(), config.dbPath);
  db = openDatabase(dbPath);
  console.log(`[db] Opened ${dbPath}`);
  return db;
}

export function initSchema(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS vehicles (
      url            TEXT PRIMARY KEY,
      title          TEXT NOT NULL,
      current_price  INTEGER NOT NULL,
      original_price INTEGER,
      trim           TEXT,
      charge_type    TEXT,
      exterior_color TEXT,
      seat_type      TEXT,
      packs          TEXT,
      location       TEXT,
      first_seen     TEXT NOT NULL,
      last_seen      TEXT NOT NULL,
      is_available   INTEGER NOT NULL DEFAULT 1
    );

    CREATE TABLE IF NOT EXISTS price_history (
      id          INTEGER PRIMARY KEY AUTOINCREMENT,
      vehicle_url TEXT NOT NULL REFERENCES vehicles(url),
      price       INTEGER NOT NULL,
      scraped_at  TEXT NOT NULL
    );
    CREATE INDEX IF NOT EXISTS idx_price_history_url  ON price_history(vehicle_url);
    CREATE INDEX IF NOT EXISTS idx_price_history_date ON price_history(scraped_at);
  `);

  // Columns added after the first release
  const cols = db.pragma("table_info(vehicles)") as { name: string }[];
  const colNames = new Set(cols.map((c) => c.name));
  if (!colNames.has("photo_url")) db.exec("ALTER TABLE vehicles ADD COLUMN photo_url TEXT");
  if (!colNames.has("latitude")) db.exec("ALTER TABLE vehicles ADD COLUMN latitude REAL");
  if (!colNames.has("longitude")) db.exec("ALTER TABLE vehicles ADD COLUMN longitude REAL");
  if (!colNames.has("is_sold"))
    db.exec("ALTER TABLE vehicles ADD COLUMN is_sold INTEGER NOT NULL DEFAULT 0");
}

// ===== Row types =====

interface VehicleRow {
  url: string;
  title: string;
  current_price: number;
  original_price: number | null;
  trim: string | null;
  charge_type: string | null;
  exterior_color: string | null;
  seat_type: string | null;
  packs: string | null;
  location: string | null;
  photo_url: string | null;
  latitude: number | null;
  longitude: number | null;
  first_seen: string;
  last_seen: string;
  is_available: number;
  is_sold: number;
}

interface PriceHistoryRow {
  vehicle_url: string;
  price: number;
  scraped_at: string;
}

function toSeatType(raw: string | null): SeatType {
  switch (raw) {
    case SeatType.ALCANTARA:
      return SeatType.ALCANTARA;
    case SeatType.WHITE_LEATHER:
      return SeatType.WHITE_LEATHER;
    default:
      return SeatType.UNSURE;
  }
}

function mapRowToVehicleRecord(row: VehicleRow, now: Date): VehicleRecord {
  const isAvailable = row.is_available === 1;
  const age = now.getTime() - new Date(row.first_seen).getTime();
  return {
    url: row.url,
    title: row.title,
    price: row.current_price,
    originalPrice: row.original_price ?? row.current_price,
    trim: row.trim ?? "",
    chargeType: row.charge_type ?? "",
    exteriorColor: row.exterior_color ?? "",
    seatType: toSeatType(row.seat_type),
    packs: row.packs ?? "None",
    location: row.location ?? "",
    photoUrl: row.photo_url,
    latitude: row.latitude,
    longitude: row.longitude,
    firstSeen: row.first_seen,
    lastSeen: row.last_seen,
    isAvailable,
    isSold: row.is_sold === 1,
    isNew: isAvailable && age < NEW_VEHICLE_WINDOW_MS,
  };
}

function mapRowToHistory(row: PriceHistoryRow): PriceHistoryEntry {
  return { vehicleUrl: row.vehicle_url, price: row.price, scrapedAt: row.scraped_at };
}

// ===== Store =====

export class SqliteVehicleStore implements VehicleStore {
  constructor(private readonly db: Database.Database) {}

  /**
   * Insert or update one vehicle and append price history when the price
   * moved. Runs in a single transaction.
   */
  upsertVehicle(vehicle: Readonly<Vehicle>, now: Date = new Date()): UpsertResult {
    const timestamp = now.toISOString();

    const run = this.db.transaction((): UpsertResult => {
      const existing = this.db
        .prepare<[string], { current_price: number }>("SELECT current_price FROM vehicles WHERE url = ?")
        .get(vehicle.url);

      if (!existing) {
        this.db
          .prepare(`
            INSERT INTO vehicles (
              url, title, current_price, original_price, trim, charge_type,
              exterior_color, seat_type, packs, location, photo_url,
              latitude, longitude, first_seen, last_seen, is_available, is_sold
            ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, 1, 0)
          `)
          .run(
            vehicle.url, vehicle.title, vehicle.price, vehicle.price,
            vehicle.trim, vehicle.chargeType, vehicle.exteriorColor,
            vehicle.seatType, vehicle.packs, vehicle.location, vehicle.photoUrl,
            vehicle.latitude, vehicle.longitude, timestamp, timestamp
          );
        this.appendPrice(vehicle.url, vehicle.price, timestamp);
        console.log(`[db] New vehicle: ${vehicle.url}`);
        return { isNew: true, priceChanged: false };
      }

      const priceChanged = existing.current_price !== vehicle.price;
      if (priceChanged) {
        console.log(`[db] Price change ${existing.current_price}€ -> ${vehicle.price}€ for ${vehicle.url}`);
        this.appendPrice(vehicle.url, vehicle.price, timestamp);
      }

      this.db
        .prepare(`
          UPDATE vehicles SET
            title = ?, current_price = ?, trim = ?, charge_type = ?,
            exterior_color = ?, seat_type = ?, packs = ?, location = ?,
            photo_url = ?, latitude = ?, longitude = ?,
            last_seen = ?, is_available = 1
          WHERE url = ?
        `)
        .run(
          vehicle.title, vehicle.price, vehicle.trim, vehicle.chargeType,
          vehicle.exteriorColor, vehicle.seatType, vehicle.packs, vehicle.location,
          vehicle.photoUrl, vehicle.latitude, vehicle.longitude,
          timestamp, vehicle.url
        );

      return { isNew: false, priceChanged };
    });

    return run();
  }

  /**
   * Flag every available vehicle whose url was not observed this run.
   * An empty set flags all of them.
   */
  markUnavailable(observedUrls: Iterable<string>): number {
    const urls = [...new Set(observedUrls)];
    const result = this.db
      .prepare(`
        UPDATE vehicles SET is_available = 0
        WHERE is_available = 1
          AND url NOT IN (SELECT value FROM json_each(?))
      `)
      .run(JSON.stringify(urls));
    if (result.changes > 0) {
      console.log(`[db] Marked ${result.changes} vehicles unavailable`);
    }
    return result.changes;
  }

  setSold(url: string, sold: boolean): boolean {
    const result = this.db
      .prepare("UPDATE vehicles SET is_sold = ? WHERE url = ?")
      .run(sold ? 1 : 0, url);
    return result.changes > 0;
  }

  getVehicle(url: string, now: Date = new Date()): VehicleRecord | null {
    const row = this.db.prepare<[string], VehicleRow>("SELECT * FROM vehicles WHERE url = ?").get(url);
    return row ? mapRowToVehicleRecord(row, now) : null;
  }

  getAllVehicles(now: Date = new Date()): VehicleRecord[] {
    const rows = this.db
      .prepare<[], VehicleRow>("SELECT * FROM vehicles ORDER BY last_seen DESC, current_price ASC")
      .all();
    return rows.map((row) => mapRowToVehicleRecord(row, now));
  }

  getPriceHistory(url: string): PriceHistoryEntry[] {
    return this.db
      .prepare<[string], PriceHistoryRow>(
        "SELECT vehicle_url, price, scraped_at FROM price_history WHERE vehicle_url = ? ORDER BY scraped_at ASC, id ASC"
      )
      .all(url)
      .map(mapRowToHistory);
  }

  getAllPriceHistories(): Map<string, PriceHistoryEntry[]> {
    const rows = this.db
      .prepare<[], PriceHistoryRow>(
        "SELECT vehicle_url, price, scraped_at FROM price_history ORDER BY vehicle_url, scraped_at ASC, id ASC"
      )
      .all();

    const histories = new Map<string, PriceHistoryEntry[]>();
    for (const row of rows) {
      const entries = histories.get(row.vehicle_url) ?? [];
      entries.push(mapRowToHistory(row));
      histories.set(row.vehicle_url, entries);
    }
    return histories;
  }

  getVehiclesWithHistory(now: Date = new Date()): VehicleWithHistory[] {
    const histories = this.getAllPriceHistories();
    return this.getAllVehicles(now).map((v) => ({ ...v, priceHistory: histories.get(v.url) ?? [] }));
  }

  getStatistics(now: Date = new Date()): Statistics {
    const count = (sql: string, ...params: string[]): number =>
      this.db.prepare<string[], { c: number }>(sql).get(...params)?.c ?? 0;

    const cutoff = new Date(now.getTime() - NEW_VEHICLE_WINDOW_MS).toISOString();

    return {
      totalVehicles: count("SELECT COUNT(*) AS c FROM vehicles"),
      availableVehicles: count("SELECT COUNT(*) AS c FROM vehicles WHERE is_available = 1"),
      soldVehicles: count("SELECT COUNT(*) AS c FROM vehicles WHERE is_sold = 1"),
      newVehicles24h: count(
        "SELECT COUNT(*) AS c FROM vehicles WHERE first_seen > ? AND is_available = 1 AND is_sold = 0",
        cutoff
      ),
      vehiclesWithPriceHistory: count("SELECT COUNT(DISTINCT vehicle_url) AS c FROM price_history"),
    };
  }

  private appendPrice(url: string, price: number, scrapedAt: string): void {
    this.db
      .prepare("INSERT INTO price_history (vehicle_url, price, scraped_at) VALUES (?, ?, ?)")
      .run(url, price, scrapedAt);
  }
}

export function getStore(): SqliteVehicleStore {
  if (!store) store = new SqliteVehicleStore(getDb());
  return store;
}
