// ===== Enums =====

export enum SeatType {
  ALCANTARA = "alcantara",
  WHITE_LEATHER = "cuir blanc",
  UNSURE = "unsure",
}

export enum StopReason {
  FETCH_FAILED = "fetch-failed",
  END_OF_RESULTS = "end-of-results",
  ANOMALY = "anomaly",
  MAX_PAGES = "max-pages",
}

// ===== Vehicle (extraction output, one per matching listing) =====

export interface Vehicle {
  title: string;
  price: number; // whole euros
  trim: string;
  chargeType: string;
  exteriorColor: string;
  seatType: SeatType;
  packs: string; // "Pack Hiver, Pack Vision" or "None"
  location: string;
  url: string;
  photoUrl: string | null;
  latitude: number | null;
  longitude: number | null;
}

// ===== Persisted record =====

export interface VehicleRecord extends Vehicle {
  originalPrice: number;
  firstSeen: string;
  lastSeen: string;
  isAvailable: boolean;
  isSold: boolean;
  isNew: boolean; // derived: first seen < 24h ago and still available
}

export interface PriceHistoryEntry {
  vehicleUrl: string;
  price: number;
  scrapedAt: string;
}

export interface VehicleWithHistory extends VehicleRecord {
  priceHistory: PriceHistoryEntry[];
}

export interface Statistics {
  totalVehicles: number;
  availableVehicles: number;
  soldVehicles: number;
  newVehicles24h: number;
  vehiclesWithPriceHistory: number;
}

export interface UpsertResult {
  isNew: boolean;
  priceChanged: boolean;
}

// ===== Store =====

export interface VehicleStore {
  upsertVehicle(vehicle: Readonly<Vehicle>, now?: Date): UpsertResult;
  markUnavailable(observedUrls: Iterable<string>): number;
}

// ===== Crawl =====

export interface CrawlProgress {
  pagesProcessed: number;
  adsProcessed: number;
  adsAdded: number;
}

export type ProgressSink = (progress: Readonly<CrawlProgress>) => void;

export interface CrawlSummary {
  vehicles: Readonly<Vehicle>[];
  progress: CrawlProgress;
  stopReason: StopReason;
  markedUnavailable: number;
}

export interface CrawlStatus extends CrawlProgress {
  isRunning: boolean;
  statusMessage: string;
  lastRun: string | null;
  error: string | null;
}
