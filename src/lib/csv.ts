import { writeFileSync } from "fs";
import Papa from "papaparse";
import { Vehicle } from "./types";

export function toCsv(vehicles: Readonly<Vehicle>[]): string {
  const rows = vehicles.map((v) => ({
    price: v.price,
    trim: v.trim,
    charge_type: v.chargeType,
    exterior_color: v.exteriorColor,
    seat_type: v.seatType,
    packs: v.packs,
    location: v.location,
    url: v.url,
    photo_url: v.photoUrl,
    latitude: v.latitude,
    longitude: v.longitude,
  }));
  return Papa.unparse(rows);
}

export function writeCsv(outputPath: string, vehicles: Readonly<Vehicle>[]): void {
  writeFileSync(outputPath, toCsv(vehicles), "utf-8");
  console.log(`[csv] Saved ${vehicles.length} vehicles to ${outputPath}`);
}
