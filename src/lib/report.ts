import { writeFileSync } from "fs";
import { formatDistance } from "date-fns";
import { PriceHistoryEntry, Statistics, VehicleRecord } from "./types";
import { config } from "./config";

export interface ReportInput {
  vehicles: VehicleRecord[];
  histories: Map<string, PriceHistoryEntry[]>;
  stats: Statistics;
  generatedAt?: Date;
}

const COLOR_SWATCHES: Record<string, string> = {
  blanc: "#f5f5f5",
  "blanc glacier": "#f5f5f5",
  "blanc nacré": "#fafafa",
  gris: "#808080",
  "gris schiste": "#5a5f63",
  "gris rafale": "#9ea3a8",
  "gris titanium": "#8a8d8f",
  bleu: "#1f4e8c",
  "bleu iron": "#3b4d61",
  "bleu nocturne": "#1c2a44",
  vert: "#3d6b4f",
  noir: "#111111",
  "noir étoilé": "#1a1a1a",
  rouge: "#b3202a",
  "rouge flamme": "#c8102e",
};

export function escapeHtml(raw: string): string {
  return raw
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

export function formatEuros(amount: number): string {
  const grouped = String(Math.round(amount)).replace(/\B(?=(\d{3})+(?!\d))/g, " ");
  return `${grouped}€`;
}

export function colorSwatch(color: string): string {
  return COLOR_SWATCHES[color.trim().toLowerCase()] ?? "#cccccc";
}

export function relativeTime(iso: string, now: Date): string {
  const date = new Date(iso);
  if (Number.isNaN(date.getTime())) return "unknown";
  return formatDistance(date, now, { addSuffix: true });
}

function priceDeltaBadge(vehicle: VehicleRecord): string {
  const diff = vehicle.price - vehicle.originalPrice;
  if (diff < 0) return ` <span class="badge badge-price-down">-${formatEuros(Math.abs(diff))}</span>`;
  if (diff > 0) return ` <span class="badge badge-price-up">+${formatEuros(diff)}</span>`;
  return "";
}

function renderHistory(history: PriceHistoryEntry[]): string {
  if (history.length <= 1) return "";
  const items = history.map((entry, i) => {
    const date = entry.scrapedAt.slice(0, 10);
    const prev = i > 0 ? history[i - 1].price : null;
    let arrow = "";
    if (prev !== null && entry.price < prev) arrow = " ↓";
    else if (prev !== null && entry.price > prev) arrow = " ↑";
    return `<div class="price-history-item">${escapeHtml(date)}: ${formatEuros(entry.price)}${arrow}</div>`;
  });
  return `<div class="price-history">${items.join("")}</div>`;
}

function renderLocation(vehicle: VehicleRecord): string {
  const label = escapeHtml(vehicle.location);
  if (vehicle.latitude === null || vehicle.longitude === null) return label;
  const href = `https://www.google.com/maps/search/?api=1&query=${vehicle.latitude},${vehicle.longitude}`;
  return `<a href="${escapeHtml(href)}" target="_blank" rel="noopener">${label}</a>`;
}

function renderRow(vehicle: VehicleRecord, history: PriceHistoryEntry[], now: Date): string {
  const url = escapeHtml(vehicle.url);
  const photo = vehicle.photoUrl
    ? `<a href="${url}" target="_blank" class="photo-link"><img src="${escapeHtml(vehicle.photoUrl)}" alt="${escapeHtml(vehicle.title)}" loading="lazy"></a>`
    : `<a href="${url}" target="_blank" class="photo-link"><div class="no-photo">No Photo</div></a>`;
  const newBadge = vehicle.isNew ? ' <span class="badge badge-new">NEW</span>' : "";
  const rowClass = [vehicle.isNew ? "new-vehicle" : "", vehicle.isAvailable ? "" : "unavailable"]
    .filter(Boolean)
    .join(" ");

  return `
      <tr${rowClass ? ` class="${rowClass}"` : ""}>
        <td class="photo-cell">${photo}${newBadge}</td>
        <td class="price-cell"><strong>${formatEuros(vehicle.price)}</strong>${priceDeltaBadge(vehicle)}${renderHistory(history)}</td>
        <td><a href="${url}" target="_blank">${escapeHtml(vehicle.title)}</a></td>
        <td><span class="color-badge" style="background-color: ${colorSwatch(vehicle.exteriorColor)};"></span>${escapeHtml(vehicle.exteriorColor)}</td>
        <td>${escapeHtml(vehicle.seatType)}</td>
        <td class="packs-cell">${escapeHtml(vehicle.packs)}</td>
        <td>${renderLocation(vehicle)}</td>
        <td><span class="relative-date">${relativeTime(vehicle.firstSeen, now)}</span><br><span class="absolute-date">${escapeHtml(vehicle.firstSeen.slice(0, 16).replace("T", " "))}</span></td>
        <td><span class="relative-date">${relativeTime(vehicle.lastSeen, now)}</span><br><span class="absolute-date">${escapeHtml(vehicle.lastSeen.slice(0, 16).replace("T", " "))}</span></td>
      </tr>`;
}

const STYLES = `
  body { font-family: -apple-system, BlinkMacSystemFont, "Segoe UI", Roboto, sans-serif; background: #f4f5f7; color: #222; margin: 0; }
  .container { max-width: 1400px; margin: 0 auto; padding: 24px; }
  .header h1 { margin: 0 0 4px; }
  .subtitle { color: #666; font-size: 14px; }
  .stats { display: flex; gap: 16px; margin: 24px 0; }
  .stat-box { background: #fff; border-radius: 8px; padding: 16px 24px; box-shadow: 0 1px 3px rgba(0,0,0,.1); }
  .stat-box .number { font-size: 28px; font-weight: 700; }
  .stat-box .label { color: #666; font-size: 13px; }
  table { width: 100%; border-collapse: collapse; background: #fff; }
  th, td { padding: 10px; border-bottom: 1px solid #eee; text-align: left; vertical-align: top; font-size: 14px; }
  th { background: #fafafa; }
  .photo-cell img { width: 160px; border-radius: 6px; }
  .no-photo { width: 160px; height: 100px; background: #eee; display: flex; align-items: center; justify-content: center; color: #999; }
  .badge { display: inline-block; padding: 2px 6px; border-radius: 4px; font-size: 12px; font-weight: 600; }
  .badge-new { background: #2e7d32; color: #fff; }
  .badge-price-down { background: #e8f5e9; color: #2e7d32; }
  .badge-price-up { background: #ffebee; color: #c62828; }
  .color-badge { display: inline-block; width: 12px; height: 12px; border-radius: 50%; border: 1px solid #999; margin-right: 6px; }
  .price-history { margin-top: 6px; font-size: 12px; color: #555; }
  .absolute-date { color: #999; font-size: 12px; }
  tr.new-vehicle { background: #f1f8e9; }
  tr.unavailable { opacity: .5; }
  .footer { margin-top: 24px; color: #999; font-size: 12px; }
`;

export function renderReport({ vehicles, histories, stats, generatedAt = new Date() }: ReportInput): string {
  const rows = vehicles.map((v) => renderRow(v, histories.get(v.url) ?? [], generatedAt)).join("");
  const generated = generatedAt.toISOString().slice(0, 16).replace("T", " ");

  return `<!DOCTYPE html>
<html lang="fr">
<head>
  <meta charset="utf-8">
  <meta name="viewport" content="width=device-width, initial-scale=1">
  <title>Mégane E-Tech listings</title>
  <style>${STYLES}</style>
</head>
<body>
  <div class="container">
    <div class="header">
      <h1>Renault Mégane E-Tech</h1>
      <div class="subtitle">${escapeHtml(config.trimLabel)} | ${escapeHtml(config.chargeLabel)}</div>
      <div class="subtitle">Generated: ${generated}</div>
    </div>
    <div class="stats">
      <div class="stat-box"><div class="number">${stats.totalVehicles}</div><div class="label">Total Vehicles</div></div>
      <div class="stat-box"><div class="number">${stats.availableVehicles}</div><div class="label">Available Now</div></div>
      <div class="stat-box"><div class="number">${stats.newVehicles24h}</div><div class="label">New (24h)</div></div>
      <div class="stat-box"><div class="number">${stats.vehiclesWithPriceHistory}</div><div class="label">Price Tracked</div></div>
    </div>
    <div class="table-container">
      <table>
        <thead>
          <tr>
            <th>Photo</th><th>Price</th><th>Title</th><th>Color</th><th>Seats</th>
            <th>Packs</th><th>Location</th><th>First Seen</th><th>Last Seen</th>
          </tr>
        </thead>
        <tbody>${rows}
        </tbody>
      </table>
    </div>
    <div class="footer">${vehicles.length} vehicles</div>
  </div>
</body>
</html>
`;
}

export function writeReport(outputPath: string, input: ReportInput): string {
  writeFileSync(outputPath, renderReport(input), "utf-8");
  console.log(`[report] Saved ${outputPath}`);
  return outputPath;
}
