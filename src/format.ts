// format.ts
//
// Human-readable renderings for --format human. JSON output bypasses this.

import type {
  Activity,
  Airline,
  AmadeusEnvelope,
  AmadeusSegment,
  CheckinLink,
  DelayPrediction,
  FlightDateResult,
  FlightOffersResponse,
  FlightPricingResponse,
  Location,
  PointOfInterest,
  RouteDestination,
  TransferOffer,
} from "./amadeus.ts";
import type { ComparisonEntry, ComparisonResult } from "./compare.ts";
import { parseIsoDate } from "./dates.ts";

const CURRENCY_SYMBOLS: Record<string, string> = { GBP: "£", EUR: "€", USD: "$" };

export function currencySymbol(currency: string): string {
  return CURRENCY_SYMBOLS[currency] ?? `${currency} `;
}

export function formatMoney(amount: number, currency: string): string {
  const n = amount.toLocaleString("en-US", { minimumFractionDigits: 2, maximumFractionDigits: 2 });
  return `${currencySymbol(currency)}${n}`;
}

export function stopsLabel(stops: number): string {
  return stops === 0 ? "Direct" : `${stops} stop${stops > 1 ? "s" : ""}`;
}

/** PT2H30M -> "2h 30m" */
export function formatDuration(iso: string): string {
  const m = /^PT(?:(\d+)H)?(?:(\d+)M)?$/.exec(iso);
  if (!m) return iso;
  return [m[1] ? `${m[1]}h` : "", m[2] ? `${m[2]}m` : ""].filter(Boolean).join(" ");
}

function formatTime(iso: string): string {
  return /T(\d{2}:\d{2})/.exec(iso)?.[1] ?? iso;
}

const WEEKDAYS = ["Sun", "Mon", "Tue", "Wed", "Thu", "Fri", "Sat"];
const MONTHS = ["Jan", "Feb", "Mar", "Apr", "May", "Jun", "Jul", "Aug", "Sep", "Oct", "Nov", "Dec"];

/** 2026-03-15 -> "Sun Mar 15" */
export function shortDate(iso: string): string {
  try {
    const d = parseIsoDate(iso);
    return `${WEEKDAYS[d.getUTCDay()]} ${MONTHS[d.getUTCMonth()]} ${String(d.getUTCDate()).padStart(2, "0")}`;
  } catch {
    return iso;
  }
}

function tripLabel(departureDate: string, returnDate?: string | null): string {
  if (!returnDate) return shortDate(departureDate);
  try {
    const days = Math.round((parseIsoDate(returnDate).getTime() - parseIsoDate(departureDate).getTime()) / 86_400_000);
    return `${shortDate(departureDate)} → ${shortDate(returnDate)} (${days}d)`;
  } catch {
    return `${departureDate} → ${returnDate}`;
  }
}

function chain(segments: AmadeusSegment[]): string {
  if (segments.length === 0) return "";
  const dep = segments.map((s) => s.departure.iataCode);
  const arr = segments[segments.length - 1].arrival.iataCode;
  return `${dep.join(" → ")} → ${arr}`;
}

export function formatComparison(result: ComparisonResult): string {
  const rows = result.comparison;
  if (!rows.length) return "No results to compare.";

  const currency = rows[0].currency;
  const lines = [`💰 Price comparison for ${result.origin} → ${result.destination}`, ""];
  for (const row of rows) lines.push(comparisonRow(row, currency));

  if (result.cheapest?.price != null) {
    const c = result.cheapest;
    lines.push("", `✅ Best deal: ${c.departureDate} at ${formatMoney(c.price ?? 0, c.currency)}`);
  }
  return lines.join("\n");
}

export function comparisonRow(row: ComparisonEntry, currency = row.currency): string {
  const dates = tripLabel(row.departureDate, row.returnDate);
  if (row.price === null) {
    return `  ${"N/A".padEnd(12)} ${dates.padEnd(30)} ${row.error ?? "No flights"}`;
  }
  const price = formatMoney(row.price, row.currency || currency);
  return `  ${price.padEnd(12)} ${dates.padEnd(30)} ${stopsLabel(row.stops ?? 0).padEnd(12)} ${row.carrier ?? ""}`.trimEnd();
}

export function formatOffers(res: FlightOffersResponse, limit = 15): string {
  const offers = res.data ?? [];
  if (!offers.length) return "No flights found.";
  const carriers = res.dictionaries?.carriers ?? {};

  const lines: string[] = [];
  for (const offer of offers.slice(0, limit)) {
    const symbol = currencySymbol(offer.price.currency);
    const total = offer.price.grandTotal ?? offer.price.total;
    const cabin = offer.travelerPricings?.[0]?.fareDetailsBySegment?.[0]?.cabin;

    offer.itineraries.forEach((it, i) => {
      const first = it.segments[0];
      const last = it.segments[it.segments.length - 1];
      if (!first || !last) return;

      const leg =
        `${first.departure.iataCode} ${formatTime(first.departure.at)} ${i === 0 ? "→" : "←"} ` +
        `${last.arrival.iataCode} ${formatTime(last.arrival.at)} (${formatDuration(it.duration)}) · ` +
        stopsLabel(it.segments.length - 1);

      if (i === 0) {
        lines.push(`✈️  ${carriers[first.carrierCode] ?? first.carrierCode} ${first.carrierCode}${first.number}`);
        lines.push(`    ${leg}`);
        lines.push(`    🛫 ${chain(it.segments)}`);
        lines.push(`    💰 ${symbol}${total}${cabin ? ` · ${titleCase(cabin)}` : ""}`);
      } else {
        lines.push(`    Return: ${leg}`);
      }
    });
    lines.push("");
  }
  if (offers.length > limit) lines.push(`... and ${offers.length - limit} more options`);
  return lines.join("\n");
}

export function formatPricing(res: FlightPricingResponse): string {
  const offers = res.data?.flightOffers ?? [];
  if (!offers.length) return "No pricing data returned.";

  const lines = ["✅ Price confirmed!", ""];
  for (const offer of offers) {
    const symbol = currencySymbol(offer.price.currency);
    lines.push(`💰 Total: ${symbol}${offer.price.grandTotal ?? offer.price.total}`);
    lines.push(`   Base fare: ${symbol}${offer.price.base ?? "?"}`);
    for (const fee of offer.price.fees ?? []) {
      if (Number(fee.amount) > 0) lines.push(`   ${fee.type}: ${symbol}${fee.amount}`);
    }
    lines.push("");
    if (offer.lastTicketingDate) lines.push(`⏰ Book by: ${offer.lastTicketingDate}`);
  }
  return lines.join("\n");
}

export function formatFlightDates(res: AmadeusEnvelope<FlightDateResult[]>, currency: string): string {
  const rows = res.data ?? [];
  if (!rows.length) return "No flight dates found. Try adjusting your search criteria.";

  const symbol = currencySymbol(currency);
  const lines = [`📅 ${rows.length} options from ${rows[0].origin}:`, ""];
  for (const r of rows) {
    lines.push(`💰 ${`${symbol}${r.price.total}`.padEnd(10)} ${r.origin} → ${r.destination}  ${tripLabel(r.departureDate, r.returnDate)}`);
  }
  return lines.join("\n");
}

export function formatLocations(res: AmadeusEnvelope<Location[]>): string {
  const locations = res.data ?? [];
  if (!locations.length) return "No airports/cities found.";

  const lines: string[] = [];
  for (const loc of locations.slice(0, 15)) {
    const name = titleCase(loc.name ?? "");
    const place = [loc.address?.cityName, loc.address?.countryName].filter(Boolean).join(", ");
    lines.push(`${loc.subType === "CITY" ? "🏙️" : "✈️"}  ${loc.iataCode ?? ""} — ${name}`);
    if (place && place.toLowerCase() !== name.toLowerCase()) lines.push(`    📍 ${place}`);
  }
  return lines.join("\n");
}

export function formatDestinations(res: AmadeusEnvelope<RouteDestination[]>, heading: string): string {
  const rows = res.data ?? [];
  if (!rows.length) return "No routes found.";
  return [`${heading} (${rows.length}):`, "", ...rows.map((d) => `   ${d.iataCode}${d.name ? ` - ${d.name}` : ""}`)].join(
    "\n",
  );
}

export function formatAirlines(res: AmadeusEnvelope<Airline[]>): string {
  const rows = res.data ?? [];
  if (!rows.length) return "No airlines found for those codes.";
  return rows
    .map((a) => {
      const codes = [a.iataCode, a.icaoCode].filter(Boolean).join("/");
      return `✈️  [${codes}] ${a.businessName || a.commonName || "Unknown"}`;
    })
    .join("\n");
}

export function formatCheckinLinks(res: AmadeusEnvelope<CheckinLink[]>): string {
  const rows = res.data ?? [];
  if (!rows.length) return "No check-in links found for that airline.";
  return rows
    .map((l) => {
      const icon = l.channel === "Web" ? "🖥️" : l.channel === "Mobile" ? "📱" : "🔗";
      return `${icon} [${l.id.split("-")[0]}] ${l.channel}: ${l.href}`;
    })
    .join("\n");
}

const DELAY_LABELS: Record<string, string> = {
  LESS_THAN_30_MINUTES: "On time (< 30 min)",
  BETWEEN_30_AND_60_MINUTES: "30-60 min delay",
  BETWEEN_60_AND_120_MINUTES: "60-120 min delay",
  OVER_120_MINUTES_OR_CANCELLED: "> 120 min / cancelled",
};

export function formatDelayPrediction(res: AmadeusEnvelope<DelayPrediction[]>): string {
  const rows = res.data ?? [];
  if (!rows.length) return "No delay prediction available for this flight.";

  const best = rows.reduce((a, b) => (Number(b.probability) > Number(a.probability) ? b : a));
  const lines = [`🛫 Delay prediction for ${best.id}`, "", `Most likely: ${DELAY_LABELS[best.result] ?? best.result}`, ""];
  for (const p of rows) {
    const pct = Number(p.probability) * 100;
    lines.push(`   ${pct.toFixed(1).padStart(5)}% ${"█".repeat(Math.floor(pct / 5))} ${DELAY_LABELS[p.result] ?? p.result}`);
  }
  return lines.join("\n");
}

export function formatActivities(res: AmadeusEnvelope<Activity[] | Activity>, limit = 20): string {
  const rows = Array.isArray(res.data) ? res.data : [res.data];
  if (!rows.length) return "No activities found in this area.";

  const lines = [`🎯 Found ${rows.length} activities:`, ""];
  for (const a of rows.slice(0, limit)) {
    const desc = a.shortDescription ?? "";
    lines.push(`🎫 ${a.name}${a.pictures?.length ? " 📷" : ""}`);
    if (a.price?.amount) lines.push(`   💰 From ${a.price.currencyCode ?? ""} ${a.price.amount}`);
    if (a.rating) lines.push(`   ⭐ ${a.rating}`);
    if (desc) lines.push(`   📝 ${desc.length > 100 ? `${desc.slice(0, 100)}...` : desc}`);
    lines.push(`   ID: ${a.id}`, "");
  }
  if (rows.length > limit) lines.push(`... and ${rows.length - limit} more activities`);
  return lines.join("\n");
}

const POI_ICONS: Record<string, string> = { SIGHTS: "🏛️", NIGHTLIFE: "🌙", RESTAURANT: "🍽️", SHOPPING: "🛍️" };

export function formatPointsOfInterest(res: AmadeusEnvelope<PointOfInterest[]>, limit = 25): string {
  const rows = res.data ?? [];
  if (!rows.length) return "No points of interest found.";

  const lines = [`📍 Found ${rows.length} points of interest:`, ""];
  for (const p of rows.slice(0, limit)) {
    lines.push(`${POI_ICONS[p.category ?? ""] ?? "📍"} ${p.name}`);
    if (p.tags?.length) lines.push(`   🏷️ ${p.tags.slice(0, 3).join(", ")}`);
    if (p.rank) lines.push(`   📊 Rank: ${p.rank}`);
  }
  if (rows.length > limit) lines.push(`... and ${rows.length - limit} more places`);
  return lines.join("\n");
}

const TRANSFER_ICONS: Record<string, string> = {
  PRIVATE: "🚘",
  SHARED: "🚐",
  TAXI: "🚕",
  HOURLY: "⏰",
  AIRPORT_EXPRESS: "🚄",
  AIRPORT_BUS: "🚌",
};

export function formatTransfers(res: AmadeusEnvelope<TransferOffer[]>): string {
  const rows = res.data ?? [];
  if (!rows.length) return "No transfer offers found.";

  const lines = [`🚗 Found ${rows.length} transfer options:`, ""];
  for (const t of rows) {
    const q = t.quotation ?? {};
    lines.push(`${TRANSFER_ICONS[t.transferType] ?? "🚗"} ${t.transferType} - ${t.vehicle?.description ?? "Vehicle"}`);
    lines.push(`   💰 ${q.currencyCode ?? ""} ${q.monetaryAmount ?? "N/A"}${q.isEstimated ? "~" : ""}`);
    lines.push(`   👥 ${t.vehicle?.seats?.[0]?.count ?? "?"} seats · ${t.serviceProvider?.name ?? "Unknown provider"}`);
    if (t.distance?.value) lines.push(`   📍 ${t.distance.value} ${t.distance.unit ?? ""}`.trimEnd());
    if (t.start?.dateTime) lines.push(`   🕐 ${t.start.dateTime.slice(0, 16).replace("T", " ")}`);
    lines.push(`   ID: ${t.id}`, "");
  }
  return lines.join("\n");
}

function titleCase(s: string): string {
  return s.toLowerCase().replace(/\b\w/g, (c) => c.toUpperCase());
}
