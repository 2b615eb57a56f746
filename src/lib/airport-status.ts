/**
 * Merge of the fresh registry and fresh remote data into the prior snapshot.
 *
 * Derived fields (flight category, METAR, FAA status) overwrite prior values
 * when this run produced them; everything else is carried forward. Which
 * input last set an airport's status is recorded in `status_source` so that
 * a derived status can be cleared later while a manual one is kept.
 */

import type { Airport, RegionMap } from "@/types/airport";
import { REGION_NAMES } from "@/types/airport";
import type {
  AirportStatus,
  AirportStatusRecord,
  FlightCategory,
  StatusEvent,
  StatusSnapshot,
  StatusSource,
} from "@/types/status";
import {
  classifyFlightCategory,
  isDegradedCategory,
  type FlightCategoryResult,
} from "@/lib/flight-category";
import { parseMetarTime } from "@/lib/metar";
import { summarizeAirportEvents, summarizeEvents, type NasEvent } from "@/lib/nas-status";
import { emptyRegions, listAirports } from "@/lib/registry";
import type { PriorSnapshot, PriorStatusRecord } from "@/lib/snapshot";

export const SNAPSHOT_SOURCE =
  "nasstatus.faa.gov/api/airport-status-information + aviationweather.gov METAR (raw, flight category computed)";

/** Fields written by this module; anything else on a prior record is an extra */
const RECORD_FIELDS = new Set([
  "icao",
  "status",
  "closed",
  "flight_category",
  "flight_category_reason",
  "closure_reason",
  "impact_reason",
  "metar_raw",
  "metar_time_utc",
  "events",
  "status_source",
]);

export interface StatusInputs {
  /** NAS events, or null when the feed could not be fetched or parsed */
  faaEvents: NasEvent[] | null;
  /** ICAO -> latest raw METAR for stations reported this run */
  observations: ReadonlyMap<string, string>;
  /** Derive IMPACT from MVFR/IFR/LIFR observations */
  weatherImpacts: boolean;
}

export interface MergeInput extends StatusInputs {
  regions: RegionMap;
  prior: PriorSnapshot;
  generatedUtc: string;
}

interface ResolvedStatus {
  status: AirportStatus;
  closure_reason: string;
  impact_reason: string;
  events: StatusEvent[];
  status_source: StatusSource;
}

const GENERIC_WEATHER_REASON = "Flight rules degraded";
const WEATHER_REASON = /^(MVFR|IFR|LIFR): /;

/** Whether a derived source could have written this status and these reasons */
function writtenBy(source: "faa" | "metar", prior: PriorStatusRecord): boolean {
  const status = prior.status ?? "OK";
  const closureReason = prior.closure_reason ?? "";
  const impactReason = prior.impact_reason ?? "";

  if (source === "metar") {
    if (status !== "IMPACT" || closureReason) return false;
    if (impactReason === GENERIC_WEATHER_REASON) return true;
    const match = WEATHER_REASON.exec(impactReason);
    if (!match) return false;
    return prior.flight_category === undefined || prior.flight_category === match[1];
  }

  if (prior.events && prior.events.length > 0) {
    const summary = summarizeEvents(prior.events);
    return (
      summary.status === status &&
      summary.closureReason === closureReason &&
      summary.impactReason === impactReason
    );
  }
  return status === "CLOSED" || (status === "IMPACT" && !closureReason);
}

/**
 * Where a prior status came from.
 *
 * A plain OK with no reasons is the default whatever the record says. A
 * record tagged `faa` or `metar` whose status or reasons that source would
 * not have written was edited by hand. Records without `status_source`
 * predate provenance tracking; a non-default status on one was set by hand.
 */
export function priorStatusSource(prior: PriorStatusRecord | undefined): StatusSource {
  if (!prior) return "default";
  if (prior.status_source === "manual") return "manual";

  const isPlainOk =
    (prior.status ?? "OK") === "OK" && !prior.closure_reason && !prior.impact_reason;
  if (isPlainOk) return "default";

  if (prior.status_source === "faa" || prior.status_source === "metar") {
    return writtenBy(prior.status_source, prior) ? prior.status_source : "manual";
  }
  return "manual";
}

function keepPrior(prior: PriorStatusRecord | undefined, source: StatusSource): ResolvedStatus {
  return {
    status: prior?.status ?? "OK",
    closure_reason: prior?.closure_reason ?? "",
    impact_reason: prior?.impact_reason ?? "",
    events: prior?.events ? prior.events.map(({ type, reason }) => ({ type, reason })) : [],
    status_source: source,
  };
}

/**
 * Decide status, reasons and events for one airport.
 *
 * Order: fresh FAA events, manual override, prior FAA status when the feed
 * is down, degraded weather, prior weather status when no observation
 * arrived, otherwise OK.
 */
export function resolveStatus(
  code: string,
  prior: PriorStatusRecord | undefined,
  faaEvents: NasEvent[] | null,
  weather: FlightCategoryResult | null,
  weatherImpacts: boolean
): ResolvedStatus {
  if (faaEvents) {
    const summary = summarizeAirportEvents(code, faaEvents);
    if (summary.status !== "OK") {
      return {
        status: summary.status,
        closure_reason: summary.status === "CLOSED" ? summary.closureReason : "",
        impact_reason: summary.impactReason,
        events: summary.events,
        status_source: "faa",
      };
    }
  }

  const source = priorStatusSource(prior);
  if (source === "manual") {
    return keepPrior(prior, "manual");
  }
  if (source === "faa" && !faaEvents) {
    return keepPrior(prior, "faa");
  }

  if (weatherImpacts && weather && isDegradedCategory(weather.category)) {
    const reason = weather.reason
      ? `${weather.category}: ${weather.reason}`
      : GENERIC_WEATHER_REASON;
    return {
      status: "IMPACT",
      closure_reason: "",
      impact_reason: reason,
      events: [{ type: "Weather", reason }],
      status_source: "metar",
    };
  }
  if (source === "metar" && !weather) {
    return keepPrior(prior, "metar");
  }

  return {
    status: "OK",
    closure_reason: "",
    impact_reason: "",
    events: [],
    status_source: "default",
  };
}

function normalizeCategory(value: FlightCategory | undefined): FlightCategory {
  return value ?? "UNK";
}

/**
 * Build the status record of one airport.
 * Known fields come first in a fixed order, then prior extras as found.
 */
export function buildStatusRecord(
  airport: Airport,
  prior: PriorStatusRecord | undefined,
  inputs: StatusInputs
): AirportStatusRecord {
  const observation = inputs.observations.get(airport.icao);
  const weather = observation ? classifyFlightCategory(observation) : null;
  const resolved = resolveStatus(
    airport.code,
    prior,
    inputs.faaEvents,
    weather,
    inputs.weatherImpacts
  );

  const record: AirportStatusRecord = {
    icao: airport.icao,
    status: resolved.status,
    closed: resolved.status === "CLOSED",
    flight_category: weather ? weather.category : normalizeCategory(prior?.flight_category),
    flight_category_reason: weather ? weather.reason : (prior?.flight_category_reason ?? ""),
    closure_reason: resolved.closure_reason,
    impact_reason: resolved.impact_reason,
    metar_raw: observation ?? prior?.metar_raw ?? "",
    metar_time_utc: observation ? parseMetarTime(observation) : (prior?.metar_time_utc ?? ""),
    events: resolved.events,
    status_source: resolved.status_source,
  };

  if (prior) {
    for (const [key, value] of Object.entries(prior)) {
      if (!RECORD_FIELDS.has(key) && value !== undefined) {
        record[key] = value;
      }
    }
  }

  return record;
}

/**
 * Produce the new snapshot.
 *
 * Every registry airport appears in both maps; airports that left the
 * registry are dropped. Airports are keyed by code in sorted order so
 * unchanged inputs serialize identically.
 */
export function mergeSnapshot(input: MergeInput): StatusSnapshot {
  const regions = emptyRegions();
  for (const name of REGION_NAMES) {
    regions[name] = [...input.regions[name]]
      .sort((a, b) => a.code.localeCompare(b.code))
      .map(({ code, icao, name: airportName, lat, lon }) => ({
        code,
        icao,
        name: airportName,
        lat,
        lon,
      }));
  }

  const airports: Record<string, AirportStatusRecord> = {};
  const ordered = [...listAirports(regions)].sort((a, b) => a.code.localeCompare(b.code));
  for (const airport of ordered) {
    if (airports[airport.code]) continue;
    airports[airport.code] = buildStatusRecord(airport, input.prior.airports[airport.code], input);
  }

  return {
    generated_utc: input.generatedUtc,
    source: SNAPSHOT_SOURCE,
    regions,
    airports,
  };
}

export interface SnapshotSummary {
  airports: number;
  closed: number;
  impacted: number;
  categories: Record<FlightCategory, number>;
}

export function summarizeSnapshot(snapshot: StatusSnapshot): SnapshotSummary {
  const summary: SnapshotSummary = {
    airports: 0,
    closed: 0,
    impacted: 0,
    categories: { VFR: 0, MVFR: 0, IFR: 0, LIFR: 0, UNK: 0 },
  };

  for (const record of Object.values(snapshot.airports)) {
    summary.airports++;
    if (record.status === "CLOSED") summary.closed++;
    if (record.status === "IMPACT") summary.impacted++;
    summary.categories[record.flight_category]++;
  }

  return summary;
}

/** "2026-01-27T05:12:34Z" (second precision, no milliseconds) */
export function formatGeneratedUtc(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, "Z");
}
