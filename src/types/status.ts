import type { RegionMap } from "@/types/airport";

export const AIRPORT_STATUSES = ["OK", "IMPACT", "CLOSED"] as const;
export type AirportStatus = (typeof AIRPORT_STATUSES)[number];

export const FLIGHT_CATEGORIES = ["VFR", "MVFR", "IFR", "LIFR", "UNK"] as const;
export type FlightCategory = (typeof FLIGHT_CATEGORIES)[number];

/**
 * Which input last decided an airport's status.
 * - faa: FAA NAS Status closure/impact events
 * - metar: degraded flight category from the latest observation
 * - default: nothing reported, status is OK
 * - manual: hand-edited in status.json, never overwritten except by FAA events
 */
export const STATUS_SOURCES = ["faa", "metar", "default", "manual"] as const;
export type StatusSource = (typeof STATUS_SOURCES)[number];

export interface StatusEvent {
  type: string;
  reason: string;
}

/**
 * Per-airport entry of the `airports` map in status.json.
 * Field names are the dashboard contract and stay snake_case.
 */
export interface AirportStatusRecord {
  icao: string;
  status: AirportStatus;
  /** Mirrors status === "CLOSED" for older dashboard revisions */
  closed: boolean;
  flight_category: FlightCategory;
  flight_category_reason: string;
  closure_reason: string;
  impact_reason: string;
  metar_raw: string;
  metar_time_utc: string;
  events: StatusEvent[];
  status_source: StatusSource;
  /** Fields added by hand or by older tooling are carried forward */
  [extra: string]: unknown;
}

export interface StatusSnapshot {
  generated_utc: string;
  source: string;
  regions: RegionMap;
  airports: Record<string, AirportStatusRecord>;
}
