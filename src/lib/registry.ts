/**
 * Airport registry: the canonical airport list grouped into regions.
 *
 * Built either from the station metadata feed or from the curated list in
 * the airports config. Regions are assigned once from longitude bands.
 */

import type { Airport, RegionBands, RegionMap, RegionName } from "@/types/airport";
import { REGION_NAMES } from "@/types/airport";
import type { ConfiguredAirport } from "@/lib/config";
import {
  codeFromStationId,
  icaoFromStationId,
  parseCoordinate,
  type StationRow,
} from "@/lib/stations";

export const DEFAULT_REGION_BANDS: RegionBands = {
  westMaxLon: -78.5,
  centralMaxLon: -76.5,
};

export interface RegistryOptions {
  /** Two-letter state filter for the station feed (e.g., "PA") */
  state: string;
  regionBands: RegionBands;
}

export function emptyRegions(): RegionMap {
  return { Western: [], Central: [], Eastern: [] };
}

export function regionFromLon(lon: number, bands: RegionBands = DEFAULT_REGION_BANDS): RegionName {
  if (lon <= bands.westMaxLon) return "Western";
  if (lon <= bands.centralMaxLon) return "Central";
  return "Eastern";
}

/**
 * Accumulates airports into regions, keeping the first airport seen per code.
 */
class RegistryBuilder {
  private readonly regions = emptyRegions();
  private readonly seen = new Set<string>();

  add(airport: Airport, region: RegionName): boolean {
    if (this.seen.has(airport.code)) return false;
    this.seen.add(airport.code);
    this.regions[region].push(airport);
    return true;
  }

  build(): RegionMap {
    const result = emptyRegions();
    for (const name of REGION_NAMES) {
      result[name] = [...this.regions[name]].sort((a, b) => a.code.localeCompare(b.code));
    }
    return result;
  }
}

/**
 * Build the registry from station feed rows.
 *
 * Keeps rows in the configured state whose station id is 3 or 4 characters
 * and that carry numeric coordinates. Duplicate codes (e.g., "KABE" and
 * "ABE") keep the first row.
 */
export function buildRegistryFromStations(rows: StationRow[], options: RegistryOptions): RegionMap {
  const builder = new RegistryBuilder();
  const state = options.state.trim().toUpperCase();

  for (const row of rows) {
    if ((row.state ?? "").trim().toUpperCase() !== state) continue;

    const stationId = (row.station_id ?? "").trim().toUpperCase();
    if (stationId.length !== 3 && stationId.length !== 4) continue;

    const lat = parseCoordinate(row.latitude);
    const lon = parseCoordinate(row.longitude);
    if (lat === null || lon === null) continue;

    const airport: Airport = {
      code: codeFromStationId(stationId),
      icao: icaoFromStationId(stationId),
      name: (row.station_name ?? "").trim() || stationId,
      lat,
      lon,
    };
    builder.add(airport, regionFromLon(lon, options.regionBands));
  }

  return builder.build();
}

/**
 * Build the registry from the curated airport list.
 * An entry may pin its METAR station (ABP reports as KPNE) and its region.
 */
export function buildRegistryFromConfig(
  airports: ConfiguredAirport[],
  options: Pick<RegistryOptions, "regionBands">
): RegionMap {
  const builder = new RegistryBuilder();

  for (const entry of airports) {
    const code = codeFromStationId(entry.code);
    const airport: Airport = {
      code,
      icao: entry.icao ? entry.icao.trim().toUpperCase() : icaoFromStationId(code),
      name: entry.name.trim() || code,
      lat: entry.lat,
      lon: entry.lon,
    };
    builder.add(airport, entry.region ?? regionFromLon(entry.lon, options.regionBands));
  }

  return builder.build();
}

/** All airports in region order (Western, Central, Eastern), then by code */
export function listAirports(regions: RegionMap): Airport[] {
  return REGION_NAMES.flatMap((name) => regions[name]);
}

export function countAirports(regions: RegionMap): number {
  return listAirports(regions).length;
}

/** Sorted, unique 4-character METAR station ids */
export function metarStationIds(regions: RegionMap): string[] {
  const ids = new Set(
    listAirports(regions)
      .map((airport) => airport.icao)
      .filter((icao) => icao.length === 4)
  );
  return [...ids].sort();
}
