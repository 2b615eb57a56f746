/**
 * Airport registry structures matching the `regions` section of status.json
 */

export const REGION_NAMES = ["Western", "Central", "Eastern"] as const;

export type RegionName = (typeof REGION_NAMES)[number];

export interface Airport {
  /** 3-letter display code, unique across the registry (e.g., "MDT") */
  code: string;
  /** 4-letter METAR station id (e.g., "KMDT") */
  icao: string;
  /** Display name (e.g., "Harrisburg Intl") */
  name: string;
  lat: number;
  lon: number;
}

/** Region name → airports sorted by code */
export type RegionMap = Record<RegionName, Airport[]>;

/** Longitude cut-offs used to split the state into regions */
export interface RegionBands {
  /** Stations at or west of this longitude are Western */
  westMaxLon: number;
  /** Stations at or west of this longitude (and east of westMaxLon) are Central */
  centralMaxLon: number;
}

export function isRegionName(value: string): value is RegionName {
  return REGION_NAMES.some((name) => name === value);
}
