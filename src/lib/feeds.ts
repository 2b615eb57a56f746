/**
 * Remote feed loaders.
 *
 * Each loader fetches one source and parses it. Failures come back as
 * `{ success: false }` with a warning already logged; callers fall back to
 * prior values.
 */

import type { AppConfig } from "@/lib/config";
import { fetchText, sleep } from "@/lib/http";
import { parseRawMetarFeed } from "@/lib/metar";
import { parseNasStatusXml, type NasEvent } from "@/lib/nas-status";
import { parseStationsCsv, type StationRow } from "@/lib/stations";
import { getErrorMessage } from "@/lib/error-utils";

export type FeedResult<T> = { success: true; data: T } | { success: false; error: string };

type FeedConfig = Pick<AppConfig, "http" | "feeds" | "metarChunkSize" | "requestPauseMs">;

export async function loadStationRows(config: FeedConfig): Promise<FeedResult<StationRow[]>> {
  const response = await fetchText(config.feeds.stationsUrl, {
    ...config.http,
    accept: "text/csv, text/plain",
  });
  if (!response.success) {
    console.warn(`[Stations] Station feed fetch failed: ${response.error}`);
    return { success: false, error: response.error };
  }

  const rows = parseStationsCsv(response.body);
  if (rows.length === 0) {
    console.warn("[Stations] Station feed returned no rows");
    return { success: false, error: "Station feed returned no rows" };
  }
  return { success: true, data: rows };
}

export async function loadNasEvents(config: FeedConfig): Promise<FeedResult<NasEvent[]>> {
  const response = await fetchText(config.feeds.nasStatusUrl, {
    ...config.http,
    accept: "application/xml, text/xml",
  });
  if (!response.success) {
    console.warn(`[NAS] Airport status fetch failed: ${response.error}`);
    return { success: false, error: response.error };
  }

  try {
    return { success: true, data: parseNasStatusXml(response.body) };
  } catch (error) {
    const message = getErrorMessage(error);
    console.warn(`[NAS] Ignoring malformed airport status feed: ${message}`);
    return { success: false, error: message };
  }
}

export function metarRequestUrl(baseUrl: string, stationIds: string[]): string {
  return `${baseUrl}?ids=${stationIds.join(",")}&format=raw&hours=2&taf=false`;
}

function chunk<T>(items: T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}

/**
 * Latest raw METAR per station, requested in chunks one after another.
 *
 * A failed chunk only loses its own stations. The result is a failure when
 * every chunk failed.
 */
export async function loadMetarObservations(
  stationIds: string[],
  config: FeedConfig
): Promise<FeedResult<Map<string, string>>> {
  const observations = new Map<string, string>();
  if (stationIds.length === 0) {
    return { success: true, data: observations };
  }

  const chunks = chunk(stationIds, config.metarChunkSize);
  const errors: string[] = [];

  for (let i = 0; i < chunks.length; i++) {
    if (i > 0 && config.requestPauseMs > 0) {
      await sleep(config.requestPauseMs);
    }

    const ids = chunks[i];
    const response = await fetchText(metarRequestUrl(config.feeds.metarUrl, ids), {
      ...config.http,
      accept: "text/plain",
    });
    if (!response.success) {
      console.warn(`[METAR] Fetch failed for ${ids.length} stations (${ids[0]}...): ${response.error}`);
      errors.push(response.error);
      continue;
    }

    const requested = new Set(ids);
    for (const [station, metar] of parseRawMetarFeed(response.body)) {
      if (requested.has(station) && !observations.has(station)) {
        observations.set(station, metar);
      }
    }
  }

  if (errors.length === chunks.length) {
    return { success: false, error: errors.join("; ") };
  }
  return { success: true, data: observations };
}
