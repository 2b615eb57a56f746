/**
 * Reading and writing docs/status.json
 *
 * The prior file is hand-edited between runs and may have been written by
 * older tooling, so it is parsed leniently: every field is optional, invalid
 * values are dropped field by field, and unknown fields are kept.
 */

import { mkdir, readFile, writeFile } from "fs/promises";
import { dirname } from "path";
import { z } from "zod";
import { REGION_NAMES } from "@/types/airport";
import type { Airport, RegionMap } from "@/types/airport";
import {
  AIRPORT_STATUSES,
  FLIGHT_CATEGORIES,
  STATUS_SOURCES,
} from "@/types/status";
import type { StatusSnapshot } from "@/types/status";
import { emptyRegions } from "@/lib/registry";
import { codeFromStationId, icaoFromStationId } from "@/lib/stations";
import { getErrorMessage, isFileNotFound } from "@/lib/error-utils";

export class SnapshotWriteError extends Error {
  constructor(
    public readonly path: string,
    cause: unknown
  ) {
    super(`Failed to write ${path}: ${getErrorMessage(cause)}`, { cause });
    this.name = "SnapshotWriteError";
  }
}

const priorEventSchema = z.object({
  type: z.string(),
  reason: z.string(),
});

export const priorStatusRecordSchema = z
  .object({
    icao: z.string().optional().catch(undefined),
    status: z.enum(AIRPORT_STATUSES).optional().catch(undefined),
    flight_category: z.enum(FLIGHT_CATEGORIES).optional().catch(undefined),
    flight_category_reason: z.string().optional().catch(undefined),
    closure_reason: z.string().optional().catch(undefined),
    impact_reason: z.string().optional().catch(undefined),
    metar_raw: z.string().optional().catch(undefined),
    metar_time_utc: z.string().optional().catch(undefined),
    events: z.array(priorEventSchema).optional().catch(undefined),
    status_source: z.enum(STATUS_SOURCES).optional().catch(undefined),
  })
  .passthrough();

export type PriorStatusRecord = z.infer<typeof priorStatusRecordSchema>;

const priorAirportSchema = z.object({
  code: z.string().min(1),
  icao: z.string().optional(),
  name: z.string().optional(),
  lat: z.number(),
  lon: z.number(),
});

const priorSnapshotSchema = z.object({
  generated_utc: z.string().optional().catch(undefined),
  regions: z.record(z.string(), z.unknown()).optional().catch(undefined),
  airports: z.record(z.string(), z.unknown()).optional().catch(undefined),
});

export interface PriorSnapshot {
  generatedUtc: string | null;
  regions: RegionMap;
  airports: Record<string, PriorStatusRecord>;
}

export type SnapshotProblem = "missing" | "corrupt";

export interface SnapshotLoadResult {
  snapshot: PriorSnapshot;
  /** Why the prior state is empty, null when the file loaded */
  problem: SnapshotProblem | null;
}

export function emptyPriorSnapshot(): PriorSnapshot {
  return { generatedUtc: null, regions: emptyRegions(), airports: {} };
}

function normalizeRegions(raw: Record<string, unknown> | undefined): RegionMap {
  const regions = emptyRegions();
  if (!raw) return regions;

  const seen = new Set<string>();
  for (const name of REGION_NAMES) {
    const entries = raw[name];
    if (!Array.isArray(entries)) continue;

    for (const entry of entries) {
      const parsed = priorAirportSchema.safeParse(entry);
      if (!parsed.success) continue;

      const code = codeFromStationId(parsed.data.code);
      if (seen.has(code)) continue;
      seen.add(code);

      const airport: Airport = {
        code,
        icao: (parsed.data.icao ?? icaoFromStationId(code)).trim().toUpperCase(),
        name: parsed.data.name ?? code,
        lat: parsed.data.lat,
        lon: parsed.data.lon,
      };
      regions[name].push(airport);
    }
    regions[name].sort((a, b) => a.code.localeCompare(b.code));
  }

  return regions;
}

function normalizeAirports(raw: Record<string, unknown> | undefined): Record<string, PriorStatusRecord> {
  const airports: Record<string, PriorStatusRecord> = {};
  if (!raw) return airports;

  for (const [code, value] of Object.entries(raw)) {
    const parsed = priorStatusRecordSchema.safeParse(value);
    if (parsed.success) {
      airports[code.trim().toUpperCase()] = parsed.data;
    }
  }
  return airports;
}

/**
 * Interpret already-decoded JSON as a prior snapshot.
 * Returns null when the top level is not an object.
 */
export function parsePriorSnapshot(data: unknown): PriorSnapshot | null {
  const parsed = priorSnapshotSchema.safeParse(data);
  if (!parsed.success) return null;

  return {
    generatedUtc: parsed.data.generated_utc ?? null,
    regions: normalizeRegions(parsed.data.regions),
    airports: normalizeAirports(parsed.data.airports),
  };
}

/**
 * Load the prior snapshot. A missing or corrupt file yields an empty prior
 * state plus the reason, never an exception.
 */
export async function loadSnapshot(path: string): Promise<SnapshotLoadResult> {
  let text: string;
  try {
    text = await readFile(path, "utf-8");
  } catch (error) {
    if (!isFileNotFound(error)) {
      console.warn(`[Snapshot] Cannot read ${path}: ${getErrorMessage(error)}`);
      return { snapshot: emptyPriorSnapshot(), problem: "corrupt" };
    }
    return { snapshot: emptyPriorSnapshot(), problem: "missing" };
  }

  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    console.warn(`[Snapshot] ${path} is not valid JSON: ${getErrorMessage(error)}`);
    return { snapshot: emptyPriorSnapshot(), problem: "corrupt" };
  }

  const snapshot = parsePriorSnapshot(data);
  if (!snapshot) {
    console.warn(`[Snapshot] ${path} does not contain a JSON object`);
    return { snapshot: emptyPriorSnapshot(), problem: "corrupt" };
  }

  return { snapshot, problem: null };
}

/** Pretty-printed JSON with a trailing newline (stable diffs) */
export function serializeSnapshot(snapshot: StatusSnapshot): string {
  return `${JSON.stringify(snapshot, null, 2)}\n`;
}

/**
 * Write the snapshot, creating the parent directory when needed.
 * @throws SnapshotWriteError
 */
export async function writeSnapshot(path: string, snapshot: StatusSnapshot): Promise<void> {
  try {
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, serializeSnapshot(snapshot), "utf-8");
  } catch (error) {
    throw new SnapshotWriteError(path, error);
  }
}
