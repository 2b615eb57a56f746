/**
 * The two stages behind the CLI scripts.
 *
 * - runRegistryBuild: rebuild the airport list and carry every status forward
 * - runStatusRefresh: fetch FAA and METAR data and merge it into status.json
 *
 * Everything runs sequentially; a failed feed degrades to prior values and
 * only a failed write (or a missing registry) fails the run.
 */

import type { RegionMap } from "@/types/airport";
import { REGION_NAMES } from "@/types/airport";
import type { StatusSnapshot } from "@/types/status";
import type { AppConfig } from "@/lib/config";
import {
  formatGeneratedUtc,
  mergeSnapshot,
  summarizeSnapshot,
} from "@/lib/airport-status";
import { loadMetarObservations, loadNasEvents, loadStationRows, type FeedResult } from "@/lib/feeds";
import {
  buildRegistryFromConfig,
  buildRegistryFromStations,
  countAirports,
  metarStationIds,
} from "@/lib/registry";
import { loadSnapshot, SnapshotWriteError, writeSnapshot, type PriorSnapshot } from "@/lib/snapshot";

export const EXIT_CODES = {
  OK: 0,
  WRITE_FAILED: 1,
  NO_REGISTRY: 2,
} as const;

export interface RunOptions {
  dryRun?: boolean;
  verbose?: boolean;
  /** Refresh only: rebuild the registry before fetching status */
  rebuildRegistry?: boolean;
  /** Clock override for generated_utc */
  now?: () => Date;
}

export type RunResult =
  | { success: true; snapshot: StatusSnapshot; written: boolean }
  | { success: false; exitCode: number; error: string };

/**
 * Build the airport registry from the configured source.
 */
export async function buildRegistry(config: AppConfig): Promise<FeedResult<RegionMap>> {
  if (config.registrySource === "config") {
    const regions = buildRegistryFromConfig(config.airports, config);
    console.log(`[Registry] ${countAirports(regions)} airports from the airports config`);
    return { success: true, data: regions };
  }

  const rows = await loadStationRows(config);
  if (!rows.success) {
    return rows;
  }

  const regions = buildRegistryFromStations(rows.data, config);
  const count = countAirports(regions);
  if (count === 0) {
    return { success: false, error: `No ${config.state} stations in the station feed` };
  }

  console.log(`[Registry] ${count} ${config.state} stations from ${rows.data.length} feed rows`);
  return { success: true, data: regions };
}

function logRegions(regions: RegionMap): void {
  for (const name of REGION_NAMES) {
    const codes = regions[name].map((airport) => airport.code).join(", ");
    console.log(`[Registry]   ${name} (${regions[name].length}): ${codes}`);
  }
}

function logSnapshot(snapshot: StatusSnapshot, verbose: boolean): void {
  const summary = summarizeSnapshot(snapshot);
  const categories = Object.entries(summary.categories)
    .map(([category, count]) => `${category} ${count}`)
    .join(", ");
  console.log(
    `[Refresh] ${summary.airports} airports: ${summary.closed} closed, ${summary.impacted} impacted (${categories})`
  );

  if (!verbose) return;
  for (const [code, record] of Object.entries(snapshot.airports)) {
    const reason = record.closure_reason || record.impact_reason;
    console.log(
      `[Refresh]   ${code} ${record.status} ${record.flight_category}${reason ? ` - ${reason}` : ""}`
    );
  }
}

async function finish(
  config: AppConfig,
  snapshot: StatusSnapshot,
  options: RunOptions
): Promise<RunResult> {
  logSnapshot(snapshot, options.verbose ?? false);

  if (options.dryRun) {
    console.log(`[Snapshot] Dry run, not writing ${config.statusPath}`);
    return { success: true, snapshot, written: false };
  }

  try {
    await writeSnapshot(config.statusPath, snapshot);
  } catch (error) {
    if (error instanceof SnapshotWriteError) {
      return { success: false, exitCode: EXIT_CODES.WRITE_FAILED, error: error.message };
    }
    throw error;
  }

  console.log(`[Snapshot] Wrote ${config.statusPath} (${snapshot.generated_utc})`);
  return { success: true, snapshot, written: true };
}

async function loadPrior(config: AppConfig): Promise<{ prior: PriorSnapshot; usable: boolean }> {
  const { snapshot, problem } = await loadSnapshot(config.statusPath);
  if (problem === "missing") {
    console.warn(`[Snapshot] ${config.statusPath} not found, starting from an empty state`);
  }
  return { prior: snapshot, usable: problem === null };
}

/**
 * Rebuild the registry and write it, carrying every status field forward.
 */
export async function runRegistryBuild(config: AppConfig, options: RunOptions = {}): Promise<RunResult> {
  const now = options.now ?? (() => new Date());
  const { prior } = await loadPrior(config);

  const registry = await buildRegistry(config);
  if (!registry.success) {
    return { success: false, exitCode: EXIT_CODES.NO_REGISTRY, error: registry.error };
  }
  if (options.verbose) logRegions(registry.data);

  const snapshot = mergeSnapshot({
    regions: registry.data,
    prior,
    faaEvents: null,
    observations: new Map<string, string>(),
    weatherImpacts: config.weatherImpacts,
    generatedUtc: formatGeneratedUtc(now()),
  });

  return finish(config, snapshot, options);
}

/**
 * Fetch closures/impacts and METARs and merge them into status.json.
 *
 * Without rebuildRegistry the airport list comes from the existing file,
 * which must then exist and list at least one airport.
 */
export async function runStatusRefresh(config: AppConfig, options: RunOptions = {}): Promise<RunResult> {
  const now = options.now ?? (() => new Date());
  const { prior, usable } = await loadPrior(config);

  let regions: RegionMap = prior.regions;
  if (options.rebuildRegistry) {
    const registry = await buildRegistry(config);
    if (registry.success) {
      regions = registry.data;
    } else if (countAirports(prior.regions) > 0) {
      console.warn(`[Registry] Rebuild failed (${registry.error}), keeping the existing airport list`);
    } else {
      return { success: false, exitCode: EXIT_CODES.NO_REGISTRY, error: registry.error };
    }
  } else if (!usable || countAirports(prior.regions) === 0) {
    return {
      success: false,
      exitCode: EXIT_CODES.NO_REGISTRY,
      error: `${config.statusPath} has no airport list; run the registry build or pass --rebuild-registry`,
    };
  }
  if (options.verbose) logRegions(regions);

  const nas = await loadNasEvents(config);
  if (nas.success) {
    console.log(`[NAS] ${nas.data.length} airport events in the FAA feed`);
  }

  const stationIds = metarStationIds(regions);
  const metar = await loadMetarObservations(stationIds, config);
  if (metar.success) {
    console.log(`[METAR] Observations for ${metar.data.size} of ${stationIds.length} stations`);
  }

  const snapshot = mergeSnapshot({
    regions,
    prior,
    faaEvents: nas.success ? nas.data : null,
    observations: metar.success ? metar.data : new Map<string, string>(),
    weatherImpacts: config.weatherImpacts,
    generatedUtc: formatGeneratedUtc(now()),
  });

  return finish(config, snapshot, options);
}
