import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdir, mkdtemp, readFile, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { dirname, join } from "path";
import { EXIT_CODES, runRegistryBuild, runStatusRefresh } from "../pipeline";
import {
  METAR_ABE,
  METAR_FEED,
  METAR_URL,
  NAS_STATUS_URL,
  NAS_STATUS_XML,
  STATIONS_CSV,
  STATIONS_URL,
  makeConfig,
} from "@/test/fixtures";

const mockFetch = vi.fn();

type Feed = "stations" | "nas" | "metar";

function serveFeeds(overrides: Partial<Record<Feed, () => Response>> = {}): void {
  mockFetch.mockImplementation(async (input: unknown) => {
    const url = String(input);
    if (url.startsWith(STATIONS_URL)) {
      return overrides.stations?.() ?? new Response(STATIONS_CSV, { status: 200 });
    }
    if (url.startsWith(NAS_STATUS_URL)) {
      return overrides.nas?.() ?? new Response(NAS_STATUS_XML, { status: 200 });
    }
    if (url.startsWith(METAR_URL)) {
      return overrides.metar?.() ?? new Response(METAR_FEED, { status: 200 });
    }
    throw new Error(`Unexpected request: ${url}`);
  });
}

function requestedUrls(): string[] {
  return mockFetch.mock.calls.map(([input]) => String(input));
}

async function writeJson(path: string, data: unknown): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, JSON.stringify(data, null, 2));
}

async function readJson(path: string): Promise<unknown> {
  return JSON.parse(await readFile(path, "utf-8"));
}

const at = (iso: string) => () => new Date(iso);

describe("pipeline", () => {
  let dir: string;
  let statusPath: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "airport-pipeline-"));
    statusPath = join(dir, "docs", "status.json");
    mockFetch.mockReset();
    vi.stubGlobal("fetch", mockFetch);
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  describe("runStatusRefresh", () => {
    it("exits with NO_REGISTRY when there is no status file", async () => {
      serveFeeds();

      const result = await runStatusRefresh(makeConfig({ statusPath }));

      expect(result).toEqual({
        success: false,
        exitCode: EXIT_CODES.NO_REGISTRY,
        error: `${statusPath} has no airport list; run the registry build or pass --rebuild-registry`,
      });
      expect(mockFetch).not.toHaveBeenCalled();
    });

    it("rebuilds the registry and writes closures and flight categories", async () => {
      serveFeeds();

      const result = await runStatusRefresh(makeConfig({ statusPath }), {
        rebuildRegistry: true,
        now: at("2026-01-27T05:55:12.345Z"),
      });

      expect(result.success && result.written).toBe(true);
      expect(requestedUrls()).toEqual([
        STATIONS_URL,
        NAS_STATUS_URL,
        `${METAR_URL}?ids=KABE,KMDT,KPIT&format=raw&hours=2&taf=false`,
      ]);

      const written = await readJson(statusPath);
      expect(written).toMatchObject({
        generated_utc: "2026-01-27T05:55:12Z",
        regions: {
          Western: [{ code: "PIT", icao: "KPIT", name: "Pittsburgh Intl", lat: 40.49, lon: -80.23 }],
          Central: [{ code: "MDT", icao: "KMDT", name: "Harrisburg Intl", lat: 40.19, lon: -76.76 }],
          Eastern: [{ code: "ABE", icao: "KABE", name: "Allentown, Lehigh Valley Intl", lat: 40.65, lon: -75.44 }],
        },
      });
      expect(written).toHaveProperty("airports.ABE", {
        icao: "KABE",
        status: "CLOSED",
        closed: true,
        flight_category: "LIFR",
        flight_category_reason: "ceiling 400ft, vis 0.5SM",
        closure_reason: "Snow removal",
        impact_reason: "",
        metar_raw: METAR_ABE,
        metar_time_utc: "27 05:51Z",
        events: [{ type: "Airport Closures", reason: "Snow removal" }],
        status_source: "faa",
      });
      expect(console.log).toHaveBeenCalledWith(
        "[Refresh] 3 airports: 1 closed, 2 impacted (VFR 1, MVFR 0, IFR 1, LIFR 1, UNK 0)"
      );
    });

    it("keeps a manual status and prior METAR fields for airports without fresh data", async () => {
      await writeJson(statusPath, {
        generated_utc: "2026-01-27T05:00:00Z",
        source: "hand edited",
        regions: {
          Western: [],
          Central: [
            { code: "LNS", icao: "KLNS", name: "Lancaster", lat: 40.12, lon: -76.29 },
            { code: "MDT", icao: "KMDT", name: "Harrisburg Intl", lat: 40.19, lon: -76.76 },
          ],
          Eastern: [],
        },
        airports: {
          LNS: {
            status: "IMPACT",
            impact_reason: "foo",
            flight_category: "VFR",
            metar_raw: "KLNS 270453Z 18005KT 10SM CLR 10/02 A3005",
            metar_time_utc: "27 04:53Z",
          },
        },
      });
      serveFeeds();

      const result = await runStatusRefresh(makeConfig({ statusPath }), { now: at("2026-01-27T05:56:00Z") });

      expect(result.success).toBe(true);
      expect(requestedUrls()).toEqual([
        NAS_STATUS_URL,
        `${METAR_URL}?ids=KLNS,KMDT&format=raw&hours=2&taf=false`,
      ]);

      const written = await readJson(statusPath);
      expect(written).toHaveProperty("airports.LNS", {
        icao: "KLNS",
        status: "IMPACT",
        closed: false,
        flight_category: "VFR",
        flight_category_reason: "",
        closure_reason: "",
        impact_reason: "foo",
        metar_raw: "KLNS 270453Z 18005KT 10SM CLR 10/02 A3005",
        metar_time_utc: "27 04:53Z",
        events: [],
        status_source: "manual",
      });
      expect(written).toHaveProperty("airports.MDT.flight_category", "IFR");
      expect(written).toHaveProperty("airports.MDT.status_source", "faa");
    });

    it("keeps prior FAA closures when the FAA feed is down", async () => {
      await writeJson(statusPath, {
        regions: {
          Eastern: [{ code: "ABE", icao: "KABE", name: "Lehigh Valley Intl", lat: 40.65, lon: -75.44 }],
        },
        airports: {
          ABE: {
            status: "CLOSED",
            closure_reason: "Snow removal",
            events: [{ type: "Airport Closures", reason: "Snow removal" }],
            status_source: "faa",
          },
        },
      });
      serveFeeds({ nas: () => new Response("unavailable", { status: 503 }) });

      const result = await runStatusRefresh(makeConfig({ statusPath }));

      expect(result.success).toBe(true);
      expect(console.warn).toHaveBeenCalledWith("[NAS] Airport status fetch failed: HTTP 503 after 1 attempt");

      const written = await readJson(statusPath);
      expect(written).toHaveProperty("airports.ABE.status", "CLOSED");
      expect(written).toHaveProperty("airports.ABE.closure_reason", "Snow removal");
      expect(written).toHaveProperty("airports.ABE.status_source", "faa");
      expect(written).toHaveProperty("airports.ABE.flight_category", "LIFR");
    });

    it("keeps the existing airport list when a rebuild fails", async () => {
      await writeJson(statusPath, {
        regions: {
          Central: [{ code: "MDT", icao: "KMDT", name: "Harrisburg Intl", lat: 40.19, lon: -76.76 }],
        },
        airports: {},
      });
      serveFeeds({ stations: () => new Response("error", { status: 500 }) });

      const result = await runStatusRefresh(makeConfig({ statusPath }), { rebuildRegistry: true });

      expect(result.success).toBe(true);
      expect(console.warn).toHaveBeenCalledWith(
        "[Registry] Rebuild failed (HTTP 500 after 1 attempt), keeping the existing airport list"
      );
      expect(await readJson(statusPath)).toHaveProperty("airports.MDT.icao", "KMDT");
    });

    it("does not write on a dry run", async () => {
      serveFeeds();

      const result = await runStatusRefresh(makeConfig({ statusPath }), { rebuildRegistry: true, dryRun: true });

      expect(result.success && result.written).toBe(false);
      expect(result.success && Object.keys(result.snapshot.airports)).toEqual(["ABE", "MDT", "PIT"]);
      await expect(readFile(statusPath, "utf-8")).rejects.toThrow();
    });

    it("exits with WRITE_FAILED when the file cannot be written", async () => {
      const blocker = join(dir, "blocker");
      await writeFile(blocker, "not a directory");
      const blockedPath = join(blocker, "status.json");
      serveFeeds();

      const result = await runStatusRefresh(
        makeConfig({
          statusPath: blockedPath,
          registrySource: "config",
          airports: [{ code: "MDT", name: "Harrisburg Intl", lat: 40.19, lon: -76.76 }],
        }),
        { rebuildRegistry: true }
      );

      expect(result.success).toBe(false);
      expect(!result.success && result.exitCode).toBe(EXIT_CODES.WRITE_FAILED);
    });

    it("writes the same file twice apart from generated_utc", async () => {
      serveFeeds();
      const config = makeConfig({ statusPath });

      await runStatusRefresh(config, { rebuildRegistry: true, now: at("2026-01-27T05:55:00Z") });
      const first = await readFile(statusPath, "utf-8");

      await runStatusRefresh(config, { now: at("2026-01-27T06:00:00Z") });
      const second = await readFile(statusPath, "utf-8");

      expect(second).not.toBe(first);
      expect(second.replace("2026-01-27T06:00:00Z", "2026-01-27T05:55:00Z")).toBe(first);
    });
  });

  describe("runRegistryBuild", () => {
    it("builds from the airports config without fetching and carries statuses forward", async () => {
      await writeJson(statusPath, {
        regions: {},
        airports: {
          ABE: {
            status: "CLOSED",
            closure_reason: "Snow removal",
            status_source: "faa",
            flight_category: "LIFR",
            custom_note: "Runway 6/24 only",
          },
        },
      });

      const result = await runRegistryBuild(
        makeConfig({
          statusPath,
          registrySource: "config",
          airports: [
            { code: "ABE", name: "Lehigh Valley Intl", lat: 40.65, lon: -75.44 },
            { code: "ABP", name: "Wilkes-Barre Wyoming Valley", lat: 41.3382, lon: -75.7234, icao: "KPNE" },
          ],
        }),
        { now: at("2026-01-27T05:55:00Z") }
      );

      expect(result.success).toBe(true);
      expect(mockFetch).not.toHaveBeenCalled();

      const written = await readJson(statusPath);
      expect(written).toHaveProperty("regions.Eastern", [
        { code: "ABE", icao: "KABE", name: "Lehigh Valley Intl", lat: 40.65, lon: -75.44 },
        { code: "ABP", icao: "KPNE", name: "Wilkes-Barre Wyoming Valley", lat: 41.3382, lon: -75.7234 },
      ]);
      expect(written).toHaveProperty("airports.ABE.status", "CLOSED");
      expect(written).toHaveProperty("airports.ABE.flight_category", "LIFR");
      expect(written).toHaveProperty("airports.ABE.custom_note", "Runway 6/24 only");
      expect(written).toHaveProperty("airports.ABP", {
        icao: "KPNE",
        status: "OK",
        closed: false,
        flight_category: "UNK",
        flight_category_reason: "",
        closure_reason: "",
        impact_reason: "",
        metar_raw: "",
        metar_time_utc: "",
        events: [],
        status_source: "default",
      });
    });

    it("exits with NO_REGISTRY when the station feed fails", async () => {
      serveFeeds({ stations: () => new Response("error", { status: 500 }) });

      const result = await runRegistryBuild(makeConfig({ statusPath }));

      expect(result).toEqual({
        success: false,
        exitCode: EXIT_CODES.NO_REGISTRY,
        error: "HTTP 500 after 1 attempt",
      });
    });

    it("exits with NO_REGISTRY when no station is in the state", async () => {
      serveFeeds();

      const result = await runRegistryBuild(makeConfig({ statusPath, state: "NJ" }));

      expect(result).toEqual({
        success: false,
        exitCode: EXIT_CODES.NO_REGISTRY,
        error: "No NJ stations in the station feed",
      });
    });
  });
});
