const STATION_ID = /^[A-Z][A-Z0-9]{3}$/;
const REPORT_TYPES = new Set(["METAR", "SPECI"]);
const OBSERVATION_TIME = /^(\d{2})(\d{2})(\d{2})Z$/;

function tokensOf(line: string): string[] {
  const tokens = line.trim().split(/\s+/).filter(Boolean);
  return tokens.length > 0 && REPORT_TYPES.has(tokens[0]) ? tokens.slice(1) : tokens;
}

/**
 * Station id of a raw METAR line ("KMDT 270551Z ..." -> "KMDT").
 * Returns null when the line does not start with a 4-character station id.
 */
export function metarStationId(line: string): string | null {
  const [first] = tokensOf(line);
  return first && STATION_ID.test(first) ? first : null;
}

/**
 * Parse the line-oriented raw METAR feed into ICAO -> observation.
 * The feed lists the newest report first, so the first line per station wins.
 */
export function parseRawMetarFeed(text: string): Map<string, string> {
  const observations = new Map<string, string>();

  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line) continue;

    const station = metarStationId(line);
    if (!station || observations.has(station)) continue;

    observations.set(station, line);
  }

  return observations;
}

/**
 * Observation time group as "DD HH:MMZ" ("270551Z" -> "27 05:51Z").
 * Empty string when the report has no time group.
 */
export function parseMetarTime(metar: string): string {
  for (const token of tokensOf(metar)) {
    const match = OBSERVATION_TIME.exec(token);
    if (match) {
      return `${match[1]} ${match[2]}:${match[3]}Z`;
    }
  }
  return "";
}
