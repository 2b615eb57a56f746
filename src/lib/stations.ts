/**
 * AviationWeather station metadata feed (CSV)
 *
 * The feed prefixes its data with "#" comment lines; the first remaining
 * line is the header. Rows are returned keyed by header name.
 */

export type StationRow = Record<string, string>;

/**
 * Split one CSV line, honouring quoted fields and doubled quotes.
 */
export function parseCSVLine(line: string): string[] {
  const values: string[] = [];
  let current = "";
  let inQuotes = false;

  for (let i = 0; i < line.length; i++) {
    const char = line[i];

    if (char === '"') {
      if (inQuotes && line[i + 1] === '"') {
        current += '"';
        i++;
      } else {
        inQuotes = !inQuotes;
      }
    } else if (char === "," && !inQuotes) {
      values.push(current.trim());
      current = "";
    } else {
      current += char;
    }
  }
  values.push(current.trim());

  return values;
}

export function parseStationsCsv(csvText: string): StationRow[] {
  const lines = csvText
    .split(/\r?\n/)
    .filter((line) => !line.startsWith("#") && line.trim() !== "");

  if (lines.length === 0) {
    return [];
  }

  const headers = parseCSVLine(lines[0]);
  const rows: StationRow[] = [];

  for (let i = 1; i < lines.length; i++) {
    const values = parseCSVLine(lines[i]);
    const row: StationRow = {};

    headers.forEach((header, index) => {
      row[header] = values[index] || "";
    });

    rows.push(row);
  }

  return rows;
}

/** "KMDT" -> "MDT"; other ids are returned uppercased */
export function codeFromStationId(stationId: string): string {
  const id = stationId.trim().toUpperCase();
  if (id.length === 4 && id.startsWith("K")) {
    return id.slice(1);
  }
  return id;
}

/** "MDT" -> "KMDT"; 4-letter ids are returned uppercased */
export function icaoFromStationId(stationId: string): string {
  const id = stationId.trim().toUpperCase();
  if (id.length === 3) {
    return `K${id}`;
  }
  return id;
}

/** Parse a decimal degree field, null for blanks and junk */
export function parseCoordinate(value: string | undefined): number | null {
  if (value === undefined || value.trim() === "") return null;
  const n = Number(value);
  return Number.isFinite(n) ? n : null;
}
