/**
 * Flight category classification from raw METAR text.
 *
 * Visibility and ceiling are pulled from the report body (everything before
 * RMK) and compared against the FAA flight rules thresholds, worst category
 * first.
 */

import type { FlightCategory } from "@/types/status";

export interface FlightCategoryResult {
  category: FlightCategory;
  /** Measured values behind a degraded category, e.g. "ceiling 800ft, vis 2SM" */
  reason: string;
  visibilitySm: number | null;
  ceilingFt: number | null;
}

// Thresholds in feet / statute miles
const LIFR_CEILING_FT = 500;
const IFR_CEILING_FT = 1000;
const MVFR_CEILING_FT = 3000;
const LIFR_VIS_SM = 1;
const IFR_VIS_SM = 3;
const MVFR_VIS_SM = 5;

const WHOLE_NUMBER = /^\d+$/;
const WHOLE_VIS = /^[MP]?(\d+)SM$/;
const FRACTION_VIS = /^M?(\d+)\/(\d+)SM$/;
const CEILING_LAYER = /^(BKN|OVC|VV)(\d{3})(CB|TCU)?$/;

function reportBody(metar: string): string[] {
  const tokens = metar.trim().split(/\s+/).filter(Boolean);
  const rmk = tokens.indexOf("RMK");
  return rmk === -1 ? tokens : tokens.slice(0, rmk);
}

/**
 * Prevailing visibility in statute miles.
 * Handles "10SM", "1/2SM", "1 1/2SM", "M1/4SM" and "P6SM".
 */
export function parseVisibilitySm(metar: string): number | null {
  const tokens = reportBody(metar);

  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i];

    const fraction = FRACTION_VIS.exec(token);
    if (fraction) {
      const numerator = Number(fraction[1]);
      const denominator = Number(fraction[2]);
      if (denominator === 0) continue;

      const whole = i > 0 && WHOLE_NUMBER.test(tokens[i - 1]) ? Number(tokens[i - 1]) : 0;
      return whole + numerator / denominator;
    }

    const whole = WHOLE_VIS.exec(token);
    if (whole) {
      return Number(whole[1]);
    }
  }

  return null;
}

/**
 * Lowest broken, overcast or vertical-visibility layer in feet AGL.
 * FEW and SCT layers never form a ceiling.
 */
export function parseCeilingFt(metar: string): number | null {
  let lowest: number | null = null;

  for (const token of reportBody(metar)) {
    const layer = CEILING_LAYER.exec(token);
    if (!layer) continue;

    const base = Number(layer[2]) * 100;
    if (lowest === null || base < lowest) {
      lowest = base;
    }
  }

  return lowest;
}

/** Format like "2", "0.5", "1.5" (no trailing zeros) */
function formatMiles(value: number): string {
  return String(Number(value.toPrecision(6)));
}

function describeConditions(ceilingFt: number | null, visibilitySm: number | null): string {
  const parts: string[] = [];
  if (ceilingFt !== null) parts.push(`ceiling ${ceilingFt}ft`);
  if (visibilitySm !== null) parts.push(`vis ${formatMiles(visibilitySm)}SM`);
  return parts.join(", ");
}

/**
 * Classify a raw METAR into VFR/MVFR/IFR/LIFR.
 *
 * A missing quantity counts as unlimited, so a report with only visibility
 * is classified on visibility alone. Returns UNK when neither parses.
 */
export function classifyFlightCategory(metar: string): FlightCategoryResult {
  const visibilitySm = parseVisibilitySm(metar);
  const ceilingFt = parseCeilingFt(metar);

  if (visibilitySm === null && ceilingFt === null) {
    return { category: "UNK", reason: "", visibilitySm, ceilingFt };
  }

  const ceiling = ceilingFt ?? Number.POSITIVE_INFINITY;
  const visibility = visibilitySm ?? Number.POSITIVE_INFINITY;

  let category: FlightCategory = "VFR";
  if (ceiling < LIFR_CEILING_FT || visibility < LIFR_VIS_SM) {
    category = "LIFR";
  } else if (ceiling < IFR_CEILING_FT || visibility < IFR_VIS_SM) {
    category = "IFR";
  } else if (ceiling < MVFR_CEILING_FT || visibility <= MVFR_VIS_SM) {
    category = "MVFR";
  }

  return {
    category,
    reason: category === "VFR" ? "" : describeConditions(ceilingFt, visibilitySm),
    visibilitySm,
    ceilingFt,
  };
}

/** True for categories below VFR */
export function isDegradedCategory(category: FlightCategory): boolean {
  return category === "MVFR" || category === "IFR" || category === "LIFR";
}
