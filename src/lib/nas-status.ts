/**
 * FAA NAS Status: closures, ground stops, ground delay programs,
 * arrival/departure delays and deicing.
 *
 * Source: https://nasstatus.faa.gov/api/airport-status-information
 *
 * The XML groups events into <Delay_type> blocks, each with a <Name> and a
 * "*_List" element whose children carry <ARPT> and <Reason>:
 *
 *   <Delay_type>
 *     <Name>Airport Closures</Name>
 *     <Airport_Closure_List>
 *       <Airport><ARPT>ABE</ARPT><Reason>Snow removal</Reason>...</Airport>
 *     </Airport_Closure_List>
 *   </Delay_type>
 */

import { XMLParser } from "fast-xml-parser";
import type { AirportStatus, StatusEvent } from "@/types/status";
import { getErrorMessage } from "@/lib/error-utils";

export class NasStatusFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "NasStatusFormatError";
  }
}

export interface NasEvent extends StatusEvent {
  airport: string;
}

export interface AirportEventSummary {
  status: AirportStatus;
  closureReason: string;
  impactReason: string;
  events: StatusEvent[];
}

const ROOT_ELEMENT = "AIRPORT_STATUS_INFORMATION";
const AIRPORT_KEYS = ["ARPT", "Arpt", "ARPT_ID", "Airport"];
const REASON_KEYS = ["Reason", "REASON"];

const CLOSURE_TYPE = /closure/i;
const CLOSURE_KEYWORDS = /\b(closed|closure|snow|ice|field|runway|plow)/i;

const REASON_SEPARATOR = "; ";

const xmlParser = new XMLParser({
  ignoreAttributes: true,
  parseTagValue: false,
  trimValues: true,
  removeNSPrefix: true,
  isArray: (name: string) => name === "Delay_type",
});

type XmlNode = Record<string, unknown>;

function isNode(value: unknown): value is XmlNode {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toArray(value: unknown): unknown[] {
  if (value === undefined || value === null || value === "") return [];
  return Array.isArray(value) ? value : [value];
}

function textOf(node: XmlNode, keys: string[]): string {
  for (const key of keys) {
    const value = node[key];
    if (typeof value === "string" && value.trim()) {
      return value.trim();
    }
  }
  return "";
}

/** Every text value under a node, in document order */
function flattenText(value: unknown): string[] {
  if (typeof value === "string") return value.trim() ? [value.trim()] : [];
  if (Array.isArray(value)) return value.flatMap(flattenText);
  if (isNode(value)) return Object.values(value).flatMap(flattenText);
  return [];
}

/** "Ground_Stop_List" -> "Ground Stop" */
function typeFromListName(listName: string): string {
  return listName.replace(/_List$/, "").replace(/_/g, " ");
}

function eventFromItem(item: unknown, type: string): NasEvent | null {
  if (!isNode(item)) return null;

  const airport = textOf(item, AIRPORT_KEYS).toUpperCase();
  if (!airport) return null;

  let reason = textOf(item, REASON_KEYS);
  if (!reason) {
    const rest = Object.entries(item)
      .filter(([key]) => !AIRPORT_KEYS.includes(key))
      .flatMap(([, value]) => flattenText(value));
    reason = rest.join(" ").replace(/\s+/g, " ").trim();
  }

  return { type, airport, reason };
}

/**
 * Parse the NAS Status XML into a flat event list.
 * @throws NasStatusFormatError when the document is not a NAS Status report
 */
export function parseNasStatusXml(xml: string): NasEvent[] {
  let parsed: unknown;
  try {
    parsed = xmlParser.parse(xml.replace(/^\uFEFF/, "").trim());
  } catch (error) {
    throw new NasStatusFormatError(`Unparseable NAS Status XML: ${getErrorMessage(error)}`);
  }

  const root = isNode(parsed) ? parsed[ROOT_ELEMENT] : undefined;
  if (root === undefined) {
    throw new NasStatusFormatError(`Missing <${ROOT_ELEMENT}> root element`);
  }
  if (!isNode(root)) {
    // An empty report parses to "" and has no events
    return [];
  }

  const events: NasEvent[] = [];

  for (const block of toArray(root.Delay_type)) {
    if (!isNode(block)) continue;

    const name = typeof block.Name === "string" ? block.Name.trim() : "";

    for (const [key, list] of Object.entries(block)) {
      if (!key.endsWith("_List") || !isNode(list)) continue;

      const type = name || typeFromListName(key);
      for (const items of Object.values(list)) {
        for (const item of toArray(items)) {
          const event = eventFromItem(item, type);
          if (event) events.push(event);
        }
      }
    }
  }

  return events;
}

/** Closure if the event type names a closure or the reason reads like one */
export function isClosureEvent(event: StatusEvent): boolean {
  return CLOSURE_TYPE.test(event.type) || CLOSURE_KEYWORDS.test(event.reason);
}

function joinUnique(values: string[]): string {
  const unique: string[] = [];
  for (const value of values) {
    if (value && !unique.includes(value)) unique.push(value);
  }
  return unique.join(REASON_SEPARATOR);
}

/**
 * Overall status of a list of events for one airport.
 * CLOSED beats IMPACT beats OK; reasons are de-duplicated in first-seen order.
 */
export function summarizeEvents(events: StatusEvent[]): AirportEventSummary {
  const closures = events.filter(isClosureEvent);
  const impacts = events.filter((event) => !isClosureEvent(event));

  const status: AirportStatus =
    closures.length > 0 ? "CLOSED" : events.length > 0 ? "IMPACT" : "OK";

  const unique: StatusEvent[] = [];
  for (const { type, reason } of events) {
    if (!unique.some((e) => e.type === type && e.reason === reason)) {
      unique.push({ type, reason });
    }
  }

  return {
    status,
    closureReason: joinUnique(closures.map((event) => event.reason)),
    impactReason: joinUnique(impacts.map((event) => event.reason)),
    events: unique,
  };
}

/** Overall status of one airport from the NAS event list */
export function summarizeAirportEvents(code: string, events: NasEvent[]): AirportEventSummary {
  const target = code.trim().toUpperCase();
  return summarizeEvents(events.filter((event) => event.airport.trim().toUpperCase() === target));
}
