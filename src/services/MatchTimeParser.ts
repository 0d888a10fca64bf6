/**
 * Turns fixture-list rows into Match records.
 *
 * The list page prints start times as "12 Mar 2025, 14:30 GMT". The zone
 * token is optional; a bare time is read in the configured default zone.
 */

import { isValid, parse } from "date-fns";
import { fromZonedTime } from "date-fns-tz";
import { describeError, MatchTimeParseError } from "../errors";
import { MatchStatus } from "../types";
import type { Match, RawMatchRecord } from "../types";
import type { Logger } from "../utils/logger";

const DATE_TIME_FORMAT = "d MMM yyyy, H:mm";
const DATE_TIME_PATTERN = /^(.*\d{1,2}:\d{2})(?:\s+(\S+))?$/;

// Abbreviations the fixture pages are known to print
const ZONE_ABBREVIATIONS: Record<string, string> = {
  UTC: "+00:00",
  GMT: "+00:00",
  IST: "+05:30",
  BST: "+01:00",
  CET: "+01:00",
  CEST: "+02:00",
  SAST: "+02:00",
  PKT: "+05:00",
  AEST: "+10:00",
  AEDT: "+11:00",
  NZST: "+12:00",
  NZDT: "+13:00",
  EST: "-05:00",
  EDT: "-04:00",
  PST: "-08:00",
  PDT: "-07:00",
};

/**
 * Map a zone token (abbreviation or IANA name) to something date-fns-tz
 * understands. Returns null for unknown zones.
 */
export function resolveTimeZone(token: string): string | null {
  const abbreviation = ZONE_ABBREVIATIONS[token.toUpperCase()];
  if (abbreviation) return abbreviation;
  try {
    new Intl.DateTimeFormat("en-US", { timeZone: token });
    return token;
  } catch {
    return null;
  }
}

/**
 * Parse fixture date/time text into epoch milliseconds.
 * @throws MatchTimeParseError
 */
export function parseMatchDateTime(text: string, defaultTimeZone = "UTC"): number {
  const normalized = text.trim().replace(/\s+/g, " ");
  const match = DATE_TIME_PATTERN.exec(normalized);
  if (!match) {
    throw new MatchTimeParseError(text, "no time of day found");
  }

  const wallClockText = match[1];
  const zoneToken: string | undefined = match[2];
  const zone = zoneToken ?? defaultTimeZone;
  const timeZone = resolveTimeZone(zone);
  if (!timeZone) {
    throw new MatchTimeParseError(text, `unknown time zone "${zone}"`);
  }

  // Read the wall clock as UTC fields so the host's own zone (and its DST gaps) never applies
  const wallClock = parse(`${wallClockText} +00:00`, `${DATE_TIME_FORMAT} xxx`, new Date(0));
  if (!isValid(wallClock)) {
    throw new MatchTimeParseError(text, `expected "${DATE_TIME_FORMAT}"`);
  }

  const instant = fromZonedTime(wallClock.toISOString().slice(0, 19), timeZone);
  if (!isValid(instant)) {
    throw new MatchTimeParseError(text, `cannot apply time zone "${zone}"`);
  }
  return instant.getTime();
}

export interface ParsedMatchList {
  matches: Match[];
  dropped: number;
}

/**
 * Build the fresh match list from a discovery pass. Rows without an id,
 * duplicate ids and rows with unreadable start times are dropped with a
 * warning; the rest are returned as UPCOMING.
 */
export function parseMatchRecords(
  records: RawMatchRecord[],
  opts: { defaultTimeZone: string; log: Logger },
): ParsedMatchList {
  const matches: Match[] = [];
  const seen = new Set<string>();
  let dropped = 0;

  for (const record of records) {
    const id = record.id.trim();
    if (!id) {
      opts.log.warn(`Dropping match without id (${record.teams || "unknown teams"})`);
      dropped++;
      continue;
    }
    if (seen.has(id)) {
      opts.log.warn(`Dropping duplicate match ${id}`);
      dropped++;
      continue;
    }

    let scheduledStart: number;
    try {
      scheduledStart = parseMatchDateTime(record.dateTime, opts.defaultTimeZone);
    } catch (err) {
      opts.log.warn(`Dropping match ${id}: ${describeError(err)}`);
      dropped++;
      continue;
    }

    seen.add(id);
    matches.push({
      id,
      teams: record.teams,
      format: record.format,
      url: record.url,
      scheduledStart,
      status: MatchStatus.UPCOMING,
    });
  }

  return { matches, dropped };
}
