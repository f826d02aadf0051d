import crypto from 'node:crypto';

import { getErrorMessage } from '@ledgerline/core';
import { err, ok, type Result } from 'neverthrow';

export const CRYPTSY_EXCHANGE_ID = 'cryptsy';

/**
 * Used when `getinfo` does not report `servertimezone`
 */
export const DEFAULT_SERVER_TIMEZONE = 'EST';

const SERVER_DATETIME_PATTERN = /^(\d{4})-(\d{2})-(\d{2})[ T](\d{2}):(\d{2}):(\d{2})$/;

const formatters = new Map<string, Intl.DateTimeFormat>();

function formatterFor(timeZone: string): Intl.DateTimeFormat {
  let formatter = formatters.get(timeZone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat('en-US', {
      day: '2-digit',
      hour: '2-digit',
      hourCycle: 'h23',
      minute: '2-digit',
      month: '2-digit',
      second: '2-digit',
      timeZone,
      year: 'numeric',
    });
    formatters.set(timeZone, formatter);
  }
  return formatter;
}

/**
 * Milliseconds the zone's wall clock is ahead of UTC at the given instant
 */
function zoneOffsetMs(instant: number, timeZone: string): number {
  const fields: Record<string, number> = {};
  for (const part of formatterFor(timeZone).formatToParts(new Date(instant))) {
    if (part.type !== 'literal') {
      fields[part.type] = Number(part.value);
    }
  }
  const wallClock = Date.UTC(
    fields['year'] ?? 0,
    (fields['month'] ?? 1) - 1,
    fields['day'] ?? 1,
    fields['hour'] ?? 0,
    fields['minute'] ?? 0,
    fields['second'] ?? 0
  );
  return wallClock - instant;
}

/**
 * `YYYY-MM-DD HH:MM:SS` on the server's wall clock -> UTC Date
 */
export function parseServerDatetime(text: string, timeZone: string): Result<Date, Error> {
  const match = SERVER_DATETIME_PATTERN.exec(text.trim());
  if (!match) {
    return err(new Error(`Unrecognized Cryptsy datetime: ${text}`));
  }

  const [, year, month, day, hour, minute, second] = match.map(Number);
  const asUtc = Date.UTC(year ?? 0, (month ?? 1) - 1, day ?? 1, hour ?? 0, minute ?? 0, second ?? 0);

  try {
    // Second pass settles instants next to a DST transition
    let instant = asUtc - zoneOffsetMs(asUtc, timeZone);
    instant = asUtc - zoneOffsetMs(instant, timeZone);
    return ok(new Date(instant));
  } catch (error) {
    return err(new Error(`Cannot convert ${text} from time zone ${timeZone}: ${getErrorMessage(error)}`));
  }
}

/**
 * Transfers carry no id of their own; derive a stable one from the row's content
 */
export function transferId(row: Record<string, unknown>): string {
  const canonical = JSON.stringify(Object.entries(row).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)));
  return `transfer-${crypto.createHash('sha256').update(canonical).digest('hex').slice(0, 16)}`;
}
