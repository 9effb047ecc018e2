// Copyright 2018-2026 the Deno authors. MIT license.
// This module is browser compatible.

/**
 * Internal conversion between xsd:dateTime text and `Date`.
 *
 * Accepted: `YYYY-MM-DDThh:mm:ss[.fraction][Z|(+|-)hh:mm]`. A missing offset
 * is read as UTC. Fractions beyond milliseconds are truncated.
 *
 * @module
 */

import { GpxValueError } from "./errors.ts";

const DATE_TIME_RE =
  /^(\d{4})-(\d{2})-(\d{2})[Tt](\d{2}):(\d{2}):(\d{2})(?:\.(\d+))?(?:([Zz])|([+-])(\d{2}):(\d{2}))?$/;

function daysInMonth(year: number, month: number): number {
  // Day 0 of the next month is the last day of this one.
  const date = new Date(0);
  date.setUTCFullYear(year, month, 0);
  return date.getUTCDate();
}

function invalid(text: string): GpxValueError {
  return new GpxValueError(
    "invalid_time",
    text,
    `Invalid date-time '${text}', expected RFC 3339 / ISO 8601`,
  );
}

/**
 * Parses an xsd:dateTime into a UTC instant.
 *
 * @example Usage
 * ```ts ignore
 * parseTime("2001-10-26T21:32:52+02:00").toISOString();
 * // "2001-10-26T19:32:52.000Z"
 * ```
 *
 * @param text The element text.
 * @returns The instant.
 * @throws {GpxValueError} If the text is not a valid date-time.
 */
export function parseTime(text: string): Date {
  const match = DATE_TIME_RE.exec(text.trim());
  if (match === null) throw invalid(text);
  const [, y, mo, d, h, mi, s, fraction, zulu, sign, oh, om] = match;

  const year = Number(y);
  const month = Number(mo);
  const day = Number(d);
  const hour = Number(h);
  const minute = Number(mi);
  const second = Number(s);
  if (
    month < 1 || month > 12 ||
    day < 1 || day > daysInMonth(year, month) ||
    hour > 23 || minute > 59 || second > 59
  ) {
    throw invalid(text);
  }

  let offsetMinutes = 0;
  if (zulu === undefined && sign !== undefined) {
    const offsetHours = Number(oh);
    const offsetMins = Number(om);
    if (offsetHours > 23 || offsetMins > 59) throw invalid(text);
    offsetMinutes = (sign === "-" ? -1 : 1) * (offsetHours * 60 + offsetMins);
  }

  const millis = fraction === undefined
    ? 0
    : Number(fraction.padEnd(3, "0").slice(0, 3));

  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  date.setUTCHours(hour, minute - offsetMinutes, second, millis);
  return date;
}

/**
 * Renders an instant as RFC 3339 text in UTC. Milliseconds are only written
 * when non-zero.
 *
 * @example Usage
 * ```ts ignore
 * formatTime(new Date(Date.UTC(2001, 9, 26, 19, 32, 52)));
 * // "2001-10-26T19:32:52Z"
 * ```
 *
 * @param date The instant to render.
 * @returns The text.
 * @throws {GpxValueError} If the date is invalid.
 */
export function formatTime(date: Date): string {
  if (Number.isNaN(date.getTime())) throw invalid(String(date));
  const iso = date.toISOString();
  return iso.endsWith(".000Z") ? `${iso.slice(0, -5)}Z` : iso;
}
