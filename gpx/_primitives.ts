// Copyright 2018-2026 the Deno authors. MIT license.
// This module is browser compatible.

/**
 * Internal consumers for leaf elements: plain text, numbers, times, fix
 * kinds and bounding boxes.
 *
 * @module
 */

import { GpxContentError, GpxGrammarError, GpxValueError } from "./errors.ts";
import { createRect, type Fix, fixFromString, type Rect } from "./types.ts";
import {
  consumeChildren,
  invalidChild,
  type ParseContext,
  parseDecimal,
  parseInteger,
  positionOf,
  requireAttribute,
  verifyStartingTag,
} from "./_context.ts";
import { parseTime } from "./_time.ts";

/**
 * Consumes an element holding only text, such as `<name>Home</name>`.
 * Adjacent text and CDATA pieces are joined.
 *
 * @param context The parse context.
 * @param tag The local name of the element.
 * @param allowEmpty Whether an element without text yields `""`.
 * @returns The text content, unmodified.
 * @throws {GpxGrammarError} On a child element or a foreign end tag.
 * @throws {GpxContentError} If the element is empty and `allowEmpty` is false.
 */
export function consumeString(
  context: ParseContext,
  tag: string,
  allowEmpty = false,
): string {
  verifyStartingTag(context, tag);
  let content: string | undefined;

  for (;;) {
    const event = context.next();
    if (event === undefined) {
      throw new GpxGrammarError("missing_closing_tag", tag, tag);
    }
    switch (event.type) {
      case "start_element":
        throw invalidChild(event, tag);
      case "text":
        content = (content ?? "") + event.text;
        break;
      case "end_element":
        if (event.name.local !== tag) {
          throw new GpxGrammarError(
            "invalid_closing_tag",
            event.name.raw,
            tag,
            positionOf(event),
          );
        }
        if (content !== undefined) return content;
        if (allowEmpty) return "";
        throw new GpxContentError(tag);
    }
  }
}

/** Consumes an element holding a decimal number. */
export function consumeDecimal(context: ParseContext, tag: string): number {
  return parseDecimal(consumeString(context, tag), tag);
}

/** Consumes an element holding a non-negative integer. */
export function consumeInteger(context: ParseContext, tag: string): number {
  return parseInteger(consumeString(context, tag), tag);
}

/**
 * Consumes an element holding an angle in [0, 360), such as `<magvar>` or
 * `<course>`.
 */
export function consumeDegrees(context: ParseContext, tag: string): number {
  const value = consumeDecimal(context, tag);
  if (value < 0 || value >= 360) {
    throw new GpxValueError(
      "degrees_out_of_range",
      String(value),
      `Value ${value} in ${tag} is outside [0, 360)`,
    );
  }
  return value;
}

/**
 * Consumes a `<dgpsid>` element. Station ids are limited to [0, 1023].
 */
export function consumeDgpsId(context: ParseContext): number {
  const value = consumeInteger(context, "dgpsid");
  if (value > 1023) {
    throw new GpxValueError(
      "dgpsid_out_of_range",
      String(value),
      `DGPS station id ${value} is outside [0, 1023]`,
    );
  }
  return value;
}

/**
 * Consumes a `<time>` element as a UTC instant.
 *
 * @throws {GpxValueError} If the text is not an RFC 3339 date-time.
 */
export function consumeTime(context: ParseContext): Date {
  return parseTime(consumeString(context, "time"));
}

/**
 * Consumes a `<fix>` element. Unknown values are kept as
 * `{ type: "other" }`.
 */
export function consumeFix(context: ParseContext): Fix {
  return fixFromString(consumeString(context, "fix"));
}

function coordinate(value: string, name: string): number {
  return parseDecimal(value, `bounds@${name}`);
}

/**
 * Consumes a `<bounds>` element. All four attributes are required, and the
 * element may not have children.
 *
 * @throws {GpxGrammarError} On a missing attribute or a child element.
 * @throws {GpxValueError} On unparsable or inverted coordinates.
 */
export function consumeBounds(context: ParseContext): Rect {
  const start = verifyStartingTag(context, "bounds");
  const minlat = coordinate(requireAttribute(start, "minlat"), "minlat");
  const maxlat = coordinate(requireAttribute(start, "maxlat"), "maxlat");
  const minlon = coordinate(requireAttribute(start, "minlon"), "minlon");
  const maxlon = coordinate(requireAttribute(start, "maxlon"), "maxlon");

  const bounds = createRect(
    { lon: minlon, lat: minlat },
    { lon: maxlon, lat: maxlat },
  );

  consumeChildren(context, "bounds", (child) => {
    throw invalidChild(child, "bounds");
  });
  return bounds;
}
