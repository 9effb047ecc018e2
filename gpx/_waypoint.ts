// Copyright 2018-2026 the Deno authors. MIT license.
// This module is browser compatible.

/**
 * Internal consumer for `wpt`, `trkpt` and `rtept`, which share one
 * grammar.
 *
 * @module
 */

import { createPoint, type Waypoint } from "./types.ts";
import {
  consumeChildren,
  type Draft,
  invalidChild,
  type ParseContext,
  parseDecimal,
  requireAttribute,
  verifyStartingTag,
} from "./_context.ts";
import {
  consumeDecimal,
  consumeDegrees,
  consumeDgpsId,
  consumeFix,
  consumeInteger,
  consumeString,
  consumeTime,
} from "./_primitives.ts";
import { consumeLink, legacyLink } from "./_compound.ts";
import { consumeExtensions } from "./_extensions.ts";

/** The element names that carry a waypoint. */
export type WaypointTag = "wpt" | "trkpt" | "rtept";

/**
 * Consumes a waypoint element. `lat` and `lon` are required and checked
 * against the WGS84 ranges before any child is read.
 *
 * In GPX 1.0 documents `<course>`, `<speed>`, `<url>` and `<urlname>` are
 * accepted and `<link>` is not; GPX 1.1 is the reverse.
 *
 * @param context The parse context.
 * @param tag The element name.
 * @returns The waypoint.
 * @throws {GpxGrammarError} On a missing coordinate or a disallowed child.
 * @throws {GpxValueError} On an out-of-range coordinate or field value.
 */
export function consumeWaypoint(
  context: ParseContext,
  tag: WaypointTag,
): Waypoint {
  const start = verifyStartingTag(context, tag);
  const lat = parseDecimal(requireAttribute(start, "lat"), `${tag}@lat`);
  const lon = parseDecimal(requireAttribute(start, "lon"), `${tag}@lon`);
  const waypoint: Draft<Waypoint> = {
    point: createPoint(lon, lat),
    links: [],
  };
  const legacy: { url?: string; urlname?: string } = {};

  consumeChildren(context, tag, (child) => {
    switch (child.name.local) {
      case "ele":
        waypoint.elevation = consumeDecimal(context, "ele");
        return;
      case "time":
        waypoint.time = consumeTime(context);
        return;
      case "magvar":
        waypoint.magneticVariation = consumeDegrees(context, "magvar");
        return;
      case "geoidheight":
        waypoint.geoidHeight = consumeDecimal(context, "geoidheight");
        return;
      case "name":
        waypoint.name = consumeString(context, "name");
        return;
      case "cmt":
        waypoint.comment = consumeString(context, "cmt", true);
        return;
      case "desc":
        waypoint.description = consumeString(context, "desc", true);
        return;
      case "src":
        waypoint.source = consumeString(context, "src", true);
        return;
      case "sym":
        waypoint.symbol = consumeString(context, "sym");
        return;
      case "type":
        waypoint.type = consumeString(context, "type");
        return;
      case "fix":
        waypoint.fix = consumeFix(context);
        return;
      case "sat":
        waypoint.satellites = consumeInteger(context, "sat");
        return;
      case "hdop":
        waypoint.hdop = consumeDecimal(context, "hdop");
        return;
      case "vdop":
        waypoint.vdop = consumeDecimal(context, "vdop");
        return;
      case "pdop":
        waypoint.pdop = consumeDecimal(context, "pdop");
        return;
      case "ageofdgpsdata":
        waypoint.dgpsAge = consumeDecimal(context, "ageofdgpsdata");
        return;
      case "dgpsid":
        waypoint.dgpsId = consumeDgpsId(context);
        return;
      case "extensions":
        waypoint.extensions = consumeExtensions(context);
        return;
    }

    if (context.isGpx10) {
      switch (child.name.local) {
        case "course":
          waypoint.course = consumeDegrees(context, "course");
          return;
        case "speed":
          waypoint.speed = consumeDecimal(context, "speed");
          return;
        case "url":
          legacy.url = consumeString(context, "url");
          return;
        case "urlname":
          legacy.urlname = consumeString(context, "urlname", true);
          return;
      }
    } else if (child.name.local === "link") {
      waypoint.links.push(consumeLink(context));
      return;
    }

    throw invalidChild(child, tag);
  });

  const link = legacyLink(legacy.url, legacy.urlname);
  if (link !== undefined) waypoint.links.push(link);
  return waypoint;
}
