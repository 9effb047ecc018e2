// Copyright 2018-2026 the Deno authors. MIT license.
// This module is browser compatible.

/**
 * Internal consumers for the container elements: `metadata`, `trk`,
 * `trkseg` and `rte`.
 *
 * @module
 */

import type {
  Metadata,
  PathDescription,
  Route,
  Track,
  TrackSegment,
} from "./types.ts";
import {
  consumeChildren,
  type Draft,
  invalidChild,
  type ParseContext,
  verifyStartingTag,
} from "./_context.ts";
import type { XmlStartElementEvent } from "./_events.ts";
import {
  consumeBounds,
  consumeInteger,
  consumeString,
  consumeTime,
} from "./_primitives.ts";
import {
  consumeCopyright,
  consumeLink,
  consumePerson,
  legacyLink,
} from "./_compound.ts";
import { consumeExtensions } from "./_extensions.ts";
import { consumeWaypoint } from "./_waypoint.ts";

/**
 * Consumes a GPX 1.1 `<metadata>` element.
 *
 * @throws {GpxGrammarError} On a child outside the metadata grammar.
 */
export function consumeMetadata(context: ParseContext): Metadata {
  verifyStartingTag(context, "metadata");
  const metadata: Draft<Metadata> = { links: [] };

  consumeChildren(context, "metadata", (child) => {
    switch (child.name.local) {
      case "name":
        metadata.name = consumeString(context, "name");
        break;
      case "desc":
        metadata.description = consumeString(context, "desc", true);
        break;
      case "author":
        metadata.author = consumePerson(context, "author");
        break;
      case "copyright":
        metadata.copyright = consumeCopyright(context);
        break;
      case "link":
        metadata.links.push(consumeLink(context));
        break;
      case "time":
        metadata.time = consumeTime(context);
        break;
      case "keywords":
        metadata.keywords = consumeString(context, "keywords", true);
        break;
      case "bounds":
        metadata.bounds = consumeBounds(context);
        break;
      case "extensions":
        metadata.extensions = consumeExtensions(context);
        break;
      default:
        throw invalidChild(child, "metadata");
    }
  });
  return metadata;
}

/** GPX 1.0 `<url>`/`<urlname>` pairs, resolved once the element ends. */
interface LegacyUrl {
  url?: string;
  urlname?: string;
}

/**
 * Reads one of the descriptive children tracks and routes share.
 *
 * @returns Whether `child` was one of them.
 */
function consumePathField(
  context: ParseContext,
  child: XmlStartElementEvent,
  path: Draft<PathDescription>,
  legacy: LegacyUrl,
): boolean {
  switch (child.name.local) {
    case "name":
      path.name = consumeString(context, "name");
      return true;
    case "cmt":
      path.comment = consumeString(context, "cmt", true);
      return true;
    case "desc":
      path.description = consumeString(context, "desc", true);
      return true;
    case "src":
      path.source = consumeString(context, "src", true);
      return true;
    case "number":
      path.number = consumeInteger(context, "number");
      return true;
    case "extensions":
      path.extensions = consumeExtensions(context);
      return true;
  }

  if (context.isGpx10) {
    switch (child.name.local) {
      case "url":
        legacy.url = consumeString(context, "url");
        return true;
      case "urlname":
        legacy.urlname = consumeString(context, "urlname", true);
        return true;
    }
    return false;
  }

  switch (child.name.local) {
    case "link":
      path.links.push(consumeLink(context));
      return true;
    case "type":
      path.type = consumeString(context, "type");
      return true;
  }
  return false;
}

function finishPath(path: Draft<PathDescription>, legacy: LegacyUrl): void {
  const link = legacyLink(legacy.url, legacy.urlname);
  if (link !== undefined) path.links.push(link);
}

/** Consumes a `<trkseg>` element. */
export function consumeTrackSegment(context: ParseContext): TrackSegment {
  verifyStartingTag(context, "trkseg");
  const segment: Draft<TrackSegment> = { points: [] };

  consumeChildren(context, "trkseg", (child) => {
    switch (child.name.local) {
      case "trkpt":
        segment.points.push(consumeWaypoint(context, "trkpt"));
        break;
      case "extensions":
        segment.extensions = consumeExtensions(context);
        break;
      default:
        throw invalidChild(child, "trkseg");
    }
  });
  return segment;
}

/**
 * Consumes a `<trk>` element and all of its segments.
 *
 * @throws {GpxGrammarError} On a child outside the track grammar of the
 * document's version.
 */
export function consumeTrack(context: ParseContext): Track {
  verifyStartingTag(context, "trk");
  const track: Draft<Track> = { links: [], segments: [] };
  const legacy: LegacyUrl = {};

  consumeChildren(context, "trk", (child) => {
    if (consumePathField(context, child, track, legacy)) return;
    if (child.name.local !== "trkseg") throw invalidChild(child, "trk");
    track.segments.push(consumeTrackSegment(context));
  });

  finishPath(track, legacy);
  return track;
}

/**
 * Consumes a `<rte>` element and all of its points.
 *
 * @throws {GpxGrammarError} On a child outside the route grammar of the
 * document's version.
 */
export function consumeRoute(context: ParseContext): Route {
  verifyStartingTag(context, "rte");
  const route: Draft<Route> = { links: [], points: [] };
  const legacy: LegacyUrl = {};

  consumeChildren(context, "rte", (child) => {
    if (consumePathField(context, child, route, legacy)) return;
    if (child.name.local !== "rtept") throw invalidChild(child, "rte");
    route.points.push(consumeWaypoint(context, "rtept"));
  });

  finishPath(route, legacy);
  return route;
}
