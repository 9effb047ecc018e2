// Copyright 2018-2026 the Deno authors. MIT license.
// This module is browser compatible.

/**
 * The in-memory GPX document model, shared by the reader and the writer.
 *
 * All entities are plain readonly objects. The reader builds them bottom-up
 * and never touches them again; the writer only reads them.
 *
 * @module
 */

import { GpxValueError } from "./errors.ts";

/**
 * GPX schema generations. The two versions have incompatible grammars, so
 * every document records which one it was read from or should be written as.
 *
 * @example Usage
 * ```ts
 * import { GpxVersion } from "gpx-codec/types";
 *
 * const version: GpxVersion = GpxVersion.Gpx11; // "1.1"
 * ```
 */
export const GpxVersion = {
  /** Not yet determined. Never the result of a successful parse. */
  Unknown: "unknown",
  /** GPX 1.0, with flattened top-level metadata fields. */
  Gpx10: "1.0",
  /** GPX 1.1, with a nested `<metadata>` element. */
  Gpx11: "1.1",
} as const;

/** One of the {@linkcode GpxVersion} values. */
export type GpxVersion = typeof GpxVersion[keyof typeof GpxVersion];

/** A geographic position in decimal degrees (WGS84). */
export interface Point {
  /** Longitude, in [-180, 180). */
  readonly lon: number;
  /** Latitude, in [-90, 90]. */
  readonly lat: number;
}

/**
 * A bounding box. `min` holds the smallest longitude and latitude, `max` the
 * largest; {@linkcode createRect} guarantees the ordering.
 */
export interface Rect {
  readonly min: Point;
  readonly max: Point;
}

/** A link to an external resource. */
export interface Link {
  /** URL of the hyperlink. */
  readonly href: string;
  /** Text of the hyperlink. */
  readonly text?: string;
  /** MIME type of the content, e.g. `image/jpeg`. */
  readonly type?: string;
}

/** A person or organization. */
export interface Person {
  /** Name of the person or organization. */
  readonly name?: string;
  /** Email address, as `id@domain`. */
  readonly email?: string;
  /** Link to a web site or other information about the person. */
  readonly link?: Link;
}

/** Copyright holder and license of a document. */
export interface Copyright {
  /** Copyright holder. */
  readonly author?: string;
  /** Year of copyright. */
  readonly year?: number;
  /** Link to the license text. */
  readonly license?: string;
}

/**
 * Information about the document as a whole. In GPX 1.0 these fields sit
 * directly under `<gpx>`; in GPX 1.1 they live in `<metadata>`.
 */
export interface Metadata {
  /** The name of the GPX file. */
  readonly name?: string;
  /** A description of the contents of the GPX file. */
  readonly description?: string;
  /** The person or organization who created the GPX file. */
  readonly author?: Person;
  /** Copyright and license information (GPX 1.1 only). */
  readonly copyright?: Copyright;
  /** URLs associated with the location described in the file. */
  readonly links: readonly Link[];
  /** The creation date of the file. */
  readonly time?: Date;
  /** Keywords associated with the file. */
  readonly keywords?: string;
  /** Minimum and maximum coordinates which describe the extent of the data. */
  readonly bounds?: Rect;
  /** Raw XML inside `<extensions>`. */
  readonly extensions?: string;
}

/** The fix kinds defined by GPX. */
export type KnownFixType = "none" | "2d" | "3d" | "dgps" | "pps";

/**
 * Type of GPS fix. Values outside the GPX list are kept verbatim as
 * `{ type: "other" }` so they survive a round trip.
 */
export type Fix =
  | { readonly type: KnownFixType }
  | { readonly type: "other"; readonly value: string };

const KNOWN_FIXES: ReadonlySet<string> = new Set<KnownFixType>([
  "none",
  "2d",
  "3d",
  "dgps",
  "pps",
]);

function isKnownFix(text: string): text is KnownFixType {
  return KNOWN_FIXES.has(text);
}

/**
 * Maps the text of a `<fix>` element to a {@linkcode Fix}.
 *
 * @example Usage
 * ```ts
 * import { fixFromString } from "gpx-codec/types";
 *
 * fixFromString("3d"); // { type: "3d" }
 * fixFromString("KF_4SV_OR_MORE"); // { type: "other", value: "KF_4SV_OR_MORE" }
 * ```
 *
 * @param text The element text.
 * @returns The matching fix.
 */
export function fixFromString(text: string): Fix {
  return isKnownFix(text) ? { type: text } : { type: "other", value: text };
}

/**
 * Renders a {@linkcode Fix} back to the text of a `<fix>` element.
 *
 * @param fix The fix to render.
 * @returns The element text.
 */
export function fixToString(fix: Fix): string {
  return fix.type === "other" ? fix.value : fix.type;
}

/**
 * A waypoint, point of interest, or named feature on a map. Track points and
 * route points share this shape.
 */
export interface Waypoint {
  /** The geographical point. */
  readonly point: Point;
  /** Elevation (in meters) of the point. */
  readonly elevation?: number;
  /** Instantaneous speed at the point, in meters per second (GPX 1.0 only). */
  readonly speed?: number;
  /** Instantaneous course at the point, in degrees (GPX 1.0 only). */
  readonly course?: number;
  /** Creation/modification timestamp, in UTC. */
  readonly time?: Date;
  /** Magnetic variation at the point, in degrees. */
  readonly magneticVariation?: number;
  /** Height (in meters) of geoid above the WGS84 ellipsoid. */
  readonly geoidHeight?: number;
  /** The GPS name of the waypoint. */
  readonly name?: string;
  /** GPS waypoint comment. */
  readonly comment?: string;
  /** A text description of the element, intended for the user. */
  readonly description?: string;
  /** Source of data, e.g. "Garmin eTrex". */
  readonly source?: string;
  /** Links to additional information about the waypoint. */
  readonly links: readonly Link[];
  /** Text of GPS symbol name. */
  readonly symbol?: string;
  /** Type (classification) of the waypoint. */
  readonly type?: string;
  /** Type of GPS fix. */
  readonly fix?: Fix;
  /** Number of satellites used to calculate the fix. */
  readonly satellites?: number;
  /** Horizontal dilution of precision. */
  readonly hdop?: number;
  /** Vertical dilution of precision. */
  readonly vdop?: number;
  /** Positional dilution of precision. */
  readonly pdop?: number;
  /** Seconds since the last DGPS update. */
  readonly dgpsAge?: number;
  /** ID of the DGPS station used in differential correction, in [0, 1023]. */
  readonly dgpsId?: number;
  /** Raw XML inside `<extensions>`. */
  readonly extensions?: string;
}

/**
 * A continuous span of track points. A new segment starts wherever GPS
 * reception was lost or the receiver was turned off.
 */
export interface TrackSegment {
  readonly points: readonly Waypoint[];
  /** Raw XML inside `<extensions>`. */
  readonly extensions?: string;
}

/** Descriptive fields shared by tracks and routes. */
export interface PathDescription {
  /** GPS name. */
  readonly name?: string;
  /** GPS comment. */
  readonly comment?: string;
  /** User description. */
  readonly description?: string;
  /** Source of data. */
  readonly source?: string;
  /** Links to external information. */
  readonly links: readonly Link[];
  /** GPS number. */
  readonly number?: number;
  /** Type (classification). */
  readonly type?: string;
  /** Raw XML inside `<extensions>`. */
  readonly extensions?: string;
}

/** An ordered list of points describing a path, split into segments. */
export interface Track extends PathDescription {
  readonly segments: readonly TrackSegment[];
}

/** An ordered list of waypoints leading to a destination. */
export interface Route extends PathDescription {
  readonly points: readonly Waypoint[];
}

/** A whole GPX document. */
export interface Gpx {
  /** The schema version the document was read from or will be written as. */
  readonly version: GpxVersion;
  /** Name or URL of the software that created the document. */
  readonly creator?: string;
  /** Information about the document, if any was present. */
  readonly metadata?: Metadata;
  /** Top-level waypoints. */
  readonly waypoints: readonly Waypoint[];
  /** Tracks. */
  readonly tracks: readonly Track[];
  /** Routes. */
  readonly routes: readonly Route[];
  /** Raw XML inside the root `<extensions>`. */
  readonly extensions?: string;
  /**
   * Prefixed namespace declarations on `<gpx>`, keyed by prefix, e.g.
   * `{ gpxtpx: "http://www.garmin.com/xmlschemas/TrackPointExtension/v1" }`.
   * Extension markup usually depends on them.
   */
  readonly namespaces?: Readonly<Record<string, string>>;
}

/**
 * Creates a {@linkcode Point}, rejecting coordinates outside the WGS84 range.
 * Latitude is checked against [-90, 90], longitude against [-180, 180).
 *
 * @example Usage
 * ```ts
 * import { createPoint } from "gpx-codec/types";
 *
 * const point = createPoint(-77.0365, 38.8977);
 * ```
 *
 * @param lon Longitude in decimal degrees.
 * @param lat Latitude in decimal degrees.
 * @returns The point.
 * @throws {GpxValueError} If either coordinate is out of range.
 */
export function createPoint(lon: number, lat: number): Point {
  if (!(lat >= -90 && lat <= 90)) {
    throw new GpxValueError(
      "latitude_out_of_range",
      String(lat),
      `Latitude ${lat} is outside [-90, 90]`,
    );
  }
  if (!(lon >= -180 && lon < 180)) {
    throw new GpxValueError(
      "longitude_out_of_range",
      String(lon),
      `Longitude ${lon} is outside [-180, 180)`,
    );
  }
  return { lon, lat };
}

/**
 * Creates a {@linkcode Rect}. Corners are never swapped: a minimum larger
 * than its maximum is an error.
 *
 * @example Usage
 * ```ts
 * import { createRect } from "gpx-codec/types";
 *
 * const bounds = createRect(
 *   { lon: -74.03, lat: 45.48 },
 *   { lon: -73.58, lat: 45.70 },
 * );
 * ```
 *
 * @param min The corner with the smallest longitude and latitude.
 * @param max The corner with the largest longitude and latitude.
 * @returns The bounding box.
 * @throws {GpxValueError} If `min` exceeds `max` on either axis.
 */
export function createRect(min: Point, max: Point): Rect {
  if (min.lon > max.lon) {
    throw new GpxValueError(
      "invalid_bounds",
      `${min.lon} > ${max.lon}`,
      `Minimum longitude ${min.lon} is larger than maximum longitude ${max.lon}`,
    );
  }
  if (min.lat > max.lat) {
    throw new GpxValueError(
      "invalid_bounds",
      `${min.lat} > ${max.lat}`,
      `Minimum latitude ${min.lat} is larger than maximum latitude ${max.lat}`,
    );
  }
  return { min, max };
}

/**
 * Options for {@linkcode parse}.
 *
 * @example Usage
 * ```ts
 * import type { ParseOptions } from "gpx-codec/types";
 *
 * const options: ParseOptions = { trackPosition: false };
 * ```
 */
export interface ParseOptions {
  /**
   * If true, record line/column positions on events and grammar errors.
   *
   * @default {true}
   */
  readonly trackPosition?: boolean;
}

/**
 * Options for {@linkcode write} and {@linkcode stringify}.
 *
 * @example Usage
 * ```ts
 * import type { WriteOptions } from "gpx-codec/types";
 *
 * const options: WriteOptions = { indent: "\t", declaration: false };
 * ```
 */
export interface WriteOptions {
  /**
   * Indentation string for each nesting level.
   *
   * @default {"  "}
   */
  readonly indent?: string;

  /**
   * If true, start the output with an XML declaration.
   *
   * @default {true}
   */
  readonly declaration?: boolean;
}

/**
 * Anything that accepts string chunks, such as a Node.js `Writable` or an
 * array-backed buffer.
 */
export interface GpxSink {
  write(chunk: string): unknown;
}
