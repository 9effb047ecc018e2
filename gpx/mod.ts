// Copyright 2018-2026 the Deno authors. MIT license.
// This module is browser compatible.

/**
 * Reading and writing of GPX (GPS Exchange Format) documents, in both the
 * GPX 1.0 and the GPX 1.1 schema.
 *
 * Documents are read in a single forward pass over the XML, one element
 * consumer per GPX element, and come back as plain readonly objects. The two
 * schema generations share one model: the document fields GPX 1.0 keeps
 * directly under `<gpx>` are collected into `metadata`, and the writer
 * flattens them out again when asked for GPX 1.0.
 *
 * ```ts ignore
 * import { parse, stringify } from "gpx-codec";
 *
 * const gpx = parse(
 *   `<gpx version="1.1" creator="example">` +
 *     `<wpt lat="1.23" lon="2.34"></wpt>` +
 *     `<wpt lon="10.256" lat="-81.324">` +
 *     `<time>2001-10-26T19:32:52+00:00</time>` +
 *     `</wpt>` +
 *     `</gpx>`,
 * );
 * gpx.waypoints.length; // 2
 * gpx.waypoints[1]?.time?.toISOString(); // "2001-10-26T19:32:52.000Z"
 *
 * const xml = stringify({ ...gpx, version: "1.0" });
 * ```
 *
 * ## Extensions
 *
 * The content of `<extensions>` elements is not interpreted. It is kept as
 * raw XML in the `extensions` field of the owning object and written back
 * unchanged.
 *
 * ## Errors
 *
 * Every failure is a {@linkcode GpxError}. The first problem found aborts
 * the whole parse or write.
 *
 * @module
 */

export * from "./errors.ts";
export * from "./types.ts";
export * from "./parse.ts";
export * from "./parse_stream.ts";
export * from "./write.ts";
