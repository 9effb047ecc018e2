// Copyright 2018-2026 the Deno authors. MIT license.
// This module is browser compatible.

/**
 * Reads GPX 1.0 and GPX 1.1 documents into a {@linkcode Gpx} model.
 *
 * @module
 */

import type { Gpx, ParseOptions } from "./types.ts";
import { textChunks } from "./_common.ts";
import { parseDocument } from "./_gpx.ts";

export type { ParseOptions } from "./types.ts";

/**
 * Parses a GPX document.
 *
 * The input is read front to back exactly once. The first problem found
 * aborts the parse; no partial document is returned.
 *
 * @example Usage
 * ```ts
 * import { parse } from "gpx-codec/parse";
 *
 * const gpx = parse(
 *   `<gpx version="1.1" creator="example">` +
 *     `<wpt lat="1.23" lon="2.34"><name>Start</name></wpt>` +
 *     `</gpx>`,
 * );
 * gpx.waypoints[0]?.name; // "Start"
 * ```
 *
 * @example GPX 1.0 document fields end up in `metadata`
 * ```ts
 * import { parse } from "gpx-codec/parse";
 *
 * const gpx = parse(
 *   `<gpx version="1.0"><author>Jane</author><keywords>hike</keywords></gpx>`,
 * );
 * gpx.metadata?.author?.name; // "Jane"
 * ```
 *
 * @param input The document text, or its UTF-8 bytes.
 * @param options Parse options.
 * @returns The document.
 * @throws {GpxXmlError} If the input is not well-formed XML.
 * @throws {GpxGrammarError} If the document breaks the GPX grammar.
 * @throws {GpxValueError} If a number, time, coordinate or bound is invalid.
 * @throws {GpxVersionError} If the root `version` is neither 1.0 nor 1.1.
 * @throws {GpxContentError} If a required text element is empty.
 */
export function parse(input: string | Uint8Array, options?: ParseOptions): Gpx {
  return parseDocument(textChunks(input), options);
}
