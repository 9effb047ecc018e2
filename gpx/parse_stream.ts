// Copyright 2018-2026 the Deno authors. MIT license.

/**
 * Reads a GPX document from an asynchronous source, such as a Node.js
 * `Readable` or a web `ReadableStream`.
 *
 * @module
 */

import type { Gpx, ParseOptions } from "./types.ts";
import { parseDocument } from "./_gpx.ts";

/**
 * Decodes a mix of text and UTF-8 byte chunks into text chunks. Multi-byte
 * sequences split across byte chunks are kept intact.
 */
async function collectText(
  source: AsyncIterable<string | Uint8Array>,
): Promise<string[]> {
  const decoder = new TextDecoder();
  const chunks: string[] = [];
  for await (const chunk of source) {
    const text = typeof chunk === "string"
      ? decoder.decode() + chunk
      : decoder.decode(chunk, { stream: true });
    if (text.length > 0) chunks.push(text);
  }
  // Flush any remaining bytes
  const rest = decoder.decode();
  if (rest.length > 0) chunks.push(rest);
  return chunks;
}

/**
 * Parses a GPX document from an asynchronous source of text or byte chunks.
 *
 * The chunks are collected first and then parsed exactly like
 * {@linkcode parse}, so a failure never leaves a partial document behind.
 *
 * @example Reading a file
 * ```ts ignore
 * import { createReadStream } from "node:fs";
 * import { parseStream } from "gpx-codec";
 *
 * const gpx = await parseStream(createReadStream("ride.gpx"));
 * console.log(gpx.tracks.length);
 * ```
 *
 * @param source Any async iterable of strings or UTF-8 bytes.
 * @param options Parse options.
 * @returns The document.
 * @throws {GpxError} Whatever {@linkcode parse} would throw for the same text.
 */
export async function parseStream(
  source: AsyncIterable<string | Uint8Array>,
  options?: ParseOptions,
): Promise<Gpx> {
  return parseDocument(await collectText(source), options);
}
