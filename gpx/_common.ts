// Copyright 2018-2026 the Deno authors. MIT license.
// This module is browser compatible.

/**
 * Internal shared utilities for the GPX module.
 *
 * @module
 */

import type { XmlName } from "./_events.ts";

/**
 * Whitespace-only test per XML 1.0 §2.3.
 * Uses explicit [ \t\r\n] instead of \s to match the S production:
 *   S ::= (#x20 | #x9 | #xD | #xA)+
 */
export const WHITESPACE_ONLY_RE = /^[ \t\r\n]*$/;

/** Size of the slices the input is fed to the tokenizer in. */
export const CHUNK_SIZE = 64 * 1024;

/**
 * Creates a cached name parser function.
 *
 * Returns a function that splits qualified XML names into prefix and local
 * parts. Each unique name is parsed once and cached for subsequent lookups,
 * which pays off on GPX files made of thousands of identical `trkpt`
 * elements.
 *
 * @example Usage
 * ```ts
 * import { createCachedNameParser } from "./_common.ts";
 *
 * const parseName = createCachedNameParser();
 * parseName("gpxtpx:hr"); // { raw: "gpxtpx:hr", prefix: "gpxtpx", local: "hr" }
 * parseName("trkpt");     // { raw: "trkpt", local: "trkpt" }
 * ```
 *
 * @returns A name parser function with per-instance caching
 */
export function createCachedNameParser(): (name: string) => XmlName {
  const cache: Record<string, XmlName> = Object.create(null);
  return (name: string): XmlName => {
    let cached = cache[name];
    if (cached !== undefined) {
      return cached;
    }
    const colonIndex = name.indexOf(":");
    cached = colonIndex === -1 ? { raw: name, local: name } : {
      raw: name,
      prefix: name.slice(0, colonIndex),
      local: name.slice(colonIndex + 1),
    };
    cache[name] = cached;
    return cached;
  };
}

/**
 * Splits a string or byte buffer into text chunks of at most
 * {@linkcode CHUNK_SIZE} characters. Bytes are decoded as UTF-8, keeping
 * multi-byte sequences that straddle a chunk boundary intact.
 *
 * @param input The document text or its UTF-8 bytes.
 * @returns A lazy sequence of text chunks.
 */
export function* textChunks(input: string | Uint8Array): Generator<string> {
  if (typeof input === "string") {
    for (let start = 0; start < input.length; start += CHUNK_SIZE) {
      yield input.slice(start, start + CHUNK_SIZE);
    }
    return;
  }
  const decoder = new TextDecoder();
  for (let start = 0; start < input.length; start += CHUNK_SIZE) {
    const text = decoder.decode(input.subarray(start, start + CHUNK_SIZE), {
      stream: true,
    });
    if (text.length > 0) yield text;
  }
  const rest = decoder.decode();
  if (rest.length > 0) yield rest;
}
