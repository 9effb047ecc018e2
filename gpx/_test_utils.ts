// Copyright 2018-2026 the Deno authors. MIT license.

import { GpxVersion } from "./types.ts";
import { ParseContext } from "./_context.ts";
import { XmlEventReader } from "./_events.ts";

/** Builds a parse context over an XML fragment. */
export function contextOf(
  xml: string | readonly string[],
  version: GpxVersion = GpxVersion.Gpx11,
): ParseContext {
  const chunks = typeof xml === "string" ? [xml] : xml;
  return new ParseContext(new XmlEventReader(chunks), version);
}

/**
 * Runs `fn` and returns the error it throws, which must be an instance of
 * `ErrorClass`, so that its fields can be checked. Where the class is all
 * that matters, use `expect(fn).toThrow(ErrorClass)`.
 */
export function catchError<E extends Error>(
  fn: () => unknown,
  ErrorClass: new (...args: never[]) => E,
): E {
  try {
    fn();
  } catch (error) {
    if (error instanceof ErrorClass) return error;
    throw error;
  }
  throw new Error(`Expected ${ErrorClass.name} to be thrown`);
}
