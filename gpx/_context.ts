// Copyright 2018-2026 the Deno authors. MIT license.
// This module is browser compatible.

/**
 * Internal parse context and the dispatch plumbing shared by every element
 * consumer.
 *
 * Each consumer reads exactly its own element, from the start tag to the
 * matching end tag, and leaves the reader positioned just after it.
 *
 * @module
 */

import { type GpxPosition, GpxGrammarError, GpxValueError } from "./errors.ts";
import { GpxVersion } from "./types.ts";
import type {
  XmlEvent,
  XmlEventSource,
  XmlStartElementEvent,
} from "./_events.ts";
import { WHITESPACE_ONLY_RE } from "./_common.ts";

/** A mutable copy of a model type, used while its element is being read. */
export type Draft<T> = {
  -readonly [K in keyof T]: T[K] extends readonly (infer U)[] ? U[] : T[K];
};

/**
 * The event reader plus the schema version detected on the root element.
 *
 * The version is written once, by the root consumer, before any
 * version-sensitive descendant runs.
 */
export class ParseContext {
  /** The event source. */
  readonly reader: XmlEventSource;
  /** The schema version every version-gated consumer consults. */
  version: GpxVersion;

  /**
   * Constructs a new ParseContext.
   *
   * @param reader The event source.
   * @param version The initial schema version.
   */
  constructor(
    reader: XmlEventSource,
    version: GpxVersion = GpxVersion.Unknown,
  ) {
    this.reader = reader;
    this.version = version;
  }

  /** Whether the document is GPX 1.0. */
  get isGpx10(): boolean {
    return this.version === GpxVersion.Gpx10;
  }

  /** Returns the next event without consuming it. */
  peek(): XmlEvent | undefined {
    return this.reader.peek();
  }

  /** Consumes and returns the next event. */
  next(): XmlEvent | undefined {
    return this.reader.next();
  }
}

/**
 * Returns the position of an event, or `undefined` when positions are not
 * tracked.
 */
export function positionOf(event: XmlEvent): GpxPosition | undefined {
  if (event.line === 0) return undefined;
  return { line: event.line, column: event.column, offset: event.offset };
}

/** Builds the error for a child element that `parent` does not allow. */
export function invalidChild(
  child: XmlStartElementEvent,
  parent: string,
): GpxGrammarError {
  return new GpxGrammarError(
    "invalid_child_element",
    child.name.raw,
    parent,
    positionOf(child),
  );
}

/**
 * Consumes the next event, which must open an element named `expected`.
 * Whitespace-only text in front of it is skipped.
 *
 * @param context The parse context.
 * @param expected The local name of the element to open.
 * @returns The start event, carrying the element's attributes.
 * @throws {GpxGrammarError} If the stream ends or anything else comes first.
 */
export function verifyStartingTag(
  context: ParseContext,
  expected: string,
): XmlStartElementEvent {
  for (;;) {
    const event = context.next();
    if (event === undefined) {
      throw new GpxGrammarError("missing_opening_tag", expected, expected);
    }
    switch (event.type) {
      case "start_element":
        if (event.name.local !== expected) throw invalidChild(event, expected);
        return event;
      case "end_element":
        throw new GpxGrammarError(
          "invalid_closing_tag",
          event.name.raw,
          expected,
          positionOf(event),
        );
      case "text":
        if (WHITESPACE_ONLY_RE.test(event.text)) continue;
        throw new GpxGrammarError(
          "unexpected_text",
          event.text.trim(),
          expected,
          positionOf(event),
        );
    }
  }
}

/**
 * Runs the child loop of an element whose start tag has already been
 * consumed. Each child start tag is handed to `onChild`, which must consume
 * the whole child or throw. Text between children is skipped. Returns once
 * the element's own end tag has been consumed.
 *
 * @param context The parse context.
 * @param tag The local name of the element being read.
 * @param onChild Dispatches on the child's name.
 * @throws {GpxGrammarError} On a foreign end tag or a premature end of input.
 */
export function consumeChildren(
  context: ParseContext,
  tag: string,
  onChild: (child: XmlStartElementEvent) => void,
): void {
  for (;;) {
    const event = context.peek();
    if (event === undefined) {
      throw new GpxGrammarError("missing_closing_tag", tag, tag);
    }
    switch (event.type) {
      case "start_element":
        onChild(event);
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
        context.next();
        return;
      case "text":
        context.next();
        break;
    }
  }
}

/**
 * Looks up an attribute by local name.
 *
 * @returns The attribute value, or `undefined` if absent.
 */
export function findAttribute(
  event: XmlStartElementEvent,
  name: string,
): string | undefined {
  for (const attribute of event.attributes) {
    if (attribute.name.local === name) return attribute.value;
  }
  return undefined;
}

/**
 * Looks up an attribute the element cannot do without.
 *
 * @throws {GpxGrammarError} If the attribute is absent.
 */
export function requireAttribute(
  event: XmlStartElementEvent,
  name: string,
): string {
  const value = findAttribute(event, name);
  if (value === undefined) {
    throw new GpxGrammarError(
      "missing_attribute",
      name,
      event.name.local,
      positionOf(event),
    );
  }
  return value;
}

// xsd:decimal and xsd:double, without INF/NaN.
const DECIMAL_RE = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
const INTEGER_RE = /^[+-]?\d+$/;

/**
 * Parses decimal text such as `4.46` or `-1.2e3`. Surrounding whitespace is
 * ignored.
 *
 * @param text The text to parse.
 * @param field The attribute or element the text came from.
 * @throws {GpxValueError} If the text is not a finite decimal number.
 */
export function parseDecimal(text: string, field: string): number {
  const trimmed = text.trim();
  const value = Number(trimmed);
  if (!DECIMAL_RE.test(trimmed) || !Number.isFinite(value)) {
    throw new GpxValueError(
      "invalid_number",
      text,
      `Invalid number '${text}' in ${field}`,
    );
  }
  return value;
}

/**
 * Parses non-negative integer text. Surrounding whitespace is ignored.
 *
 * @param text The text to parse.
 * @param field The attribute or element the text came from.
 * @throws {GpxValueError} If the text is not a non-negative integer.
 */
export function parseInteger(text: string, field: string): number {
  const trimmed = text.trim();
  const value = Number(trimmed);
  if (
    !INTEGER_RE.test(trimmed) || !Number.isSafeInteger(value) || value < 0
  ) {
    throw new GpxValueError(
      "invalid_integer",
      text,
      `Invalid non-negative integer '${text}' in ${field}`,
    );
  }
  return value;
}
