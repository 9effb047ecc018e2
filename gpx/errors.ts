// Copyright 2018-2026 the Deno authors. MIT license.
// This module is browser compatible.

/**
 * Error types raised while reading or writing GPX documents.
 *
 * Every failure is a subclass of {@linkcode GpxError}, so callers can catch
 * the whole family at once and narrow with `instanceof` or the `kind` field.
 *
 * @module
 */

/**
 * Position information for error reporting.
 *
 * @example Usage
 * ```ts
 * import type { GpxPosition } from "gpx-codec/errors";
 *
 * const pos: GpxPosition = { line: 10, column: 5, offset: 150 };
 * ```
 */
export interface GpxPosition {
  /** Line number (1-indexed). */
  readonly line: number;
  /** Column number (1-indexed). */
  readonly column: number;
  /** Character offset in the input. */
  readonly offset: number;
}

function at(position: GpxPosition | undefined): string {
  return position === undefined
    ? ""
    : ` at line ${position.line}, column ${position.column}`;
}

/**
 * Base class of every error thrown by this library.
 *
 * @example Usage
 * ```ts
 * import { parse } from "gpx-codec";
 * import { GpxError } from "gpx-codec/errors";
 *
 * try {
 *   parse("<gpx version='2.0'></gpx>");
 * } catch (error) {
 *   if (error instanceof GpxError) console.error(error.message);
 * }
 * ```
 */
export class GpxError extends Error {
  /**
   * Constructs a new GpxError.
   *
   * @param message The error message.
   * @param options Standard error options, such as the `cause`.
   */
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "GpxError";
  }
}

/**
 * Raised when the underlying XML is not well-formed, e.g. an unterminated
 * tag or a mismatched end tag. The tokenizer's own error is kept as `cause`.
 */
export class GpxXmlError extends GpxError {
  /** The line number where the tokenizer stopped (1-indexed). */
  readonly line: number;
  /** The column number where the tokenizer stopped (1-indexed). */
  readonly column: number;

  /**
   * Constructs a new GpxXmlError.
   *
   * @param message The tokenizer's message, without position details.
   * @param position Where the tokenizer stopped.
   * @param options Standard error options, such as the `cause`.
   */
  constructor(message: string, position: GpxPosition, options?: ErrorOptions) {
    super(`Malformed XML: ${message}${at(position)}`, options);
    this.name = "GpxXmlError";
    this.line = position.line;
    this.column = position.column;
  }
}

/** The ways a document can break the per-element GPX grammar. */
export type GpxGrammarErrorKind =
  | "invalid_child_element"
  | "invalid_closing_tag"
  | "missing_closing_tag"
  | "missing_opening_tag"
  | "missing_attribute"
  | "tag_opened_twice"
  | "unexpected_text";

/**
 * Raised when an element's children or attributes do not match what GPX
 * allows in that place. Both the offending tag (or attribute) and the
 * enclosing element are reported.
 *
 * @example Usage
 * ```ts
 * import { GpxGrammarError } from "gpx-codec/errors";
 *
 * const error = new GpxGrammarError("invalid_child_element", "foo", "wpt");
 * error.message; // "Invalid child element 'foo' in wpt"
 * ```
 */
export class GpxGrammarError extends GpxError {
  /** Which grammar rule was broken. */
  readonly kind: GpxGrammarErrorKind;
  /** The offending tag or attribute name. */
  readonly tag: string;
  /** The element in which the problem was found. */
  readonly parent: string;
  /** The position of the offending event, if tracked. */
  readonly position: GpxPosition | undefined;

  /**
   * Constructs a new GpxGrammarError.
   *
   * @param kind Which grammar rule was broken.
   * @param tag The offending tag or attribute name.
   * @param parent The element in which the problem was found.
   * @param position The position of the offending event.
   */
  constructor(
    kind: GpxGrammarErrorKind,
    tag: string,
    parent: string,
    position?: GpxPosition,
  ) {
    super(`${describeGrammar(kind, tag, parent)}${at(position)}`);
    this.name = "GpxGrammarError";
    this.kind = kind;
    this.tag = tag;
    this.parent = parent;
    this.position = position;
  }
}

function describeGrammar(
  kind: GpxGrammarErrorKind,
  tag: string,
  parent: string,
): string {
  switch (kind) {
    case "invalid_child_element":
      return `Invalid child element '${tag}' in ${parent}`;
    case "invalid_closing_tag":
      return `Invalid closing tag '${tag}' in ${parent}`;
    case "missing_closing_tag":
      return `Missing closing tag for ${parent}`;
    case "missing_opening_tag":
      return `Missing opening tag for ${parent}`;
    case "missing_attribute":
      return `Element ${parent} lacks required attribute '${tag}'`;
    case "tag_opened_twice":
      return `Tag '${tag}' opened twice in ${parent}`;
    case "unexpected_text":
      return `Unexpected text '${tag}' where ${parent} was expected`;
  }
}

/** The ways a well-formed value can be rejected. */
export type GpxValueErrorKind =
  | "invalid_number"
  | "invalid_integer"
  | "invalid_time"
  | "latitude_out_of_range"
  | "longitude_out_of_range"
  | "invalid_bounds"
  | "invalid_email"
  | "dgpsid_out_of_range"
  | "degrees_out_of_range";

/**
 * Raised when attribute or text content cannot be converted into the model,
 * or violates one of its invariants (coordinate ranges, bounds ordering,
 * email shape).
 */
export class GpxValueError extends GpxError {
  /** Which conversion or invariant failed. */
  readonly kind: GpxValueErrorKind;
  /** The rejected value, as text. */
  readonly value: string;

  /**
   * Constructs a new GpxValueError.
   *
   * @param kind Which conversion or invariant failed.
   * @param value The rejected value, as text.
   * @param message A description naming the field involved.
   */
  constructor(kind: GpxValueErrorKind, value: string, message: string) {
    super(message);
    this.name = "GpxValueError";
    this.kind = kind;
    this.value = value;
  }
}

/**
 * Raised when the `version` attribute is not `1.0` or `1.1` on read, or when
 * a document without a known version is written.
 */
export class GpxVersionError extends GpxError {
  /** The version that was found. */
  readonly version: string;

  /**
   * Constructs a new GpxVersionError.
   *
   * @param version The version that was found.
   */
  constructor(version: string) {
    super(`Unknown GPX version '${version}'`);
    this.name = "GpxVersionError";
    this.version = version;
  }
}

/** Raised when a text element that requires content is empty. */
export class GpxContentError extends GpxError {
  /** The element that had no content. */
  readonly tag: string;

  /**
   * Constructs a new GpxContentError.
   *
   * @param tag The element that had no content.
   */
  constructor(tag: string) {
    super(`No string content inside ${tag}`);
    this.name = "GpxContentError";
    this.tag = tag;
  }
}
