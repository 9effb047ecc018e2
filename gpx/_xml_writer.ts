// Copyright 2018-2026 the Deno authors. MIT license.
// This module is browser compatible.

/**
 * Internal event-driven XML emitter.
 *
 * @module
 */

import type { GpxSink } from "./types.ts";
import { encodeAttributeValue, encodeEntities } from "./_entities.ts";

/** Attribute name/value pairs, written in the given order. */
export type XmlAttributes = ReadonlyArray<readonly [string, string]>;

/** Options for {@linkcode XmlWriter}. */
export interface XmlWriterOptions {
  /**
   * Indentation per nesting level. An empty string writes everything on one
   * line.
   *
   * @default {"  "}
   */
  readonly indent?: string;
}

interface OpenElement {
  readonly name: string;
  /** The start tag still lacks its closing `>`. */
  pending: boolean;
  /** At least one child element was written. */
  hasChildren: boolean;
}

/**
 * Writes XML to a sink as a sequence of open, characters and close calls.
 *
 * Elements with child elements are laid out one per line; elements holding
 * only text stay on one line; empty elements are self-closed.
 *
 * @example Usage
 * ```ts ignore
 * const chunks: string[] = [];
 * const writer = new XmlWriter({ write: (c: string) => chunks.push(c) });
 * writer.startElement("wpt", [["lat", "1"], ["lon", "2"]]);
 * writer.startElement("name");
 * writer.characters("Home");
 * writer.endElement();
 * writer.endElement();
 * chunks.join(""); // '<wpt lat="1" lon="2">\n  <name>Home</name>\n</wpt>'
 * ```
 */
export class XmlWriter {
  #sink: GpxSink;
  #indent: string;
  #newline: string;
  #indentCache: string[] = [""];
  #stack: OpenElement[] = [];
  #empty = true;

  /**
   * Constructs a new XmlWriter.
   *
   * @param sink Receives the output chunks.
   * @param options Layout options.
   */
  constructor(sink: GpxSink, options: XmlWriterOptions = {}) {
    this.#sink = sink;
    this.#indent = options.indent ?? "  ";
    this.#newline = this.#indent === "" ? "" : "\n";
  }

  /** Writes `<?xml version="1.0" encoding="UTF-8"?>`. */
  declaration(): void {
    this.#write('<?xml version="1.0" encoding="UTF-8"?>');
  }

  /**
   * Opens an element.
   *
   * @param name The qualified element name.
   * @param attributes Attribute pairs; values are escaped.
   */
  startElement(name: string, attributes: XmlAttributes = []): void {
    const parent = this.#stack.at(-1);
    if (parent !== undefined) {
      this.#closeStartTag(parent);
      parent.hasChildren = true;
    }
    let tag = `<${name}`;
    for (const [attribute, value] of attributes) {
      tag += ` ${attribute}="${encodeAttributeValue(value)}"`;
    }
    this.#write(
      (this.#empty ? "" : this.#newline) + this.#indentAt(this.#stack.length) +
        tag,
    );
    this.#stack.push({ name, pending: true, hasChildren: false });
  }

  /**
   * Writes escaped text into the current element.
   *
   * @throws {TypeError} If no element is open.
   */
  characters(text: string): void {
    this.#write(this.#openForContent() + encodeEntities(text));
  }

  /**
   * Writes markup into the current element unchanged.
   *
   * @throws {TypeError} If no element is open.
   */
  raw(xml: string): void {
    this.#write(this.#openForContent() + xml);
  }

  /**
   * Closes the most recently opened element.
   *
   * @throws {TypeError} If no element is open.
   */
  endElement(): void {
    const element = this.#stack.pop();
    if (element === undefined) {
      throw new TypeError("Cannot close an element: none is open");
    }
    if (element.pending) {
      this.#write("/>");
    } else if (element.hasChildren) {
      this.#write(
        this.#newline + this.#indentAt(this.#stack.length) +
          `</${element.name}>`,
      );
    } else {
      this.#write(`</${element.name}>`);
    }
  }

  /**
   * Finishes the document with a trailing newline.
   *
   * @throws {TypeError} If an element is still open.
   */
  end(): void {
    const open = this.#stack.at(-1);
    if (open !== undefined) {
      throw new TypeError(`Cannot end the document: <${open.name}> is open`);
    }
    if (!this.#empty) this.#write(this.#newline);
  }

  #openForContent(): string {
    const element = this.#stack.at(-1);
    if (element === undefined) {
      throw new TypeError("Cannot write content outside of an element");
    }
    if (!element.pending) return "";
    element.pending = false;
    return ">";
  }

  #closeStartTag(element: OpenElement): void {
    if (!element.pending) return;
    element.pending = false;
    this.#write(">");
  }

  #indentAt(depth: number): string {
    return (this.#indentCache[depth] ??= this.#indent.repeat(depth));
  }

  #write(chunk: string): void {
    if (chunk.length === 0) return;
    this.#empty = false;
    this.#sink.write(chunk);
  }
}
