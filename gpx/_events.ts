// Copyright 2018-2026 the Deno authors. MIT license.
// This module is browser compatible.

/**
 * Internal tokenizer adapter.
 *
 * Wraps a strict `sax` parser into a lazy, peekable sequence of structural
 * events. Input is handed to the tokenizer one chunk at a time, and only
 * when the consumer asks for an event that has not been produced yet.
 *
 * CDATA sections are reported as plain text. Comments, processing
 * instructions and the doctype are dropped.
 *
 * @module
 */

import * as sax from "sax";
import { type GpxPosition, GpxXmlError } from "./errors.ts";
import { createCachedNameParser } from "./_common.ts";

/** A qualified XML name with optional namespace prefix. */
export interface XmlName {
  /** The name as written, including any prefix. */
  readonly raw: string;
  /** The local part of the name (after the colon, or the whole name). */
  readonly local: string;
  /** The namespace prefix (before the colon), if present. */
  readonly prefix?: string;
}

/** An XML attribute with its qualified name and value. */
export interface XmlAttribute {
  /** The qualified name of the attribute. */
  readonly name: XmlName;
  /** The decoded attribute value. */
  readonly value: string;
}

/** Event emitted when an element start tag is encountered. */
export interface XmlStartElementEvent extends GpxPosition {
  /** The event type discriminant. */
  readonly type: "start_element";
  /** The qualified name of the element. */
  readonly name: XmlName;
  /** The attributes on the element, in document order. */
  readonly attributes: ReadonlyArray<XmlAttribute>;
  /** Whether this is a self-closing tag (`<foo/>`). */
  readonly selfClosing: boolean;
}

/**
 * Event emitted when an element end tag is encountered. Self-closing tags
 * produce an end event too.
 */
export interface XmlEndElementEvent extends GpxPosition {
  /** The event type discriminant. */
  readonly type: "end_element";
  /** The qualified name of the element. */
  readonly name: XmlName;
}

/** Event emitted for text content, including whitespace and CDATA. */
export interface XmlTextEvent extends GpxPosition {
  /** The event type discriminant. */
  readonly type: "text";
  /** The decoded text content. */
  readonly text: string;
}

/** Discriminated union of the events the consumers work on. */
export type XmlEvent =
  | XmlStartElementEvent
  | XmlEndElementEvent
  | XmlTextEvent;

/** Options for {@linkcode XmlEventReader}. */
export interface XmlEventReaderOptions {
  /**
   * If true, record line/column positions on events and tokenizer errors.
   *
   * @default {true}
   */
  readonly trackPosition?: boolean;
}

/** A sequence of XML events with one event of lookahead. */
export interface XmlEventSource {
  /** Returns the next event without consuming it. */
  peek(): XmlEvent | undefined;
  /** Consumes and returns the next event. */
  next(): XmlEvent | undefined;
}

const NO_POSITION: GpxPosition = { line: 0, column: 0, offset: 0 };

/**
 * Pull-based, one-event-lookahead reader over XML text.
 *
 * Events produced before a tokenizer failure are still delivered; the
 * failure is thrown as a {@linkcode GpxXmlError} once they run out.
 *
 * @example Usage
 * ```ts ignore
 * const reader = new XmlEventReader(["<gpx version='1.1'/>"]);
 * reader.peek()?.type; // "start_element"
 * reader.next();
 * reader.next()?.type; // "end_element"
 * reader.next();       // undefined
 * ```
 */
export class XmlEventReader implements XmlEventSource {
  #parser: sax.SAXParser;
  #chunks: Iterator<string>;
  #trackPosition: boolean;
  #parseName = createCachedNameParser();
  #queue: XmlEvent[] = [];
  #head = 0;
  #ended = false;
  #error: GpxXmlError | undefined;

  /**
   * Constructs a new XmlEventReader.
   *
   * @param chunks The document text, in one or more chunks.
   * @param options Reader options.
   */
  constructor(chunks: Iterable<string>, options: XmlEventReaderOptions = {}) {
    this.#trackPosition = options.trackPosition ?? true;
    this.#chunks = chunks[Symbol.iterator]();
    this.#parser = sax.parser(true, { position: this.#trackPosition });

    this.#parser.onopentag = (tag) => {
      if (this.#error) return;
      const raw: Record<string, string | sax.QualifiedAttribute> =
        tag.attributes;
      const attributes: XmlAttribute[] = [];
      for (const [name, attr] of Object.entries(raw)) {
        attributes.push({
          name: this.#parseName(name),
          value: typeof attr === "string" ? attr : attr.value,
        });
      }
      this.#queue.push({
        type: "start_element",
        name: this.#parseName(tag.name),
        attributes,
        selfClosing: tag.isSelfClosing,
        ...this.#position(),
      });
    };
    this.#parser.onclosetag = (name) => {
      if (this.#error) return;
      this.#queue.push({
        type: "end_element",
        name: this.#parseName(name),
        ...this.#position(),
      });
    };
    this.#parser.ontext = (text) => this.#pushText(text);
    this.#parser.oncdata = (text) => this.#pushText(text);
    this.#parser.onerror = (error) => {
      if (this.#error) return;
      const message = error.message.split("\n", 1)[0] ?? error.message;
      this.#error = new GpxXmlError(message, this.#position(), {
        cause: error,
      });
    };
  }

  /**
   * Returns the next event without consuming it.
   *
   * @returns The next event, or `undefined` at the end of the document.
   * @throws {GpxXmlError} If the XML is malformed before the next event.
   */
  peek(): XmlEvent | undefined {
    this.#fill();
    return this.#queue[this.#head];
  }

  /**
   * Consumes and returns the next event.
   *
   * @returns The next event, or `undefined` at the end of the document.
   * @throws {GpxXmlError} If the XML is malformed before the next event.
   */
  next(): XmlEvent | undefined {
    this.#fill();
    const event = this.#queue[this.#head];
    if (event !== undefined) this.#head++;
    return event;
  }

  #fill(): void {
    while (this.#head >= this.#queue.length) {
      this.#queue = [];
      this.#head = 0;
      if (this.#error) throw this.#error;
      if (this.#ended) return;

      const chunk = this.#chunks.next();
      if (chunk.done) {
        this.#ended = true;
        this.#parser.close();
      } else {
        this.#parser.write(chunk.value);
      }
    }
  }

  #pushText(text: string): void {
    if (this.#error || text.length === 0) return;
    this.#queue.push({ type: "text", text, ...this.#position() });
  }

  #position(): GpxPosition {
    if (!this.#trackPosition) return NO_POSITION;
    return {
      line: this.#parser.line + 1,
      column: this.#parser.column + 1,
      offset: this.#parser.position,
    };
  }
}
