// Copyright 2018-2026 the Deno authors. MIT license.
// This module is browser compatible.

/**
 * Internal pass-through consumer for `<extensions>` blocks.
 *
 * Extension content is outside the GPX grammar, so nothing inside is
 * validated beyond nesting. The subtree is re-serialized into a string that
 * the writer can emit again unchanged.
 *
 * @module
 */

import { GpxGrammarError } from "./errors.ts";
import {
  type ParseContext,
  positionOf,
  verifyStartingTag,
} from "./_context.ts";
import type { XmlStartElementEvent } from "./_events.ts";
import { encodeAttributeValue, encodeEntities } from "./_entities.ts";

interface OpenTag {
  readonly name: string;
  readonly selfClosing: boolean;
}

function serializeStartTag(event: XmlStartElementEvent): string {
  let tag = `<${event.name.raw}`;
  for (const attribute of event.attributes) {
    tag += ` ${attribute.name.raw}="${encodeAttributeValue(attribute.value)}"`;
  }
  return tag + (event.selfClosing ? "/>" : ">");
}

/**
 * Consumes an `<extensions>` element and everything inside it, including
 * vendor blocks that nest further `<extensions>` elements.
 *
 * @example Usage
 * ```ts ignore
 * // <extensions><gpxtpx:hr>142</gpxtpx:hr></extensions>
 * consumeExtensions(context); // "<gpxtpx:hr>142</gpxtpx:hr>"
 * ```
 *
 * @param context The parse context.
 * @returns The inner XML of the element.
 * @throws {GpxGrammarError} On an end tag that does not match the most
 * recently opened element, or when input ends inside the block.
 */
export function consumeExtensions(context: ParseContext): string {
  const start = verifyStartingTag(context, "extensions");
  // Elements opened inside the block and not yet closed. The block itself
  // ends when an end tag arrives while this is empty.
  const open: OpenTag[] = [];
  let xml = "";

  for (;;) {
    const event = context.next();
    if (event === undefined) {
      throw new GpxGrammarError(
        "missing_closing_tag",
        "extensions",
        "extensions",
      );
    }
    switch (event.type) {
      case "start_element":
        open.push({ name: event.name.raw, selfClosing: event.selfClosing });
        xml += serializeStartTag(event);
        break;
      case "text":
        xml += encodeEntities(event.text);
        break;
      case "end_element": {
        const top = open.pop();
        const expected = top?.name ?? start.name.raw;
        if (event.name.raw !== expected) {
          throw new GpxGrammarError(
            "invalid_closing_tag",
            event.name.raw,
            expected,
            positionOf(event),
          );
        }
        if (top === undefined) return xml;
        if (!top.selfClosing) xml += `</${top.name}>`;
        break;
      }
    }
  }
}
