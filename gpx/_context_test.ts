// Copyright 2018-2026 the Deno authors. MIT license.

import { expect, test } from "vitest";
import {
  consumeChildren,
  findAttribute,
  ParseContext,
  parseDecimal,
  parseInteger,
  requireAttribute,
  verifyStartingTag,
} from "./_context.ts";
import { XmlEventReader } from "./_events.ts";
import { GpxGrammarError, GpxValueError } from "./errors.ts";
import { GpxVersion } from "./types.ts";
import { catchError, contextOf } from "./_test_utils.ts";

// =============================================================================
// ParseContext
// =============================================================================

test("ParseContext starts with an unknown version", () => {
  const context = new ParseContext(new XmlEventReader(["<gpx/>"]));

  expect(context.version).toBe(GpxVersion.Unknown);
  expect(context.isGpx10).toBe(false);
  context.version = GpxVersion.Gpx10;
  expect(context.isGpx10).toBe(true);
});

// =============================================================================
// verifyStartingTag()
// =============================================================================

test("verifyStartingTag() returns the start event with its attributes", () => {
  const context = contextOf('<link href="https://example.com"/>');

  const start = verifyStartingTag(context, "link");
  expect(findAttribute(start, "href")).toBe("https://example.com");
  expect(findAttribute(start, "type")).toBeUndefined();
  expect(context.peek()).toMatchObject({ type: "end_element" });
});

test("verifyStartingTag() skips whitespace before the tag", () => {
  const context = contextOf("<gpx>\n  <wpt/></gpx>");

  verifyStartingTag(context, "gpx");
  expect(verifyStartingTag(context, "wpt").name.local).toBe("wpt");
});

test("verifyStartingTag() rejects another element", () => {
  const error = catchError(
    () => verifyStartingTag(contextOf("<trk/>"), "gpx"),
    GpxGrammarError,
  );

  expect(error.kind).toBe("invalid_child_element");
  expect(error.tag).toBe("trk");
  expect(error.parent).toBe("gpx");
});

test("verifyStartingTag() rejects text", () => {
  const context = contextOf("<gpx> oops <wpt/></gpx>");
  verifyStartingTag(context, "gpx");

  const error = catchError(
    () => verifyStartingTag(context, "wpt"),
    GpxGrammarError,
  );
  expect(error.kind).toBe("unexpected_text");
  expect(error.tag).toBe("oops");
  expect(error.parent).toBe("wpt");
});

test("verifyStartingTag() rejects an end tag", () => {
  const context = contextOf("<gpx></gpx>");
  verifyStartingTag(context, "gpx");

  const error = catchError(
    () => verifyStartingTag(context, "wpt"),
    GpxGrammarError,
  );
  expect(error.kind).toBe("invalid_closing_tag");
  expect(error.tag).toBe("gpx");
  expect(error.parent).toBe("wpt");
});

test("verifyStartingTag() reports a missing opening tag at end of input", () => {
  const context = contextOf("<gpx/>");
  context.next();
  context.next();

  const error = catchError(
    () => verifyStartingTag(context, "wpt"),
    GpxGrammarError,
  );
  expect(error.kind).toBe("missing_opening_tag");
  expect(error.message).toBe("Missing opening tag for wpt");
});

test("verifyStartingTag() includes the position in the message", () => {
  const context = contextOf("<gpx>\n<foo/></gpx>");
  verifyStartingTag(context, "gpx");

  const error = catchError(
    () => verifyStartingTag(context, "wpt"),
    GpxGrammarError,
  );
  expect(error.position?.line).toBe(2);
  expect(error.message.startsWith("Invalid child element 'foo' in wpt at line 2, column ")).toBe(true);
});

test("verifyStartingTag() leaves the position out when not tracking", () => {
  const context = new ParseContext(
    new XmlEventReader(["<gpx>\n<foo/></gpx>"], { trackPosition: false }),
  );
  verifyStartingTag(context, "gpx");

  const error = catchError(
    () => verifyStartingTag(context, "wpt"),
    GpxGrammarError,
  );
  expect(error.position).toBeUndefined();
  expect(error.message).toBe("Invalid child element 'foo' in wpt");
});

// =============================================================================
// consumeChildren()
// =============================================================================

test("consumeChildren() dispatches children and skips text", () => {
  const context = contextOf("<trkseg>\n  <a/>\n  <b/>\n</trkseg><!-- end -->");
  verifyStartingTag(context, "trkseg");
  const seen: string[] = [];

  consumeChildren(context, "trkseg", (child) => {
    seen.push(child.name.local);
    verifyStartingTag(context, child.name.local);
    consumeChildren(context, child.name.local, () => {});
  });
  expect(seen).toEqual(["a", "b"]);
  expect(context.next()).toBeUndefined();
});

test("consumeChildren() rejects a foreign end tag", () => {
  const context = contextOf("<a><b></b></a>");
  verifyStartingTag(context, "a");
  verifyStartingTag(context, "b");

  const error = catchError(
    () => consumeChildren(context, "x", () => {}),
    GpxGrammarError,
  );
  expect(error.kind).toBe("invalid_closing_tag");
  expect(error.tag).toBe("b");
  expect(error.parent).toBe("x");
});

test("consumeChildren() reports a missing closing tag at end of input", () => {
  const context = contextOf("<a></a>");
  context.next();
  context.next();

  const error = catchError(
    () => consumeChildren(context, "a", () => {}),
    GpxGrammarError,
  );
  expect(error.kind).toBe("missing_closing_tag");
  expect(error.parent).toBe("a");
});

// =============================================================================
// Attributes
// =============================================================================

test("requireAttribute() names the attribute and the element", () => {
  const start = verifyStartingTag(contextOf("<link/>"), "link");

  const error = catchError(
    () => requireAttribute(start, "href"),
    GpxGrammarError,
  );
  expect(error.kind).toBe("missing_attribute");
  expect(error.tag).toBe("href");
  expect(error.parent).toBe("link");
  expect(error.message.startsWith("Element link lacks required attribute 'href'"))
    .toBe(true);
});

// =============================================================================
// Numbers
// =============================================================================

test("parseDecimal() accepts decimal and exponent notation", () => {
  expect(parseDecimal("4.46", "ele")).toBe(4.46);
  expect(parseDecimal(" -1.2e3 ", "ele")).toBe(-1200);
  expect(parseDecimal("+.5", "ele")).toBe(0.5);
  expect(parseDecimal("7.", "ele")).toBe(7);
});

test("parseDecimal() rejects anything else", () => {
  for (const text of ["", "1,5", "NaN", "Infinity", "0x10", "1e400", "- 1"]) {
    const error = catchError(() => parseDecimal(text, "ele"), GpxValueError);
    expect(error.kind).toBe("invalid_number");
    expect(error.value).toBe(text);
  }
  expect(catchError(() => parseDecimal("abc", "wpt@lat"), GpxValueError).message)
    .toBe("Invalid number 'abc' in wpt@lat");
});

test("parseInteger() accepts non-negative integers only", () => {
  expect(parseInteger("12", "sat")).toBe(12);
  expect(parseInteger(" +3 ", "sat")).toBe(3);
  for (const text of ["-1", "1.5", "", "1e3", "99999999999999999999"]) {
    const error = catchError(() => parseInteger(text, "sat"), GpxValueError);
    expect(error.kind).toBe("invalid_integer");
  }
});
