// Copyright 2018-2026 the Deno authors. MIT license.
// This module is browser compatible.

/**
 * Internal consumer for the `<gpx>` root element.
 *
 * @module
 */

import { GpxGrammarError, GpxVersionError } from "./errors.ts";
import {
  type Gpx,
  GpxVersion,
  type Metadata,
  type ParseOptions,
  type Person,
  type Rect,
} from "./types.ts";
import {
  consumeChildren,
  type Draft,
  findAttribute,
  invalidChild,
  ParseContext,
  positionOf,
  requireAttribute,
  verifyStartingTag,
} from "./_context.ts";
import { XmlEventReader, type XmlStartElementEvent } from "./_events.ts";
import { WHITESPACE_ONLY_RE } from "./_common.ts";
import { consumeBounds, consumeString, consumeTime } from "./_primitives.ts";
import { checkEmail, legacyLink } from "./_compound.ts";
import { consumeExtensions } from "./_extensions.ts";
import { consumeWaypoint } from "./_waypoint.ts";
import { consumeMetadata, consumeRoute, consumeTrack } from "./_containers.ts";

/** The document-level fields GPX 1.0 puts directly under `<gpx>`. */
interface LegacyMetadata {
  name?: string;
  description?: string;
  author?: string;
  email?: string;
  url?: string;
  urlname?: string;
  time?: Date;
  keywords?: string;
  bounds?: Rect;
}

/**
 * Maps the `version` attribute to a {@linkcode GpxVersion}.
 *
 * @throws {GpxVersionError} For anything but `1.0` and `1.1`.
 */
export function parseVersion(text: string): GpxVersion {
  switch (text) {
    case "1.0":
      return GpxVersion.Gpx10;
    case "1.1":
      return GpxVersion.Gpx11;
    default:
      throw new GpxVersionError(text);
  }
}

function consumeLegacyField(
  context: ParseContext,
  child: XmlStartElementEvent,
  legacy: LegacyMetadata,
): boolean {
  switch (child.name.local) {
    case "name":
      legacy.name = consumeString(context, "name");
      return true;
    case "desc":
      legacy.description = consumeString(context, "desc", true);
      return true;
    case "author":
      legacy.author = consumeString(context, "author", true);
      return true;
    case "email":
      legacy.email = checkEmail(consumeString(context, "email"));
      return true;
    case "url":
      legacy.url = consumeString(context, "url");
      return true;
    case "urlname":
      legacy.urlname = consumeString(context, "urlname", true);
      return true;
    case "time":
      legacy.time = consumeTime(context);
      return true;
    case "keywords":
      legacy.keywords = consumeString(context, "keywords", true);
      return true;
    case "bounds":
      legacy.bounds = consumeBounds(context);
      return true;
    default:
      return false;
  }
}

/** Collects the `xmlns:prefix` declarations of the root element. */
function namespaceDeclarations(
  start: XmlStartElementEvent,
): Record<string, string> | undefined {
  const namespaces: Record<string, string> = {};
  let found = false;
  for (const attribute of start.attributes) {
    if (attribute.name.prefix !== "xmlns") continue;
    namespaces[attribute.name.local] = attribute.value;
    found = true;
  }
  return found ? namespaces : undefined;
}

function nonEmpty(value: string | undefined): value is string {
  return value !== undefined && value !== "";
}

/**
 * Assembles GPX 1.0 root fields into {@linkcode Metadata}. An author is only
 * created when one of its own fields carries text, and the metadata only
 * when at least one field ends up set.
 */
function buildLegacyMetadata(legacy: LegacyMetadata): Metadata | undefined {
  const author: Draft<Person> = {};
  if (nonEmpty(legacy.author)) author.name = legacy.author;
  if (nonEmpty(legacy.email)) author.email = legacy.email;
  const link = legacyLink(legacy.url, legacy.urlname);
  if (link !== undefined) author.link = link;

  const metadata: Draft<Metadata> = { links: [] };
  let present = false;
  if (Object.keys(author).length > 0) {
    metadata.author = author;
    present = true;
  }
  if (legacy.name !== undefined) {
    metadata.name = legacy.name;
    present = true;
  }
  if (legacy.description !== undefined) {
    metadata.description = legacy.description;
    present = true;
  }
  if (legacy.time !== undefined) {
    metadata.time = legacy.time;
    present = true;
  }
  if (legacy.keywords !== undefined) {
    metadata.keywords = legacy.keywords;
    present = true;
  }
  if (legacy.bounds !== undefined) {
    metadata.bounds = legacy.bounds;
    present = true;
  }
  return present ? metadata : undefined;
}

/**
 * Consumes the `<gpx>` root element and everything inside it.
 *
 * The `version` attribute is read first and stored on the context, so every
 * consumer below sees the grammar it has to enforce. In GPX 1.0 documents
 * the document-level fields are collected from the root and assembled into
 * {@linkcode Metadata} once the root closes.
 *
 * @param context The parse context.
 * @returns The document.
 * @throws {GpxVersionError} If `version` is neither `1.0` nor `1.1`.
 * @throws {GpxGrammarError} If the document breaks the GPX grammar.
 */
export function consumeGpx(context: ParseContext): Gpx {
  const start = verifyStartingTag(context, "gpx");
  context.version = parseVersion(requireAttribute(start, "version"));

  const gpx: Draft<Gpx> = {
    version: context.version,
    waypoints: [],
    tracks: [],
    routes: [],
  };
  const creator = findAttribute(start, "creator");
  if (creator !== undefined) gpx.creator = creator;
  const namespaces = namespaceDeclarations(start);
  if (namespaces !== undefined) gpx.namespaces = namespaces;
  const legacy: LegacyMetadata = {};

  consumeChildren(context, "gpx", (child) => {
    switch (child.name.local) {
      case "wpt":
        gpx.waypoints.push(consumeWaypoint(context, "wpt"));
        return;
      case "trk":
        gpx.tracks.push(consumeTrack(context));
        return;
      case "rte":
        gpx.routes.push(consumeRoute(context));
        return;
      case "extensions":
        gpx.extensions = consumeExtensions(context);
        return;
    }

    if (context.isGpx10) {
      if (consumeLegacyField(context, child, legacy)) return;
    } else if (child.name.local === "metadata") {
      if (gpx.metadata !== undefined) {
        throw new GpxGrammarError(
          "tag_opened_twice",
          child.name.raw,
          "gpx",
          positionOf(child),
        );
      }
      gpx.metadata = consumeMetadata(context);
      return;
    }

    throw invalidChild(child, "gpx");
  });

  if (context.isGpx10) {
    const metadata = buildLegacyMetadata(legacy);
    if (metadata !== undefined) gpx.metadata = metadata;
  }
  return gpx;
}

/**
 * Parses a whole document handed over as text chunks. Only whitespace may
 * follow the root element.
 *
 * @param chunks The document text.
 * @param options Parse options.
 * @returns The document.
 */
export function parseDocument(
  chunks: Iterable<string>,
  options?: ParseOptions,
): Gpx {
  const reader = new XmlEventReader(chunks, {
    trackPosition: options?.trackPosition ?? true,
  });
  const context = new ParseContext(reader);
  const gpx = consumeGpx(context);

  for (;;) {
    const event = context.next();
    if (event === undefined) return gpx;
    switch (event.type) {
      case "start_element":
        throw invalidChild(event, "document");
      case "end_element":
        throw new GpxGrammarError(
          "invalid_closing_tag",
          event.name.raw,
          "document",
          positionOf(event),
        );
      case "text":
        if (!WHITESPACE_ONLY_RE.test(event.text)) {
          throw new GpxGrammarError(
            "unexpected_text",
            event.text.trim(),
            "document",
            positionOf(event),
          );
        }
    }
  }
}
