// Copyright 2018-2026 the Deno authors. MIT license.
// This module is browser compatible.

/**
 * Serializes a {@linkcode Gpx} document back to GPX 1.0 or GPX 1.1 XML.
 *
 * @module
 */

import { GpxVersionError } from "./errors.ts";
import {
  type Copyright,
  fixToString,
  type Gpx,
  type GpxSink,
  GpxVersion,
  type Link,
  type Metadata,
  type PathDescription,
  type Person,
  type Rect,
  type Route,
  type Track,
  type TrackSegment,
  type Waypoint,
  type WriteOptions,
} from "./types.ts";
import { formatTime } from "./_time.ts";
import { splitEmail } from "./_compound.ts";
import { type XmlAttributes, XmlWriter } from "./_xml_writer.ts";

export type { GpxSink, WriteOptions } from "./types.ts";
export { splitEmail } from "./_compound.ts";

/** The `creator` written for documents that do not name one. */
export const DEFAULT_CREATOR = "gpx-codec";

const NAMESPACES = {
  [GpxVersion.Gpx10]: "http://www.topografix.com/GPX/1/0",
  [GpxVersion.Gpx11]: "http://www.topografix.com/GPX/1/1",
} as const;

type KnownVersion = keyof typeof NAMESPACES;

/** Formats a number for output. `String()` drops the sign of `-0`. */
function formatNumber(value: number): string {
  return Object.is(value, -0) ? "-0" : String(value);
}

/** Emits the elements of one document in one schema version. */
class GpxEmitter {
  readonly #xml: XmlWriter;
  readonly #version: KnownVersion;

  constructor(xml: XmlWriter, version: KnownVersion) {
    this.#xml = xml;
    this.#version = version;
  }

  get #isGpx10(): boolean {
    return this.#version === GpxVersion.Gpx10;
  }

  gpx(gpx: Gpx): void {
    const attributes: [string, string][] = [
      ["version", this.#version],
      ["creator", gpx.creator ?? DEFAULT_CREATOR],
      ["xmlns", NAMESPACES[this.#version]],
    ];
    for (const [prefix, uri] of Object.entries(gpx.namespaces ?? {})) {
      attributes.push([`xmlns:${prefix}`, uri]);
    }
    this.#xml.startElement("gpx", attributes);
    if (gpx.metadata !== undefined) {
      if (this.#isGpx10) this.#flatMetadata(gpx.metadata);
      else this.#metadata(gpx.metadata);
    }
    for (const waypoint of gpx.waypoints) this.#waypoint("wpt", waypoint);
    for (const route of gpx.routes) this.#route(route);
    for (const track of gpx.tracks) this.#track(track);
    this.#extensions(gpx.extensions);
    this.#xml.endElement();
  }

  /** GPX 1.0 keeps the document fields directly under `<gpx>`. */
  #flatMetadata(metadata: Metadata): void {
    this.#string("name", metadata.name);
    this.#string("desc", metadata.description);
    const author = metadata.author;
    this.#string("author", author?.name);
    if (author?.email !== undefined) {
      const [id, domain] = splitEmail(author.email);
      this.#string("email", `${id}@${domain}`);
    }
    this.#legacyLink(author?.link);
    this.#time(metadata.time);
    this.#string("keywords", metadata.keywords);
    this.#bounds(metadata.bounds);
  }

  #metadata(metadata: Metadata): void {
    this.#xml.startElement("metadata");
    this.#string("name", metadata.name);
    this.#string("desc", metadata.description);
    if (metadata.author !== undefined) this.#person("author", metadata.author);
    if (metadata.copyright !== undefined) this.#copyright(metadata.copyright);
    for (const link of metadata.links) this.#link(link);
    this.#time(metadata.time);
    this.#string("keywords", metadata.keywords);
    this.#bounds(metadata.bounds);
    this.#extensions(metadata.extensions);
    this.#xml.endElement();
  }

  #person(tag: string, person: Person): void {
    this.#xml.startElement(tag);
    this.#string("name", person.name);
    if (person.email !== undefined) {
      const [id, domain] = splitEmail(person.email);
      this.#xml.startElement("email", [["id", id], ["domain", domain]]);
      this.#xml.endElement();
    }
    if (person.link !== undefined) this.#link(person.link);
    this.#xml.endElement();
  }

  #copyright(copyright: Copyright): void {
    this.#xml.startElement(
      "copyright",
      copyright.author === undefined ? [] : [["author", copyright.author]],
    );
    this.#value("year", copyright.year);
    this.#string("license", copyright.license);
    this.#xml.endElement();
  }

  #link(link: Link): void {
    this.#xml.startElement("link", [["href", link.href]]);
    this.#string("text", link.text);
    this.#string("type", link.type);
    this.#xml.endElement();
  }

  /** GPX 1.0 has room for a single link, as `<url>` and `<urlname>`. */
  #legacyLink(link: Link | undefined): void {
    if (link === undefined) return;
    this.#string("url", link.href);
    this.#string("urlname", link.text);
  }

  #links(links: readonly Link[]): void {
    if (this.#isGpx10) {
      this.#legacyLink(links[0]);
    } else {
      for (const link of links) this.#link(link);
    }
  }

  #waypoint(tag: string, waypoint: Waypoint): void {
    const attributes: XmlAttributes = [
      ["lat", formatNumber(waypoint.point.lat)],
      ["lon", formatNumber(waypoint.point.lon)],
    ];
    this.#xml.startElement(tag, attributes);
    this.#value("ele", waypoint.elevation);
    this.#time(waypoint.time);
    if (this.#isGpx10) {
      this.#value("course", waypoint.course);
      this.#value("speed", waypoint.speed);
    }
    this.#value("magvar", waypoint.magneticVariation);
    this.#value("geoidheight", waypoint.geoidHeight);
    this.#string("name", waypoint.name);
    this.#string("cmt", waypoint.comment);
    this.#string("desc", waypoint.description);
    this.#string("src", waypoint.source);
    this.#links(waypoint.links);
    this.#string("sym", waypoint.symbol);
    this.#string("type", waypoint.type);
    if (waypoint.fix !== undefined) {
      this.#string("fix", fixToString(waypoint.fix));
    }
    this.#value("sat", waypoint.satellites);
    this.#value("hdop", waypoint.hdop);
    this.#value("vdop", waypoint.vdop);
    this.#value("pdop", waypoint.pdop);
    this.#value("ageofdgpsdata", waypoint.dgpsAge);
    this.#value("dgpsid", waypoint.dgpsId);
    this.#extensions(waypoint.extensions);
    this.#xml.endElement();
  }

  #pathDescription(path: PathDescription): void {
    this.#string("name", path.name);
    this.#string("cmt", path.comment);
    this.#string("desc", path.description);
    this.#string("src", path.source);
    this.#links(path.links);
    this.#value("number", path.number);
    if (!this.#isGpx10) this.#string("type", path.type);
    this.#extensions(path.extensions);
  }

  #track(track: Track): void {
    this.#xml.startElement("trk");
    this.#pathDescription(track);
    for (const segment of track.segments) this.#segment(segment);
    this.#xml.endElement();
  }

  #segment(segment: TrackSegment): void {
    this.#xml.startElement("trkseg");
    for (const point of segment.points) this.#waypoint("trkpt", point);
    this.#extensions(segment.extensions);
    this.#xml.endElement();
  }

  #route(route: Route): void {
    this.#xml.startElement("rte");
    this.#pathDescription(route);
    for (const point of route.points) this.#waypoint("rtept", point);
    this.#xml.endElement();
  }

  #bounds(bounds: Rect | undefined): void {
    if (bounds === undefined) return;
    this.#xml.startElement("bounds", [
      ["minlat", formatNumber(bounds.min.lat)],
      ["minlon", formatNumber(bounds.min.lon)],
      ["maxlat", formatNumber(bounds.max.lat)],
      ["maxlon", formatNumber(bounds.max.lon)],
    ]);
    this.#xml.endElement();
  }

  #extensions(xml: string | undefined): void {
    if (xml === undefined) return;
    this.#xml.startElement("extensions");
    if (xml !== "") this.#xml.raw(xml);
    this.#xml.endElement();
  }

  #time(time: Date | undefined): void {
    if (time !== undefined) this.#string("time", formatTime(time));
  }

  #value(tag: string, value: number | undefined): void {
    if (value !== undefined) this.#string(tag, formatNumber(value));
  }

  #string(tag: string, value: string | undefined): void {
    if (value === undefined) return;
    this.#xml.startElement(tag);
    this.#xml.characters(value);
    this.#xml.endElement();
  }
}

function knownVersion(version: GpxVersion): KnownVersion {
  if (version === GpxVersion.Unknown) throw new GpxVersionError(version);
  return version;
}

/**
 * Writes a document as GPX XML to a sink, in the schema version recorded on
 * the document.
 *
 * In GPX 1.0 output the metadata is flattened into the root element, its
 * author's link becomes `<url>`/`<urlname>`, and waypoints, tracks and
 * routes keep only their first link. Copyright, metadata links and metadata
 * extensions have no GPX 1.0 counterpart and are left out. In GPX 1.1 output
 * waypoint `speed` and `course` are left out.
 *
 * @example Usage
 * ```ts
 * import { GpxVersion, write } from "gpx-codec";
 *
 * const chunks: string[] = [];
 * write({
 *   version: GpxVersion.Gpx11,
 *   creator: "example",
 *   waypoints: [{ point: { lon: 2.34, lat: 1.23 }, links: [] }],
 *   tracks: [],
 *   routes: [],
 * }, { write: (chunk: string) => chunks.push(chunk) });
 * ```
 *
 * @param gpx The document to write.
 * @param sink Receives the output in chunks; a Node.js `Writable` will do.
 * @param options Layout options.
 * @throws {GpxVersionError} If the document's version is unknown.
 * @throws {GpxValueError} If an email address or a time cannot be written.
 */
export function write(gpx: Gpx, sink: GpxSink, options?: WriteOptions): void {
  const version = knownVersion(gpx.version);
  const xml = new XmlWriter(sink, { indent: options?.indent ?? "  " });
  if (options?.declaration ?? true) xml.declaration();
  new GpxEmitter(xml, version).gpx(gpx);
  xml.end();
}

/**
 * Serializes a document to a GPX XML string.
 *
 * @example Usage
 * ```ts
 * import { GpxVersion, stringify } from "gpx-codec";
 *
 * const xml = stringify({
 *   version: GpxVersion.Gpx11,
 *   creator: "example",
 *   waypoints: [],
 *   tracks: [],
 *   routes: [],
 * }, { declaration: false });
 * // '<gpx version="1.1" creator="example" xmlns="http://www.topografix.com/GPX/1/1"/>\n'
 * ```
 *
 * @param gpx The document to write.
 * @param options Layout options.
 * @returns The XML text.
 * @throws {GpxVersionError} If the document's version is unknown.
 * @throws {GpxValueError} If an email address or a time cannot be written.
 */
export function stringify(gpx: Gpx, options?: WriteOptions): string {
  const chunks: string[] = [];
  write(gpx, { write: (chunk: string) => chunks.push(chunk) }, options);
  return chunks.join("");
}
