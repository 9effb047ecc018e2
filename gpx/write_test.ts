// Copyright 2018-2026 the Deno authors. MIT license.

import { PassThrough } from "node:stream";
import { expect, test } from "vitest";
import { DEFAULT_CREATOR, splitEmail, stringify, write } from "./write.ts";
import { parse } from "./parse.ts";
import { GpxValueError, GpxVersionError } from "./errors.ts";
import { type Gpx, GpxVersion } from "./types.ts";
import { catchError } from "./_test_utils.ts";

const SAMPLE: Gpx = {
  version: GpxVersion.Gpx11,
  creator: "Placeholder App",
  metadata: {
    name: "Trip",
    author: { name: "Jane", email: "jane@example.org" },
    links: [],
  },
  waypoints: [{
    point: { lon: 2.34, lat: 1.23 },
    name: "Home",
    fix: { type: "other", value: "KF_4SV_OR_MORE" },
    links: [],
  }],
  tracks: [],
  routes: [],
};

// =============================================================================
// Layout
// =============================================================================

test("stringify() writes GPX 1.1", () => {
  expect(stringify(SAMPLE)).toBe(
    '<?xml version="1.0" encoding="UTF-8"?>\n' +
      '<gpx version="1.1" creator="Placeholder App" xmlns="http://www.topografix.com/GPX/1/1">\n' +
      "  <metadata>\n" +
      "    <name>Trip</name>\n" +
      "    <author>\n" +
      "      <name>Jane</name>\n" +
      '      <email id="jane" domain="example.org"/>\n' +
      "    </author>\n" +
      "  </metadata>\n" +
      '  <wpt lat="1.23" lon="2.34">\n' +
      "    <name>Home</name>\n" +
      "    <fix>KF_4SV_OR_MORE</fix>\n" +
      "  </wpt>\n" +
      "</gpx>\n",
  );
});

test("stringify() flattens metadata for GPX 1.0", () => {
  expect(stringify({ ...SAMPLE, version: GpxVersion.Gpx10 })).toBe(
    '<?xml version="1.0" encoding="UTF-8"?>\n' +
      '<gpx version="1.0" creator="Placeholder App" xmlns="http://www.topografix.com/GPX/1/0">\n' +
      "  <name>Trip</name>\n" +
      "  <author>Jane</author>\n" +
      "  <email>jane@example.org</email>\n" +
      '  <wpt lat="1.23" lon="2.34">\n' +
      "    <name>Home</name>\n" +
      "    <fix>KF_4SV_OR_MORE</fix>\n" +
      "  </wpt>\n" +
      "</gpx>\n",
  );
});

test("stringify() honors indent and declaration", () => {
  const gpx: Gpx = {
    version: GpxVersion.Gpx11,
    creator: "x",
    waypoints: [],
    tracks: [],
    routes: [{ name: "r", links: [], points: [] }],
  };

  expect(stringify(gpx, { indent: "", declaration: false })).toBe(
    '<gpx version="1.1" creator="x" xmlns="http://www.topografix.com/GPX/1/1">' +
      "<rte><name>r</name></rte></gpx>",
  );
});

test("stringify() writes the default creator", () => {
  const xml = stringify(
    { version: GpxVersion.Gpx11, waypoints: [], tracks: [], routes: [] },
    { declaration: false },
  );

  expect(xml).toBe(
    `<gpx version="1.1" creator="${DEFAULT_CREATOR}" xmlns="http://www.topografix.com/GPX/1/1"/>\n`,
  );
});

test("stringify() writes waypoint fields in schema order", () => {
  const xml = stringify({
    version: GpxVersion.Gpx11,
    creator: "x",
    waypoints: [{
      point: { lon: 0, lat: 0 },
      dgpsId: 5,
      extensions: "<a/>",
      elevation: 1,
      links: [{ href: "https://example.com", type: "text/html" }],
      time: new Date(Date.UTC(2024, 0, 2, 3, 4, 5, 600)),
      satellites: 4,
    }],
    tracks: [],
    routes: [],
  }, { indent: "", declaration: false });

  expect(xml).toBe(
    '<gpx version="1.1" creator="x" xmlns="http://www.topografix.com/GPX/1/1">' +
      '<wpt lat="0" lon="0"><ele>1</ele>' +
      "<time>2024-01-02T03:04:05.600Z</time>" +
      '<link href="https://example.com"><type>text/html</type></link>' +
      "<sat>4</sat><dgpsid>5</dgpsid><extensions><a/></extensions></wpt></gpx>",
  );
});

test("write() pushes chunks into a Node.js stream", async () => {
  const stream = new PassThrough({ encoding: "utf8" });
  const received: string[] = [];
  stream.on("data", (chunk: string) => received.push(chunk));

  write(SAMPLE, stream);
  stream.end();
  await new Promise((resolve) => stream.on("end", resolve));

  expect(received.join("")).toBe(stringify(SAMPLE));
});

// =============================================================================
// Errors
// =============================================================================

test("write() rejects a document without a known version", () => {
  const error = catchError(
    () => stringify({ ...SAMPLE, version: GpxVersion.Unknown }),
    GpxVersionError,
  );

  expect(error.version).toBe("unknown");
});

test("splitEmail() splits on the single @", () => {
  expect(splitEmail("me@example.com")).toEqual(["me", "example.com"]);
});

test("splitEmail() rejects addresses without exactly one @", () => {
  for (const email of ["me@home@example.com", "me", "@example.com", "me@"]) {
    const error = catchError(() => splitEmail(email), GpxValueError);
    expect(error.kind).toBe("invalid_email");
    expect(error.value).toBe(email);
  }
});

test("stringify() rejects an email with two @ characters", () => {
  const gpx: Gpx = {
    ...SAMPLE,
    metadata: { author: { email: "a@b@example.com" }, links: [] },
  };

  expect(() => stringify(gpx)).toThrow(GpxValueError);
  expect(() => stringify({ ...gpx, version: GpxVersion.Gpx10 }))
    .toThrow(GpxValueError);
});

// =============================================================================
// Round trips
// =============================================================================

const FULL_GPX11 = `<gpx version="1.1" creator="Placeholder App">
  <metadata>
    <name>Trip &amp; more</name>
    <desc>Two days</desc>
    <author>
      <name>Jane Placeholder</name>
      <email id="me" domain="example.com"/>
      <link href="https://example.org/jane"/>
    </author>
    <copyright author="Jane Placeholder">
      <year>2024</year>
      <license>https://example.org/license</license>
    </copyright>
    <link href="https://example.org/a"><text>A</text><type>text/html</type></link>
    <link href="https://example.org/b"/>
    <time>2024-05-01T08:00:00.250Z</time>
    <keywords>hike, lake</keywords>
    <bounds minlat="45.48" minlon="-74.03" maxlat="45.70" maxlon="-73.58"/>
    <extensions><meta:tag x="1">y</meta:tag></extensions>
  </metadata>
  <wpt lat="45.5" lon="-73.6">
    <ele>232.5</ele>
    <time>2024-05-01T08:00:00Z</time>
    <magvar>14.2</magvar>
    <geoidheight>-32.1</geoidheight>
    <name>Summit</name>
    <cmt></cmt>
    <desc>View</desc>
    <src>Placeholder GPS</src>
    <link href="https://example.org/s"/>
    <sym>Flag</sym>
    <type>peak</type>
    <fix>KF_4SV_OR_MORE</fix>
    <sat>7</sat>
    <hdop>1.2</hdop>
    <vdop>1.8</vdop>
    <pdop>2.1</pdop>
    <ageofdgpsdata>4.5</ageofdgpsdata>
    <dgpsid>1023</dgpsid>
    <extensions><v:x><extensions><v:y/></extensions></v:x></extensions>
  </wpt>
  <rte>
    <name>Planned</name>
    <number>1</number>
    <type>bike</type>
    <rtept lat="45.5" lon="-73.6"/>
    <rtept lat="-90" lon="-180"/>
  </rte>
  <trk>
    <name>Recorded</name>
    <link href="https://example.org/t"/>
    <link href="https://example.org/u"/>
    <extensions><t/></extensions>
    <trkseg>
      <trkpt lat="90" lon="179.999"><ele>1</ele></trkpt>
      <extensions><s/></extensions>
    </trkseg>
    <trkseg/>
  </trk>
  <extensions><root:e>1 &lt; 2</root:e></extensions>
</gpx>`;

const FULL_GPX10 = `<gpx version="1.0" creator="Placeholder App">
  <name>Trip</name>
  <desc></desc>
  <author>Jane Placeholder</author>
  <email>jane@example.org</email>
  <url>https://example.org/trip</url>
  <urlname>Trip page</urlname>
  <time>2024-05-01T08:00:00Z</time>
  <keywords>hike</keywords>
  <bounds minlat="45.48" minlon="-74.03" maxlat="45.70" maxlon="-73.58"/>
  <wpt lat="45.5" lon="-73.6">
    <ele>232.5</ele>
    <course>270.5</course>
    <speed>3.25</speed>
    <name>Summit</name>
    <url>https://example.org/s</url>
    <urlname>Summit page</urlname>
    <fix>dgps</fix>
  </wpt>
  <rte>
    <name>Planned</name>
    <url>https://example.org/r</url>
    <number>2</number>
    <rtept lat="1" lon="2"><speed>1.5</speed></rtept>
  </rte>
  <trk>
    <name>Recorded</name>
    <trkseg>
      <trkpt lat="45.5" lon="-73.6"><speed>0</speed></trkpt>
    </trkseg>
  </trk>
</gpx>`;

test("parse() of stringify() reproduces a GPX 1.1 document", () => {
  const gpx = parse(FULL_GPX11);

  expect(parse(stringify(gpx))).toEqual(gpx);
  expect(parse(stringify(gpx, { indent: "" }))).toEqual(gpx);
});

test("parse() of stringify() reproduces a GPX 1.0 document", () => {
  const gpx = parse(FULL_GPX10);

  expect(parse(stringify(gpx))).toEqual(gpx);
});

test("stringify() keeps GPX 1.0 speed and course", () => {
  const gpx = parse(FULL_GPX10);
  const again = parse(stringify(gpx));

  expect(again.waypoints[0]?.speed).toBe(3.25);
  expect(again.waypoints[0]?.course).toBe(270.5);
  expect(again.routes[0]?.points[0]?.speed).toBe(1.5);
  expect(again.tracks[0]?.segments[0]?.points[0]?.speed).toBe(0);
});

test("stringify() leaves speed and course out of GPX 1.1", () => {
  const gpx = parse(FULL_GPX10);
  const xml = stringify({ ...gpx, version: GpxVersion.Gpx11 });

  expect(xml.includes("<speed>")).toBe(false);
  expect(xml.includes("<course>")).toBe(false);
  expect(parse(xml).waypoints[0]?.speed).toBeUndefined();
});

test("stringify() keeps extension markup unchanged", () => {
  const gpx = parse(FULL_GPX11);
  const again = parse(stringify(gpx));

  expect(again.extensions).toBe("<root:e>1 &lt; 2</root:e>");
  expect(again.metadata?.extensions).toBe('<meta:tag x="1">y</meta:tag>');
  expect(again.waypoints[0]?.extensions).toBe(
    "<v:x><extensions><v:y/></extensions></v:x>",
  );
});

test("stringify() declares the namespaces extension markup uses", () => {
  const gpx = parse(
    '<gpx version="1.1" creator="x"' +
      ' xmlns="http://www.topografix.com/GPX/1/1"' +
      ' xmlns:gpxtpx="http://example.com/tpx">' +
      '<trk><trkseg><trkpt lat="1" lon="2"><extensions>' +
      "<gpxtpx:TrackPointExtension><gpxtpx:hr>120</gpxtpx:hr>" +
      "</gpxtpx:TrackPointExtension></extensions></trkpt></trkseg></trk></gpx>",
  );

  const xml = stringify(gpx, { indent: "", declaration: false });
  expect(xml).toBe(
    '<gpx version="1.1" creator="x"' +
      ' xmlns="http://www.topografix.com/GPX/1/1"' +
      ' xmlns:gpxtpx="http://example.com/tpx">' +
      '<trk><trkseg><trkpt lat="1" lon="2"><extensions>' +
      "<gpxtpx:TrackPointExtension><gpxtpx:hr>120</gpxtpx:hr>" +
      "</gpxtpx:TrackPointExtension></extensions></trkpt></trkseg></trk></gpx>",
  );
  expect(parse(xml)).toEqual(gpx);
});

test("stringify() keeps the sign of negative zero", () => {
  const gpx = parse(
    '<gpx version="1.1" creator="x"><wpt lat="-0.0" lon="-0">' +
      "<ele>-0</ele></wpt></gpx>",
  );

  const xml = stringify(gpx, { indent: "", declaration: false });
  expect(xml).toBe(
    '<gpx version="1.1" creator="x" xmlns="http://www.topografix.com/GPX/1/1">' +
      '<wpt lat="-0" lon="-0"><ele>-0</ele></wpt></gpx>',
  );
  const again = parse(xml);
  expect(again.waypoints[0]?.point.lat).toBe(-0);
  expect(again).toEqual(gpx);
});

test("stringify() re-emits an email as id and domain", () => {
  const gpx = parse(FULL_GPX11);
  const xml = stringify(gpx);

  expect(gpx.metadata?.author?.email).toBe("me@example.com");
  expect(xml.includes('<email id="me" domain="example.com"/>')).toBe(true);
});

test("stringify() converts GPX 1.1 metadata to GPX 1.0 root fields", () => {
  const gpx11 = parse(`<gpx version="1.1" creator="Placeholder App">
  <metadata>
    <name>Trip</name>
    <desc></desc>
    <author>
      <name>Jane Placeholder</name>
      <email id="jane" domain="example.org"/>
      <link href="https://example.org/trip"><text>Trip page</text></link>
    </author>
    <time>2024-05-01T08:00:00Z</time>
    <keywords>hike</keywords>
    <bounds minlat="45.48" minlon="-74.03" maxlat="45.70" maxlon="-73.58"/>
  </metadata>
</gpx>`);

  const gpx10 = parse(stringify({ ...gpx11, version: GpxVersion.Gpx10 }));
  expect(gpx10.version).toBe(GpxVersion.Gpx10);
  expect(gpx10.metadata).toEqual(gpx11.metadata);
  expect(gpx10.metadata).toEqual(parse(FULL_GPX10).metadata);
});

test("stringify() converts GPX 1.0 root fields to GPX 1.1 metadata", () => {
  const gpx10 = parse(FULL_GPX10);

  const xml = stringify({ ...gpx10, version: GpxVersion.Gpx11 });
  const gpx11 = parse(xml);
  expect(xml.includes("<metadata>")).toBe(true);
  expect(gpx11.metadata).toEqual(gpx10.metadata);
});
