// Copyright 2018-2026 the Deno authors. MIT license.

import { expect, test } from "vitest";
import { XmlWriter, type XmlWriterOptions } from "./_xml_writer.ts";

function writerWithOutput(
  options?: XmlWriterOptions,
): [XmlWriter, () => string] {
  const chunks: string[] = [];
  const writer = new XmlWriter(
    { write: (chunk: string) => chunks.push(chunk) },
    options,
  );
  return [writer, () => chunks.join("")];
}

test("XmlWriter self-closes empty elements", () => {
  const [writer, output] = writerWithOutput();

  writer.startElement("bounds", [["minlat", "1"], ["maxlat", "2"]]);
  writer.endElement();
  expect(output()).toBe('<bounds minlat="1" maxlat="2"/>');
});

test("XmlWriter keeps text-only elements on one line", () => {
  const [writer, output] = writerWithOutput();

  writer.startElement("wpt", [["lat", "1"], ["lon", "2"]]);
  writer.startElement("name");
  writer.characters("Home");
  writer.endElement();
  writer.startElement("cmt");
  writer.characters("");
  writer.endElement();
  writer.endElement();
  expect(output()).toBe(
    '<wpt lat="1" lon="2">\n  <name>Home</name>\n  <cmt></cmt>\n</wpt>',
  );
});

test("XmlWriter indents nested elements", () => {
  const [writer, output] = writerWithOutput({ indent: "\t" });

  writer.declaration();
  writer.startElement("trk");
  writer.startElement("trkseg");
  writer.startElement("trkpt", [["lat", "1"], ["lon", "2"]]);
  writer.endElement();
  writer.endElement();
  writer.endElement();
  writer.end();
  expect(output()).toBe(
    '<?xml version="1.0" encoding="UTF-8"?>\n' +
      "<trk>\n" +
      "\t<trkseg>\n" +
      '\t\t<trkpt lat="1" lon="2"/>\n' +
      "\t</trkseg>\n" +
      "</trk>\n",
  );
});

test("XmlWriter writes everything on one line without indent", () => {
  const [writer, output] = writerWithOutput({ indent: "" });

  writer.declaration();
  writer.startElement("gpx");
  writer.startElement("name");
  writer.characters("x");
  writer.endElement();
  writer.endElement();
  writer.end();
  expect(output()).toBe(
    '<?xml version="1.0" encoding="UTF-8"?><gpx><name>x</name></gpx>',
  );
});

test("XmlWriter escapes text and attribute values", () => {
  const [writer, output] = writerWithOutput();

  writer.startElement("link", [["href", 'a?b=1&c="2"\n']]);
  writer.characters("<Fish & Chips>");
  writer.endElement();
  expect(output()).toBe(
    '<link href="a?b=1&amp;c=&quot;2&quot;&#10;">&lt;Fish &amp; Chips&gt;</link>',
  );
});

test("XmlWriter writes raw markup unchanged", () => {
  const [writer, output] = writerWithOutput();

  writer.startElement("extensions");
  writer.raw("<a:b>1 &lt; 2</a:b>");
  writer.endElement();
  expect(output()).toBe("<extensions><a:b>1 &lt; 2</a:b></extensions>");
});

test("XmlWriter rejects unbalanced calls", () => {
  const [writer] = writerWithOutput();

  expect(() => writer.endElement()).toThrow(TypeError);
  expect(() => writer.characters("x")).toThrow(TypeError);
  writer.startElement("gpx");
  expect(() => writer.end()).toThrow("Cannot end the document: <gpx> is open");
});
