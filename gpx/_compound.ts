// Copyright 2018-2026 the Deno authors. MIT license.
// This module is browser compatible.

/**
 * Internal consumers for `link`, `email`, `person` and `copyright`.
 *
 * @module
 */

import { GpxValueError } from "./errors.ts";
import type { Copyright, Link, Person } from "./types.ts";
import {
  consumeChildren,
  type Draft,
  findAttribute,
  invalidChild,
  type ParseContext,
  parseInteger,
  requireAttribute,
  verifyStartingTag,
} from "./_context.ts";
import { consumeString } from "./_primitives.ts";

/**
 * Consumes a `<link href="...">` element with optional `<text>` and
 * `<type>` children.
 */
export function consumeLink(context: ParseContext): Link {
  const start = verifyStartingTag(context, "link");
  const link: Draft<Link> = { href: requireAttribute(start, "href") };

  consumeChildren(context, "link", (child) => {
    switch (child.name.local) {
      case "text":
        link.text = consumeString(context, "text", true);
        break;
      case "type":
        link.type = consumeString(context, "type");
        break;
      default:
        throw invalidChild(child, "link");
    }
  });
  return link;
}

/**
 * Builds the link a GPX 1.0 element describes through `<url>` and
 * `<urlname>`. Without a non-empty URL there is no link.
 */
export function legacyLink(
  url: string | undefined,
  urlname: string | undefined,
): Link | undefined {
  if (url === undefined || url === "") return undefined;
  return urlname === undefined || urlname === ""
    ? { href: url }
    : { href: url, text: urlname };
}

/**
 * Splits an email address into the `id` and `domain` parts GPX 1.1 stores
 * as attributes.
 *
 * @throws {GpxValueError} Unless the address holds exactly one `@` with text
 * on both sides.
 */
export function splitEmail(email: string): [id: string, domain: string] {
  const parts = email.split("@");
  const [id, domain] = parts;
  if (
    parts.length !== 2 || id === undefined || id === "" ||
    domain === undefined || domain === ""
  ) {
    throw new GpxValueError(
      "invalid_email",
      email,
      `Invalid email address '${email}': expected exactly one '@' between an id and a domain`,
    );
  }
  return [id, domain];
}

/** Returns the address as given once {@linkcode splitEmail} accepts it. */
export function checkEmail(email: string): string {
  splitEmail(email);
  return email;
}

/**
 * Consumes an `<email id="..." domain="..."/>` element into `id@domain`.
 *
 * @throws {GpxGrammarError} If either attribute is missing or the element
 * has children.
 * @throws {GpxValueError} If the joined address does not split back into
 * the same id and domain.
 */
export function consumeEmail(context: ParseContext): string {
  const start = verifyStartingTag(context, "email");
  const id = requireAttribute(start, "id");
  const domain = requireAttribute(start, "domain");

  consumeChildren(context, "email", (child) => {
    throw invalidChild(child, "email");
  });
  return checkEmail(`${id}@${domain}`);
}

/**
 * Consumes a person element. GPX names it after its role, e.g. `author`.
 *
 * @param context The parse context.
 * @param tag The local name of the element.
 */
export function consumePerson(context: ParseContext, tag: string): Person {
  verifyStartingTag(context, tag);
  const person: Draft<Person> = {};

  consumeChildren(context, tag, (child) => {
    switch (child.name.local) {
      case "name":
        person.name = consumeString(context, "name");
        break;
      case "email":
        person.email = consumeEmail(context);
        break;
      case "link":
        person.link = consumeLink(context);
        break;
      default:
        throw invalidChild(child, tag);
    }
  });
  return person;
}

/**
 * Consumes a `<copyright author="...">` element with optional `<year>` and
 * `<license>` children.
 */
export function consumeCopyright(context: ParseContext): Copyright {
  const start = verifyStartingTag(context, "copyright");
  const copyright: Draft<Copyright> = {};
  const author = findAttribute(start, "author");
  if (author !== undefined) copyright.author = author;

  consumeChildren(context, "copyright", (child) => {
    switch (child.name.local) {
      case "year":
        copyright.year = parseInteger(consumeString(context, "year"), "year");
        break;
      case "license":
        copyright.license = consumeString(context, "license");
        break;
      default:
        throw invalidChild(child, "copyright");
    }
  });
  return copyright;
}
