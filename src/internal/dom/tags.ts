import { readFileSync } from "node:fs";

import { z } from "zod";

export const VOID_ELEMENTS: ReadonlySet<string> = new Set([
  "area",
  "base",
  "br",
  "col",
  "embed",
  "hr",
  "img",
  "input",
  "keygen",
  "link",
  "meta",
  "param",
  "source",
  "track",
  "wbr"
]);

// Closing tags of these are followed by a line break in rendered output.
export const LINE_BREAK_ELEMENTS: ReadonlySet<string> = new Set([
  "body",
  "br",
  "div",
  "hr",
  "p",
  "td",
  "th",
  "thead",
  "tbody",
  "tr"
]);

export const RAW_TEXT_ELEMENTS: ReadonlySet<string> = new Set(["script", "style"]);

const tagListSchema = z.array(z.string().min(1));

function loadTagList(): ReadonlySet<string> {
  const raw: unknown = JSON.parse(readFileSync(new URL("../../../data/html-tags.json", import.meta.url), "utf8"));
  return new Set(tagListSchema.parse(raw));
}

export const HTML5_TAGS: ReadonlySet<string> = loadTagList();

export function isVoidElement(tagName: string): boolean {
  return VOID_ELEMENTS.has(tagName);
}
