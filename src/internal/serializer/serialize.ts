import { RenderError } from "../errors.js";
import { Defaults } from "../dom/defaults.js";
import type { ChildNode, ElementNode, RootNode } from "../dom/nodes.js";
import { LINE_BREAK_ELEMENTS, RAW_TEXT_ELEMENTS } from "../dom/tags.js";

import { escapeText } from "./escape.js";

export interface RenderOptions {
  /** Emit a line break after closing tags of block-ish elements. Defaults to `true`. */
  readonly lineBreaks?: boolean;
}

interface RenderState {
  readonly defaults: Defaults;
  readonly lineBreaks: boolean;
  readonly parts: string[];
}

const RAW_TEXT_CLOSE_PATTERNS: ReadonlyMap<string, RegExp> = new Map(
  [...RAW_TEXT_ELEMENTS].map((tagName) => [tagName, new RegExp(`<\\/?${tagName}`, "i")])
);

function renderAttributes(element: ElementNode, defaults: Defaults): string {
  const defaultAttributes = defaults.getAttributes(element.tagName);
  const rendered: string[] = [];

  for (const [name, attribute] of element.attributes) {
    rendered.push(attribute.render(defaultAttributes.get(name)));
  }

  for (const [name, attribute] of defaultAttributes) {
    if (!element.attributes.has(name)) {
      rendered.push(attribute.render());
    }
  }

  return rendered.length > 0 ? ` ${rendered.join(" ")}` : "";
}

function renderText(value: string, parent: ElementNode | RootNode | null): string {
  if (parent === null || parent.kind !== "element") {
    return escapeText(value);
  }

  const closePattern = RAW_TEXT_CLOSE_PATTERNS.get(parent.tagName);
  if (closePattern === undefined) {
    return escapeText(value);
  }

  if (closePattern.test(value)) {
    throw new RenderError({ code: "RENDER_FAILED", reason: "raw-text-close-tag", tagName: parent.tagName });
  }

  return value;
}

function renderElement(element: ElementNode, state: RenderState): void {
  const tagName = element.tagName;
  const attributes = renderAttributes(element, element.localDefaults ?? state.defaults);
  const lineBreak = state.lineBreaks && LINE_BREAK_ELEMENTS.has(tagName) ? "\n" : "";

  if (element.isVoid()) {
    if (element.children.length > 0) {
      throw new RenderError({ code: "RENDER_FAILED", reason: "void-element-children", tagName });
    }

    state.parts.push(`<${tagName}${attributes}>${lineBreak}`);
    return;
  }

  state.parts.push(`<${tagName}${attributes}>`);
  for (const child of element.children) {
    renderNode(child, element, state);
  }
  state.parts.push(`</${tagName}>${lineBreak}`);
}

function renderNode(node: ChildNode, parent: ElementNode | RootNode | null, state: RenderState): void {
  switch (node.kind) {
    case "text":
      state.parts.push(renderText(node.value, parent));
      return;
    case "raw":
      state.parts.push(node.value);
      return;
    case "comment":
      state.parts.push(`<!--${escapeText(node.value)}-->`);
      return;
    case "element":
      renderElement(node, state);
      return;
  }
}

/**
 * Serializes a tree. `defaults` supplies per-tag attributes for every element
 * that does not carry its own `localDefaults`; it is only read.
 */
export function render(
  node: RootNode | ChildNode,
  defaults: Defaults = new Defaults(),
  options: RenderOptions = {}
): string {
  const state: RenderState = {
    defaults,
    lineBreaks: options.lineBreaks ?? true,
    parts: []
  };

  if (node.kind === "root") {
    for (const child of node.children) {
      renderNode(child, node, state);
    }
  } else {
    renderNode(node, null, state);
  }

  return state.parts.join("");
}
