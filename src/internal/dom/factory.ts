import { TreeError } from "../errors.js";

import type { Defaults } from "./defaults.js";
import { ElementNode, type AttributeInputs, type ChildInput } from "./nodes.js";
import { HTML5_TAGS } from "./tags.js";

export function createElement(
  tagName: string,
  attributes: AttributeInputs = {},
  ...children: readonly ChildInput[]
): ElementNode {
  return new ElementNode(tagName, attributes).addChildren(...children);
}

export type ElementFactory = (
  tagName: string,
  attributes?: AttributeInputs,
  ...children: readonly ChildInput[]
) => ElementNode;

export interface ElementFactoryOptions {
  readonly tags?: ReadonlySet<string> | null;
  readonly defaults?: Defaults | null;
}

/**
 * Builds elements restricted to a tag table (HTML5 by default). Tag names are
 * matched case-insensitively and created in lower case.
 */
export function createElementFactory(options: ElementFactoryOptions = {}): ElementFactory {
  const tags = options.tags === undefined ? HTML5_TAGS : options.tags;
  const defaults = options.defaults ?? null;

  return (tagName, attributes = {}, ...children) => {
    const normalized = tagName.toLowerCase();
    if (tags !== null && !tags.has(normalized)) {
      throw new TreeError({ code: "TREE_INVALID", reason: "unknown-tag", tagName });
    }

    return new ElementNode(normalized, attributes, defaults).addChildren(...children);
  };
}
