export { Attribute, isPresentValue } from "./attribute.js";
export { Defaults } from "./defaults.js";
export { createElement, createElementFactory } from "./factory.js";
export {
  CommentNode,
  ElementNode,
  RawNode,
  RootNode,
  TextNode,
  byTag,
  documentParts,
  matching,
  nodesMatch,
  requireElement
} from "./nodes.js";
export { HTML5_TAGS, LINE_BREAK_ELEMENTS, RAW_TEXT_ELEMENTS, VOID_ELEMENTS, isVoidElement } from "./tags.js";

export type { AttributeValue } from "./attribute.js";
export type { DefaultsConfig } from "./defaults.js";
export type { ElementFactory, ElementFactoryOptions } from "./factory.js";
export type {
  AttributeInput,
  AttributeInputs,
  ChildInput,
  ChildNode,
  DocNode,
  DocumentParts,
  NodeKind,
  NodePredicate
} from "./nodes.js";
