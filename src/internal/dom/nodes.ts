import { TreeError } from "../errors.js";

import { Attribute, type AttributeValue } from "./attribute.js";
import type { Defaults } from "./defaults.js";
import { isVoidElement } from "./tags.js";

export type NodeKind = "root" | "element" | "text" | "raw" | "comment";

export type ChildNode = ElementNode | TextNode | RawNode | CommentNode;
export type DocNode = RootNode | ChildNode;

/** Plain strings are accepted wherever children are added and become `TextNode`s. */
export type ChildInput = ChildNode | string;

export type NodePredicate = (node: ChildNode) => boolean;

/**
 * `null`, `undefined` or `true` declare a bare attribute, a string adds one
 * value, a list adds each present value in order.
 */
export type AttributeInput = AttributeValue | true | readonly AttributeValue[];
export type AttributeInputs = Readonly<Record<string, AttributeInput>>;

abstract class ValueNode {
  value: string;

  constructor(value: string) {
    this.value = value;
  }

  set(value: string): this {
    this.value = value;
    return this;
  }
}

export class TextNode extends ValueNode {
  readonly kind = "text";

  clone(): TextNode {
    return new TextNode(this.value);
  }
}

export class RawNode extends ValueNode {
  readonly kind = "raw";

  clone(): RawNode {
    return new RawNode(this.value);
  }
}

export class CommentNode extends ValueNode {
  readonly kind = "comment";

  clone(): CommentNode {
    return new CommentNode(this.value);
  }
}

function toChildNode(child: ChildInput): ChildNode {
  return typeof child === "string" ? new TextNode(child) : child;
}

function toValues(input: AttributeInput): readonly AttributeValue[] {
  if (input === true) {
    return [];
  }

  if (typeof input === "string" || input === null || input === undefined) {
    return [input];
  }

  return input;
}

abstract class ParentNode {
  children: ChildNode[] = [];

  protected abstract acceptsChildren(): boolean;

  protected abstract describe(): string;

  addChildren(...children: readonly ChildInput[]): this {
    return this.insertChildren(this.children.length, ...children);
  }

  insertChildren(index: number, ...children: readonly ChildInput[]): this {
    if (children.length === 0) {
      return this;
    }

    if (!this.acceptsChildren()) {
      throw new TreeError({ code: "TREE_INVALID", reason: "void-element-children", tagName: this.describe() });
    }

    this.children.splice(index, 0, ...children.map(toChildNode));
    return this;
  }

  /** Every descendant, parents before their children, children in order. */
  *walk(): Generator<ChildNode, void, undefined> {
    for (const child of this.children) {
      yield child;
      if (child.kind === "element") {
        yield* child.walk();
      }
    }
  }

  walkWithCallback(callback: (node: ChildNode) => void): void {
    for (const node of this.walk()) {
      callback(node);
    }
  }

  /**
   * Lazily matching descendants in walk order. Each iteration of the
   * returned iterable starts a fresh traversal.
   */
  find<T extends ChildNode>(predicate: (node: ChildNode) => node is T): Iterable<T>;
  find(predicate: NodePredicate): Iterable<ChildNode>;
  find(predicate: NodePredicate): Iterable<ChildNode> {
    return {
      [Symbol.iterator]: () => this.#matching(predicate)
    };
  }

  findFirst<T extends ChildNode>(predicate: (node: ChildNode) => node is T): T | null;
  findFirst(predicate: NodePredicate): ChildNode | null;
  findFirst(predicate: NodePredicate): ChildNode | null {
    for (const node of this.#matching(predicate)) {
      return node;
    }
    return null;
  }

  findElement(tagName: string): ElementNode | null {
    return this.findFirst(byTag(tagName));
  }

  *#matching(predicate: NodePredicate): Generator<ChildNode, void, undefined> {
    for (const node of this.walk()) {
      if (predicate(node)) {
        yield node;
      }
    }
  }
}

export class ElementNode extends ParentNode {
  readonly kind = "element";
  readonly tagName: string;
  readonly attributes = new Map<string, Attribute>();
  localDefaults: Defaults | null;

  constructor(tagName: string, attributes: AttributeInputs = {}, localDefaults: Defaults | null = null) {
    super();
    this.tagName = tagName;
    this.localDefaults = localDefaults;
    this.addAttributes(attributes);
  }

  isVoid(): boolean {
    return isVoidElement(this.tagName);
  }

  getAttribute(name: string): Attribute | undefined {
    return this.attributes.get(name);
  }

  hasAttribute(name: string): boolean {
    return this.attributes.has(name);
  }

  addAttribute(name: string, input: AttributeInput = null): this {
    let attribute = this.attributes.get(name);
    if (attribute === undefined) {
      attribute = new Attribute(name);
      this.attributes.set(name, attribute);
    }
    attribute.update(toValues(input));
    return this;
  }

  addAttributes(inputs: AttributeInputs): this {
    for (const [name, input] of Object.entries(inputs)) {
      this.addAttribute(name, input);
    }
    return this;
  }

  setAttribute(name: string, input: AttributeInput = null): this {
    this.attributes.set(name, new Attribute(name, toValues(input)));
    return this;
  }

  removeAttribute(name: string): boolean {
    return this.attributes.delete(name);
  }

  clone(): ElementNode {
    const copy = new ElementNode(this.tagName, {}, this.localDefaults);
    for (const [name, attribute] of this.attributes) {
      copy.attributes.set(name, attribute.clone());
    }
    copy.children = this.children.map((child) => child.clone());
    return copy;
  }

  protected acceptsChildren(): boolean {
    return !this.isVoid();
  }

  protected describe(): string {
    return this.tagName;
  }
}

export class RootNode extends ParentNode {
  readonly kind = "root";

  constructor(...children: readonly ChildInput[]) {
    super();
    this.addChildren(...children);
  }

  clone(): RootNode {
    const copy = new RootNode();
    copy.children = this.children.map((child) => child.clone());
    return copy;
  }

  protected acceptsChildren(): boolean {
    return true;
  }

  protected describe(): string {
    return "#root";
  }
}

export function byTag(tagName: string): (node: ChildNode) => node is ElementNode {
  return (node): node is ElementNode => node.kind === "element" && node.tagName === tagName;
}

/**
 * Elements match on tag name alone; text, raw and comment nodes match on
 * their value.
 */
export function nodesMatch(left: DocNode, right: DocNode): boolean {
  switch (left.kind) {
    case "root":
      return right.kind === "root";
    case "element":
      return right.kind === "element" && right.tagName === left.tagName;
    case "text":
    case "raw":
    case "comment":
      return right.kind === left.kind && right.value === left.value;
  }
}

export function matching(template: ChildNode): NodePredicate {
  return (node) => nodesMatch(template, node);
}

export interface DocumentParts {
  readonly html: ElementNode;
  readonly head: ElementNode;
  readonly body: ElementNode;
}

export function requireElement(parent: RootNode | ElementNode, tagName: string): ElementNode {
  const element = parent.findElement(tagName);
  if (element === null) {
    throw new TreeError({ code: "TREE_INVALID", reason: "missing-element", tagName });
  }
  return element;
}

export function documentParts(root: RootNode): DocumentParts {
  const html = requireElement(root, "html");
  return {
    html,
    head: requireElement(html, "head"),
    body: requireElement(html, "body")
  };
}
