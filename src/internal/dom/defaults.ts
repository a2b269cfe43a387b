import { Attribute, type AttributeValue } from "./attribute.js";

export type DefaultsConfig = Readonly<
  Record<string, { readonly attributes?: Readonly<Record<string, readonly AttributeValue[]>> }>
>;

const EMPTY_ATTRIBUTES: ReadonlyMap<string, Attribute> = new Map();

/**
 * Per-tag attribute overlays merged into elements at render time.
 *
 * Rendering only reads from a registry; lookups for unknown tags do not
 * create entries.
 */
export class Defaults {
  readonly name: string | null;
  readonly #byTag = new Map<string, Map<string, Attribute>>();

  constructor(name: string | null = null) {
    this.name = name;
  }

  static fromConfig(config: DefaultsConfig, name: string | null = null): Defaults {
    const defaults = new Defaults(name);
    for (const [tagName, entry] of Object.entries(config)) {
      for (const [attributeName, values] of Object.entries(entry.attributes ?? {})) {
        defaults.appendAttributes(tagName, attributeName, values);
      }
    }
    return defaults;
  }

  appendAttributes(tagName: string, name: string, values: Iterable<AttributeValue>): this {
    const attributes = this.#attributesFor(tagName);
    const existing = attributes.get(name);
    if (existing === undefined) {
      attributes.set(name, new Attribute(name, values));
    } else {
      existing.update(values);
    }
    return this;
  }

  setAttributes(tagName: string, name: string, values: Iterable<AttributeValue>): this {
    this.#attributesFor(tagName).set(name, new Attribute(name, values));
    return this;
  }

  getAttributes(tagName: string): ReadonlyMap<string, Attribute> {
    return this.#byTag.get(tagName) ?? EMPTY_ATTRIBUTES;
  }

  clearAttributes(tagName: string): this {
    this.#byTag.delete(tagName);
    return this;
  }

  tags(): string[] {
    return [...this.#byTag.keys()];
  }

  #attributesFor(tagName: string): Map<string, Attribute> {
    let attributes = this.#byTag.get(tagName);
    if (attributes === undefined) {
      attributes = new Map();
      this.#byTag.set(tagName, attributes);
    }
    return attributes;
  }
}
