import { escapeAttribute } from "../serializer/escape.js";

/** A candidate attribute value; `null`, `undefined` and `""` count as "no value". */
export type AttributeValue = string | null | undefined;

export function isPresentValue(value: AttributeValue): value is string {
  return value !== null && value !== undefined && value.length > 0;
}

/**
 * A named attribute holding an ordered, duplicate-free list of values.
 *
 * An attribute without values renders as its bare name (`required`), never as
 * `required=""`.
 */
export class Attribute {
  readonly name: string;
  #values: string[] = [];

  constructor(name: string, values: Iterable<AttributeValue> = []) {
    this.name = name;
    this.update(values);
  }

  get values(): readonly string[] {
    return this.#values;
  }

  has(value: string): boolean {
    return this.#values.includes(value);
  }

  add(value: AttributeValue): this {
    if (isPresentValue(value) && !this.#values.includes(value)) {
      this.#values.push(value);
    }
    return this;
  }

  update(values: Iterable<AttributeValue>): this {
    for (const value of values) {
      this.add(value);
    }
    return this;
  }

  set(values: Iterable<AttributeValue>): this {
    this.#values = [];
    return this.update(values);
  }

  clear(): this {
    this.#values = [];
    return this;
  }

  clone(): Attribute {
    return new Attribute(this.name, this.#values);
  }

  render(extra?: Attribute): string {
    const merged = extra === undefined ? this.#values : new Attribute(this.name, this.#values).update(extra.values).values;
    if (merged.length === 0) {
      return this.name;
    }

    return `${this.name}="${merged.map((value) => escapeAttribute(value)).join(" ")}"`;
  }
}
