import { contentTypeFor } from "./content-types.js";

export type SpaceMode = "asis" | "pipeline";

export const PRE_CHAIN = "pre";
export const POST_CHAIN = "post";

export interface ContentSpaceInit<T> {
  readonly name: string;
  readonly mode: SpaceMode;
  readonly patterns: readonly RegExp[];
  readonly chains?: ReadonlyMap<string, readonly T[]>;
  readonly contentTypes?: ReadonlyMap<string, string>;
}

/**
 * A named routing unit: path patterns, a render mode and per-extension chains.
 *
 * The `pre` and `post` chains wrap every extension chain unless a caller asks
 * for the extension chain alone. Instances are built at configuration time
 * and never change afterwards.
 */
export class ContentSpace<T> {
  readonly name: string;
  readonly mode: SpaceMode;
  readonly #patterns: readonly RegExp[];
  readonly #chains: ReadonlyMap<string, readonly T[]>;
  readonly #contentTypes: ReadonlyMap<string, string>;

  constructor(init: ContentSpaceInit<T>) {
    this.name = init.name;
    this.mode = init.mode;
    this.#patterns = [...init.patterns];
    this.#chains = new Map(init.chains ?? []);
    this.#contentTypes = new Map(init.contentTypes ?? []);
  }

  matches(docPath: string): boolean {
    return this.#patterns.some((pattern) => pattern.test(docPath));
  }

  getTransformers(extension: string | null, extensionOnly = false): T[] {
    const chain = extension === null ? [] : [...(this.#chains.get(extension) ?? [])];
    if (extensionOnly) {
      return chain;
    }

    return [...(this.#chains.get(PRE_CHAIN) ?? []), ...chain, ...(this.#chains.get(POST_CHAIN) ?? [])];
  }

  hasExtensionChain(extension: string | null): boolean {
    return extension !== null && extension !== PRE_CHAIN && extension !== POST_CHAIN && this.#chains.has(extension);
  }

  chainKeys(): string[] {
    return [...this.#chains.keys()];
  }

  contentTypeFor(extension: string | null): string {
    return contentTypeFor(extension, this.#contentTypes);
  }
}
