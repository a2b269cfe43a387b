import type { z } from "zod";

import type { RootNode } from "../dom/nodes.js";
import type { RawContent } from "../encoding/decode.js";
import { LoadError } from "../errors.js";

import type { BoundTransformer, TransformContext, TransformResult, TransformerEntry } from "./types.js";

export interface TransformerDefinition<Options> {
  readonly name: string;
  /** Validates and defaults the configured `kwargs`. */
  readonly options: z.ZodType<Options, z.ZodTypeDef, unknown>;
  transform(
    context: TransformContext,
    content: RawContent,
    root: RootNode,
    options: Options,
    args: readonly unknown[]
  ): TransformResult;
}

export interface Transformer {
  readonly name: string;
  bind(entry: TransformerEntry, space: string): BoundTransformer;
}

export function defineTransformer<Options>(definition: TransformerDefinition<Options>): Transformer {
  return {
    name: definition.name,
    bind(entry, space) {
      const parsed = definition.options.safeParse(entry.kwargs);
      if (!parsed.success) {
        throw new LoadError({
          code: "LOAD_FAILED",
          space,
          locator: entry.reference,
          reason: "invalid-options",
          issues: parsed.error.issues.map((issue) => `${issue.path.join(".") || "<options>"}: ${issue.message}`)
        });
      }

      const options = parsed.data;
      const args = [...entry.args];

      return {
        name: definition.name,
        locator: entry.reference,
        run: (context, content, root) => definition.transform(context, content, root, options, args)
      };
    }
  };
}

/**
 * Closed lookup from configuration locators to transformer implementations.
 * Binding happens once, when a space is set up.
 */
export class TransformerRegistry {
  readonly #transformers = new Map<string, Transformer>();

  register(locator: string, transformer: Transformer): this {
    if (this.#transformers.has(locator)) {
      throw new Error(`transformer locator already registered: ${locator}`);
    }

    this.#transformers.set(locator, transformer);
    return this;
  }

  has(locator: string): boolean {
    return this.#transformers.has(locator);
  }

  locators(): string[] {
    return [...this.#transformers.keys()].sort();
  }

  bind(entry: TransformerEntry, space: string): BoundTransformer {
    const transformer = this.#transformers.get(entry.reference);
    if (transformer === undefined) {
      throw new LoadError({
        code: "LOAD_FAILED",
        space,
        locator: entry.reference,
        reason: "unknown-transformer",
        issues: []
      });
    }

    return transformer.bind(entry, space);
  }
}
