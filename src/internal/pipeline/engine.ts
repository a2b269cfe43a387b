import { ElementNode, RootNode } from "../dom/nodes.js";
import type { RawContent } from "../encoding/decode.js";
import { TransformError } from "../errors.js";

import type { BoundTransformer, TransformContext } from "./types.js";

export interface PipelineInput {
  readonly context: TransformContext;
  readonly content: RawContent;
  /** Tree to start from; a fresh empty document otherwise. */
  readonly root?: RootNode;
}

/** `html` holding an empty `head` and `body`. */
export function createInitialDocument(): RootNode {
  return new RootNode(new ElementNode("html").addChildren(new ElementNode("head"), new ElementNode("body")));
}

/**
 * Runs a chain in order, handing each step the tree the previous step
 * returned. The first failure stops the chain and is rethrown as a
 * `TransformError` naming the step.
 */
export function runPipeline(chain: readonly BoundTransformer[], input: PipelineInput): RootNode {
  const { context, content } = input;
  const logger = context.logger.child({ docPath: context.docPath, space: context.space.name });
  let root = input.root ?? createInitialDocument();

  for (const [index, transformer] of chain.entries()) {
    logger.debug("running transformer", { transformer: transformer.locator, index });

    const fail = (error: unknown): TransformError => {
      logger.error("transformer failed", error, { transformer: transformer.locator, index });
      return new TransformError(
        {
          code: "TRANSFORM_FAILED",
          transformer: transformer.locator,
          index,
          docPath: context.docPath,
          space: context.space.name
        },
        error
      );
    };

    let result: ReturnType<BoundTransformer["run"]>;
    try {
      result = transformer.run(context, content, root);
    } catch (error) {
      throw fail(error);
    }

    if (result instanceof RootNode) {
      root = result;
    } else if (result !== undefined) {
      throw fail(new TypeError(`expected a root node or nothing, got a node of kind ${result.kind}`));
    }
  }

  return root;
}
