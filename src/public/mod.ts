import type { TransformerRegistry } from "../internal/pipeline/mod.js";
import { ContentSite, type ContentSiteOptions } from "../internal/site/mod.js";
import { createDefaultRegistry } from "../transformers/mod.js";

export {
  Attribute,
  CommentNode,
  Defaults,
  ElementNode,
  HTML5_TAGS,
  RawNode,
  RootNode,
  TextNode,
  VOID_ELEMENTS,
  byTag,
  createElement,
  createElementFactory,
  documentParts,
  matching,
  nodesMatch
} from "../internal/dom/mod.js";
export { decodeContent } from "../internal/encoding/mod.js";
export {
  ConfigError,
  LoadError,
  RenderError,
  ResolutionError,
  TransformError,
  TreeError
} from "../internal/errors.js";
export { Logger, getLogger, setLogger } from "../internal/logging/mod.js";
export { TransformerRegistry, createInitialDocument, defineTransformer, runPipeline } from "../internal/pipeline/mod.js";
export { dumpTree, render } from "../internal/serializer/mod.js";
export { ContentSite } from "../internal/site/mod.js";
export { ContentSpace, SpaceResolver, contentTypeFor, loadSiteConfig, normalizeDocPath } from "../internal/space/mod.js";
export { tokenize } from "../internal/tokenizer/mod.js";
export { MarkupParser, parse, parseBytes, parseStream } from "../internal/tree/mod.js";
export { createDefaultRegistry } from "../transformers/mod.js";

export type * from "./types.js";

export interface CreateSiteOptions extends ContentSiteOptions {
  /** Defaults to the built-in transformers. */
  readonly registry?: TransformerRegistry;
}

/** Validates a parsed site configuration and binds every configured chain. */
export function createSite(config: unknown, options: CreateSiteOptions = {}): ContentSite {
  const { registry = createDefaultRegistry(), ...siteOptions } = options;
  return ContentSite.fromConfig(config, registry, siteOptions);
}
