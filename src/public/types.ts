export type {
  AttributeInput,
  AttributeInputs,
  AttributeValue,
  ChildInput,
  ChildNode,
  DefaultsConfig,
  DocNode,
  DocumentParts,
  ElementFactory,
  ElementFactoryOptions,
  NodeKind,
  NodePredicate
} from "../internal/dom/mod.js";
export type { DecodeOptions, DecodedContent, RawContent } from "../internal/encoding/mod.js";
export type {
  ConfigErrorPayload,
  LoadErrorPayload,
  RenderErrorPayload,
  ResolutionErrorPayload,
  TransformErrorPayload,
  TreeErrorPayload
} from "../internal/errors.js";
export type { LogContext, LogEntry, LogLevel, LoggerOptions } from "../internal/logging/mod.js";
export type {
  BoundTransformer,
  DirectoryEntry,
  FileKind,
  FileMetadata,
  FileStat,
  PipelineInput,
  ServerInfo,
  SpaceInfo,
  TransformContext,
  TransformResult,
  Transformer,
  TransformerDefinition,
  TransformerEntry
} from "../internal/pipeline/mod.js";
export type { RenderOptions } from "../internal/serializer/mod.js";
export type {
  ContentSiteOptions,
  FailedOutcome,
  NotFoundOutcome,
  NotModifiedOutcome,
  RedirectOutcome,
  RenderedOutcome,
  SiteOutcome,
  SiteRequest
} from "../internal/site/mod.js";
export type {
  ContentSpaceInit,
  LoadSiteConfigOptions,
  RawSiteConfig,
  SiteConfig,
  SpaceConfig,
  SpaceMode
} from "../internal/space/mod.js";
export type {
  MarkupToken,
  TokenPosition,
  TokenizeResult,
  TokenizerParseError
} from "../internal/tokenizer/mod.js";
export type { ParseOptions, ParseResult, ParseWarning, ParseWarningCode } from "../internal/tree/mod.js";
