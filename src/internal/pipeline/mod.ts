export { createInitialDocument, runPipeline } from "./engine.js";
export { TransformerRegistry, defineTransformer } from "./registry.js";

export type { PipelineInput } from "./engine.js";
export type { Transformer, TransformerDefinition } from "./registry.js";
export type {
  BoundTransformer,
  DirectoryEntry,
  FileKind,
  FileMetadata,
  FileStat,
  ServerInfo,
  SpaceInfo,
  TransformContext,
  TransformResult,
  TransformerEntry
} from "./types.js";
