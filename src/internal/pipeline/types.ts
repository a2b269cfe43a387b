import type { DocNode, RootNode } from "../dom/nodes.js";
import type { RawContent } from "../encoding/decode.js";
import type { Logger } from "../logging/logger.js";
import type { SpaceMode } from "../space/space.js";

/** A configured chain step before it is bound: locator plus its arguments. */
export interface TransformerEntry {
  readonly reference: string;
  readonly args: readonly unknown[];
  readonly kwargs: Readonly<Record<string, unknown>>;
}

export type FileKind = "file" | "directory" | "other";

export interface FileStat {
  readonly exists: boolean;
  readonly kind: FileKind;
  readonly executable: boolean;
  readonly modifiedAt: Date | null;
}

export interface FileMetadata extends FileStat {
  readonly extension: string | null;
}

export interface ServerInfo {
  readonly indexFiles: readonly string[];
  readonly documentRoot: string;
  readonly siteRoot: string;
}

export interface SpaceInfo {
  readonly name: string;
  readonly mode: SpaceMode;
}

export interface DirectoryEntry {
  readonly name: string;
  readonly isDirectory: boolean;
  readonly size: number;
}

/** Read-only view of the request handed to every transformer. */
export interface TransformContext {
  readonly docPath: string;
  readonly file: FileMetadata;
  readonly server: ServerInfo;
  readonly space: SpaceInfo;
  readonly directory?: readonly DirectoryEntry[];
  readonly logger: Logger;
}

/**
 * A returned root replaces the tree and returning nothing keeps it. Any other
 * node fails the step.
 */
export type TransformResult = DocNode | undefined;

export interface BoundTransformer {
  readonly name: string;
  readonly locator: string;
  run(context: TransformContext, content: RawContent, root: RootNode): TransformResult;
}
