import type { RootNode } from "../dom/nodes.js";
import type { Logger } from "../logging/logger.js";

export type ParseWarningCode = "stray-end-tag" | "unclosed-element" | "tokenizer-error";

export interface ParseWarning {
  readonly code: ParseWarningCode;
  readonly message: string;
  readonly tagName: string | null;
  readonly line: number | null;
  readonly column: number | null;
}

export interface ParseOptions {
  readonly logger?: Logger;
  /** Drop the line feed `render` emits after line-break elements. Defaults to `true`. */
  readonly lineBreaks?: boolean;
}

export interface ParseResult {
  readonly root: RootNode;
  readonly wellFormed: boolean;
  readonly warnings: readonly ParseWarning[];
}
