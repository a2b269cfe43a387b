import type { RawContent } from "../encoding/decode.js";
import type { RenderError, TransformError } from "../errors.js";
import type { DirectoryEntry, FileStat } from "../pipeline/types.js";

/** One request as handed over by the serving layer: path, stat and content already read. */
export interface SiteRequest {
  readonly path: string;
  readonly file: FileStat;
  readonly content: RawContent;
  readonly directory?: readonly DirectoryEntry[];
  /** Raw `If-Modified-Since` header value. */
  readonly ifModifiedSince?: string;
}

export interface RenderedOutcome {
  readonly kind: "rendered";
  readonly docPath: string;
  readonly space: string;
  readonly payload: RawContent;
  readonly contentType: string;
  readonly cacheControl: string | null;
  readonly lastModified: string | null;
}

export interface NotModifiedOutcome {
  readonly kind: "not-modified";
  readonly docPath: string;
  readonly space: string;
}

export interface RedirectOutcome {
  readonly kind: "redirect";
  readonly docPath: string;
  readonly location: string;
}

export interface NotFoundOutcome {
  readonly kind: "not-found";
  readonly docPath: string;
  readonly reason: "bad-path" | "no-space" | "missing-file";
}

export interface FailedOutcome {
  readonly kind: "failed";
  readonly docPath: string;
  readonly space: string;
  readonly error: TransformError | RenderError;
}

export type SiteOutcome = RenderedOutcome | NotModifiedOutcome | RedirectOutcome | NotFoundOutcome | FailedOutcome;
