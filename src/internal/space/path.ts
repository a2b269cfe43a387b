import { posix } from "node:path";

import { ResolutionError } from "../errors.js";

/**
 * Turns a request target into a document path: query and fragment removed,
 * percent-decoded, dot segments resolved against `/`. A trailing slash on the
 * request survives normalization.
 */
export function normalizeDocPath(target: string): string {
  const end = target.search(/[?#]/);
  const rawPath = end === -1 ? target : target.slice(0, end);

  let decoded: string;
  try {
    decoded = decodeURIComponent(rawPath);
  } catch (error) {
    throw new ResolutionError({ code: "RESOLUTION_FAILED", docPath: target, reason: "bad-path" }, { cause: error });
  }

  const resolved = posix.resolve("/", decoded);
  return rawPath.endsWith("/") && resolved !== "/" ? `${resolved}/` : resolved;
}

/** `.md` for `/notes/a.md`, `null` when the last segment has no extension. */
export function extensionOf(docPath: string): string | null {
  const extension = posix.extname(docPath.endsWith("/") ? "" : docPath);
  return extension.length > 0 ? extension : null;
}

/** Name of the containing directory and the base name without extension. */
export function splitDocPath(docPath: string): { readonly parent: string; readonly stem: string } {
  const trimmed = docPath.length > 1 && docPath.endsWith("/") ? docPath.slice(0, -1) : docPath;
  const parent = posix.dirname(trimmed);
  return { parent, stem: posix.basename(trimmed, posix.extname(trimmed)) };
}
