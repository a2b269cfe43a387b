import { readFileSync } from "node:fs";

import { z } from "zod";

export const DEFAULT_CONTENT_TYPE = "application/octet-stream";

/** Extension used for directory requests, so directories can carry their own chain. */
export const DIRECTORY_EXTENSION = ".directory";

const contentTypeTableSchema = z.record(z.string().startsWith("."), z.string().min(1));

function loadContentTypes(): ReadonlyMap<string, string> {
  const raw: unknown = JSON.parse(readFileSync(new URL("../../../data/content-types.json", import.meta.url), "utf8"));
  return new Map(Object.entries(contentTypeTableSchema.parse(raw)));
}

export const CONTENT_TYPES: ReadonlyMap<string, string> = loadContentTypes();

export function contentTypeFor(
  extension: string | null,
  overrides: ReadonlyMap<string, string> = new Map()
): string {
  if (extension === null) {
    return DEFAULT_CONTENT_TYPE;
  }

  return overrides.get(extension) ?? CONTENT_TYPES.get(extension) ?? DEFAULT_CONTENT_TYPE;
}
