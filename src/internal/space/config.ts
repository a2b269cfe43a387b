import { z } from "zod";

import type { DefaultsConfig } from "../dom/defaults.js";
import { ConfigError } from "../errors.js";
import { getLogger, type Logger } from "../logging/logger.js";
import type { TransformerEntry } from "../pipeline/types.js";

import type { SpaceMode } from "./space.js";

const transformerEntrySchema = z
  .object({
    function: z.string().min(1),
    args: z.array(z.unknown()).default([]),
    kwargs: z.record(z.unknown()).default({})
  })
  .strict();

const spaceSchema = z
  .object({
    type: z.enum(["asis", "pipeline"]).default("asis"),
    regexps: z.array(z.string()).default([]),
    extensions: z.record(z.string().startsWith("."), z.string().min(1)).default({}),
    transformers: z.record(z.array(transformerEntrySchema)).default({})
  })
  .strict();

const defaultsSchema = z.record(
  z.object({
    attributes: z.record(z.array(z.string().nullable())).default({})
  })
);

export const siteConfigSchema = z.object({
  "space-order": z.array(z.string()).default([]),
  spaces: z.record(spaceSchema).default({}),
  "index-files": z.array(z.string().min(1)).default(["index.html"]),
  "document-root": z.string().default("/"),
  "site-root": z.string().default("/"),
  defaults: defaultsSchema.default({})
});

export type RawSiteConfig = z.input<typeof siteConfigSchema>;

export interface SpaceConfig {
  readonly name: string;
  readonly mode: SpaceMode;
  readonly patterns: readonly RegExp[];
  readonly contentTypes: ReadonlyMap<string, string>;
  readonly transformers: ReadonlyMap<string, readonly TransformerEntry[]>;
}

export interface SiteConfig {
  /** Spaces in match priority order. */
  readonly spaces: readonly SpaceConfig[];
  readonly indexFiles: readonly string[];
  readonly documentRoot: string;
  readonly siteRoot: string;
  readonly defaults: DefaultsConfig;
}

export interface LoadSiteConfigOptions {
  readonly logger?: Logger;
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "<root>"}: ${issue.message}`);
}

function compilePattern(source: string, path: string): RegExp {
  try {
    // Patterns match from the start of the path only.
    return new RegExp(`^(?:${source})`);
  } catch (error) {
    throw new ConfigError(
      { code: "CONFIG_INVALID", path, issues: [error instanceof Error ? error.message : String(error)] },
      { cause: error }
    );
  }
}

function toSpaceConfig(name: string, raw: z.output<typeof spaceSchema>): SpaceConfig {
  const transformers = new Map<string, TransformerEntry[]>();
  for (const [key, entries] of Object.entries(raw.transformers)) {
    transformers.set(
      key,
      entries.map((entry) => ({ reference: entry.function, args: entry.args, kwargs: entry.kwargs }))
    );
  }

  return {
    name,
    mode: raw.type,
    patterns: raw.regexps.map((source, index) => compilePattern(source, `spaces.${name}.regexps.${String(index)}`)),
    contentTypes: new Map(Object.entries(raw.extensions)),
    transformers
  };
}

/**
 * Validates an already-parsed site configuration object.
 *
 * Only spaces named in `space-order` take part in matching; any other space is
 * reported and left out.
 */
export function loadSiteConfig(raw: unknown, options: LoadSiteConfigOptions = {}): SiteConfig {
  const logger = (options.logger ?? getLogger()).child({ component: "site-config" });
  const parsed = siteConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError({ code: "CONFIG_INVALID", path: "<root>", issues: formatIssues(parsed.error) });
  }

  const config = parsed.data;
  const order = config["space-order"];
  const seen = new Set<string>();
  const spaces: SpaceConfig[] = [];

  order.forEach((name, index) => {
    const space = config.spaces[name];
    if (space === undefined) {
      throw new ConfigError({
        code: "CONFIG_INVALID",
        path: `space-order.${String(index)}`,
        issues: [`unknown space "${name}"`]
      });
    }

    if (seen.has(name)) {
      throw new ConfigError({
        code: "CONFIG_INVALID",
        path: `space-order.${String(index)}`,
        issues: [`space "${name}" listed more than once`]
      });
    }

    seen.add(name);
    spaces.push(toSpaceConfig(name, space));
  });

  for (const name of Object.keys(config.spaces)) {
    if (!seen.has(name)) {
      logger.warn("space is not listed in space-order and will never match", { space: name });
    }
  }

  return {
    spaces,
    indexFiles: config["index-files"],
    documentRoot: config["document-root"],
    siteRoot: config["site-root"],
    defaults: config.defaults
  };
}
