import { Defaults } from "../dom/defaults.js";
import { RenderError, ResolutionError, TransformError } from "../errors.js";
import { getLogger, type Logger } from "../logging/logger.js";
import { runPipeline } from "../pipeline/engine.js";
import type { TransformerRegistry } from "../pipeline/registry.js";
import type { BoundTransformer, FileMetadata, ServerInfo, TransformContext } from "../pipeline/types.js";
import { render, type RenderOptions } from "../serializer/serialize.js";
import { loadSiteConfig, type SiteConfig } from "../space/config.js";
import { DIRECTORY_EXTENSION } from "../space/content-types.js";
import { extensionOf, normalizeDocPath } from "../space/path.js";
import { SpaceResolver } from "../space/resolver.js";
import { ContentSpace } from "../space/space.js";

import type { SiteOutcome, SiteRequest } from "./types.js";

const HTML_EXTENSION = ".html";
const STATIC_CACHE_CONTROL = "max-age=120";

export interface ContentSiteOptions {
  readonly logger?: Logger;
  readonly render?: RenderOptions;
}

type Space = ContentSpace<BoundTransformer>;

function notModifiedSince(modifiedAt: Date, header: string): boolean {
  const since = Date.parse(header);
  if (Number.isNaN(since)) {
    return false;
  }

  // HTTP dates carry whole seconds.
  return Math.floor(modifiedAt.getTime() / 1000) * 1000 <= since;
}

/**
 * Spaces, bound chains and render defaults for one site. Everything is built
 * in the constructor and only read while handling requests; each request gets
 * its own document tree.
 */
export class ContentSite {
  readonly server: ServerInfo;
  readonly defaults: Defaults;
  readonly #resolver: SpaceResolver<BoundTransformer>;
  readonly #logger: Logger;
  readonly #renderOptions: RenderOptions;

  constructor(config: SiteConfig, registry: TransformerRegistry, options: ContentSiteOptions = {}) {
    this.#logger = (options.logger ?? getLogger()).child({ component: "content-site" });
    this.#renderOptions = options.render ?? {};
    this.server = {
      indexFiles: [...config.indexFiles],
      documentRoot: config.documentRoot,
      siteRoot: config.siteRoot
    };
    this.defaults = Defaults.fromConfig(config.defaults, "site");
    this.#resolver = new SpaceResolver(config.spaces.map((space) => this.#setupSpace(space, registry)));
  }

  static fromConfig(raw: unknown, registry: TransformerRegistry, options: ContentSiteOptions = {}): ContentSite {
    return new ContentSite(loadSiteConfig(raw, { logger: options.logger }), registry, options);
  }

  get spaces(): readonly Space[] {
    return this.#resolver.spaces;
  }

  resolveSpace(docPath: string): Space | null {
    return this.#resolver.resolve(docPath);
  }

  /** Paths to try, in order, when a directory path should be served by its index file. */
  indexCandidates(docPath: string): string[] {
    if (!docPath.endsWith("/")) {
      return [];
    }

    return this.server.indexFiles.map((indexFile) => `${docPath}${indexFile}`);
  }

  handle(request: SiteRequest): SiteOutcome {
    let docPath = request.path;
    let space: Space;
    try {
      docPath = normalizeDocPath(request.path);
      space = this.#resolver.require(docPath);
    } catch (error) {
      if (error instanceof ResolutionError) {
        this.#logger.debug("request not resolved", { path: request.path, reason: error.payload.reason });
        return { kind: "not-found", docPath, reason: error.payload.reason };
      }
      throw error;
    }

    const { file } = request;
    if (file.exists && file.kind === "directory" && !docPath.endsWith("/")) {
      return { kind: "redirect", docPath, location: `${docPath}/` };
    }

    if (!file.exists) {
      return { kind: "not-found", docPath, reason: "missing-file" };
    }

    const metadata: FileMetadata = {
      ...file,
      extension: file.kind === "directory" ? DIRECTORY_EXTENSION : extensionOf(docPath)
    };

    if (space.mode === "pipeline" && (metadata.extension === HTML_EXTENSION || space.hasExtensionChain(metadata.extension))) {
      return this.#renderDocument(space, docPath, metadata, request);
    }

    return this.#serveAsIs(space, docPath, metadata, request);
  }

  #setupSpace(config: SiteConfig["spaces"][number], registry: TransformerRegistry): Space {
    const chains = new Map<string, BoundTransformer[]>();
    for (const [key, entries] of config.transformers) {
      chains.set(key, entries.map((entry) => registry.bind(entry, config.name)));
    }

    if (config.mode === "asis" && chains.size > 0) {
      this.#logger.warn("transformers on an asis space are never run", { space: config.name });
    }

    this.#logger.debug("space ready", { space: config.name, mode: config.mode, chains: [...chains.keys()] });

    return new ContentSpace<BoundTransformer>({
      name: config.name,
      mode: config.mode,
      patterns: config.patterns,
      chains,
      contentTypes: config.contentTypes
    });
  }

  #serveAsIs(space: Space, docPath: string, file: FileMetadata, request: SiteRequest): SiteOutcome {
    const modifiedAt = file.executable ? null : file.modifiedAt;

    if (modifiedAt !== null && request.ifModifiedSince !== undefined && notModifiedSince(modifiedAt, request.ifModifiedSince)) {
      return { kind: "not-modified", docPath, space: space.name };
    }

    return {
      kind: "rendered",
      docPath,
      space: space.name,
      payload: request.content,
      contentType: space.contentTypeFor(file.extension),
      cacheControl: modifiedAt === null ? null : STATIC_CACHE_CONTROL,
      lastModified: modifiedAt === null ? null : modifiedAt.toUTCString()
    };
  }

  #renderDocument(space: Space, docPath: string, file: FileMetadata, request: SiteRequest): SiteOutcome {
    const logger = this.#logger.child({ docPath, space: space.name });
    const context: TransformContext = {
      docPath,
      file,
      server: this.server,
      space: { name: space.name, mode: space.mode },
      directory: request.directory,
      logger
    };

    try {
      const root = runPipeline(space.getTransformers(file.extension), { context, content: request.content });
      return {
        kind: "rendered",
        docPath,
        space: space.name,
        payload: render(root, this.defaults, this.#renderOptions),
        contentType: space.contentTypeFor(HTML_EXTENSION),
        cacheControl: null,
        lastModified: null
      };
    } catch (error) {
      if (error instanceof TransformError || error instanceof RenderError) {
        logger.error("document failed", error);
        return { kind: "failed", docPath, space: space.name, error };
      }
      throw error;
    }
  }
}
