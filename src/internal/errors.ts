export interface ResolutionErrorPayload {
  readonly code: "RESOLUTION_FAILED";
  readonly docPath: string;
  readonly reason: "no-space" | "bad-path";
}

export interface LoadErrorPayload {
  readonly code: "LOAD_FAILED";
  readonly space: string;
  readonly locator: string;
  readonly reason: "unknown-transformer" | "invalid-options";
  readonly issues: readonly string[];
}

export interface TransformErrorPayload {
  readonly code: "TRANSFORM_FAILED";
  readonly transformer: string;
  readonly index: number;
  readonly docPath: string;
  readonly space: string;
}

export interface RenderErrorPayload {
  readonly code: "RENDER_FAILED";
  readonly reason: "void-element-children" | "raw-text-close-tag";
  readonly tagName: string;
}

export interface TreeErrorPayload {
  readonly code: "TREE_INVALID";
  readonly reason: "unknown-tag" | "void-element-children" | "missing-element";
  readonly tagName: string;
}

export interface ConfigErrorPayload {
  readonly code: "CONFIG_INVALID";
  readonly path: string;
  readonly issues: readonly string[];
}

export class ResolutionError extends Error {
  readonly payload: ResolutionErrorPayload;

  constructor(payload: ResolutionErrorPayload, options?: ErrorOptions) {
    super(`Resolution failed: ${payload.reason} path=${payload.docPath}`, options);
    this.name = "ResolutionError";
    this.payload = payload;
  }
}

export class LoadError extends Error {
  readonly payload: LoadErrorPayload;

  constructor(payload: LoadErrorPayload, options?: ErrorOptions) {
    super(
      `Transformer load failed: ${payload.reason} space=${payload.space} locator=${payload.locator}${
        payload.issues.length > 0 ? ` (${payload.issues.join("; ")})` : ""
      }`,
      options
    );
    this.name = "LoadError";
    this.payload = payload;
  }
}

export class TransformError extends Error {
  readonly payload: TransformErrorPayload;

  constructor(payload: TransformErrorPayload, cause: unknown) {
    super(
      `Transformer ${payload.transformer} (step ${String(payload.index)}) failed for ${payload.docPath}: ${describeCause(cause)}`,
      { cause }
    );
    this.name = "TransformError";
    this.payload = payload;
  }
}

export class RenderError extends Error {
  readonly payload: RenderErrorPayload;

  constructor(payload: RenderErrorPayload) {
    super(`Render failed: ${payload.reason} <${payload.tagName}>`);
    this.name = "RenderError";
    this.payload = payload;
  }
}

export class TreeError extends Error {
  readonly payload: TreeErrorPayload;

  constructor(payload: TreeErrorPayload) {
    super(`Invalid tree: ${payload.reason} <${payload.tagName}>`);
    this.name = "TreeError";
    this.payload = payload;
  }
}

export class ConfigError extends Error {
  readonly payload: ConfigErrorPayload;

  constructor(payload: ConfigErrorPayload, options?: ErrorOptions) {
    super(`Invalid configuration at ${payload.path}: ${payload.issues.join("; ")}`, options);
    this.name = "ConfigError";
    this.payload = payload;
  }
}

export function describeCause(cause: unknown): string {
  if (cause instanceof Error) {
    return `${cause.name}: ${cause.message}`;
  }

  return String(cause);
}
