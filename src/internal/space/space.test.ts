import { describe, expect, it } from "vitest";

import { ResolutionError } from "../errors.js";

import { ContentSpace } from "./space.js";
import { SpaceResolver } from "./resolver.js";

function space(
  name: string,
  patterns: readonly RegExp[],
  chains: Record<string, string[]> = {},
  contentTypes: Record<string, string> = {}
): ContentSpace<string> {
  return new ContentSpace<string>({
    name,
    mode: "pipeline",
    patterns,
    chains: new Map(Object.entries(chains)),
    contentTypes: new Map(Object.entries(contentTypes))
  });
}

describe("ContentSpace", () => {
  const docs = space(
    "docs",
    [/^\/docs\//],
    { pre: ["A"], ".md": ["B", "C"], post: ["D"] },
    { ".md": "text/markdown", ".png": "image/x-png" }
  );

  it("should wrap extension chains with pre and post", () => {
    expect(docs.getTransformers(".md")).toEqual(["A", "B", "C", "D"]);
  });

  it("should return the extension chain alone on request", () => {
    expect(docs.getTransformers(".md", true)).toEqual(["B", "C"]);
  });

  it("should still apply pre and post to extensions without a chain", () => {
    expect(docs.getTransformers(".txt")).toEqual(["A", "D"]);
    expect(docs.getTransformers(null, true)).toEqual([]);
  });

  it("should hand out copies of its chains", () => {
    docs.getTransformers(".md").push("E");

    expect(docs.getTransformers(".md")).toEqual(["A", "B", "C", "D"]);
  });

  it("should only report real extensions as having a chain", () => {
    expect(docs.hasExtensionChain(".md")).toBe(true);
    expect(docs.hasExtensionChain("pre")).toBe(false);
    expect(docs.hasExtensionChain(".txt")).toBe(false);
  });

  it("should apply its own content types over the table", () => {
    expect(docs.contentTypeFor(".md")).toBe("text/markdown");
    expect(docs.contentTypeFor(".png")).toBe("image/x-png");
    expect(docs.contentTypeFor(".txt")).toBe("text/plain");
    expect(docs.contentTypeFor(".nope")).toBe("application/octet-stream");
  });

  it("should keep its content types to itself", () => {
    const other = space("other", []);

    expect(docs.contentTypeFor(".md")).toBe("text/markdown");
    expect(other.contentTypeFor(".md")).toBe("application/octet-stream");
    expect(other.contentTypeFor(".png")).toBe("image/png");
  });
});

describe("SpaceResolver", () => {
  it("should pick the first matching space in priority order", () => {
    const resolver = new SpaceResolver([space("assets", [/^\/asis\//]), space("site", [/^\//])]);

    expect(resolver.resolve("/asis/logo.png")?.name).toBe("assets");
    expect(resolver.resolve("/about.html")?.name).toBe("site");
  });

  it("should return null when nothing matches", () => {
    const resolver = new SpaceResolver([space("docs", [/^\/docs\//])]);

    expect(resolver.resolve("/blog/")).toBeNull();
    expect(resolver.get("docs")?.name).toBe("docs");
  });

  it("should raise a resolution error when a path must resolve", () => {
    const resolver = new SpaceResolver([space("docs", [/^\/docs\//])]);

    expect(resolver.require("/docs/a.md").name).toBe("docs");
    expect(() => resolver.require("/blog/")).toThrow(ResolutionError);
    expect(() => resolver.require("/blog/")).toThrow("Resolution failed: no-space path=/blog/");
  });
});
