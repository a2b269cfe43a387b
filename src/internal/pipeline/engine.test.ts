import { describe, expect, it } from "vitest";
import { z } from "zod";

import { ElementNode, RootNode, documentParts } from "../dom/nodes.js";
import { LoadError, TransformError } from "../errors.js";
import { Logger } from "../logging/logger.js";
import { render } from "../serializer/serialize.js";

import { createInitialDocument, runPipeline } from "./engine.js";
import { TransformerRegistry, defineTransformer } from "./registry.js";
import type { BoundTransformer, TransformContext } from "./types.js";

const context: TransformContext = {
  docPath: "/notes/a.txt",
  file: { extension: ".txt", exists: true, kind: "file", executable: false, modifiedAt: null },
  server: { indexFiles: ["index.html"], documentRoot: "/srv/site", siteRoot: "/srv" },
  space: { name: "notes", mode: "pipeline" },
  logger: new Logger({ level: "error", output: () => undefined })
};

const append = defineTransformer({
  name: "append",
  options: z.object({ tag: z.string().default("p") }).strict(),
  transform(_context, content, root, options) {
    documentParts(root).body.addChildren(new ElementNode(options.tag).addChildren(String(content)));
    return root;
  }
});

const replace = defineTransformer({
  name: "replace",
  options: z.object({}),
  transform() {
    return new RootNode(new ElementNode("html").addChildren(new ElementNode("head"), new ElementNode("body")));
  }
});

const keep = defineTransformer({
  name: "keep",
  options: z.object({}),
  transform(_context, _content, root): undefined {
    documentParts(root).head.addChildren(new ElementNode("title").addChildren("kept"));
  }
});

const fragment = defineTransformer({
  name: "fragment",
  options: z.object({}),
  transform() {
    return new ElementNode("p").addChildren("loose");
  }
});

const explode = defineTransformer({
  name: "explode",
  options: z.object({}),
  transform() {
    throw new Error("boom");
  }
});

const registry = new TransformerRegistry()
  .register("test.append", append)
  .register("test.replace", replace)
  .register("test.keep", keep)
  .register("test.explode", explode)
  .register("test.fragment", fragment);

function bind(reference: string, kwargs: Record<string, unknown> = {}): BoundTransformer {
  return registry.bind({ reference, args: [], kwargs }, "notes");
}

describe("createInitialDocument", () => {
  it("should hold an empty head and body", () => {
    expect(render(createInitialDocument(), undefined, { lineBreaks: false })).toBe(
      "<html><head></head><body></body></html>"
    );
  });
});

describe("runPipeline", () => {
  it("should thread the tree through every step in order", () => {
    const root = runPipeline([bind("test.append"), bind("test.append", { tag: "div" })], { context, content: "x" });

    expect(render(documentParts(root).body, undefined, { lineBreaks: false })).toBe("<body><p>x</p><div>x</div></body>");
  });

  it("should pass a returned root on to the next step", () => {
    const root = runPipeline([bind("test.append"), bind("test.replace"), bind("test.append")], { context, content: "y" });

    expect(documentParts(root).body.children).toHaveLength(1);
  });

  it("should keep the tree when a step returns nothing", () => {
    const start = createInitialDocument();
    const root = runPipeline([bind("test.keep")], { context, content: "", root: start });

    expect(root).toBe(start);
    expect(documentParts(root).head.findElement("title")).not.toBeNull();
  });

  it("should stop at the first failure and name the step", () => {
    const seen: string[] = [];
    const spy = registry.bind({ reference: "test.append", args: [], kwargs: {} }, "notes");
    const recording: BoundTransformer = {
      ...spy,
      run: (...parameters) => {
        seen.push("after");
        return spy.run(...parameters);
      }
    };

    let failure: unknown = null;
    try {
      runPipeline([bind("test.append"), bind("test.explode"), recording], { context, content: "z" });
    } catch (error) {
      failure = error;
    }

    expect(failure).toBeInstanceOf(TransformError);
    expect(failure instanceof TransformError ? failure.payload : null).toEqual({
      code: "TRANSFORM_FAILED",
      transformer: "test.explode",
      index: 1,
      docPath: "/notes/a.txt",
      space: "notes"
    });
    expect(failure instanceof TransformError && failure.cause instanceof Error ? failure.cause.message : null).toBe("boom");
    expect(seen).toEqual([]);
  });

  it("should refuse a step that returns a node other than a root", () => {
    let failure: unknown = null;
    try {
      runPipeline([bind("test.keep"), bind("test.fragment"), bind("test.append")], { context, content: "z" });
    } catch (error) {
      failure = error;
    }

    expect(failure).toBeInstanceOf(TransformError);
    expect(failure instanceof TransformError ? failure.payload.transformer : null).toBe("test.fragment");
    expect(failure instanceof TransformError ? failure.payload.index : null).toBe(1);
    expect(failure instanceof TransformError && failure.cause instanceof TypeError ? failure.cause.message : null).toBe(
      "expected a root node or nothing, got a node of kind element"
    );
  });

  it("should render identical output for identical input", () => {
    const chain = [bind("test.append"), bind("test.keep")];
    const first = render(runPipeline(chain, { context, content: "same" }));
    const second = render(runPipeline(chain, { context, content: "same" }));

    expect(second).toBe(first);
  });
});

describe("TransformerRegistry", () => {
  it("should refuse unknown locators at bind time", () => {
    expect(() => registry.bind({ reference: "test.missing", args: [], kwargs: {} }, "notes")).toThrow(LoadError);
  });

  it("should refuse invalid options at bind time", () => {
    try {
      bind("test.append", { tag: 3 });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(LoadError);
      expect(error instanceof LoadError ? error.payload.reason : null).toBe("invalid-options");
    }
  });

  it("should refuse unexpected options on strict schemas", () => {
    expect(() => bind("test.append", { colour: "red" })).toThrow(LoadError);
  });

  it("should reject duplicate registrations", () => {
    expect(() => new TransformerRegistry().register("x", keep).register("x", keep)).toThrow("already registered");
  });

  it("should list locators", () => {
    expect(registry.locators()).toEqual(["test.append", "test.explode", "test.fragment", "test.keep", "test.replace"]);
  });
});
