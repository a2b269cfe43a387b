import { describe, expect, it } from "vitest";

import { createElement } from "../dom/factory.js";
import { CommentNode, RootNode, nodesMatch, type DocNode } from "../dom/nodes.js";
import { Logger, type LogEntry } from "../logging/logger.js";
import { dumpTree } from "../serializer/dump.js";
import { render } from "../serializer/serialize.js";

import { MarkupParser, parse, parseBytes, parseStream } from "./build.js";

function sameTree(left: DocNode, right: DocNode): boolean {
  if (!nodesMatch(left, right)) {
    return false;
  }

  if (left.kind === "root" || left.kind === "element") {
    if (right.kind !== "root" && right.kind !== "element") {
      return false;
    }

    if (left.kind === "element" && right.kind === "element") {
      for (const [name, attribute] of left.attributes) {
        const other = right.getAttribute(name);
        if (other === undefined || [...other.values].sort().join(" ") !== [...attribute.values].sort().join(" ")) {
          return false;
        }
      }
    }

    return (
      left.children.length === right.children.length &&
      left.children.every((child, index) => {
        const counterpart = right.children[index];
        return counterpart !== undefined && sameTree(child, counterpart);
      })
    );
  }

  return true;
}

async function* chunks<T>(...parts: T[]): AsyncIterable<T> {
  for (const part of parts) {
    yield part;
  }
}

describe("parse", () => {
  it("should recover from a mismatched end tag", () => {
    const result = parse("<div><span>text</div>");

    expect(result.wellFormed).toBe(false);
    expect(dumpTree(result.root)).toBe(['| <div>', '|   <span>', '|     "text"'].join("\n"));
    expect(result.warnings.map((warning) => warning.code)).toEqual(["stray-end-tag", "unclosed-element", "unclosed-element"]);
  });

  it("should log ignored end tags as warnings", () => {
    const entries: LogEntry[] = [];
    const logger = new Logger({ level: "warn", output: (entry) => entries.push(entry) });

    parse("<div><span>text</div>", { logger });

    expect(entries[0]?.level).toBe("warn");
    expect(entries[0]?.message).toBe("ignoring end tag </div>, expected </span>");
  });

  it("should accept a stray end tag at the top level", () => {
    const result = parse("</p>x");

    expect(result.wellFormed).toBe(true);
    expect(result.warnings[0]?.code).toBe("stray-end-tag");
    expect(result.root.children.map((child) => child.kind)).toEqual(["text"]);
  });

  it("should split class values on whitespace", () => {
    const { root } = parse('<p class=" lead  big" title="a b">x</p>');
    const p = root.findElement("p");

    expect(p?.getAttribute("class")?.values).toEqual(["lead", "big"]);
    expect(p?.getAttribute("title")?.values).toEqual(["a b"]);
  });

  it("should decode entities in text and comments", () => {
    const { root } = parse("<p>a &amp; b &lt;c&gt;</p><!-- x &amp; y -->");

    expect(root.findElement("p")?.children).toEqual([expect.objectContaining({ kind: "text", value: "a & b <c>" })]);
    expect(root.children[1]).toEqual(expect.objectContaining({ kind: "comment", value: " x & y " }));
  });

  it("should not push void elements", () => {
    const result = parse("<p>a<br>b<img src=x.png></p>");

    expect(result.wellFormed).toBe(true);
    expect(result.root.findElement("p")?.children.map((child) => child.kind)).toEqual(["text", "element", "text", "element"]);
  });

  it("should close self-closing elements immediately", () => {
    const result = parse("<div/>x");

    expect(result.wellFormed).toBe(true);
    expect(result.root.children.map((child) => child.kind)).toEqual(["element", "text"]);
  });

  it("should keep script and textarea content as text", () => {
    const { root } = parse("<script>if (a<b) {}</script><textarea><b></textarea>");

    expect(root.findElement("script")?.children).toEqual([expect.objectContaining({ value: "if (a<b) {}" })]);
    expect(root.findElement("textarea")?.children).toEqual([expect.objectContaining({ value: "<b>" })]);
  });

  it("should drop doctypes", () => {
    const { root } = parse("<!DOCTYPE html><html><head></head><body></body></html>");

    expect(root.children.map((child) => (child.kind === "element" ? child.tagName : child.kind))).toEqual(["html"]);
  });

  it("should rebuild a rendered tree node for node", () => {
    const tree = new RootNode(
      createElement(
        "section",
        { id: "s", class: ["x", "y"] },
        "Tom & Jerry <3",
        createElement("em", {}, "hi"),
        new CommentNode("a < b"),
        createElement("span", {}, createElement("span", {}, "deep"))
      )
    );

    const reparsed = parse(render(tree));

    expect(reparsed.wellFormed).toBe(true);
    expect(sameTree(tree, reparsed.root)).toBe(true);
  });

  it("should rebuild line-break elements rendered with their line feeds", () => {
    const tree = new RootNode(
      createElement(
        "div",
        { class: "box" },
        createElement("p", {}, "x"),
        new CommentNode("between"),
        createElement("p", {}, "y")
      ),
      "\nafter"
    );

    const markup = render(tree);
    const reparsed = parse(markup);

    expect(markup).toBe('<div class="box"><p>x</p>\n<!--between--><p>y</p>\n</div>\n\nafter');
    expect(reparsed.wellFormed).toBe(true);
    expect(dumpTree(reparsed.root)).toBe(dumpTree(tree));
    expect(sameTree(tree, reparsed.root)).toBe(true);
  });

  it("should keep the line feed after a line-break element when asked to", () => {
    const kept = parse("<p>a</p>\nb", { lineBreaks: false });
    const dropped = parse("<p>a</p>\nb");

    expect(kept.root.children[1]).toEqual(expect.objectContaining({ kind: "text", value: "\nb" }));
    expect(dropped.root.children[1]).toEqual(expect.objectContaining({ kind: "text", value: "b" }));
  });

  it("should only drop the line feed directly after a closed line-break element", () => {
    const { root } = parse("<span>a</span>\n<div>b</div>x\n");

    expect(root.children.map((child) => (child.kind === "text" ? child.value : child.kind))).toEqual([
      "element",
      "\n",
      "element",
      "x\n"
    ]);
  });

  it("should bring carriage returns back unchanged", () => {
    const tree = new RootNode(createElement("span", { title: "a\rb" }, "one\r\ntwo\r"));

    const reparsed = parse(render(tree));

    expect(reparsed.root.findElement("span")?.children).toEqual([
      expect.objectContaining({ kind: "text", value: "one\r\ntwo\r" })
    ]);
    expect(reparsed.root.findElement("span")?.getAttribute("title")?.values).toEqual(["a\rb"]);
  });

  it("should read adjacent text siblings back as one text node", () => {
    const tree = new RootNode(createElement("span", {}, "a", "b"));

    const reparsed = parse(render(tree));

    expect(reparsed.root.findElement("span")?.children).toEqual([expect.objectContaining({ kind: "text", value: "ab" })]);
  });
});

describe("MarkupParser", () => {
  it("should merge text across fed chunks", () => {
    const parser = new MarkupParser().feed("<p>ab").feed("cd</p>").close();

    expect(parser.getRoot().findElement("p")?.children).toEqual([expect.objectContaining({ value: "abcd" })]);
    expect(parser.isWellFormed()).toBe(true);
  });

  it("should refuse input after close", () => {
    const parser = new MarkupParser().close();

    expect(() => parser.feed("<p>")).toThrow("after close");
  });
});

describe("parseBytes", () => {
  it("should strip a byte-order mark", () => {
    const bytes = new Uint8Array([0xef, 0xbb, 0xbf, ...new TextEncoder().encode("<b>é</b>")]);

    expect(parseBytes(bytes).root.findElement("b")?.children).toEqual([expect.objectContaining({ value: "é" })]);
  });
});

describe("parseStream", () => {
  it("should parse string chunks", async () => {
    const result = await parseStream(chunks("<p>he", "llo</p>"));

    expect(result.root.findElement("p")?.children).toEqual([expect.objectContaining({ value: "hello" })]);
  });

  it("should decode characters split across byte chunks", async () => {
    const encoder = new TextEncoder();
    const result = await parseStream(
      chunks(encoder.encode("<p>"), new Uint8Array([0xc3]), new Uint8Array([0xa9, ...encoder.encode("</p>")]))
    );

    expect(result.root.findElement("p")?.children).toEqual([expect.objectContaining({ value: "é" })]);
  });
});
