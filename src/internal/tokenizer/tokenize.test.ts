import { describe, expect, it } from "vitest";

import { createTokenizer, tokenize } from "./tokenize.js";
import type { MarkupToken } from "./tokens.js";

describe("tokenize", () => {
  it("should produce start, character and end tokens", () => {
    const { tokens } = tokenize('<p class="a">Hi</p>');

    expect(tokens.map((token) => token.type)).toEqual(["StartTag", "Character", "EndTag"]);
    expect(tokens[0]).toMatchObject({ type: "StartTag", name: "p", attributes: [{ name: "class", value: "a" }] });
    expect(tokens[1]).toMatchObject({ type: "Character", data: "Hi" });
  });

  it("should keep script content as text", () => {
    const { tokens } = tokenize("<script>a<b</script>");

    expect(tokens.map((token) => token.type)).toEqual(["StartTag", "Character", "EndTag"]);
    expect(tokens[1]).toMatchObject({ data: "a<b" });
  });

  it("should report comments and doctypes", () => {
    const { tokens } = tokenize("<!DOCTYPE html><!-- x -->");

    expect(tokens).toMatchObject([
      { type: "Doctype", name: "html" },
      { type: "Comment", data: " x " }
    ]);
  });

  it("should flag self-closing syntax", () => {
    const { tokens } = tokenize("<div/>");

    expect(tokens[0]).toMatchObject({ type: "StartTag", name: "div", selfClosing: true });
  });

  it("should collect tokenizer errors with positions", () => {
    const { errors } = tokenize("<p a=1 a=2></p>");

    expect(errors.map((error) => error.code)).toContain("duplicate-attribute");
    expect(errors[0]?.position.line).toBe(1);
  });

  it("should accept input in chunks", () => {
    const tokens: MarkupToken[] = [];
    const tokenizer = createTokenizer({ token: (token) => tokens.push(token) });

    tokenizer.write("<e");
    tokenizer.write("m>x</em>");
    tokenizer.end();

    expect(tokens.filter((token) => token.type !== "Character")).toMatchObject([
      { type: "StartTag", name: "em" },
      { type: "EndTag", name: "em" }
    ]);
  });
});
