import { decodeHTML } from "entities";

import { CommentNode, ElementNode, RootNode, TextNode } from "../dom/nodes.js";
import { LINE_BREAK_ELEMENTS } from "../dom/tags.js";
import { decodeContent } from "../encoding/decode.js";
import { getLogger, type Logger } from "../logging/logger.js";
import { createTokenizer, type MarkupTokenizer } from "../tokenizer/tokenize.js";
import type {
  EndTagToken,
  MarkupToken,
  StartTagToken,
  TokenPosition,
  TokenizerParseError
} from "../tokenizer/tokens.js";

import type { ParseOptions, ParseResult, ParseWarning, ParseWarningCode } from "./types.js";

type OpenNode = RootNode | ElementNode;

const CLASS_SEPARATOR = /\s+/;

/**
 * Builds a document tree from markup with a stack of open elements.
 *
 * The stack starts with a synthetic root. An end tag that does not match the
 * innermost open element is reported and skipped, so recovery never pops
 * elements it did not open.
 *
 * With `lineBreaks` on (the default), the one line feed `render` writes after
 * a line-break element such as `div` or `p` is dropped again, so rendered
 * output parses back to the tree it came from.
 */
export class MarkupParser {
  readonly #root = new RootNode();
  readonly #stack: OpenNode[] = [this.#root];
  readonly #warnings: ParseWarning[] = [];
  readonly #logger: Logger;
  readonly #tokenizer: MarkupTokenizer;
  readonly #lineBreaks: boolean;
  #afterLineBreakElement = false;
  #closed = false;

  constructor(options: ParseOptions = {}) {
    this.#logger = (options.logger ?? getLogger()).child({ component: "markup-parser" });
    this.#lineBreaks = options.lineBreaks ?? true;
    this.#tokenizer = createTokenizer({
      token: (token) => this.#handleToken(token),
      parseError: (error) => this.#handleTokenizerError(error)
    });
  }

  get warnings(): readonly ParseWarning[] {
    return this.#warnings;
  }

  feed(chunk: string): this {
    if (this.#closed) {
      throw new Error("MarkupParser.feed() called after close()");
    }

    this.#tokenizer.write(chunk);
    return this;
  }

  close(): this {
    if (this.#closed) {
      return this;
    }

    this.#closed = true;
    this.#tokenizer.end();

    for (const open of this.#stack.slice(1)) {
      if (open.kind === "element") {
        this.#warn("unclosed-element", `element <${open.tagName}> was never closed`, open.tagName, null);
      }
    }
    return this;
  }

  /** True when every element opened so far has been closed in order. */
  isWellFormed(): boolean {
    return this.#stack.length === 1;
  }

  getRoot(): RootNode {
    return this.#root;
  }

  #current(): OpenNode {
    return this.#stack[this.#stack.length - 1] ?? this.#root;
  }

  #handleToken(token: MarkupToken): void {
    if (token.type === "Character" && this.#afterLineBreakElement) {
      this.#afterLineBreakElement = false;
      this.#handleText(token.data.startsWith("\n") ? token.data.slice(1) : token.data);
      return;
    }

    this.#afterLineBreakElement = false;

    switch (token.type) {
      case "StartTag":
        this.#handleStartTag(token);
        return;
      case "EndTag":
        this.#handleEndTag(token);
        return;
      case "Character":
        this.#handleText(token.data);
        return;
      case "Comment":
        this.#current().addChildren(new CommentNode(decodeHTML(token.data)));
        return;
      case "Doctype":
        this.#logger.debug("doctype dropped", { name: token.name });
        return;
    }
  }

  #handleStartTag(token: StartTagToken): void {
    const element = new ElementNode(token.name);

    for (const attribute of token.attributes) {
      if (attribute.name === "class") {
        element.addAttribute("class", attribute.value.split(CLASS_SEPARATOR));
      } else {
        element.addAttribute(attribute.name, attribute.value);
      }
    }

    this.#current().addChildren(element);

    if (!element.isVoid() && !token.selfClosing) {
      this.#stack.push(element);
    } else {
      this.#markClosed(element.tagName);
    }
  }

  #handleEndTag(token: EndTagToken): void {
    const current = this.#current();

    if (current.kind === "root" || current.tagName !== token.name) {
      const expected = current.kind === "root" ? "no open element" : `</${current.tagName}>`;
      this.#warn("stray-end-tag", `ignoring end tag </${token.name}>, expected ${expected}`, token.name, token.position);
      return;
    }

    this.#stack.pop();
    this.#markClosed(token.name);
  }

  #markClosed(tagName: string): void {
    this.#afterLineBreakElement = this.#lineBreaks && LINE_BREAK_ELEMENTS.has(tagName);
  }

  #handleText(data: string): void {
    if (data.length === 0) {
      return;
    }

    const current = this.#current();
    const last = current.children[current.children.length - 1];

    if (last?.kind === "text") {
      last.value += data;
      return;
    }

    current.addChildren(new TextNode(data));
  }

  #handleTokenizerError(error: TokenizerParseError): void {
    this.#warn("tokenizer-error", error.code, null, error.position);
  }

  #warn(code: ParseWarningCode, message: string, tagName: string | null, position: TokenPosition | null): void {
    const warning: ParseWarning = {
      code,
      message,
      tagName,
      line: position?.line ?? null,
      column: position?.column ?? null
    };

    this.#warnings.push(warning);

    if (code === "tokenizer-error") {
      this.#logger.debug(message, { line: warning.line, column: warning.column });
    } else {
      this.#logger.warn(message, { code, line: warning.line, column: warning.column });
    }
  }
}

function toResult(parser: MarkupParser): ParseResult {
  return {
    root: parser.getRoot(),
    wellFormed: parser.isWellFormed(),
    warnings: parser.warnings
  };
}

export function parse(markup: string, options: ParseOptions = {}): ParseResult {
  return toResult(new MarkupParser(options).feed(markup).close());
}

/** Decodes by byte-order mark or `<meta charset>`, UTF-8 otherwise. */
export function parseBytes(bytes: Uint8Array, options: ParseOptions = {}): ParseResult {
  return parse(decodeContent(bytes).text, options);
}

/** Feeds chunks to the parser as they arrive; byte chunks are read as UTF-8. */
export async function parseStream(
  chunks: AsyncIterable<Uint8Array | string>,
  options: ParseOptions = {}
): Promise<ParseResult> {
  const parser = new MarkupParser(options);
  const decoder = new TextDecoder("utf-8");

  for await (const chunk of chunks) {
    parser.feed(typeof chunk === "string" ? chunk : decoder.decode(chunk, { stream: true }));
  }

  const tail = decoder.decode();
  if (tail.length > 0) {
    parser.feed(tail);
  }

  return toResult(parser.close());
}
