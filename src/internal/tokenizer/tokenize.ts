import { Tokenizer, TokenizerMode, type ParserError, type Token, type TokenHandler } from "parse5";

import type {
  MarkupToken,
  TokenPosition,
  TokenSink,
  TokenizeResult,
  TokenizerParseError
} from "./tokens.js";

type TextMode = (typeof TokenizerMode)[keyof typeof TokenizerMode];

// Content of these elements is text up to the matching end tag.
const TEXT_MODES: ReadonlyMap<string, TextMode> = new Map<string, TextMode>([
  ["script", TokenizerMode.SCRIPT_DATA],
  ["style", TokenizerMode.RAWTEXT],
  ["textarea", TokenizerMode.RCDATA],
  ["title", TokenizerMode.RCDATA]
]);

export interface MarkupTokenizer {
  write(chunk: string): void;
  end(): void;
}

function toPosition(location: Token.Location | null): TokenPosition | null {
  if (location === null) {
    return null;
  }

  return { line: location.startLine, column: location.startCol };
}

/**
 * Streams markup through the parse5 tokenizer. Input may arrive in any number
 * of chunks; `end()` flushes whatever is still buffered.
 */
export function createTokenizer(sink: TokenSink): MarkupTokenizer {
  const emitCharacters = (token: Token.CharacterToken): void => {
    sink.token({ type: "Character", data: token.chars, position: toPosition(token.location) });
  };

  const handler: TokenHandler = {
    onStartTag(token: Token.TagToken) {
      sink.token({
        type: "StartTag",
        name: token.tagName,
        attributes: token.attrs.map((attr) => ({ name: attr.name, value: attr.value })),
        selfClosing: token.selfClosing,
        position: toPosition(token.location)
      });

      const mode = token.selfClosing ? undefined : TEXT_MODES.get(token.tagName);
      if (mode !== undefined) {
        tokenizer.state = mode;
      }
    },
    onEndTag(token: Token.TagToken) {
      sink.token({ type: "EndTag", name: token.tagName, position: toPosition(token.location) });
    },
    onComment(token: Token.CommentToken) {
      sink.token({ type: "Comment", data: token.data, position: toPosition(token.location) });
    },
    onDoctype(token: Token.DoctypeToken) {
      sink.token({ type: "Doctype", name: token.name ?? "", position: toPosition(token.location) });
    },
    onCharacter: emitCharacters,
    onWhitespaceCharacter: emitCharacters,
    onNullCharacter: emitCharacters,
    onEof() {
      // Nothing is pending once the tokenizer reports end of input.
    },
    onParseError(error: ParserError) {
      sink.parseError?.({ code: error.code, position: { line: error.startLine, column: error.startCol } });
    }
  };

  const tokenizer = new Tokenizer({ sourceCodeLocationInfo: true }, handler);

  return {
    write(chunk: string): void {
      tokenizer.write(chunk, false);
    },
    end(): void {
      tokenizer.write("", true);
    }
  };
}

function mergeAdjacentCharacterTokens(tokens: readonly MarkupToken[]): MarkupToken[] {
  const merged: MarkupToken[] = [];

  for (const token of tokens) {
    const previous = merged[merged.length - 1];
    if (token.type === "Character" && previous?.type === "Character") {
      merged[merged.length - 1] = {
        type: "Character",
        data: previous.data + token.data,
        position: previous.position
      };
      continue;
    }

    merged.push(token);
  }

  return merged;
}

export function tokenize(input: string): TokenizeResult {
  const tokens: MarkupToken[] = [];
  const errors: TokenizerParseError[] = [];

  const tokenizer = createTokenizer({
    token(token) {
      tokens.push(token);
    },
    parseError(error) {
      errors.push(error);
    }
  });

  tokenizer.write(input);
  tokenizer.end();

  return {
    tokens: mergeAdjacentCharacterTokens(tokens),
    errors
  };
}
