export interface TokenPosition {
  readonly line: number;
  readonly column: number;
}

export interface TokenAttribute {
  readonly name: string;
  readonly value: string;
}

export interface StartTagToken {
  readonly type: "StartTag";
  readonly name: string;
  readonly attributes: readonly TokenAttribute[];
  readonly selfClosing: boolean;
  readonly position: TokenPosition | null;
}

export interface EndTagToken {
  readonly type: "EndTag";
  readonly name: string;
  readonly position: TokenPosition | null;
}

export interface CommentToken {
  readonly type: "Comment";
  readonly data: string;
  readonly position: TokenPosition | null;
}

export interface DoctypeToken {
  readonly type: "Doctype";
  readonly name: string;
  readonly position: TokenPosition | null;
}

export interface CharacterToken {
  readonly type: "Character";
  readonly data: string;
  readonly position: TokenPosition | null;
}

export type MarkupToken =
  | StartTagToken
  | EndTagToken
  | CommentToken
  | DoctypeToken
  | CharacterToken;

export interface TokenizerParseError {
  readonly code: string;
  readonly position: TokenPosition;
}

/** Receives tokens as the tokenizer produces them. */
export interface TokenSink {
  token(token: MarkupToken): void;
  parseError?(error: TokenizerParseError): void;
}

export interface TokenizeResult {
  readonly tokens: readonly MarkupToken[];
  readonly errors: readonly TokenizerParseError[];
}
