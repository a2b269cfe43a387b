export { createTokenizer, tokenize } from "./tokenize.js";

export type { MarkupTokenizer } from "./tokenize.js";
export type {
  CharacterToken,
  CommentToken,
  DoctypeToken,
  EndTagToken,
  MarkupToken,
  StartTagToken,
  TokenAttribute,
  TokenPosition,
  TokenSink,
  TokenizeResult,
  TokenizerParseError
} from "./tokens.js";
