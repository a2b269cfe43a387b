export { MarkupParser, parse, parseBytes, parseStream } from "./build.js";

export type { ParseOptions, ParseResult, ParseWarning, ParseWarningCode } from "./types.js";
