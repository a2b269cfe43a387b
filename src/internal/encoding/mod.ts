export { contentBytes, contentText, decodeContent } from "./decode.js";

export type { DecodeOptions, DecodedContent, RawContent } from "./decode.js";
