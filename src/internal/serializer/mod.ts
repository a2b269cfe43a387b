export { render } from "./serialize.js";
export { dumpTree } from "./dump.js";
export { escapeAttribute, escapeText } from "./escape.js";

export type { RenderOptions } from "./serialize.js";
