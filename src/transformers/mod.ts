import { TransformerRegistry } from "../internal/pipeline/registry.js";

import { decorate } from "./bootstrap/decorate.js";
import { html2bhtml } from "./bootstrap/html2bhtml.js";
import { patchhtml } from "./bootstrap/patchhtml.js";
import { addhtmlhead } from "./content/addhtmlhead.js";
import { addhtmltag } from "./content/addhtmltag.js";
import { directory2html } from "./content/directory2html.js";
import { html2html } from "./content/html2html.js";
import { image2html } from "./content/image2html.js";
import { markdown2html } from "./content/markdown2html.js";
import { txt2html } from "./content/txt2html.js";

export {
  addhtmlhead,
  addhtmltag,
  decorate,
  directory2html,
  html2bhtml,
  html2html,
  image2html,
  markdown2html,
  patchhtml,
  txt2html
};

/** Registry with every built-in transformer under its configuration locator. */
export function createDefaultRegistry(): TransformerRegistry {
  return new TransformerRegistry()
    .register("content.addhtmlhead", addhtmlhead)
    .register("content.addhtmltag", addhtmltag)
    .register("content.directory2html", directory2html)
    .register("content.html2html", html2html)
    .register("content.image2html", image2html)
    .register("content.markdown2html", markdown2html)
    .register("content.txt2html", txt2html)
    .register("bootstrap.decorate", decorate)
    .register("bootstrap.html2bhtml", html2bhtml)
    .register("bootstrap.patchhtml", patchhtml);
}
