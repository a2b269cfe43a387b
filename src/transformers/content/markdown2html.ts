import { marked } from "marked";
import { z } from "zod";

import { documentParts } from "../../internal/dom/nodes.js";
import { contentText } from "../../internal/encoding/decode.js";
import { defineTransformer } from "../../internal/pipeline/registry.js";
import { parse } from "../../internal/tree/build.js";

export const markdown2html = defineTransformer({
  name: "markdown2html",
  options: z
    .object({
      gfm: z.boolean().default(true),
      breaks: z.boolean().default(false)
    })
    .strict(),
  transform(context, content, root, options) {
    const html = marked.parse(contentText(content), { async: false, gfm: options.gfm, breaks: options.breaks });
    if (typeof html !== "string") {
      throw new Error("markdown renderer returned a promise for synchronous input");
    }

    const parsed = parse(html, { logger: context.logger });
    documentParts(root).body.addChildren(...parsed.root.children);
    return root;
  }
});
