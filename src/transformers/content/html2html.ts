import { z } from "zod";

import { documentParts } from "../../internal/dom/nodes.js";
import { contentText } from "../../internal/encoding/decode.js";
import { defineTransformer } from "../../internal/pipeline/registry.js";
import { parse } from "../../internal/tree/build.js";

/**
 * Parses HTML content. A complete document (one with an `html` element)
 * replaces the tree; a fragment is appended to `body`.
 */
export const html2html = defineTransformer({
  name: "html2html",
  options: z.object({}).strict(),
  transform(context, content, root) {
    const parsed = parse(contentText(content), { logger: context.logger });

    if (parsed.root.findElement("html") !== null) {
      return parsed.root;
    }

    documentParts(root).body.addChildren(...parsed.root.children);
    return root;
  }
});
