import { z } from "zod";

import { ElementNode, documentParts } from "../../internal/dom/nodes.js";
import { contentText } from "../../internal/encoding/decode.js";
import { defineTransformer } from "../../internal/pipeline/registry.js";

/** Plain text inside a `pre`; escaping is left to rendering. */
export const txt2html = defineTransformer({
  name: "txt2html",
  options: z.object({}).strict(),
  transform(_context, content, root) {
    documentParts(root).body.addChildren(new ElementNode("pre").addChildren(contentText(content)));
    return root;
  }
});
