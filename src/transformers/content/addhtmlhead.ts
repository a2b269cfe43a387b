import { z } from "zod";

import { RawNode, documentParts } from "../../internal/dom/nodes.js";
import { defineTransformer } from "../../internal/pipeline/registry.js";

export const addhtmlhead = defineTransformer({
  name: "addhtmlhead",
  options: z
    .object({
      content: z.string(),
      extensions: z.array(z.string()).default([".html", ".htm"])
    })
    .strict(),
  transform(context, _content, root, options) {
    if (context.file.extension === null || !options.extensions.includes(context.file.extension)) {
      return;
    }

    documentParts(root).head.addChildren(new RawNode(options.content));
    return root;
  }
});
