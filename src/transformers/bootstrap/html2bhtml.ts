import { z } from "zod";

import { ElementNode, documentParts } from "../../internal/dom/nodes.js";
import { defineTransformer } from "../../internal/pipeline/registry.js";

/** Wraps body content in `section > div.container` unless the extension is a passthrough. */
export const html2bhtml = defineTransformer({
  name: "html2bhtml",
  options: z
    .object({
      passthroughs: z.array(z.string()).default([".bhtml"])
    })
    .strict(),
  transform(context, _content, root, options) {
    if (context.file.extension !== null && options.passthroughs.includes(context.file.extension)) {
      return;
    }

    const body = documentParts(root).body;
    const container = new ElementNode("div", { class: "container" }).addChildren(...body.children);
    body.children = [];
    body.addChildren(new ElementNode("section").addChildren(container));
    return root;
  }
});
