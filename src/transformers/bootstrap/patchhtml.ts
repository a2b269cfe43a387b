import { z } from "zod";

import { documentParts, type ChildNode } from "../../internal/dom/nodes.js";
import { defineTransformer } from "../../internal/pipeline/registry.js";

// Checked in this order; the first kind present on the admonition wins.
const ADMONITION_KINDS = ["info", "note", "warning", "tip", "danger", "success", "primary", "secondary", "dark", "light"];

function patch(node: ChildNode): void {
  if (node.kind !== "element") {
    return;
  }

  if (node.tagName === "table") {
    node.addAttribute("class", ["table", "table-striped", "table-hover"]);
    return;
  }

  const classes = node.getAttribute("class");
  if (node.tagName !== "div" || classes === undefined || !classes.has("admonition")) {
    return;
  }

  const kind = ADMONITION_KINDS.find((candidate) => classes.has(candidate));
  if (kind !== undefined) {
    classes.update(["alert", `alert-${kind}`]);
  }
  node.addAttribute("role", "alert");
}

/** Bootstrap classes for tables and admonition blocks inside `body`. */
export const patchhtml = defineTransformer({
  name: "patchhtml",
  options: z
    .object({
      passthroughs: z.array(z.string()).default([".bhtml"])
    })
    .strict(),
  transform(context, _content, root, options) {
    if (context.file.extension !== null && options.passthroughs.includes(context.file.extension)) {
      return;
    }

    documentParts(root).body.walkWithCallback(patch);
    return root;
  }
});
