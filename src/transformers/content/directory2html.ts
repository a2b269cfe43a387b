import { posix } from "node:path";

import { z } from "zod";

import { createElementFactory } from "../../internal/dom/factory.js";
import { documentParts, type ElementNode } from "../../internal/dom/nodes.js";
import { defineTransformer } from "../../internal/pipeline/registry.js";
import type { DirectoryEntry, TransformContext } from "../../internal/pipeline/types.js";

const h = createElementFactory();

function listingDirectory(context: TransformContext): string {
  if (context.file.kind === "directory") {
    return context.docPath.endsWith("/") ? context.docPath : `${context.docPath}/`;
  }

  const parent = posix.dirname(context.docPath);
  return parent === "/" ? parent : `${parent}/`;
}

function entryRow(directory: string, entry: DirectoryEntry): ElementNode {
  const extension = posix.extname(entry.name);
  const stem = entry.isDirectory ? entry.name : posix.basename(entry.name, extension);
  const type = entry.isDirectory ? "directory" : extension.slice(1);
  const href = `${directory}${entry.name}${entry.isDirectory ? "/" : ""}`;

  return h("tr", {}, h("td", {}, h("a", { href }, stem)), h("td", {}, type), h("td", {}, String(entry.size)));
}

/** Appends a "Location" line and a table of the directory entries the request carries. */
export const directory2html = defineTransformer({
  name: "directory2html",
  options: z.object({}).strict(),
  transform(context, _content, root) {
    const directory = listingDirectory(context);
    const hidden = new Set(context.server.indexFiles);
    const entries = [...(context.directory ?? [])]
      .filter((entry) => !hidden.has(entry.name))
      .sort((left, right) => (left.name < right.name ? -1 : left.name > right.name ? 1 : 0));

    const tbody = h("tbody", {}, ...entries.map((entry) => entryRow(directory, entry)));
    if (tbody.children.length === 0) {
      tbody.addChildren(h("tr", {}, h("td", { colspan: "3" }, "No items")));
    }

    documentParts(root).body.addChildren(
      h("div", {}, `Location: ${directory}`),
      h("table", {}, h("thead", {}, h("tr", {}, h("th", {}, "Name"), h("th", {}, "Type"), h("th", {}, "Size"))), tbody)
    );
    return root;
  }
});
