import { z } from "zod";

import { ElementNode, documentParts, type ChildInput } from "../../internal/dom/nodes.js";
import { defineTransformer } from "../../internal/pipeline/registry.js";
import { parse } from "../../internal/tree/build.js";

const cssValue = z.union([z.string(), z.number()]).transform(String);

/** A fixed-position side tab holding text, a link or parsed HTML. */
export const addhtmltag = defineTransformer({
  name: "addhtmltag",
  options: z
    .object({
      text: z.string().default("tag"),
      link: z.string().optional(),
      html: z.string().optional(),
      backgroundColor: z.string().default("black"),
      borderRadius: z.string().default("3px"),
      color: z.string().default("white"),
      padding: z.string().default("8px 4px 8px 4px"),
      writingMode: z.string().default("sideways-lr"),
      zIndex: cssValue.default("100"),
      style: z.string().default(""),
      extensions: z.array(z.string()).default([".html", ".htm"])
    })
    .strict(),
  transform(context, _content, root, options) {
    if (context.file.extension === null || !options.extensions.includes(context.file.extension)) {
      return;
    }

    let contents: ChildInput[];
    if (options.html !== undefined) {
      contents = parse(options.html, { logger: context.logger }).root.children;
    } else if (options.link !== undefined) {
      contents = [new ElementNode("a", { href: options.link }).addChildren(options.text)];
    } else {
      contents = [options.text];
    }

    const style = [
      "position: fixed",
      `writing-mode: ${options.writingMode}`,
      `background-color: ${options.backgroundColor}`,
      `border-radius: ${options.borderRadius}`,
      `color: ${options.color}`,
      `padding: ${options.padding}`,
      `z-index: ${options.zIndex}`,
      options.style
    ]
      .filter((declaration) => declaration.length > 0)
      .join("; ");

    documentParts(root).body.addChildren(new ElementNode("div", { style: `${style};` }).addChildren(...contents));
    return root;
  }
});
