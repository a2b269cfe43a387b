import { Buffer } from "node:buffer";

import { z } from "zod";

import { ElementNode, documentParts } from "../../internal/dom/nodes.js";
import { contentBytes } from "../../internal/encoding/decode.js";
import { defineTransformer } from "../../internal/pipeline/registry.js";
import { splitDocPath } from "../../internal/space/path.js";

const IMAGE_CONTENT_TYPES: ReadonlyMap<string, string> = new Map([
  ["gif", "image/gif"],
  ["jpeg", "image/jpeg"],
  ["jpg", "image/jpeg"],
  ["png", "image/png"],
  ["webp", "image/webp"]
]);

/** Inlines image bytes as a base64 `data:` URI under an "Image" heading. */
export const image2html = defineTransformer({
  name: "image2html",
  options: z
    .object({
      // Falls back to the file extension.
      imageType: z.string().min(1).optional()
    })
    .strict(),
  transform(context, content, root, options) {
    const body = documentParts(root).body;
    body.addChildren(new ElementNode("h1").addChildren("Image"));

    const imageType = options.imageType ?? context.file.extension?.slice(1);
    if (imageType === undefined) {
      body.addChildren("no image type given");
      return root;
    }

    const contentType = IMAGE_CONTENT_TYPES.get(imageType.toLowerCase());
    if (contentType === undefined) {
      body.addChildren(`image type (${imageType}) not supported`);
      return root;
    }

    const encoded = Buffer.from(contentBytes(content)).toString("base64");
    body.addChildren(
      new ElementNode("img", {
        src: `data:${contentType};base64,${encoded}`,
        alt: splitDocPath(context.docPath).stem
      })
    );
    return root;
  }
});
