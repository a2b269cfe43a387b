import { z } from "zod";

import { createElementFactory } from "../../internal/dom/factory.js";
import { documentParts, type ElementNode } from "../../internal/dom/nodes.js";
import { defineTransformer } from "../../internal/pipeline/registry.js";
import { splitDocPath } from "../../internal/space/path.js";

const h = createElementFactory();

const navbarItemSchema = z
  .object({
    text: z.string().min(1),
    link: z.string().default("")
  })
  .strict();

const classList = z.union([z.string(), z.array(z.string())]).transform((value) => (typeof value === "string" ? value.split(/\s+/) : value));

const decorateOptions = z
  .object({
    theme: z.string().optional(),
    brandName: z.string().default("brand name"),
    brandLogoHref: z.string().default("/asis/img/brand-logo.png"),
    brandLogoImageClasses: classList.default([]),
    copyright: z.string().default("company name"),
    navbarItems: z.array(navbarItemSchema).default([]),
    stylesheets: z
      .array(z.string())
      .default(["/asis/bootstrap/css/bootstrap.min.css", "/asis/extra.css", "/asis/codehilite.css"]),
    scripts: z.array(z.string()).default(["/asis/bootstrap/js/bootstrap.bundle.min.js"])
  })
  .strict();

type DecorateOptions = z.output<typeof decorateOptions>;

function headElements(options: DecorateOptions): ElementNode[] {
  return [
    h("meta", { charset: "utf-8" }),
    h("meta", { name: "viewport", content: "width=device-width, initial-scale=1" }),
    ...options.stylesheets.map((href) => h("link", { href, rel: "stylesheet" }))
  ];
}

function navbar(options: DecorateOptions): ElementNode {
  const logo = h("img", {
    class: ["img-fluid", "w-30", ...options.brandLogoImageClasses],
    style: "border-radius: 4px; max-width: 30px; max-height: 30px; margin: 4px 4px 4px 0px;",
    src: options.brandLogoHref,
    alt: "brand logo"
  });

  const items = options.navbarItems.map((item) =>
    h("li", { class: "nav-item" }, h("a", { href: item.link, class: "nav-link" }, item.text))
  );

  return h(
    "nav",
    {
      class: ["navbar", "sticky-top", "navbar-dark", "bg-dark", "navbar-expand-md", "py-1", "border-bottom", "border-success", "border-2"]
    },
    h(
      "div",
      { class: "container" },
      h("a", { href: "/", class: "navbar-brand" }, logo, " ", options.brandName),
      h(
        "button",
        { class: "navbar-toggler", type: "button", "data-bs-toggle": "collapse", "data-bs-target": "#navmenu" },
        h("span", { class: "navbar-toggler-icon" })
      ),
      h(
        "div",
        { class: ["collapse", "navbar-collapse", "justify-content-md-center"], id: "navmenu" },
        h("ul", { class: ["navbar-nav", "ms-auto"] }, ...items)
      )
    )
  );
}

function footer(options: DecorateOptions): ElementNode {
  return h("section", { class: "container" }, h("div", { align: "center" }, h("hr"), options.copyright));
}

/**
 * Bootstrap page furniture: head links, a title, the navbar before the body
 * content and the footer and scripts after it. Fragments are built fresh for
 * every document.
 */
export const decorate = defineTransformer({
  name: "decorate",
  options: decorateOptions,
  transform(context, _content, root, options) {
    const { html, head, body } = documentParts(root);

    if (options.theme !== undefined) {
      html.setAttribute("data-bs-theme", options.theme);
    }

    head.addChildren(...headElements(options));
    if (head.findElement("title") === null) {
      const { parent, stem } = splitDocPath(context.docPath);
      head.addChildren(h("title", {}, stem.length > 0 ? `${stem} (${parent})` : parent));
    }

    const content = body.children;
    body.children = [];
    body.addChildren(
      navbar(options),
      ...content,
      footer(options),
      ...options.scripts.map((src) => h("script", { src }))
    );
    return root;
  }
});
