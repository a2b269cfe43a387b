import type { ChildNode, RootNode } from "../dom/nodes.js";

function indent(level: number): string {
  return "  ".repeat(level);
}

function quoteRaw(value: string): string {
  return `"${value}"`;
}

function dumpNode(node: ChildNode, level: number, lines: string[]): void {
  if (node.kind === "element") {
    lines.push(`| ${indent(level)}<${node.tagName}>`);

    for (const attribute of node.attributes.values()) {
      lines.push(`| ${indent(level + 1)}${attribute.name}=${quoteRaw(attribute.values.join(" "))}`);
    }

    for (const child of node.children) {
      dumpNode(child, level + 1, lines);
    }
    return;
  }

  if (node.kind === "text") {
    lines.push(`| ${indent(level)}${quoteRaw(node.value)}`);
    return;
  }

  if (node.kind === "raw") {
    lines.push(`| ${indent(level)}raw ${quoteRaw(node.value)}`);
    return;
  }

  lines.push(`| ${indent(level)}<!-- ${node.value} -->`);
}

/** Indented, one-node-per-line view of a tree for logs and assertions. */
export function dumpTree(root: RootNode): string {
  const lines: string[] = [];
  for (const child of root.children) {
    dumpNode(child, 0, lines);
  }
  return lines.join("\n");
}
