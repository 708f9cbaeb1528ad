/**
 * Shared test helpers for the DOM tests.
 */

import type { NodeSnapshot } from "yoguido-shared";
import { DomPatcher } from "../dom/patcher";

export function snapshot(
  id: string,
  kind: string,
  extra: Partial<Omit<NodeSnapshot, "id" | "kind">> = {},
): NodeSnapshot {
  return { id, kind, props: {}, events: [], children: [], ...extra };
}

/**
 * Markup with attributes sorted, so attribute order does not matter.
 */
export function normalize(node: Node): string {
  if (node.nodeType === 3) {
    return node.textContent ?? "";
  }
  if (!(node instanceof Element)) {
    return "";
  }
  const attributes = node
    .getAttributeNames()
    .sort()
    .map((name) => ` ${name}="${node.getAttribute(name) ?? ""}"`)
    .join("");
  const children = [...node.childNodes].map(normalize).join("");
  return `<${node.tagName.toLowerCase()}${attributes}>${children}</${node.tagName.toLowerCase()}>`;
}

export function normalizeChildren(host: Element): string {
  return [...host.childNodes].map(normalize).join("");
}

/**
 * What a fresh mount of `tree` looks like.
 */
export function mounted(tree: NodeSnapshot | null): string {
  const host = document.createElement("div");
  new DomPatcher(host).mount(tree);
  return normalizeChildren(host);
}
