/**
 * HTML renderer.
 *
 * Turns a node snapshot into markup through the shared element
 * descriptions, so the first page load matches what the browser runtime
 * builds when it patches.
 */

import {
  VOID_TAGS,
  describeElement,
  type BootstrapData,
  type NodeSnapshot,
  type StaticContent,
  type WireError,
} from "yoguido-shared";

export interface DocumentOptions {
  title: string;
  tree: NodeSnapshot | null;
  /** Omitted for static documents, together with `scriptUrl` */
  bootstrap?: BootstrapData;
  /** URL of the browser runtime */
  scriptUrl?: string;
  stylesheets?: string[];
  notice?: WireError;
}

/**
 * Produces the initial HTML for a session.
 */
export interface TemplateRenderer {
  renderTree(tree: NodeSnapshot | null): string;
  renderDocument(options: DocumentOptions): string;
}

const ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;",
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (char) => ESCAPES[char] ?? char);
}

/**
 * JSON safe to embed in a `<script>` element.
 */
export function embedJson(value: unknown): string {
  return JSON.stringify(value)
    .replace(/</g, "\\u003c")
    .replace(/\u2028/g, "\\u2028")
    .replace(/\u2029/g, "\\u2029");
}

function attributes(attrs: Record<string, string>): string {
  return Object.entries(attrs)
    .map(([name, value]) => (value === "" ? ` ${name}` : ` ${name}="${escapeHtml(value)}"`))
    .join("");
}

export class HtmlRenderer implements TemplateRenderer {
  renderTree(tree: NodeSnapshot | null): string {
    return tree ? this.renderNode(tree) : "";
  }

  renderDocument(options: DocumentOptions): string {
    const links = (options.stylesheets ?? [])
      .map((href) => `<link rel="stylesheet" href="${escapeHtml(href)}">`)
      .join("\n");
    const notice = options.notice
      ? `<div id="yg-notice" role="alert" data-code="${escapeHtml(options.notice.code)}">${escapeHtml(options.notice.message)}</div>`
      : `<div id="yg-notice" role="alert" hidden></div>`;

    return [
      "<!DOCTYPE html>",
      '<html lang="en">',
      "<head>",
      '<meta charset="utf-8">',
      '<meta name="viewport" content="width=device-width, initial-scale=1">',
      `<title>${escapeHtml(options.title)}</title>`,
      ...(links ? [links] : []),
      "</head>",
      "<body>",
      notice,
      `<div id="yg-root">${this.renderTree(options.tree)}</div>`,
      ...(options.bootstrap
        ? [`<script id="yg-bootstrap" type="application/json">${embedJson(options.bootstrap)}</script>`]
        : []),
      ...(options.scriptUrl ? [`<script src="${escapeHtml(options.scriptUrl)}" defer></script>`] : []),
      "</body>",
      "</html>",
    ].join("\n");
  }

  private renderNode(node: NodeSnapshot): string {
    const spec = describeElement(node);
    const open = `<${spec.tag}${attributes(spec.attributes)}>`;
    if (spec.isVoid) {
      return open;
    }
    const content = spec.content.map((item) => this.renderContent(item)).join("");
    const children = node.children.map((child) => this.renderNode(child)).join("");
    return `${open}${content}${children}</${spec.tag}>`;
  }

  private renderContent(content: StaticContent): string {
    if (typeof content === "string") {
      return escapeHtml(content);
    }
    const open = `<${content.tag}${attributes(content.attributes)}>`;
    if (VOID_TAGS.has(content.tag)) {
      return open;
    }
    return `${open}${content.content.map((item) => this.renderContent(item)).join("")}</${content.tag}>`;
  }
}
