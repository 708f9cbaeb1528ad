/**
 * DOM patcher.
 *
 * Builds elements from node snapshots through `describeElement` and applies
 * patch operations to them. The caller validates a batch against its
 * snapshot mirror first and passes the index of the resulting tree, so an
 * invalid patch never reaches the DOM.
 *
 * An element holds its static content first, then the elements of the
 * node's children (the only direct children carrying `data-yg-id`).
 * Updates reconcile attributes and static content in place so a focused
 * input keeps its caret.
 */

import {
  DiffInvariantViolation,
  NODE_ID_ATTRIBUTE,
  ROOT_MOUNT_ID,
  describeElement,
  type NodeSnapshot,
  type PatchOp,
  type StaticContent,
  type SnapshotIndex,
  type StaticElement,
} from "yoguido-shared";

export class DomPatcher {
  private readonly elements = new Map<string, Element>();

  constructor(private readonly root: Element) {}

  /**
   * Replace the whole mount point with `tree`.
   */
  mount(tree: NodeSnapshot | null): void {
    this.elements.clear();
    this.root.replaceChildren(...(tree ? [this.build(tree)] : []));
  }

  /**
   * Element of a node, if mounted.
   */
  element(id: string): Element | undefined {
    return this.elements.get(id);
  }

  /**
   * Apply a validated batch. `next` indexes the tree the batch produces.
   */
  apply(ops: readonly PatchOp[], next: SnapshotIndex): void {
    for (const op of ops) {
      switch (op.op) {
        case "insert": {
          const element = this.build(op.node);
          if (op.parentId === ROOT_MOUNT_ID) {
            this.root.replaceChildren(element);
            break;
          }
          const parent = this.require(op.parentId);
          const siblings = nodeChildren(parent);
          parent.insertBefore(element, siblings[op.index] ?? null);
          break;
        }
        case "remove": {
          const element = this.require(op.id);
          this.forget(element);
          element.remove();
          break;
        }
        case "reorder": {
          const parent = this.require(op.parentId);
          for (const id of op.order) {
            parent.appendChild(this.require(id));
          }
          break;
        }
        case "updateProps":
        case "updateText": {
          const node = next.get(op.id)?.node;
          // Removed later in the same batch.
          if (node) this.refresh(node);
          break;
        }
      }
    }
  }

  // ===========================================================================
  // Building
  // ===========================================================================

  private build(node: NodeSnapshot): Element {
    const spec = describeElement(node);
    const element = this.document.createElement(spec.tag);
    setAttributes(element, spec.attributes);
    if (!spec.isVoid) {
      element.append(...spec.content.map((content) => this.buildStatic(content)));
      element.append(...node.children.map((child) => this.build(child)));
    }
    this.elements.set(node.id, element);
    return element;
  }

  private buildStatic(content: StaticContent): Node {
    if (typeof content === "string") {
      return this.document.createTextNode(content);
    }
    const element = this.document.createElement(content.tag);
    setAttributes(element, content.attributes);
    element.append(...content.content.map((child) => this.buildStatic(child)));
    syncFormState(element, content);
    return element;
  }

  // ===========================================================================
  // Updating
  // ===========================================================================

  private refresh(node: NodeSnapshot): void {
    const element = this.require(node.id);
    const spec = describeElement(node);
    if (element.tagName.toLowerCase() !== spec.tag) {
      // e.g. a title whose level changed
      const replacement = this.document.createElement(spec.tag);
      setAttributes(replacement, spec.attributes);
      replacement.append(...spec.content.map((content) => this.buildStatic(content)));
      replacement.append(...nodeChildren(element));
      element.replaceWith(replacement);
      this.elements.set(node.id, replacement);
      return;
    }
    syncAttributes(element, spec.attributes);
    this.syncContent(element, spec.content);
  }

  /**
   * Reconcile the static children of `host` with `content`, leaving node
   * children where they are.
   */
  private syncContent(host: Element, content: StaticContent[]): void {
    const existing = [...host.childNodes].filter((child) => !isNodeElement(child));
    const anchor = nodeChildren(host)[0] ?? null;

    content.forEach((item, index) => {
      const current = existing[index];
      if (current && typeof item === "string" && current.nodeType === TEXT_NODE) {
        if (current.textContent !== item) current.textContent = item;
        return;
      }
      if (current && typeof item !== "string" && isElement(current) && current.tagName.toLowerCase() === item.tag) {
        syncAttributes(current, item.attributes);
        this.syncContent(current, item.content);
        syncFormState(current, item);
        return;
      }
      const built = this.buildStatic(item);
      if (current) {
        current.replaceWith(built);
      } else {
        host.insertBefore(built, anchor);
      }
    });

    for (const extra of existing.slice(content.length)) {
      extra.remove();
    }
  }

  private forget(element: Element): void {
    const id = element.getAttribute(NODE_ID_ATTRIBUTE);
    if (id !== null) this.elements.delete(id);
    for (const child of element.querySelectorAll(`[${NODE_ID_ATTRIBUTE}]`)) {
      const childId = child.getAttribute(NODE_ID_ATTRIBUTE);
      if (childId !== null) this.elements.delete(childId);
    }
  }

  private require(id: string): Element {
    const element = this.elements.get(id);
    if (!element) {
      throw DiffInvariantViolation.unknownNode("dom", id);
    }
    return element;
  }

  private get document(): Document {
    return this.root.ownerDocument;
  }
}

// =============================================================================
// DOM helpers
// =============================================================================

const ELEMENT_NODE = 1;
const TEXT_NODE = 3;

function isElement(node: Node): node is Element {
  return node.nodeType === ELEMENT_NODE;
}

function isNodeElement(node: Node): boolean {
  return isElement(node) && node.hasAttribute(NODE_ID_ATTRIBUTE);
}

function nodeChildren(parent: Element): Element[] {
  return [...parent.children].filter((child) => child.hasAttribute(NODE_ID_ATTRIBUTE));
}

function setAttributes(element: Element, attributes: Record<string, string>): void {
  for (const [name, value] of Object.entries(attributes)) {
    element.setAttribute(name, value);
  }
}

function syncAttributes(element: Element, attributes: Record<string, string>): void {
  for (const name of element.getAttributeNames()) {
    if (!(name in attributes)) element.removeAttribute(name);
  }
  for (const [name, value] of Object.entries(attributes)) {
    if (element.getAttribute(name) !== value) element.setAttribute(name, value);
  }
}

/**
 * Attributes only seed form controls; the live state is in properties.
 * A control the user is typing in keeps its value.
 */
function syncFormState(element: Element, spec: StaticElement): void {
  const focused = element.ownerDocument.activeElement === element;
  const view = element.ownerDocument.defaultView;
  if (!view) return;

  if (element instanceof view.HTMLInputElement) {
    if (element.type === "checkbox" || element.type === "radio") {
      element.checked = "checked" in spec.attributes;
    } else if (element.type !== "file" && !focused) {
      element.value = spec.attributes.value ?? "";
    }
  } else if (element instanceof view.HTMLTextAreaElement && !focused) {
    element.value = spec.content.filter((item) => typeof item === "string").join("");
  } else if (element instanceof view.HTMLOptionElement) {
    element.selected = "selected" in spec.attributes;
  }
}
