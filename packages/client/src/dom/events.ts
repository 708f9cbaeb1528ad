/**
 * Event delegation.
 *
 * One listener per DOM event type on the mount point. A DOM event is
 * forwarded when the nearest node element lists the matching node event in
 * `data-yg-events`:
 *
 * - click on a `data-yg-action` element -> that action with its payload
 * - click elsewhere -> `click`
 * - change of a form control -> `change` with `{ value }`, `{ checked }` or `{ files }`
 * - form submit -> `submit` with `{ values }` keyed by control name
 */

import {
  ACTION_ATTRIBUTE,
  NODE_EVENTS_ATTRIBUTE,
  NODE_ID_ATTRIBUTE,
  PAYLOAD_ATTRIBUTE,
  type JsonObject,
  type JsonValue,
} from "yoguido-shared";

export type EventSink = (nodeId: string, event: string, payload?: JsonValue) => void;

const DOM_EVENTS = ["click", "change", "submit"] as const;

export class EventDelegator {
  private readonly listener = (event: Event): void => this.handle(event);
  private attached = false;

  constructor(
    private readonly root: Element,
    private readonly sink: EventSink,
  ) {}

  attach(): void {
    if (this.attached) return;
    for (const type of DOM_EVENTS) {
      this.root.addEventListener(type, this.listener);
    }
    this.attached = true;
  }

  detach(): void {
    for (const type of DOM_EVENTS) {
      this.root.removeEventListener(type, this.listener);
    }
    this.attached = false;
  }

  private handle(event: Event): void {
    const target = event.target;
    if (!isElementTarget(target)) return;
    const node = target.closest(`[${NODE_ID_ATTRIBUTE}]`);
    if (!node || !this.root.contains(node)) return;
    const nodeId = node.getAttribute(NODE_ID_ATTRIBUTE) ?? "";

    switch (event.type) {
      case "click": {
        const action = target.closest(`[${ACTION_ATTRIBUTE}]`);
        if (action && node.contains(action)) {
          const name = action.getAttribute(ACTION_ATTRIBUTE) ?? "";
          if (listens(node, name)) {
            event.preventDefault();
            this.sink(nodeId, name, parsePayload(action.getAttribute(PAYLOAD_ATTRIBUTE)));
          }
          return;
        }
        if (listens(node, "click")) {
          // Links with a handler navigate through the server.
          event.preventDefault();
          this.sink(nodeId, "click");
        }
        return;
      }
      case "change": {
        if (listens(node, "change")) {
          const payload = controlPayload(target);
          if (payload) this.sink(nodeId, "change", payload);
        }
        return;
      }
      case "submit": {
        event.preventDefault();
        if (listens(node, "submit") && isForm(node)) {
          this.sink(nodeId, "submit", { values: formValues(node) });
        }
        return;
      }
    }
  }
}

// =============================================================================
// Helpers
// =============================================================================

function isElementTarget(target: EventTarget | null): target is Element {
  return target !== null && "closest" in target && typeof target.closest === "function";
}

function listens(node: Element, event: string): boolean {
  return (node.getAttribute(NODE_EVENTS_ATTRIBUTE) ?? "").split(" ").includes(event);
}

function parsePayload(raw: string | null): JsonValue | undefined {
  if (raw === null) return undefined;
  try {
    const value: JsonValue = JSON.parse(raw);
    return value;
  } catch {
    return raw;
  }
}

function isForm(element: Element): element is HTMLFormElement {
  return element.tagName === "FORM";
}

function controlPayload(target: Element): JsonObject | undefined {
  const view = target.ownerDocument.defaultView;
  if (!view) return undefined;
  if (target instanceof view.HTMLInputElement) {
    if (target.type === "checkbox") return { checked: target.checked };
    if (target.type === "file") return { files: [...(target.files ?? [])].map((file) => file.name) };
    return { value: target.value };
  }
  if (target instanceof view.HTMLSelectElement || target instanceof view.HTMLTextAreaElement) {
    return { value: target.value };
  }
  return undefined;
}

function formValues(form: HTMLFormElement): JsonObject {
  const values: JsonObject = {};
  const view = form.ownerDocument.defaultView;
  if (!view) return values;
  for (const control of form.elements) {
    if (control instanceof view.HTMLInputElement) {
      if (!control.name) continue;
      if (control.type === "checkbox") {
        values[control.name] = String(control.checked);
      } else if (control.type === "radio") {
        if (control.checked) values[control.name] = control.value;
      } else if (control.type !== "file") {
        values[control.name] = control.value;
      }
    } else if (control instanceof view.HTMLSelectElement || control instanceof view.HTMLTextAreaElement) {
      if (control.name) values[control.name] = control.value;
    }
  }
  return values;
}
