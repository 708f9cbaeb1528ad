/**
 * Element descriptions
 *
 * Maps a node snapshot to the HTML element that displays it. The server's
 * HTML renderer and the browser's DOM patcher both go through
 * `describeElement`, so first-load markup and patched DOM stay identical.
 *
 * An element holds its static content (labels, table rows, option lists)
 * first, followed by the elements of the node's children.
 */

import { jsonEqual } from "./equality";
import { isJsonObject, type JsonObject, type JsonValue, type NodeSnapshot } from "./protocol";

export interface StaticElement {
  tag: string;
  attributes: Record<string, string>;
  content: StaticContent[];
}

export type StaticContent = string | StaticElement;

export interface ElementSpec extends StaticElement {
  /** True for tags that cannot hold children (input, hr) */
  isVoid: boolean;
}

export const VOID_TAGS: ReadonlySet<string> = new Set(["input", "hr", "br", "img"]);

/** Attribute that carries a node id in the DOM */
export const NODE_ID_ATTRIBUTE = "data-yg-id";
/** Space-separated event names the client forwards for a node */
export const NODE_EVENTS_ATTRIBUTE = "data-yg-events";
/** Marks a static element inside a node that raises a named event when clicked */
export const ACTION_ATTRIBUTE = "data-yg-action";
/** JSON payload sent with an action */
export const PAYLOAD_ATTRIBUTE = "data-yg-payload";

interface Description {
  tag: string;
  attributes?: Record<string, string | undefined>;
  content?: StaticContent[];
}

type Describer = (node: NodeSnapshot) => Description;

// =============================================================================
// Prop readers
// =============================================================================

function str(props: JsonObject, key: string): string | undefined {
  const value = props[key];
  if (value === undefined || value === null) return undefined;
  return typeof value === "string" ? value : String(value);
}

function num(props: JsonObject, key: string): number | undefined {
  const value = props[key];
  return typeof value === "number" ? value : undefined;
}

function flag(props: JsonObject, key: string): boolean {
  return props[key] === true;
}

function list(props: JsonObject, key: string): JsonValue[] {
  const value = props[key];
  return Array.isArray(value) ? value : [];
}

/**
 * Display form of a JSON value inside a cell or label.
 */
export function displayValue(value: JsonValue | undefined): string {
  if (value === undefined || value === null) return "";
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  return JSON.stringify(value);
}

function el(
  tag: string,
  attributes: Record<string, string | undefined> = {},
  content: StaticContent[] = [],
): StaticElement {
  return { tag, attributes: definedAttributes(attributes), content };
}

function definedAttributes(attributes: Record<string, string | undefined>): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [name, value] of Object.entries(attributes)) {
    if (value !== undefined) result[name] = value;
  }
  return result;
}

function present(condition: boolean): string | undefined {
  return condition ? "" : undefined;
}

function textContent(node: NodeSnapshot): StaticContent[] {
  return node.text !== undefined ? [node.text] : [];
}

function fieldLabel(node: NodeSnapshot): StaticContent[] {
  return node.text !== undefined ? [el("span", { class: "yg-label" }, [node.text])] : [];
}

interface Choice {
  label: string;
  value: JsonValue;
}

function choices(props: JsonObject): Choice[] {
  return list(props, "options").flatMap((option) =>
    isJsonObject(option) ? [{ label: displayValue(option.label), value: option.value ?? null }] : [],
  );
}

function action(name: string, payload: JsonValue): Record<string, string> {
  return { [ACTION_ATTRIBUTE]: name, [PAYLOAD_ATTRIBUTE]: JSON.stringify(payload) };
}

// =============================================================================
// Kinds
// =============================================================================

const describers: Record<string, Describer> = {
  page: () => ({ tag: "div" }),
  container: () => ({ tag: "div" }),
  flex: ({ props }) => ({
    tag: "div",
    attributes: {
      style: [
        "display:flex",
        `flex-direction:${str(props, "direction") ?? "row"}`,
        `gap:${num(props, "gap") ?? 8}px`,
        flag(props, "wrap") ? "flex-wrap:wrap" : undefined,
      ]
        .filter(Boolean)
        .join(";"),
    },
  }),
  grid: ({ props }) => ({
    tag: "div",
    attributes: {
      style: `display:grid;grid-template-columns:repeat(${num(props, "columns") ?? 2}, minmax(0, 1fr));gap:${num(props, "gap") ?? 8}px`,
    },
  }),
  card: (node) => ({
    tag: "section",
    content: node.text !== undefined ? [el("h3", { class: "yg-card-title" }, [node.text])] : [],
  }),
  sidebar: () => ({ tag: "aside" }),
  header: () => ({ tag: "header" }),
  footer: () => ({ tag: "footer" }),
  form: () => ({ tag: "form" }),
  formField: (node) => ({
    tag: "div",
    content: [
      ...fieldLabel(node),
      ...(str(node.props, "help") ? [el("small", { class: "yg-help" }, [str(node.props, "help") ?? ""])] : []),
    ],
  }),
  modal: (node) => ({
    tag: "div",
    attributes: { role: "dialog", "aria-modal": "true", hidden: present(!flag(node.props, "open")) },
    content: [
      el("div", { class: "yg-modal-header" }, [
        el("h3", {}, textContent(node)),
        el("button", { type: "button", "aria-label": "Close", ...action("close", null) }, ["×"]),
      ]),
    ],
  }),
  dropdown: (node) => ({
    tag: "details",
    attributes: { open: present(flag(node.props, "open")) },
    content: [el("summary", {}, textContent(node))],
  }),
  breadcrumb: () => ({ tag: "nav", attributes: { "aria-label": "Breadcrumb" } }),

  title: (node) => {
    const level = Math.min(Math.max(num(node.props, "level") ?? 1, 1), 6);
    return { tag: `h${level}`, content: textContent(node) };
  },
  text: (node) => ({ tag: "p", content: textContent(node) }),
  icon: ({ props }) => ({ tag: "span", attributes: { "data-icon": str(props, "name"), "aria-hidden": "true" } }),
  badge: (node) => ({
    tag: "span",
    attributes: { "data-variant": str(node.props, "variant") },
    content: textContent(node),
  }),
  alert: (node) => ({
    tag: "div",
    attributes: { role: "alert", "data-variant": str(node.props, "variant") },
    content: [
      ...(str(node.props, "title") ? [el("strong", {}, [str(node.props, "title") ?? ""])] : []),
      el("span", {}, textContent(node)),
    ],
  }),
  spinner: (node) => ({
    tag: "div",
    attributes: { role: "status", "aria-live": "polite" },
    content: textContent(node),
  }),
  separator: () => ({ tag: "hr" }),
  spacer: ({ props }) => ({
    tag: "div",
    attributes: { style: `height:${num(props, "size") ?? 16}px`, "aria-hidden": "true" },
  }),
  stats: (node) => ({
    tag: "div",
    content: [
      el("span", { class: "yg-stats-label" }, textContent(node)),
      el("strong", { class: "yg-stats-value" }, [displayValue(node.props.value)]),
      ...(node.props.change !== undefined
        ? [el("span", { class: "yg-stats-change" }, [displayValue(node.props.change)])]
        : []),
    ],
  }),
  progress: (node) => {
    const value = num(node.props, "value") ?? 0;
    const max = num(node.props, "max") ?? 100;
    return {
      tag: "div",
      content: [
        ...fieldLabel(node),
        el("progress", { value: String(value), max: String(max) }),
        el("span", { class: "yg-progress-percentage" }, [`${num(node.props, "percentage") ?? 0}%`]),
      ],
    };
  },
  link: (node) => ({ tag: "a", attributes: { href: str(node.props, "href") }, content: textContent(node) }),

  button: (node) => ({
    tag: "button",
    attributes: {
      type: "button",
      "data-variant": str(node.props, "variant"),
      disabled: present(flag(node.props, "disabled")),
    },
    content: textContent(node),
  }),
  input: (node) => ({
    tag: "label",
    content: [
      ...fieldLabel(node),
      el("input", {
        type: str(node.props, "type") ?? "text",
        name: node.id,
        value: str(node.props, "value") ?? "",
        placeholder: str(node.props, "placeholder"),
        disabled: present(flag(node.props, "disabled")),
      }),
    ],
  }),
  number: (node) => ({
    tag: "label",
    content: [
      ...fieldLabel(node),
      el("input", {
        type: "number",
        name: node.id,
        value: str(node.props, "value") ?? "",
        min: str(node.props, "min"),
        max: str(node.props, "max"),
        step: str(node.props, "step"),
      }),
    ],
  }),
  textarea: (node) => ({
    tag: "label",
    content: [
      ...fieldLabel(node),
      el(
        "textarea",
        { name: node.id, rows: str(node.props, "rows"), placeholder: str(node.props, "placeholder") },
        [str(node.props, "value") ?? ""],
      ),
    ],
  }),
  select: (node) => ({
    tag: "label",
    content: [
      ...fieldLabel(node),
      el(
        "select",
        { name: node.id },
        choices(node.props).map((choice) =>
          el(
            "option",
            {
              value: displayValue(choice.value),
              selected: present(jsonEqual(choice.value, node.props.value)),
            },
            [choice.label],
          ),
        ),
      ),
    ],
  }),
  checkbox: (node) => ({
    tag: "label",
    content: [
      el("input", { type: "checkbox", name: node.id, checked: present(flag(node.props, "checked")) }),
      el("span", { class: "yg-label" }, textContent(node)),
    ],
  }),
  slider: (node) => ({
    tag: "label",
    content: [
      ...fieldLabel(node),
      el("input", {
        type: "range",
        name: node.id,
        min: str(node.props, "min"),
        max: str(node.props, "max"),
        step: str(node.props, "step"),
        value: str(node.props, "value"),
      }),
      el("output", {}, [str(node.props, "value") ?? ""]),
    ],
  }),
  radio: (node) => ({
    tag: "fieldset",
    content: [
      el("legend", {}, textContent(node)),
      ...choices(node.props).map((choice) =>
        el("label", {}, [
          el("input", {
            type: "radio",
            name: node.id,
            value: displayValue(choice.value),
            checked: present(jsonEqual(choice.value, node.props.value)),
          }),
          el("span", {}, [choice.label]),
        ]),
      ),
    ],
  }),
  date: (node) => ({
    tag: "label",
    content: [
      ...fieldLabel(node),
      el("input", { type: "date", name: node.id, value: str(node.props, "value") ?? "" }),
    ],
  }),
  file: (node) => ({
    tag: "label",
    content: [
      ...fieldLabel(node),
      el("input", {
        type: "file",
        name: node.id,
        accept: str(node.props, "accept"),
        multiple: present(flag(node.props, "multiple")),
      }),
    ],
  }),

  table: ({ props }) => {
    const columns = list(props, "columns").map(displayValue);
    const actions = list(props, "actions").map(displayValue);
    const rows = list(props, "rows");
    const header = el("thead", {}, [
      el("tr", {}, [
        ...columns.map((column) => el("th", {}, [column])),
        ...(actions.length > 0 ? [el("th", {}, ["Actions"])] : []),
      ]),
    ]);
    const body = rows.map((row, rowIndex) =>
      el("tr", {}, [
        ...columns.map((column) => el("td", {}, [displayValue(isJsonObject(row) ? row[column] : null)])),
        ...(actions.length > 0
          ? [
              el(
                "td",
                {},
                actions.map((label, actionIndex) =>
                  el("button", { type: "button", ...action("action", { row: rowIndex, action: actionIndex }) }, [
                    label,
                  ]),
                ),
              ),
            ]
          : []),
      ]),
    );
    const empty = el("tr", {}, [
      el("td", { colspan: String(columns.length + (actions.length > 0 ? 1 : 0)) }, ["No data"]),
    ]);
    return { tag: "table", content: [header, el("tbody", {}, rows.length > 0 ? body : [empty])] };
  },
  chart: (node) => {
    const x = str(node.props, "x") ?? "label";
    const y = str(node.props, "y") ?? "value";
    const data = list(node.props, "data");
    return {
      tag: "figure",
      attributes: { "data-chart-type": str(node.props, "chartType"), "data-chart": JSON.stringify(data) },
      content: [
        ...(node.text !== undefined ? [el("figcaption", {}, [node.text])] : []),
        el("table", {}, [
          el("thead", {}, [el("tr", {}, [el("th", {}, [x]), el("th", {}, [y])])]),
          el(
            "tbody",
            {},
            data.map((point) =>
              el("tr", {}, [
                el("td", {}, [displayValue(isJsonObject(point) ? point[x] : null)]),
                el("td", {}, [displayValue(isJsonObject(point) ? point[y] : null)]),
              ]),
            ),
          ),
        ]),
      ],
    };
  },
  tabs: ({ props }) => ({
    tag: "div",
    attributes: { role: "tablist" },
    content: list(props, "tabs").map((tab) => {
      const label = displayValue(tab);
      return el(
        "button",
        {
          type: "button",
          role: "tab",
          "aria-selected": String(jsonEqual(tab, props.value)),
          ...action("change", { value: label }),
        },
        [label],
      );
    }),
  }),
  pagination: ({ props }) => {
    const page = num(props, "page") ?? 1;
    const pages = num(props, "pages") ?? 1;
    return {
      tag: "nav",
      attributes: { "aria-label": "Pagination" },
      content: [
        el("button", { type: "button", disabled: present(page <= 1), ...action("change", { value: page - 1 }) }, [
          "Previous",
        ]),
        el("span", {}, [`Page ${page} of ${pages}`]),
        el("button", { type: "button", disabled: present(page >= pages), ...action("change", { value: page + 1 }) }, [
          "Next",
        ]),
      ],
    };
  },
};

const fallback: Describer = (node) => ({ tag: "div", content: textContent(node) });

export function describeElement(node: NodeSnapshot): ElementSpec {
  const description = (describers[node.kind] ?? fallback)(node);
  const className = str(node.props, "className");
  const attributes = definedAttributes({
    [NODE_ID_ATTRIBUTE]: node.id,
    class: className ? `yg-${node.kind} ${className}` : `yg-${node.kind}`,
    ...(node.events.length > 0 && { [NODE_EVENTS_ATTRIBUTE]: node.events.join(" ") }),
    ...description.attributes,
  });
  return {
    tag: description.tag,
    attributes,
    content: description.content ?? [],
    isVoid: VOID_TAGS.has(description.tag),
  };
}
