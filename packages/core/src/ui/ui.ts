/**
 * UI - the primitive catalogue handed to page and layout functions.
 *
 * Every call appends one node to the open container. Interactive
 * primitives return what the user did since the last commit: `button()`
 * whether it was clicked, value inputs their current value.
 *
 * @example
 * ```typescript
 * registry.page('/', (ui) => {
 *   const counter = ui.useState(Counter);
 *   ui.title('Counter');
 *   ui.card({ title: 'Clicks' }, () => {
 *     ui.button(`Count: ${counter.get('count')}`, {
 *       onClick: () => counter.set('count', counter.peek('count') + 1),
 *     });
 *     if (ui.button('Reset')) {
 *       ui.text('Reset requested');
 *     }
 *   });
 * });
 * ```
 */

import {
  ValidationError,
  displayValue,
  isJsonObject,
  jsonEqual,
  type JsonObject,
  type JsonPrimitive,
  type JsonValue,
} from "yoguido-shared";
import type { StateContainer, StateDefinition, StateFields } from "../state/state";
import type { NodeSpec, TreeBuilder } from "../tree/builder";
import type { ComponentNode, HandlerEvent } from "../tree/node";

// =============================================================================
// Host
// =============================================================================

/**
 * Value a widget was last changed to, with the value the page declared at
 * that time. The remembered value holds until the declaration changes.
 */
export interface WidgetMemory {
  declared: JsonValue;
  payload: JsonValue | undefined;
}

/**
 * Session services the primitives need.
 */
export interface UIHost {
  readonly sessionId: string;
  useState<T extends StateFields>(
    definition: StateDefinition<T>,
    initial?: Partial<T>,
    key?: string,
  ): StateContainer<T>;
  navigateTo(path: string): void;
  getCurrentPath(): string;
  isCurrentPage(path: string): boolean;
  getCurrentPageTitle(): string;
  recallWidget(nodeId: string): WidgetMemory | undefined;
  rememberWidget(nodeId: string, memory: WidgetMemory): void;
}

// =============================================================================
// Options
// =============================================================================

export interface BaseOptions {
  /** Stable identity among siblings; defaults to position */
  key?: string;
  /** Opaque CSS class string */
  className?: string;
}

export type ChangeHandler<V> = (value: V, event: HandlerEvent) => unknown;

export interface FieldOptions<V> extends BaseOptions {
  disabled?: boolean;
  onChange?: ChangeHandler<V>;
}

export type Variant = "default" | "primary" | "secondary" | "success" | "warning" | "danger" | "info";

export interface ButtonOptions extends BaseOptions {
  variant?: Variant;
  disabled?: boolean;
  /** Return `false` to report the click as not handled */
  onClick?: (event: HandlerEvent) => unknown;
}

export interface InputOptions extends FieldOptions<string> {
  value?: string;
  placeholder?: string;
  type?: "text" | "email" | "password" | "search" | "tel" | "url";
}

export interface NumberInputOptions extends FieldOptions<number> {
  value?: number;
  min?: number;
  max?: number;
  step?: number;
}

export interface TextareaOptions extends FieldOptions<string> {
  value?: string;
  placeholder?: string;
  rows?: number;
}

export interface ChoiceOption<T extends JsonPrimitive> {
  label: string;
  value: T;
}

export interface ChoiceOptions<T extends JsonPrimitive> extends FieldOptions<T> {
  value?: T;
}

export interface CheckboxOptions extends FieldOptions<boolean> {
  checked?: boolean;
}

export interface FileUploadOptions extends FieldOptions<string[]> {
  accept?: string;
  multiple?: boolean;
}

export interface TableAction<R> {
  label: string;
  onClick: (row: R, index: number, event: HandlerEvent) => unknown;
}

export interface TableOptions<R extends JsonObject> extends BaseOptions {
  /** Defaults to the keys of the first row */
  columns?: string[];
  actions?: TableAction<R>[];
}

export interface ChartOptions extends BaseOptions {
  title?: string;
  /** Field holding the label of a point (default: 'label') */
  x?: string;
  /** Field holding the value of a point (default: 'value') */
  y?: string;
}

export type ChartType = "line" | "bar" | "pie";

export interface BreadcrumbItem {
  label: string;
  href?: string;
}

export interface ContainerOptions extends BaseOptions {}

export interface FlexOptions extends BaseOptions {
  direction?: "row" | "column";
  gap?: number;
  wrap?: boolean;
}

export interface GridOptions extends BaseOptions {
  columns?: number;
  gap?: number;
}

export interface CardOptions extends BaseOptions {
  title?: string;
}

export interface FormOptions extends BaseOptions {
  onSubmit?: (values: Record<string, string>, event: HandlerEvent) => unknown;
}

export interface FormFieldOptions extends BaseOptions {
  label?: string;
  help?: string;
}

export interface ModalOptions extends BaseOptions {
  title?: string;
  open: boolean;
  onClose?: (event: HandlerEvent) => unknown;
}

export interface DropdownOptions extends BaseOptions {
  label: string;
  open?: boolean;
}

type Body = () => void;

// =============================================================================
// Payload parsing
// =============================================================================

function field(payload: JsonValue | undefined, name: string): JsonValue | undefined {
  return isJsonObject(payload) ? payload[name] : undefined;
}

function parseString(payload: JsonValue | undefined): string | undefined {
  const value = field(payload, "value");
  return typeof value === "string" ? value : undefined;
}

function parseNumber(payload: JsonValue | undefined): number | undefined {
  const value = field(payload, "value");
  const parsed = typeof value === "number" ? value : typeof value === "string" && value !== "" ? Number(value) : NaN;
  return Number.isFinite(parsed) ? parsed : undefined;
}

function parseChecked(payload: JsonValue | undefined): boolean | undefined {
  const value = field(payload, "checked");
  return typeof value === "boolean" ? value : undefined;
}

function parseFiles(payload: JsonValue | undefined): string[] | undefined {
  const value = field(payload, "files");
  return Array.isArray(value) ? value.map(displayValue) : undefined;
}

function isChoiceOption<T extends JsonPrimitive>(option: T | ChoiceOption<T>): option is ChoiceOption<T> {
  return typeof option === "object" && option !== null;
}

function normalizeChoices<T extends JsonPrimitive>(options: ReadonlyArray<T | ChoiceOption<T>>): ChoiceOption<T>[] {
  return options.map((option) =>
    isChoiceOption(option) ? option : { label: displayValue(option), value: option },
  );
}

function isBody(value: unknown): value is Body {
  return typeof value === "function";
}

function choiceParser<T extends JsonPrimitive>(choices: ChoiceOption<T>[]) {
  return (payload: JsonValue | undefined): T | undefined => {
    const raw = field(payload, "value");
    const match = choices.find((choice) => displayValue(choice.value) === displayValue(raw));
    return raw === undefined ? undefined : match?.value;
  };
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

// =============================================================================
// UI
// =============================================================================

export class UI {
  constructor(
    private readonly builder: TreeBuilder,
    private readonly host: UIHost,
  ) {}

  get sessionId(): string {
    return this.host.sessionId;
  }

  // ---------------------------------------------------------------------------
  // State & navigation
  // ---------------------------------------------------------------------------

  useState<T extends StateFields>(
    definition: StateDefinition<T>,
    initial?: Partial<T>,
    key?: string,
  ): StateContainer<T> {
    return this.host.useState(definition, initial, key);
  }

  navigateTo(path: string): void {
    this.host.navigateTo(path);
  }

  getCurrentPath(): string {
    return this.host.getCurrentPath();
  }

  isCurrentPage(path: string): boolean {
    return this.host.isCurrentPage(path);
  }

  getCurrentPageTitle(): string {
    return this.host.getCurrentPageTitle();
  }

  // ---------------------------------------------------------------------------
  // Display
  // ---------------------------------------------------------------------------

  title(text: string, options: BaseOptions & { level?: 1 | 2 | 3 | 4 | 5 | 6 } = {}): ComponentNode {
    return this.builder.leaf(
      "title",
      { text, props: { level: options.level ?? 1, className: options.className } },
      options.key,
    );
  }

  text(text: string, options: BaseOptions = {}): ComponentNode {
    return this.builder.leaf("text", { text, props: { className: options.className } }, options.key);
  }

  icon(name: string, options: BaseOptions = {}): ComponentNode {
    return this.builder.leaf("icon", { props: { name, className: options.className } }, options.key);
  }

  badge(text: string, options: BaseOptions & { variant?: Variant } = {}): ComponentNode {
    return this.builder.leaf(
      "badge",
      { text, props: { variant: options.variant ?? "default", className: options.className } },
      options.key,
    );
  }

  alert(message: string, options: BaseOptions & { variant?: Variant; title?: string } = {}): ComponentNode {
    return this.builder.leaf(
      "alert",
      {
        text: message,
        props: { variant: options.variant ?? "info", title: options.title, className: options.className },
      },
      options.key,
    );
  }

  spinner(label?: string, options: BaseOptions = {}): ComponentNode {
    return this.builder.leaf("spinner", { text: label, props: { className: options.className } }, options.key);
  }

  separator(options: BaseOptions = {}): ComponentNode {
    return this.builder.leaf("separator", { props: { className: options.className } }, options.key);
  }

  spacer(size = 16, options: BaseOptions = {}): ComponentNode {
    return this.builder.leaf("spacer", { props: { size, className: options.className } }, options.key);
  }

  statsCard(
    label: string,
    value: JsonPrimitive,
    options: BaseOptions & { change?: string; icon?: string } = {},
  ): ComponentNode {
    return this.builder.leaf(
      "stats",
      {
        text: label,
        props: { value, change: options.change, icon: options.icon, className: options.className },
      },
      options.key,
    );
  }

  progressBar(value: number, options: BaseOptions & { max?: number; label?: string } = {}): ComponentNode {
    const max = options.max ?? 100;
    const percentage = max > 0 ? Math.round(clamp(value / max, 0, 1) * 100) : 0;
    return this.builder.leaf(
      "progress",
      { text: options.label, props: { value, max, percentage, className: options.className } },
      options.key,
    );
  }

  /**
   * Link. Paths starting with `/` navigate inside the app; anything else is
   * left to the browser.
   */
  link(label: string, href: string, options: BaseOptions = {}): ComponentNode {
    const internal = href.startsWith("/");
    return this.builder.leaf(
      "link",
      {
        text: label,
        props: { href, className: options.className },
        handlers: { click: internal ? (event) => event.navigateTo(href) : undefined },
      },
      options.key,
    );
  }

  breadcrumb(items: BreadcrumbItem[], options: BaseOptions = {}): ComponentNode {
    const nav = this.builder.openContainer("breadcrumb", { props: { className: options.className } }, options.key);
    return this.builder.within(nav, () => {
      for (const item of items) {
        if (item.href !== undefined) {
          this.link(item.label, item.href);
        } else {
          this.text(item.label);
        }
      }
    });
  }

  // ---------------------------------------------------------------------------
  // Inputs
  // ---------------------------------------------------------------------------

  /**
   * @returns whether the button was clicked since the last commit
   */
  button(label: string, options: ButtonOptions = {}): boolean {
    let clicked = false;
    this.builder.leaf(
      "button",
      (id) => {
        const pending = this.builder.pendingEvent(id, "click");
        clicked = pending !== undefined && pending.result !== false;
        return {
          text: label,
          props: { variant: options.variant ?? "default", disabled: options.disabled, className: options.className },
          handlers: { click: (event) => options.onClick?.(event) },
        };
      },
      options.key,
    );
    return clicked;
  }

  input(label: string, options: InputOptions = {}): string {
    return this.widget("input", label, options.value ?? "", parseString, options, (value) => ({
      value,
      type: options.type ?? "text",
      placeholder: options.placeholder,
    }));
  }

  numberInput(label: string, options: NumberInputOptions = {}): number {
    return this.widget("number", label, options.value ?? 0, parseNumber, options, (value) => ({
      value,
      min: options.min,
      max: options.max,
      step: options.step,
    }));
  }

  textarea(label: string, options: TextareaOptions = {}): string {
    return this.widget("textarea", label, options.value ?? "", parseString, options, (value) => ({
      value,
      rows: options.rows ?? 4,
      placeholder: options.placeholder,
    }));
  }

  select<T extends JsonPrimitive>(
    label: string,
    options: ReadonlyArray<T | ChoiceOption<T>>,
    settings: ChoiceOptions<T> = {},
  ): T | null {
    return this.choice("select", label, options, settings);
  }

  radioGroup<T extends JsonPrimitive>(
    label: string,
    options: ReadonlyArray<T | ChoiceOption<T>>,
    settings: ChoiceOptions<T> = {},
  ): T | null {
    return this.choice("radio", label, options, settings);
  }

  checkbox(label: string, options: CheckboxOptions = {}): boolean {
    return this.widget("checkbox", label, options.checked ?? false, parseChecked, options, (checked) => ({ checked }));
  }

  slider(
    label: string,
    options: FieldOptions<number> & { value?: number; min?: number; max?: number; step?: number } = {},
  ): number {
    const min = options.min ?? 0;
    const max = options.max ?? 100;
    const parse = (payload: JsonValue | undefined): number | undefined => {
      const value = parseNumber(payload);
      return value === undefined ? undefined : clamp(value, min, max);
    };
    return this.widget("slider", label, options.value ?? min, parse, options, (value) => ({
      value,
      min,
      max,
      step: options.step ?? 1,
    }));
  }

  /**
   * @returns an ISO date (`YYYY-MM-DD`) or an empty string
   */
  datePicker(label: string, options: FieldOptions<string> & { value?: string } = {}): string {
    return this.widget("date", label, options.value ?? "", parseString, options, (value) => ({ value }));
  }

  /**
   * @returns the names of the files last picked
   */
  fileUpload(label: string, options: FileUploadOptions = {}): string[] {
    return this.widget("file", label, [], parseFiles, options, (files) => ({
      files,
      accept: options.accept,
      multiple: options.multiple,
    }));
  }

  // ---------------------------------------------------------------------------
  // Data
  // ---------------------------------------------------------------------------

  table<R extends JsonObject>(rows: R[], options: TableOptions<R> = {}): ComponentNode {
    const columns = options.columns ?? (rows.length > 0 ? Object.keys(rows[0]) : []);
    const actions = options.actions ?? [];
    const onAction = (event: HandlerEvent): unknown => {
      const rowIndex = field(event.payload, "row");
      const actionIndex = field(event.payload, "action");
      if (typeof rowIndex !== "number" || typeof actionIndex !== "number") {
        throw ValidationError.type("payload", "{ row: number, action: number }");
      }
      const row = rows[rowIndex];
      const action = actions[actionIndex];
      if (row === undefined || action === undefined) {
        throw new ValidationError("payload", `No action ${actionIndex} for row ${rowIndex}`, {
          code: "VALIDATION_CONSTRAINT",
        });
      }
      return action.onClick(row, rowIndex, event);
    };
    return this.builder.leaf(
      "table",
      {
        props: {
          columns,
          rows,
          actions: actions.map((action) => action.label),
          className: options.className,
        },
        handlers: { action: actions.length > 0 ? onAction : undefined },
      },
      options.key,
    );
  }

  lineChart(data: JsonObject[], options: ChartOptions = {}): ComponentNode {
    return this.chart("line", data, options);
  }

  barChart(data: JsonObject[], options: ChartOptions = {}): ComponentNode {
    return this.chart("bar", data, options);
  }

  pieChart(data: JsonObject[], options: ChartOptions = {}): ComponentNode {
    return this.chart("pie", data, options);
  }

  // ---------------------------------------------------------------------------
  // Navigation widgets
  // ---------------------------------------------------------------------------

  /**
   * @returns the selected tab label
   */
  tabs(labels: string[], options: FieldOptions<string> & { value?: string } = {}): string {
    const parse = (payload: JsonValue | undefined): string | undefined => {
      const value = parseString(payload);
      return value !== undefined && labels.includes(value) ? value : undefined;
    };
    return this.widget("tabs", undefined, options.value ?? labels[0] ?? "", parse, options, (value) => ({
      tabs: labels,
      value,
    }));
  }

  /**
   * @returns the current page, 1-based
   */
  pagination(pages: number, options: FieldOptions<number> & { page?: number } = {}): number {
    const last = Math.max(1, pages);
    const parse = (payload: JsonValue | undefined): number | undefined => {
      const value = parseNumber(payload);
      return value === undefined ? undefined : clamp(Math.trunc(value), 1, last);
    };
    return this.widget("pagination", undefined, clamp(options.page ?? 1, 1, last), parse, options, (page) => ({
      page,
      pages: last,
    }));
  }

  // ---------------------------------------------------------------------------
  // Containers
  // ---------------------------------------------------------------------------

  container(body: Body): ComponentNode;
  container(options: ContainerOptions, body: Body): ComponentNode;
  container(first: ContainerOptions | Body, second?: Body): ComponentNode {
    const [options, body] = this.split(first, second, {});
    return this.group("container", { props: { className: options.className } }, options, body);
  }

  flex(body: Body): ComponentNode;
  flex(options: FlexOptions, body: Body): ComponentNode;
  flex(first: FlexOptions | Body, second?: Body): ComponentNode {
    const [options, body] = this.split(first, second, {});
    return this.group(
      "flex",
      {
        props: {
          direction: options.direction ?? "row",
          gap: options.gap ?? 8,
          wrap: options.wrap,
          className: options.className,
        },
      },
      options,
      body,
    );
  }

  grid(body: Body): ComponentNode;
  grid(options: GridOptions, body: Body): ComponentNode;
  grid(first: GridOptions | Body, second?: Body): ComponentNode {
    const [options, body] = this.split(first, second, {});
    return this.group(
      "grid",
      { props: { columns: options.columns ?? 2, gap: options.gap ?? 8, className: options.className } },
      options,
      body,
    );
  }

  card(body: Body): ComponentNode;
  card(options: CardOptions, body: Body): ComponentNode;
  card(first: CardOptions | Body, second?: Body): ComponentNode {
    const [options, body] = this.split(first, second, {});
    return this.group("card", { text: options.title, props: { className: options.className } }, options, body);
  }

  sidebar(body: Body): ComponentNode;
  sidebar(options: ContainerOptions, body: Body): ComponentNode;
  sidebar(first: ContainerOptions | Body, second?: Body): ComponentNode {
    const [options, body] = this.split(first, second, {});
    return this.group("sidebar", { props: { className: options.className } }, options, body);
  }

  header(body: Body): ComponentNode;
  header(options: ContainerOptions, body: Body): ComponentNode;
  header(first: ContainerOptions | Body, second?: Body): ComponentNode {
    const [options, body] = this.split(first, second, {});
    return this.group("header", { props: { className: options.className } }, options, body);
  }

  footer(body: Body): ComponentNode;
  footer(options: ContainerOptions, body: Body): ComponentNode;
  footer(first: ContainerOptions | Body, second?: Body): ComponentNode {
    const [options, body] = this.split(first, second, {});
    return this.group("footer", { props: { className: options.className } }, options, body);
  }

  /**
   * @returns whether the form was submitted since the last commit
   */
  form(options: FormOptions, body: Body): boolean {
    let submitted = false;
    const node = this.builder.openContainer(
      "form",
      (id) => {
        const pending = this.builder.pendingEvent(id, "submit");
        submitted = pending !== undefined && pending.result !== false;
        return {
          props: { className: options.className },
          handlers: {
            submit: (event) => options.onSubmit?.(this.formValues(event.payload), event),
          },
        };
      },
      options.key,
    );
    this.builder.within(node, body);
    return submitted;
  }

  formField(options: FormFieldOptions, body: Body): ComponentNode {
    return this.group(
      "formField",
      { text: options.label, props: { help: options.help, className: options.className } },
      options,
      body,
    );
  }

  /**
   * Dialog. The body only runs while `open` is true.
   *
   * @returns whether closing was requested since the last commit
   */
  modal(options: ModalOptions, body: Body): boolean {
    let closeRequested = false;
    const node = this.builder.openContainer(
      "modal",
      (id) => {
        closeRequested = this.builder.pendingEvent(id, "close") !== undefined;
        return {
          text: options.title,
          props: { open: options.open, className: options.className },
          handlers: { close: (event) => options.onClose?.(event) },
        };
      },
      options.key,
    );
    this.builder.within(node, options.open ? body : () => {});
    return closeRequested;
  }

  dropdown(options: DropdownOptions, body: Body): ComponentNode {
    return this.group(
      "dropdown",
      { text: options.label, props: { open: options.open ?? false, className: options.className } },
      options,
      body,
    );
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private split<O extends BaseOptions>(first: O | Body, second: Body | undefined, empty: O): [O, Body] {
    if (isBody(first)) {
      return [empty, first];
    }
    return [first, second ?? (() => {})];
  }

  private group(kind: string, spec: NodeSpec, options: BaseOptions, body: Body): ComponentNode {
    const node = this.builder.openContainer(kind, spec, options.key);
    return this.builder.within(node, body);
  }

  private chart(chartType: ChartType, data: JsonObject[], options: ChartOptions): ComponentNode {
    return this.builder.leaf(
      "chart",
      {
        text: options.title,
        props: {
          chartType,
          data,
          x: options.x ?? "label",
          y: options.y ?? "value",
          className: options.className,
        },
      },
      options.key,
    );
  }

  private choice<T extends JsonPrimitive>(
    kind: "select" | "radio",
    label: string,
    options: ReadonlyArray<T | ChoiceOption<T>>,
    settings: ChoiceOptions<T>,
  ): T | null {
    const choices = normalizeChoices(options);
    const parse = choiceParser(choices);
    const declared: T | null = settings.value ?? choices[0]?.value ?? null;
    const onChange = settings.onChange;
    return this.widget(
      kind,
      label,
      declared,
      (payload) => parse(payload),
      {
        key: settings.key,
        className: settings.className,
        disabled: settings.disabled,
        onChange: onChange ? (value, event) => (value === null ? undefined : onChange(value, event)) : undefined,
      },
      (value) => ({ value, options: choices.map((choice) => ({ label: choice.label, value: choice.value })) }),
    );
  }

  /**
   * Resolve a widget's value: a pending change event wins, then the value
   * the user last picked (while the declared value is unchanged), then the
   * declared value.
   */
  private widget<V extends JsonValue>(
    kind: string,
    label: string | undefined,
    declared: V,
    parse: (payload: JsonValue | undefined) => V | undefined,
    options: FieldOptions<V>,
    props: (value: V) => Record<string, JsonValue | undefined>,
  ): V {
    let value = declared;
    this.builder.leaf(
      kind,
      (id) => {
        const pending = this.builder.pendingEvent(id, "change");
        const fromEvent = pending ? parse(pending.payload) : undefined;
        if (pending && fromEvent !== undefined) {
          this.host.rememberWidget(id, { declared, payload: pending.payload });
          value = fromEvent;
        } else {
          const memory = this.host.recallWidget(id);
          const recalled = memory && jsonEqual(memory.declared, declared) ? parse(memory.payload) : undefined;
          value = recalled ?? declared;
        }
        const onChange = options.onChange;
        return {
          text: label,
          props: { ...props(value), disabled: options.disabled, className: options.className },
          handlers: {
            change: (event) => {
              const next = parse(event.payload);
              if (next === undefined) {
                throw ValidationError.type("payload", `a valid ${kind} value`, JSON.stringify(event.payload));
              }
              return onChange?.(next, event);
            },
          },
        };
      },
      options.key,
    );
    return value;
  }

  private formValues(payload: JsonValue | undefined): Record<string, string> {
    const values = field(payload, "values");
    const result: Record<string, string> = {};
    if (isJsonObject(values)) {
      for (const [name, value] of Object.entries(values)) {
        result[name] = displayValue(value);
      }
    }
    return result;
  }
}
