// @vitest-environment jsdom
/**
 * Tests for EventDelegator
 */

import { EventDelegator } from "../dom/events";
import { DomPatcher } from "../dom/patcher";
import { snapshot } from "./helpers";
import type { NodeSnapshot } from "yoguido-shared";

function mount(...children: NodeSnapshot[]) {
  const host = document.body.appendChild(document.createElement("div"));
  const patcher = new DomPatcher(host);
  patcher.mount(snapshot("root", "page", { children }));
  const sink = vi.fn();
  const delegator = new EventDelegator(host, sink);
  delegator.attach();
  const find = (id: string): Element => {
    const element = patcher.element(id);
    if (!element) throw new Error(`not mounted: ${id}`);
    return element;
  };
  return { host, sink, delegator, find };
}

function change(element: Element | null): void {
  element?.dispatchEvent(new Event("change", { bubbles: true }));
}

afterEach(() => {
  document.body.replaceChildren();
});

describe("EventDelegator", () => {
  describe("click", () => {
    it("should forward clicks on nodes that listen for them", () => {
      const { sink, find } = mount(snapshot("root/button0", "button", { text: "Save", events: ["click"] }));

      find("root/button0").dispatchEvent(new MouseEvent("click", { bubbles: true }));

      expect(sink).toHaveBeenCalledWith("root/button0", "click");
    });

    it("should ignore clicks on nodes without a click handler", () => {
      const { sink, find } = mount(snapshot("root/button0", "button", { text: "Save" }));

      find("root/button0").dispatchEvent(new MouseEvent("click", { bubbles: true }));

      expect(sink).not.toHaveBeenCalled();
    });

    it("should keep internal links from loading a new page", () => {
      const { sink, find } = mount(
        snapshot("root/link0", "link", { text: "About", props: { href: "/about" }, events: ["click"] }),
      );
      const event = new MouseEvent("click", { bubbles: true, cancelable: true });

      find("root/link0").dispatchEvent(event);

      expect(event.defaultPrevented).toBe(true);
      expect(sink).toHaveBeenCalledWith("root/link0", "click");
    });
  });

  describe("actions", () => {
    it("should send the pagination target page", () => {
      const { sink, find } = mount(
        snapshot("root/pagination0", "pagination", { props: { page: 1, pages: 3 }, events: ["change"] }),
      );
      const next = find("root/pagination0").querySelectorAll("button")[1];

      next.click();

      expect(sink).toHaveBeenCalledWith("root/pagination0", "change", { value: 2 });
    });

    it("should send the row and action of a table button", () => {
      const { sink, find } = mount(
        snapshot("root/table0", "table", {
          props: { columns: ["name"], rows: [{ name: "Ada" }, { name: "Grace" }], actions: ["Edit", "Delete"] },
          events: ["action"],
        }),
      );
      const buttons = find("root/table0").querySelectorAll("button");

      buttons[3].click();

      expect(sink).toHaveBeenCalledWith("root/table0", "action", { row: 1, action: 1 });
    });

    it("should ignore actions the node does not listen for", () => {
      const { sink, find } = mount(snapshot("root/tabs0", "tabs", { props: { tabs: ["One", "Two"], value: "One" } }));

      find("root/tabs0").querySelectorAll("button")[1].click();

      expect(sink).not.toHaveBeenCalled();
    });
  });

  describe("change", () => {
    it("should send the checked state of a checkbox", () => {
      const { sink, find } = mount(snapshot("root/checkbox0", "checkbox", { text: "Agree", events: ["change"] }));
      const input = find("root/checkbox0").querySelector("input");
      if (input) input.checked = true;

      change(input);

      expect(sink).toHaveBeenCalledWith("root/checkbox0", "change", { checked: true });
    });

    it("should send the value of a select", () => {
      const { sink, find } = mount(
        snapshot("root/select0", "select", {
          props: {
            value: "b",
            options: [
              { label: "A", value: "a" },
              { label: "B", value: "b" },
            ],
          },
          events: ["change"],
        }),
      );
      const select = find("root/select0").querySelector("select");
      if (select) select.value = "a";

      change(select);

      expect(sink).toHaveBeenCalledWith("root/select0", "change", { value: "a" });
    });
  });

  describe("submit", () => {
    it("should send control values keyed by node id", () => {
      const { sink, find } = mount(
        snapshot("root/form0", "form", {
          events: ["submit"],
          children: [
            snapshot("root/form0/input0", "input", { text: "Name", props: { value: "" } }),
            snapshot("root/form0/checkbox0", "checkbox", { text: "Admin" }),
          ],
        }),
      );
      const input = find("root/form0/input0").querySelector("input");
      if (input) input.value = "Ada";
      const event = new Event("submit", { bubbles: true, cancelable: true });

      find("root/form0").dispatchEvent(event);

      expect(event.defaultPrevented).toBe(true);
      expect(sink).toHaveBeenCalledWith("root/form0", "submit", {
        values: { "root/form0/input0": "Ada", "root/form0/checkbox0": "false" },
      });
    });
  });

  describe("detach", () => {
    it("should stop forwarding events", () => {
      const { sink, find, delegator } = mount(snapshot("root/button0", "button", { events: ["click"] }));

      delegator.detach();
      find("root/button0").dispatchEvent(new MouseEvent("click", { bubbles: true }));

      expect(sink).not.toHaveBeenCalled();
    });
  });
});
