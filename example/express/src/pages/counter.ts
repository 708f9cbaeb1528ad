import type { UI } from "yoguido";
import { Counter } from "../state";

export function counter(ui: UI): void {
  const state = ui.useState(Counter);

  ui.title("Counter");
  ui.card({ title: "Clicks" }, () => {
    ui.text(`Count: ${state.get("count")}`);
    ui.flex({ gap: 8 }, () => {
      ui.button("Add", {
        variant: "primary",
        onClick: () => state.set("count", state.peek("count") + state.peek("step")),
      });
      ui.button("Reset", { onClick: () => state.set("count", 0) });
    });
    ui.numberInput("Step", {
      value: state.get("step"),
      min: 1,
      max: 10,
      onChange: (step) => state.set("step", step),
    });
  });
  ui.link("Admin area", "/admin");
}
