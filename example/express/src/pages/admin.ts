import type { GuardContext, LayoutRender, UI } from "yoguido";
import { Auth, Directory, Load, type Member, type Role } from "../state";

const PAGE_SIZE = 2;

const ROLES: Role[] = ["admin", "editor", "viewer"];

export function requireUser(context: GuardContext): true | string {
  return context.useState(Auth).peek("user") ? true : "/login";
}

export const adminLayout: LayoutRender = (ui, renderPage) => {
  const auth = ui.useState(Auth);

  ui.header(() => {
    ui.flex({ gap: 16 }, () => {
      ui.breadcrumb([{ label: "Admin", href: "/admin" }, { label: ui.getCurrentPageTitle() }]);
      ui.badge(auth.get("user"), { variant: "info" });
      ui.button("Sign out", {
        onClick: (event) => {
          auth.set("user", "");
          event.navigateTo("/login");
        },
      });
    });
  });
  ui.flex({ gap: 24 }, () => {
    ui.sidebar(() => {
      ui.link("Dashboard", "/admin");
      ui.link("Members", "/admin/members");
      ui.link("Counter", "/");
    });
    ui.container(renderPage);
  });
};

export function login(ui: UI): void {
  const auth = ui.useState(Auth);

  ui.title("Sign in");
  const name = ui.input("Name", { placeholder: "ada" });
  ui.button("Continue", {
    variant: "primary",
    disabled: name.trim() === "",
    onClick: (event) => {
      auth.set("user", name.trim());
      event.navigateTo("/admin");
    },
  });
}

export function dashboard(ui: UI): void {
  const load = ui.useState(Load);
  const directory = ui.useState(Directory);

  ui.title("Dashboard");
  ui.grid({ columns: 3 }, () => {
    ui.statsCard("Members", directory.get("members").length);
    ui.statsCard("Requests", load.get("requests"));
    ui.statsCard("Uptime", `${load.get("uptime")}s`);
  });
  ui.barChart(
    ROLES.map((role) => ({
      label: role,
      value: directory.get("members").filter((member) => member.role === role).length,
    })),
    { title: "Members by role" },
  );
}

export function members(ui: UI): void {
  const directory = ui.useState(Directory);
  const all = directory.get("members");
  const pages = Math.max(1, Math.ceil(all.length / PAGE_SIZE));
  const page = ui.pagination(pages, {
    page: directory.get("page"),
    onChange: (value) => directory.set("page", value),
  });
  const offset = (page - 1) * PAGE_SIZE;
  const rows = all.slice(offset, offset + PAGE_SIZE);

  ui.title("Members");
  ui.table(rows, {
    columns: ["name", "email", "role"],
    actions: [
      { label: "Edit", onClick: (_row, index) => directory.set("editing", offset + index) },
      {
        label: "Remove",
        onClick: (row) => directory.set("members", all.filter((member) => member.email !== row.email)),
      },
    ],
  });

  const editing: Member | undefined = all[directory.get("editing")];
  ui.modal(
    {
      title: editing ? `Edit ${editing.name}` : "Edit",
      open: editing !== undefined,
      onClose: () => directory.set("editing", -1),
    },
    () => {
      if (!editing) return;
      ui.select("Role", ROLES, {
        value: editing.role,
        onChange: (role) => {
          directory.update({
            members: all.map((member) => (member.email === editing.email ? { ...member, role } : member)),
            editing: -1,
          });
        },
      });
    },
  );
}
