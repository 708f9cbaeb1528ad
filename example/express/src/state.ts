import { defineState } from "yoguido";

export const Counter = defineState("counter", { count: 0, step: 1 });

export const Auth = defineState("auth", { user: "" });

export type Role = "admin" | "editor" | "viewer";

export interface Member {
  [key: string]: string;
  name: string;
  email: string;
  role: Role;
}

const members: Member[] = [
  { name: "Ada", email: "ada@example.com", role: "admin" },
  { name: "Grace", email: "grace@example.com", role: "editor" },
  { name: "Linus", email: "linus@example.com", role: "viewer" },
];

export const Directory = defineState("directory", { members, page: 1, editing: -1 });

/** Server-side figures pushed to open dashboards */
export const Load = defineState("load", { requests: 0, uptime: 0 });
