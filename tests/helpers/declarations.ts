import type { InterfaceDecl } from "../../src/declarations/types.js";

export function iface(name: string, methods: string[] = [], position = "test.go"): InterfaceDecl {
  return { name, package: "test", position, methods, level: 0 };
}

export function names(items: readonly { name: string }[]): string[] {
  return items.map((i) => i.name);
}
