/**
 * No-op implementations for interface declarations. Pure text synthesis;
 * writing the result anywhere is the caller's business.
 */

import type { InterfaceDecl } from "../declarations/types.js";
import { parseMethodSignature } from "./signature.js";
import { zeroValues } from "./zeroValues.js";

export const GENERATED_HEADER = "// Code generated by declorder; DO NOT EDIT.";

export function implementationName(name: string): string {
  return `NoOp${name}`;
}

function generateMethod(signature: string, implName: string, level: number): string | null {
  const parsed = parseMethodSignature(signature);
  if (!parsed) return null;

  const { name, params, returns } = parsed;
  const lines = [
    `// ${name} is a no-op implementation (Level ${level})`,
    `func (n *${implName}) ${name}(${params})${returns ? ` ${returns}` : ""} {`,
    `\t// TODO: Implement ${name} (Level ${level})`,
  ];
  const zeros = returns ? zeroValues(returns) : "";
  if (zeros) lines.push(`\treturn ${zeros}`);
  lines.push("}");
  return lines.join("\n");
}

/** Stub source for one interface; "" for an unnamed one. Ends with a newline. */
export function generateNoOp(item: InterfaceDecl): string {
  if (item.name === "") return "";

  const impl = implementationName(item.name);
  const blocks = [
    [
      `// ${impl} is a no-op implementation of ${item.name} interface (Level ${item.level})`,
      `type ${impl} struct {`,
      `\tlevel int // Dependency level: ${item.level}`,
      "}",
    ].join("\n"),
    [
      `// New${impl} creates a new no-op implementation at the specified level`,
      `func New${impl}(level int) *${impl} {`,
      `\treturn &${impl}{level: level}`,
      "}",
    ].join("\n"),
    [
      `// GetLevel returns the dependency level of this ${impl}`,
      `func (n *${impl}) GetLevel() int {`,
      "\treturn n.level",
      "}",
    ].join("\n"),
  ];

  for (const signature of item.methods) {
    const method = generateMethod(signature, impl, item.level);
    if (method) blocks.push(method);
  }

  return blocks.join("\n\n") + "\n";
}

/** One file for a unit: header, package clause, then each stub separated by a blank line. */
export function renderGeneratedDocument(stubs: readonly string[], packageName: string): string {
  let out = `${GENERATED_HEADER}\n\npackage ${packageName}\n\n`;
  for (const stub of stubs) {
    if (stub !== "") out += stub + "\n";
  }
  return out;
}
