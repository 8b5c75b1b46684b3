/**
 * Loose readers for unit entries. Entries come from YAML/JSON written by an
 * external parser; a wrong-typed field reads as empty rather than failing.
 */

export type Entry = Record<string, unknown>;

export function isEntry(value: unknown): value is Entry {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function scalarToString(value: unknown): string | null {
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  return null;
}

/** The entry's kind tag, or null when the node is not an entry. */
export function entryKind(node: unknown): string | null {
  if (!isEntry(node)) return null;
  return typeof node.kind === "string" ? node.kind : null;
}

export function stringField(entry: Entry, key: string, fallback = ""): string {
  const value = scalarToString(entry[key]);
  return value === null || value === "" ? fallback : value;
}

export function stringListField(entry: Entry, key: string): string[] {
  const value = entry[key];
  if (!Array.isArray(value)) return [];
  const out: string[] = [];
  for (const v of value) {
    const s = scalarToString(v);
    if (s !== null && s !== "") out.push(s);
  }
  return out;
}
