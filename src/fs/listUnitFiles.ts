/**
 * Declaration unit discovery: *.decl.yml, *.decl.yaml and *.decl.json files
 * under the given paths. Sorted, deduplicated, absolute.
 */

import { readdirSync, statSync } from "fs";
import { join, resolve } from "path";
import { sortNamesBinary } from "../determinism/CanonicalOrder.js";

const EXCLUDED = new Set(["node_modules", "dist", "build", "coverage"]);

const UNIT_SUFFIXES = [".decl.yml", ".decl.yaml", ".decl.json"];

export function isUnitFile(name: string): boolean {
  return unitStem(name) !== null;
}

/** `service.decl.yml` → `service`; null when the name has no unit suffix. */
export function unitStem(name: string): string | null {
  const suffix = UNIT_SUFFIXES.find((s) => name.endsWith(s));
  if (suffix === undefined) return null;
  const stem = name.slice(0, name.length - suffix.length);
  return stem === "" ? null : stem;
}

function isHidden(name: string): boolean {
  return name.startsWith(".");
}

function walkUnits(dir: string, out: Set<string>): void {
  const entries = readdirSync(dir, { withFileTypes: true });
  for (const e of entries) {
    const abs = join(dir, e.name);
    if (e.isDirectory()) {
      if (!EXCLUDED.has(e.name) && !isHidden(e.name)) walkUnits(abs, out);
    } else if (e.isFile() && !isHidden(e.name) && isUnitFile(e.name)) {
      out.add(abs);
    }
  }
}

/**
 * Files are taken as given, whatever their name; directories are walked for
 * unit suffixes only. A missing path throws.
 */
export function listUnitFiles(paths: readonly string[]): string[] {
  const out = new Set<string>();
  for (const p of paths) {
    const abs = resolve(p);
    if (statSync(abs).isDirectory()) walkUnits(abs, out);
    else out.add(abs);
  }
  return sortNamesBinary(out);
}
