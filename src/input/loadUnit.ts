import { readFileSync } from "fs";
import { parse } from "yaml";
import { UnitFormatError } from "../errors.js";
import { isEntry } from "./fields.js";

/** One analysed file's declarations, as written by an external source parser. */
export interface DeclarationUnit {
  /** Where the document was read from. */
  source: string;
  /** Source file the declarations belong to; names the generated file. */
  file: string;
  package: string;
  /** Raw entries; each kind's visitor picks out its own. */
  declarations: unknown[];
}

const ALLOWED_KEYS = new Set(["file", "package", "declarations"]);

/**
 * Parse a unit document (YAML or JSON). Shape problems throw UnitFormatError;
 * individual entries are not checked here.
 */
export function parseUnit(text: string, source: string): DeclarationUnit {
  let raw: unknown;
  try {
    raw = parse(text);
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new UnitFormatError(source, `invalid YAML/JSON: ${msg}`);
  }

  if (!isEntry(raw)) {
    throw new UnitFormatError(source, "root must be an object");
  }

  for (const key of Object.keys(raw)) {
    if (!ALLOWED_KEYS.has(key)) {
      throw new UnitFormatError(source, `unknown key "${key}"`);
    }
  }

  if (typeof raw.package !== "string" || raw.package === "") {
    throw new UnitFormatError(source, "package must be a non-empty string");
  }

  let file = source;
  if (raw.file !== undefined) {
    if (typeof raw.file !== "string" || raw.file === "") {
      throw new UnitFormatError(source, "file must be a non-empty string");
    }
    file = raw.file;
  }

  let declarations: unknown[] = [];
  if (raw.declarations !== undefined && raw.declarations !== null) {
    if (!Array.isArray(raw.declarations)) {
      throw new UnitFormatError(source, "declarations must be an array");
    }
    declarations = raw.declarations;
  }

  return { source, file, package: raw.package, declarations };
}

export function loadUnit(path: string): DeclarationUnit {
  let text: string;
  try {
    text = readFileSync(path, "utf8");
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new UnitFormatError(path, `cannot read: ${msg}`);
  }
  return parseUnit(text, path);
}
