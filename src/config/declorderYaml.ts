/**
 * .declorder.yml loader. Unknown keys or invalid values throw ConfigError
 * (CLI exits 2). Missing file → defaults.
 */

import { existsSync, readFileSync } from "fs";
import { join } from "path";
import { parse } from "yaml";
import { DECLARATION_KINDS, type DeclarationKind } from "../declarations/types.js";
import { ConfigError } from "../errors.js";
import { isValidIdentifier } from "../extract/typeDependencies.js";
import { isEntry } from "../input/fields.js";
import type { SortStrategy } from "../pipeline/createEngine.js";

export const CONFIG_FILE = ".declorder.yml";

const ALLOWED_KEYS = new Set(["kinds", "sort", "noop", "noopDir", "noopPackage"]);
const VALID_SORTS = new Set<string>(["topological", "alphabetical"]);

export const DEFAULT_NOOP_DIR = "./noop";
export const DEFAULT_NOOP_PACKAGE = "main";

export interface DeclorderConfig {
  kinds: DeclarationKind[];
  sort: SortStrategy;
  noop: boolean;
  noopDir: string;
  noopPackage: string;
}

export function defaultConfig(): DeclorderConfig {
  return {
    kinds: [...DECLARATION_KINDS],
    sort: "topological",
    noop: false,
    noopDir: DEFAULT_NOOP_DIR,
    noopPackage: DEFAULT_NOOP_PACKAGE,
  };
}

function isDeclarationKind(value: string): value is DeclarationKind {
  return DECLARATION_KINDS.some((kind) => kind === value);
}

function isSortStrategy(value: string): value is SortStrategy {
  return VALID_SORTS.has(value);
}

/** Validate already-parsed YAML. `label` prefixes error messages. */
export function parseConfig(raw: unknown, label: string = CONFIG_FILE): DeclorderConfig {
  const config = defaultConfig();
  if (raw === null || raw === undefined) return config;

  if (!isEntry(raw)) {
    throw new ConfigError(`${label}: root must be an object`);
  }

  const obj = raw;

  for (const key of Object.keys(obj)) {
    if (!ALLOWED_KEYS.has(key)) {
      throw new ConfigError(`${label}: unknown key "${key}"`);
    }
  }

  if (obj.kinds !== undefined) {
    if (!Array.isArray(obj.kinds) || obj.kinds.length === 0) {
      throw new ConfigError(`${label}: kinds must be a non-empty array`);
    }
    const kinds = new Set<DeclarationKind>();
    for (let i = 0; i < obj.kinds.length; i++) {
      const v: unknown = obj.kinds[i];
      if (typeof v !== "string" || !isDeclarationKind(v)) {
        throw new ConfigError(
          `${label}: kinds[${i}] must be one of ${DECLARATION_KINDS.join(", ")}`,
        );
      }
      kinds.add(v);
    }
    config.kinds = DECLARATION_KINDS.filter((k) => kinds.has(k));
  }

  if (obj.sort !== undefined) {
    if (typeof obj.sort !== "string" || !isSortStrategy(obj.sort)) {
      throw new ConfigError(`${label}: sort must be topological or alphabetical`);
    }
    config.sort = obj.sort;
  }

  if (obj.noop !== undefined) {
    if (typeof obj.noop !== "boolean") {
      throw new ConfigError(`${label}: noop must be true or false`);
    }
    config.noop = obj.noop;
  }

  if (obj.noopDir !== undefined) {
    if (typeof obj.noopDir !== "string" || obj.noopDir.trim() === "") {
      throw new ConfigError(`${label}: noopDir must be a non-empty string`);
    }
    config.noopDir = obj.noopDir;
  }

  if (obj.noopPackage !== undefined) {
    if (typeof obj.noopPackage !== "string" || !isValidIdentifier(obj.noopPackage)) {
      throw new ConfigError(`${label}: noopPackage must be an identifier`);
    }
    config.noopPackage = obj.noopPackage;
  }

  return config;
}

/** Load `path`, or `<root>/.declorder.yml` when no path is given. */
export function loadDeclorderConfig(root: string, path?: string): DeclorderConfig {
  const file = path ?? join(root, CONFIG_FILE);
  if (!existsSync(file)) {
    if (path !== undefined) throw new ConfigError(`${path}: not found`);
    return defaultConfig();
  }

  let raw: unknown;
  try {
    raw = parse(readFileSync(file, "utf8"));
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`${path ?? CONFIG_FILE}: invalid YAML: ${msg}`);
  }

  return parseConfig(raw, path ?? CONFIG_FILE);
}
