/**
 * Lexical dependency extraction from rendered type text. Never resolves
 * identifiers against a real type system: a name is a dependency when it
 * looks like one.
 */

const BUILTIN_TYPES = new Set([
  "bool",
  "byte",
  "complex64",
  "complex128",
  "error",
  "float32",
  "float64",
  "int",
  "int8",
  "int16",
  "int32",
  "int64",
  "rune",
  "string",
  "uint",
  "uint8",
  "uint16",
  "uint32",
  "uint64",
  "uintptr",
  "interface",
  "func",
  "struct",
  "any",
]);

const NOISE_TOKENS = ["*", "[]", "map[", "chan ", "<-"];

const SEPARATORS = /[()[\]{},\s]+/;

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

export function isBuiltinType(name: string): boolean {
  return BUILTIN_TYPES.has(name);
}

export function isValidIdentifier(name: string): boolean {
  return IDENTIFIER.test(name);
}

function stripNoise(fragment: string): string {
  let cleaned = fragment;
  for (const token of NOISE_TOKENS) {
    cleaned = cleaned.split(token).join("");
  }
  return cleaned;
}

/**
 * Names a type or signature fragment mentions, deduplicated, in first-seen order.
 * `"*[]map[string]UserService"` → `["UserService"]`, `"pkg.Reader"` → `["Reader"]`.
 */
export function extractTypeDependencies(fragment: string): string[] {
  const deps = new Set<string>();

  for (const raw of stripNoise(fragment).split(SEPARATORS)) {
    const word = raw.trim();
    if (word === "" || isBuiltinType(word)) continue;

    if (word.includes(".")) {
      const parts = word.split(".");
      if (parts.length === 2 && parts[1] !== "") deps.add(parts[1]);
    } else if (isValidIdentifier(word)) {
      deps.add(word);
    }
  }

  return [...deps];
}

/** Union of extractTypeDependencies over fragments, minus `exclude` (self-reference). */
export function collectDependencies(fragments: readonly string[], exclude?: string): string[] {
  const deps = new Set<string>();
  for (const fragment of fragments) {
    for (const dep of extractTypeDependencies(fragment)) {
      if (dep !== exclude) deps.add(dep);
    }
  }
  return [...deps];
}
