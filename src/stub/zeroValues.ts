const ZERO_BY_BUILTIN = new Map<string, string>([
  ["bool", "false"],
  ["string", '""'],
  ["int", "0"],
  ["int8", "0"],
  ["int16", "0"],
  ["int32", "0"],
  ["int64", "0"],
  ["uint", "0"],
  ["uint8", "0"],
  ["uint16", "0"],
  ["uint32", "0"],
  ["uint64", "0"],
  ["uintptr", "0"],
  ["byte", "0"],
  ["rune", "0"],
  ["float32", "0.0"],
  ["float64", "0.0"],
  ["complex64", "0+0i"],
  ["complex128", "0+0i"],
  ["error", "nil"],
  ["any", "nil"],
]);

const NIL_PREFIXES = ["*", "[]", "map[", "func(", "interface{"];

const CHANNEL = /\bchan\b/;

const NAMED_RESULT = /^[A-Za-z_][A-Za-z0-9_]*\s+(\S.*)$/;

const TYPE_KEYWORDS = new Set(["func", "map", "chan", "interface", "struct"]);

/** Zero-value literal for one return type. Unknown unqualified names get a composite literal. */
export function zeroValue(type: string): string {
  const t = type.trim();
  if (NIL_PREFIXES.some((p) => t.startsWith(p)) || CHANNEL.test(t)) return "nil";

  const builtin = ZERO_BY_BUILTIN.get(t);
  if (builtin !== undefined) return builtin;

  if (t.includes(".")) return "nil";
  return `${t}{}`;
}

/** Split on commas outside brackets. */
function splitTopLevel(list: string): string[] {
  const parts: string[] = [];
  let depth = 0;
  let start = 0;
  for (let i = 0; i < list.length; i++) {
    const ch = list[i];
    if (ch === "(" || ch === "[" || ch === "{") depth++;
    else if (ch === ")" || ch === "]" || ch === "}") depth--;
    else if (ch === "," && depth === 0) {
      parts.push(list.slice(start, i));
      start = i + 1;
    }
  }
  parts.push(list.slice(start));
  return parts.map((p) => p.trim()).filter((p) => p !== "");
}

function stripResultName(result: string): string {
  const m = result.match(NAMED_RESULT);
  if (!m) return result;
  const first = result.split(/\s/, 1)[0];
  return TYPE_KEYWORDS.has(first) ? result : m[1];
}

/**
 * Zero values for a return clause, in declared order.
 * `"(int, error)"` → `"0, nil"`, `"(n int, err error)"` → `"0, nil"`, `""` → `""`.
 */
export function zeroValues(returnClause: string): string {
  let clause = returnClause.trim();
  if (clause.startsWith("(") && clause.endsWith(")")) clause = clause.slice(1, -1);
  return splitTopLevel(clause)
    .map((result) => zeroValue(stripResultName(result)))
    .join(", ");
}
