export interface MethodSignature {
  name: string;
  /** Parameter list without the enclosing parens, verbatim. */
  params: string;
  /** Return clause, trimmed; "" when the method returns nothing. */
  returns: string;
}

/**
 * Re-derive name, parameter list and return clause from a rendered signature
 * such as `Write(p []byte, opts ...Option) (n int, err error)`.
 * Returns null for embedded types, unnamed signatures and unbalanced parens.
 */
export function parseMethodSignature(signature: string): MethodSignature | null {
  const open = signature.indexOf("(");
  if (open < 0) return null;

  const name = signature.slice(0, open).trim();
  if (name === "") return null;

  const remainder = signature.slice(open + 1);
  let depth = 0;
  let paramEnd = -1;
  for (let i = 0; i < remainder.length; i++) {
    const ch = remainder[i];
    if (ch === "(") {
      depth++;
    } else if (ch === ")") {
      if (depth === 0) {
        paramEnd = i;
        break;
      }
      depth--;
    }
  }
  if (paramEnd < 0) return null;

  return {
    name,
    params: remainder.slice(0, paramEnd),
    returns: remainder.slice(paramEnd + 1).trim(),
  };
}
