import type { CliOverrides } from "../config/runConfig.js";
import type { DeclarationKind } from "../declarations/types.js";

const KIND_FLAGS = new Map<string, DeclarationKind>([
  ["--structs", "struct"],
  ["--interfaces", "interface"],
  ["--functions", "function"],
  ["--variables", "variable"],
  ["--constants", "constant"],
  ["--imports", "import"],
]);

export const USAGE = `Usage: declorder [options]
  --units a,b          comma-separated unit files or directories (default ".");
                       directories are searched for *.decl.yml, *.decl.yaml, *.decl.json
  --structs --interfaces --functions --variables --constants --imports
                       show only these kinds (default: all)
  --all                show all kinds
  --topo | --alpha     topological (default) or alphabetical order
  --noop               generate NoOp implementations for interfaces
  --noop-dir DIR       where generated files go (default ./noop)
  --noop-package NAME  package clause of generated files (default main)
  --config PATH        config file (default ./.declorder.yml)`;

export interface ParsedArgs {
  units: string[];
  configPath?: string;
  overrides: CliOverrides;
  help: boolean;
}

/** Unknown flags are ignored; a value flag missing its value is ignored too. */
export function parseArgs(args: readonly string[]): ParsedArgs {
  const parsed: ParsedArgs = { units: ["."], overrides: {}, help: false };
  const kinds: DeclarationKind[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const next = args[i + 1];
    const kind = KIND_FLAGS.get(arg);
    if (kind !== undefined) {
      kinds.push(kind);
    } else if (arg === "--units" && next !== undefined) {
      parsed.units = next.split(",");
      i++;
    } else if (arg === "--noop-dir" && next !== undefined) {
      parsed.overrides.noopDir = next;
      i++;
    } else if (arg === "--noop-package" && next !== undefined) {
      parsed.overrides.noopPackage = next;
      i++;
    } else if (arg === "--config" && next !== undefined) {
      parsed.configPath = next;
      i++;
    } else if (arg === "--all") {
      parsed.overrides.all = true;
    } else if (arg === "--topo") {
      parsed.overrides.topo = true;
    } else if (arg === "--alpha") {
      parsed.overrides.alpha = true;
    } else if (arg === "--noop") {
      parsed.overrides.noop = true;
    } else if (arg === "--help" || arg === "-h") {
      parsed.help = true;
    }
  }

  if (kinds.length > 0) parsed.overrides.kinds = kinds;
  return parsed;
}
