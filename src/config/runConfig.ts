import { DECLARATION_KINDS, type DeclarationKind } from "../declarations/types.js";
import type { SortStrategy } from "../pipeline/createEngine.js";
import type { DeclorderConfig } from "./declorderYaml.js";

/** Flags given on the command line; absent means "use the config file". */
export interface CliOverrides {
  kinds?: DeclarationKind[];
  all?: boolean;
  topo?: boolean;
  alpha?: boolean;
  noop?: boolean;
  noopDir?: string;
  noopPackage?: string;
}

/** Everything one run needs, built once and passed down explicitly. */
export interface RunConfig {
  readonly kinds: readonly DeclarationKind[];
  readonly sort: SortStrategy;
  readonly noop: boolean;
  readonly noopDir: string;
  readonly noopPackage: string;
}

function resolveSort(file: SortStrategy, cli: CliOverrides): SortStrategy {
  if (cli.alpha) return "alphabetical";
  if (cli.topo) return "topological";
  return file;
}

function resolveKinds(file: readonly DeclarationKind[], cli: CliOverrides): readonly DeclarationKind[] {
  if (cli.all) return DECLARATION_KINDS;
  if (cli.kinds && cli.kinds.length > 0) return cli.kinds;
  return file;
}

/**
 * CLI flags win over the file. `--all` selects every kind, whatever the file
 * or the kind flags say; no kind flag keeps the file's kinds. `--alpha` beats
 * `--topo`.
 */
export function buildRunConfig(file: DeclorderConfig, cli: CliOverrides = {}): RunConfig {
  const kinds = resolveKinds(file.kinds, cli);
  return Object.freeze({
    kinds: Object.freeze([...kinds]),
    sort: resolveSort(file.sort, cli),
    noop: cli.noop ?? file.noop,
    noopDir: cli.noopDir ?? file.noopDir,
    noopPackage: cli.noopPackage ?? file.noopPackage,
  });
}
