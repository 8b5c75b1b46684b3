/**
 * One analysis run: every unit through one fresh engine per active kind.
 * Units never share graphs or collectors.
 */

import { basename, extname, join } from "path";
import type { RunConfig } from "../config/runConfig.js";
import { sortNamesBinary } from "../determinism/CanonicalOrder.js";
import type { DeclarationByKind, DeclarationKind } from "../declarations/types.js";
import { PersistenceError } from "../errors.js";
import { listUnitFiles, unitStem } from "../fs/listUnitFiles.js";
import { loadUnit, type DeclarationUnit } from "../input/loadUnit.js";
import { KINDS, type KindStrategies } from "../kinds/index.js";
import type { ContentWriter } from "../pipeline/capabilities.js";
import { createEngine } from "../pipeline/createEngine.js";

export interface GeneratedFile {
  target: string;
  implementations: string[];
}

export interface UnitResult {
  source: string;
  lines: string[];
  /** NoOp name → stub text, across all kinds that generate. */
  generated: Map<string, string>;
  files: GeneratedFile[];
  failures: PersistenceError[];
}

function fileStem(file: string): string {
  const base = basename(file);
  return unitStem(base) ?? base.slice(0, base.length - extname(base).length);
}

export function generatedFileName(unit: DeclarationUnit, title: string, noopDir: string): string {
  return join(noopDir, `noop_${fileStem(unit.file)}_${title.toLowerCase()}.go`);
}

function analyzeKind<T>(
  strategies: KindStrategies<T>,
  unit: DeclarationUnit,
  config: RunConfig,
  writer: ContentWriter,
  result: UnitResult,
): void {
  const generate = config.noop && strategies.stubs !== undefined;
  const engine = createEngine(strategies, unit, { sort: config.sort, generate, writer });
  engine.analyze(unit.declarations);

  result.lines.push("", `--- ${strategies.title} (Dependency Order) ---`, ...engine.renderResults());
  if (!generate) return;

  const implementations = engine.generateImplementations();
  for (const [name, code] of implementations) result.generated.set(name, code);

  const target = generatedFileName(unit, strategies.title, config.noopDir);
  try {
    engine.writeImplementations(implementations, target, config.noopPackage);
  } catch (err) {
    if (!(err instanceof PersistenceError)) throw err;
    result.failures.push(err);
    return;
  }
  result.files.push({ target, implementations: [...implementations.keys()] });
  result.lines.push(`Generated NoOp implementations: ${target}`);
}

function analyzeKindOf<K extends DeclarationKind>(
  kind: K,
  unit: DeclarationUnit,
  config: RunConfig,
  writer: ContentWriter,
  result: UnitResult,
): void {
  const strategies: KindStrategies<DeclarationByKind[K]> = KINDS[kind];
  analyzeKind(strategies, unit, config, writer, result);
}

export function analyzeUnit(
  unit: DeclarationUnit,
  config: RunConfig,
  writer: ContentWriter,
): UnitResult {
  const result: UnitResult = {
    source: unit.source,
    lines: ["", `=== Analyzing file: ${unit.file} ===`],
    generated: new Map(),
    files: [],
    failures: [],
  };
  for (const kind of config.kinds) {
    analyzeKindOf(kind, unit, config, writer, result);
  }
  return result;
}

export function runHeader(config: RunConfig): string {
  const sortType = config.sort === "topological" ? "Topological" : "Alphabetical";
  let header = `Using ${sortType} sorting`;
  if (config.noop) header += ` with NoOp generation enabled (output: ${config.noopDir})`;
  return header;
}

/**
 * Analyze every unit under `paths`, printing the report. Unreadable paths and
 * malformed units are reported and skipped. Returns the exit code: 1 when
 * anything was skipped or failed to persist, else 0.
 */
export function runAnalysis(
  paths: readonly string[],
  config: RunConfig,
  writer: ContentWriter,
): number {
  let failed = false;
  console.log(runHeader(config));

  for (const path of sortNamesBinary(paths.map((p) => p.trim()).filter((p) => p !== ""))) {
    console.log(`\n=== Analyzing directory: ${path} ===`);

    let files: string[];
    try {
      files = listUnitFiles([path]);
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      console.error(`declorder: error analyzing ${path}: ${msg}`);
      failed = true;
      continue;
    }

    for (const file of files) {
      let unit: DeclarationUnit;
      try {
        unit = loadUnit(file);
      } catch (err) {
        const msg = err instanceof Error ? err.message : String(err);
        console.error(`declorder: skipping unit ${msg}`);
        failed = true;
        continue;
      }

      const result = analyzeUnit(unit, config, writer);
      console.log(result.lines.join("\n"));
      for (const failure of result.failures) {
        console.error(`declorder: ${failure.message}`);
        failed = true;
      }
    }
  }

  return failed ? 1 : 0;
}
