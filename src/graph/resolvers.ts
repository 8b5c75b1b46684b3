import { sortByKeyBinary, stringCompareBinary } from "../determinism/CanonicalOrder.js";
import type {
  DependencyExtractor,
  DependencyResolver,
  LevelProvider,
  TypeNameProvider,
} from "../pipeline/capabilities.js";
import { buildDependencyGraph } from "./buildDependencyGraph.js";

function assignLevels<T>(items: T[], levels: LevelProvider<T>): T[] {
  return items.map((item, index) => levels.withLevel(item, index));
}

/**
 * Kahn's algorithm. The ready set is re-sorted (binary order) before every pop,
 * so the same input set always yields the same order. Names that never reach
 * in-degree zero (cycles, self-references) and unnamed items are appended in
 * input order afterwards. Nothing is reported about them.
 */
export class TopologicalDependencyResolver<T> implements DependencyResolver<T> {
  constructor(
    private readonly extractor: DependencyExtractor<T>,
    private readonly nameProvider: TypeNameProvider<T>,
    private readonly levels: LevelProvider<T>,
  ) {}

  resolveDependencies(items: readonly T[]): T[] {
    const graph = buildDependencyGraph(items, this.extractor, this.nameProvider);
    const inDegree = new Map(graph.inDegree);
    const ready = graph.nodes.filter((name) => inDegree.get(name) === 0);

    const result: T[] = [];
    const processed = new Set<string>();

    while (ready.length > 0) {
      ready.sort(stringCompareBinary);
      const current = ready.shift();
      if (current === undefined || processed.has(current)) continue;
      processed.add(current);

      const item = graph.items.get(current);
      if (item !== undefined) result.push(item);

      for (const dependent of graph.dependents.get(current) ?? []) {
        const remaining = (inDegree.get(dependent) ?? 0) - 1;
        inDegree.set(dependent, remaining);
        if (remaining === 0) ready.push(dependent);
      }
    }

    for (const item of items) {
      if (!processed.has(this.nameProvider.getTypeName(item))) result.push(item);
    }

    return assignLevels(result, this.levels);
  }
}

/** Name order only; dependencies are ignored. */
export class AlphabeticalDependencyResolver<T> implements DependencyResolver<T> {
  constructor(
    private readonly nameProvider: TypeNameProvider<T>,
    private readonly levels: LevelProvider<T>,
  ) {}

  resolveDependencies(items: readonly T[]): T[] {
    const sorted = sortByKeyBinary(items, (item) => this.nameProvider.getTypeName(item));
    return assignLevels(sorted, this.levels);
  }
}
