import { AlphabeticalDependencyResolver, TopologicalDependencyResolver } from "../graph/resolvers.js";
import type { KindStrategies, UnitContext } from "../kinds/types.js";
import type { ContentWriter, DependencyResolver } from "./capabilities.js";
import {
  ArrayResultCollector,
  DependencySorter,
  GenericCodeGenerator,
  GenericFormatter,
  GenericVisitor,
  NamedItemValidator,
} from "./components.js";
import { AnalysisEngine } from "./engine.js";

export type SortStrategy = "topological" | "alphabetical";

export interface EngineOptions {
  sort: SortStrategy;
  /** Attach the kind's stub generator, if it has one. */
  generate: boolean;
  writer: ContentWriter;
}

export function createResolver<T>(
  strategies: KindStrategies<T>,
  sort: SortStrategy,
): DependencyResolver<T> {
  return sort === "topological"
    ? new TopologicalDependencyResolver(strategies.extractor, strategies.nameProvider, strategies.levels)
    : new AlphabeticalDependencyResolver(strategies.nameProvider, strategies.levels);
}

/** Fresh engine (fresh collector) for one kind of one unit. */
export function createEngine<T>(
  strategies: KindStrategies<T>,
  unit: UnitContext,
  options: EngineOptions,
): AnalysisEngine<T> {
  const visitor = new GenericVisitor(
    strategies.createVisitor(unit),
    new ArrayResultCollector<T>(),
    new NamedItemValidator(strategies.nameProvider),
  );
  const sorter = new DependencySorter(createResolver(strategies, options.sort));
  const formatter = new GenericFormatter(strategies.renderer);
  const stubs = options.generate ? strategies.stubs : undefined;
  const codeGenerator = stubs
    ? new GenericCodeGenerator(stubs.generator, stubs.namer, options.writer)
    : null;

  return new AnalysisEngine(visitor, sorter, formatter, codeGenerator);
}
