import type { DeclarationByKind, DeclarationKind } from "../declarations/types.js";
import type {
  CodeGenerator,
  DependencyExtractor,
  ImplementationNamer,
  ItemRenderer,
  LevelProvider,
  NodeVisitor,
  TypeNameProvider,
} from "../pipeline/capabilities.js";

/** Where a unit's entries came from; the fallback for missing package/position. */
export interface UnitContext {
  file: string;
  package: string;
}

/** Everything that differs between declaration kinds. */
export interface KindStrategies<T> {
  kind: DeclarationKind;
  /** Report section title, e.g. "Structs". */
  title: string;
  createVisitor(unit: UnitContext): NodeVisitor<T>;
  extractor: DependencyExtractor<T>;
  nameProvider: TypeNameProvider<T>;
  renderer: ItemRenderer<T>;
  levels: LevelProvider<T>;
  /** Only kinds that can have stubs. */
  stubs?: {
    generator: CodeGenerator<T>;
    namer: ImplementationNamer<T>;
  };
}

export type KindRegistry = { [K in DeclarationKind]: KindStrategies<DeclarationByKind[K]> };
