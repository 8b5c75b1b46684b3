/**
 * One capability per responsibility. Kinds differ only in which strategies
 * they plug in; the engine never branches on kind.
 */

/** Maps one unit entry to a record. Entries of another kind map to an invalid record. */
export interface NodeVisitor<T> {
  visitNode(node: unknown): T;
}

export interface ResultCollector<T> {
  collectResults(): T[];
  addResult(item: T): void;
}

export interface ItemValidator<T> {
  isValid(item: T): boolean;
}

export interface ItemRenderer<T> {
  renderItem(item: T): string;
}

export interface DependencyExtractor<T> {
  extractDependencies(item: T): string[];
}

export interface TypeNameProvider<T> {
  getTypeName(item: T): string;
}

export interface ItemSorter<T> {
  sortItems(items: readonly T[]): T[];
}

export interface DependencyResolver<T> {
  resolveDependencies(items: readonly T[]): T[];
}

export interface CodeGenerator<T> {
  generateCode(item: T): string;
}

export interface ImplementationNamer<T> {
  getImplementationName(item: T): string;
}

/** Persist named content. Throws on failure; callers wrap the cause. */
export interface ContentWriter {
  writeContent(content: string, target: string): void;
}

export interface LevelProvider<T> {
  getLevel(item: T): number;
  /** Returns a copy carrying `level`; the input is left untouched. */
  withLevel(item: T, level: number): T;
}
