import type { DeclarationName } from "../declarations/types.js";

/**
 * Dependency → dependents adjacency plus in-degree per name.
 * Built fresh for every sort, never persisted.
 */
export interface DependencyGraph<T> {
  /** Known names in registration order; a later duplicate keeps the first slot. */
  nodes: DeclarationName[];
  /** Last-registered item per name. */
  items: Map<DeclarationName, T>;
  dependents: Map<DeclarationName, DeclarationName[]>;
  inDegree: Map<DeclarationName, number>;
}
