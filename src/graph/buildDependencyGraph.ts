import type { DeclarationName } from "../declarations/types.js";
import type { DependencyExtractor, TypeNameProvider } from "../pipeline/capabilities.js";
import type { DependencyGraph } from "./types.js";

/**
 * Edges run from a dependency to each dependent. Unnamed items are left out;
 * a name registered twice keeps the later item. Dependencies on names outside
 * the set cannot affect ordering and are dropped.
 */
export function buildDependencyGraph<T>(
  items: readonly T[],
  extractor: DependencyExtractor<T>,
  nameProvider: TypeNameProvider<T>,
): DependencyGraph<T> {
  const byName = new Map<DeclarationName, T>();
  for (const item of items) {
    const name = nameProvider.getTypeName(item);
    if (name !== "") byName.set(name, item);
  }

  const dependents = new Map<DeclarationName, DeclarationName[]>();
  const inDegree = new Map<DeclarationName, number>();
  for (const name of byName.keys()) {
    dependents.set(name, []);
    inDegree.set(name, 0);
  }

  for (const [name, item] of byName) {
    for (const dep of new Set(extractor.extractDependencies(item))) {
      const out = dependents.get(dep);
      if (!out) continue;
      out.push(name);
      inDegree.set(name, (inDegree.get(name) ?? 0) + 1);
    }
  }

  return {
    nodes: [...byName.keys()],
    items: byName,
    dependents,
    inDegree,
  };
}
