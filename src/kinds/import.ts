import type { ImportDecl } from "../declarations/types.js";
import { entryKind, isEntry, stringField } from "../input/fields.js";
import type { KindStrategies, UnitContext } from "./types.js";
import { levelProvider, levelSuffix } from "./shared.js";

function emptyImport(): ImportDecl {
  return { alias: "", path: "", position: "", level: 0 };
}

export const importKind: KindStrategies<ImportDecl> = {
  kind: "import",
  title: "Imports",
  createVisitor: (unit: UnitContext) => ({
    visitNode(node) {
      if (!isEntry(node) || entryKind(node) !== "import") return emptyImport();
      return {
        alias: stringField(node, "alias"),
        path: stringField(node, "path"),
        position: stringField(node, "position", unit.file),
        level: 0,
      };
    },
  }),
  // Imports never depend on each other.
  extractor: { extractDependencies: () => [] },
  nameProvider: { getTypeName: (item) => item.path },
  renderer: {
    renderItem(item) {
      if (item.path === "") return "";
      const head =
        item.alias !== "" && item.alias !== "."
          ? `Import: ${item.path} as ${item.alias}`
          : `Import: ${item.path}`;
      return `${head} at ${item.position}` + levelSuffix(item.level);
    },
  },
  levels: levelProvider<ImportDecl>(),
};
