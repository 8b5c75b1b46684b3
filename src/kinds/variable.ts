import type { VariableDecl } from "../declarations/types.js";
import { extractTypeDependencies } from "../extract/typeDependencies.js";
import { entryKind, isEntry, stringField } from "../input/fields.js";
import type { KindStrategies, UnitContext } from "./types.js";
import { levelProvider, levelSuffix } from "./shared.js";

function emptyVariable(): VariableDecl {
  return { name: "", package: "", position: "", type: "", level: 0 };
}

export const variableKind: KindStrategies<VariableDecl> = {
  kind: "variable",
  title: "Variables",
  createVisitor: (unit: UnitContext) => ({
    visitNode(node) {
      if (!isEntry(node) || entryKind(node) !== "variable") return emptyVariable();
      const hasInitializer = stringField(node, "value") !== "";
      return {
        name: stringField(node, "name"),
        package: stringField(node, "package", unit.package),
        position: stringField(node, "position", unit.file),
        type: stringField(node, "type", hasInitializer ? "inferred" : ""),
        level: 0,
      };
    },
  }),
  extractor: { extractDependencies: (item) => extractTypeDependencies(item.type) },
  nameProvider: { getTypeName: (item) => item.name },
  renderer: {
    renderItem(item) {
      if (item.name === "") return "";
      return (
        `Variable: ${item.name} ${item.type} (Package: ${item.package}) at ${item.position}` +
        levelSuffix(item.level)
      );
    },
  },
  levels: levelProvider<VariableDecl>(),
};
