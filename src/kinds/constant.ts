import type { ConstantDecl } from "../declarations/types.js";
import { extractTypeDependencies } from "../extract/typeDependencies.js";
import { entryKind, isEntry, stringField } from "../input/fields.js";
import type { KindStrategies, UnitContext } from "./types.js";
import { levelProvider, levelSuffix } from "./shared.js";

function emptyConstant(): ConstantDecl {
  return { name: "", package: "", position: "", type: "", value: "", level: 0 };
}

export const constantKind: KindStrategies<ConstantDecl> = {
  kind: "constant",
  title: "Constants",
  createVisitor: (unit: UnitContext) => ({
    visitNode(node) {
      if (!isEntry(node) || entryKind(node) !== "constant") return emptyConstant();
      return {
        name: stringField(node, "name"),
        package: stringField(node, "package", unit.package),
        position: stringField(node, "position", unit.file),
        type: stringField(node, "type"),
        value: stringField(node, "value"),
        level: 0,
      };
    },
  }),
  extractor: { extractDependencies: (item) => extractTypeDependencies(item.type) },
  nameProvider: { getTypeName: (item) => item.name },
  renderer: {
    renderItem(item) {
      if (item.name === "") return "";
      let out = `Constant: ${item.name}`;
      if (item.type !== "") out += ` ${item.type}`;
      if (item.value !== "") out += ` = ${item.value}`;
      return out + ` (Package: ${item.package}) at ${item.position}` + levelSuffix(item.level);
    },
  },
  levels: levelProvider<ConstantDecl>(),
};
