import type { StructDecl } from "../declarations/types.js";
import { collectDependencies } from "../extract/typeDependencies.js";
import { entryKind, isEntry, stringField, stringListField } from "../input/fields.js";
import type { KindStrategies, UnitContext } from "./types.js";
import { levelProvider, levelSuffix, listSuffix } from "./shared.js";

function emptyStruct(): StructDecl {
  return { name: "", package: "", position: "", fields: [], level: 0 };
}

export const structKind: KindStrategies<StructDecl> = {
  kind: "struct",
  title: "Structs",
  createVisitor: (unit: UnitContext) => ({
    visitNode(node) {
      if (!isEntry(node) || entryKind(node) !== "struct") return emptyStruct();
      return {
        name: stringField(node, "name"),
        package: stringField(node, "package", unit.package),
        position: stringField(node, "position", unit.file),
        fields: stringListField(node, "fields"),
        level: 0,
      };
    },
  }),
  // A field typed as the struct itself (linked lists, trees) is not a dependency.
  extractor: { extractDependencies: (item) => collectDependencies(item.fields, item.name) },
  nameProvider: { getTypeName: (item) => item.name },
  renderer: {
    renderItem(item) {
      if (item.name === "") return "";
      return (
        `Struct: ${item.name} (Package: ${item.package}) at ${item.position}` +
        listSuffix("Fields", item.fields) +
        levelSuffix(item.level)
      );
    },
  },
  levels: levelProvider<StructDecl>(),
};
