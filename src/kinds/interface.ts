import type { InterfaceDecl } from "../declarations/types.js";
import { collectDependencies } from "../extract/typeDependencies.js";
import { entryKind, isEntry, stringField, stringListField } from "../input/fields.js";
import { generateNoOp, implementationName } from "../stub/noopGenerator.js";
import type { KindStrategies, UnitContext } from "./types.js";
import { levelProvider, levelSuffix, listSuffix } from "./shared.js";

function emptyInterface(): InterfaceDecl {
  return { name: "", package: "", position: "", methods: [], level: 0 };
}

export const interfaceKind: KindStrategies<InterfaceDecl> = {
  kind: "interface",
  title: "Interfaces",
  createVisitor: (unit: UnitContext) => ({
    visitNode(node) {
      if (!isEntry(node) || entryKind(node) !== "interface") return emptyInterface();
      return {
        name: stringField(node, "name"),
        package: stringField(node, "package", unit.package),
        position: stringField(node, "position", unit.file),
        methods: stringListField(node, "methods"),
        level: 0,
      };
    },
  }),
  extractor: { extractDependencies: (item) => collectDependencies(item.methods, item.name) },
  nameProvider: { getTypeName: (item) => item.name },
  renderer: {
    renderItem(item) {
      if (item.name === "") return "";
      return (
        `Interface: ${item.name} (Package: ${item.package}) at ${item.position}` +
        listSuffix("Methods", item.methods) +
        levelSuffix(item.level)
      );
    },
  },
  levels: levelProvider<InterfaceDecl>(),
  stubs: {
    generator: { generateCode: generateNoOp },
    namer: { getImplementationName: (item) => implementationName(item.name) },
  },
};
