import type { FunctionDecl } from "../declarations/types.js";
import { collectDependencies } from "../extract/typeDependencies.js";
import { entryKind, isEntry, stringField, stringListField } from "../input/fields.js";
import type { KindStrategies, UnitContext } from "./types.js";
import { levelProvider, levelSuffix, listSuffix } from "./shared.js";

function emptyFunction(): FunctionDecl {
  return { name: "", package: "", position: "", receiver: "", parameters: [], returns: [], level: 0 };
}

export const functionKind: KindStrategies<FunctionDecl> = {
  kind: "function",
  title: "Functions",
  createVisitor: (unit: UnitContext) => ({
    visitNode(node) {
      if (!isEntry(node) || entryKind(node) !== "function") return emptyFunction();
      return {
        name: stringField(node, "name"),
        package: stringField(node, "package", unit.package),
        position: stringField(node, "position", unit.file),
        receiver: stringField(node, "receiver"),
        parameters: stringListField(node, "parameters"),
        returns: stringListField(node, "returns"),
        level: 0,
      };
    },
  }),
  extractor: {
    extractDependencies: (item) =>
      collectDependencies([item.receiver, ...item.parameters, ...item.returns]),
  },
  // Methods are keyed by receiver so Start on *Server and on *Client stay apart.
  nameProvider: {
    getTypeName: (item) => (item.receiver !== "" ? `${item.receiver}.${item.name}` : item.name),
  },
  renderer: {
    renderItem(item) {
      if (item.name === "") return "";
      const head =
        item.receiver !== ""
          ? `Method: ${item.name} (Receiver: ${item.receiver}, Package: ${item.package}) at ${item.position}`
          : `Function: ${item.name} (Package: ${item.package}) at ${item.position}`;
      return (
        head +
        listSuffix("Parameters", item.parameters) +
        listSuffix("Returns", item.returns) +
        levelSuffix(item.level)
      );
    },
  },
  levels: levelProvider<FunctionDecl>(),
};
