import { constantKind } from "./constant.js";
import { functionKind } from "./function.js";
import { importKind } from "./import.js";
import { interfaceKind } from "./interface.js";
import { structKind } from "./struct.js";
import type { KindRegistry } from "./types.js";
import { variableKind } from "./variable.js";

export const KINDS: KindRegistry = {
  struct: structKind,
  interface: interfaceKind,
  function: functionKind,
  variable: variableKind,
  constant: constantKind,
  import: importKind,
};

export type { KindRegistry, KindStrategies, UnitContext } from "./types.js";
