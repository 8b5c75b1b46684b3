export * from "./declarations/types.js";
export * from "./errors.js";
export {
  collectDependencies,
  extractTypeDependencies,
  isBuiltinType,
  isValidIdentifier,
} from "./extract/typeDependencies.js";
export { buildDependencyGraph } from "./graph/buildDependencyGraph.js";
export type { DependencyGraph } from "./graph/types.js";
export { AlphabeticalDependencyResolver, TopologicalDependencyResolver } from "./graph/resolvers.js";
export { parseMethodSignature, type MethodSignature } from "./stub/signature.js";
export { zeroValue, zeroValues } from "./stub/zeroValues.js";
export {
  GENERATED_HEADER,
  generateNoOp,
  implementationName,
  renderGeneratedDocument,
} from "./stub/noopGenerator.js";
export type * from "./pipeline/capabilities.js";
export * from "./pipeline/components.js";
export { AnalysisEngine } from "./pipeline/engine.js";
export { createEngine, createResolver, type EngineOptions, type SortStrategy } from "./pipeline/createEngine.js";
export { FileContentWriter } from "./pipeline/fileWriter.js";
export { KINDS, type KindRegistry, type KindStrategies, type UnitContext } from "./kinds/index.js";
export { parseUnit, loadUnit, type DeclarationUnit } from "./input/loadUnit.js";
export { isUnitFile, listUnitFiles, unitStem } from "./fs/listUnitFiles.js";
export {
  defaultConfig,
  loadDeclorderConfig,
  parseConfig,
  type DeclorderConfig,
} from "./config/declorderYaml.js";
export { buildRunConfig, type CliOverrides, type RunConfig } from "./config/runConfig.js";
export { analyzeUnit, runAnalysis, runHeader, type UnitResult } from "./run/analyzeUnits.js";
