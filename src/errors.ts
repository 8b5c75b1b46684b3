/**
 * Boundary failures. The analysis core itself never throws; only loading
 * input, reading config and persisting generated output can.
 */

function causeMessage(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

/** Invalid .declorder.yml. CLI exits 2. */
export class ConfigError extends Error {
  override name = "ConfigError";
}

/** A declaration unit document that is not valid YAML/JSON or has the wrong shape. */
export class UnitFormatError extends Error {
  override name = "UnitFormatError";

  constructor(
    readonly source: string,
    detail: string,
  ) {
    super(`${source}: ${detail}`);
  }
}

/** Generated content could not be stored at `target`. Not retried. */
export class PersistenceError extends Error {
  override name = "PersistenceError";

  constructor(
    readonly target: string,
    cause: unknown,
  ) {
    super(`failed to write ${target}: ${causeMessage(cause)}`, { cause });
  }
}

/** Code generation requested from an engine built without a generator. */
export class GenerationUnavailableError extends Error {
  override name = "GenerationUnavailableError";

  constructor() {
    super("code generator not available");
  }
}
