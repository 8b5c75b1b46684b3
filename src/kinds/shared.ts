import type { LevelProvider } from "../pipeline/capabilities.js";

export function levelProvider<T extends { level: number }>(): LevelProvider<T> {
  return {
    getLevel: (item) => item.level,
    withLevel: (item, level) => ({ ...item, level }),
  };
}

/** Trailing "\n  Level: N" for renderers; level 0 is left implicit. */
export function levelSuffix(level: number): string {
  return level > 0 ? `\n  Level: ${level}` : "";
}

export function listSuffix(label: string, values: readonly string[]): string {
  return values.length > 0 ? `\n  ${label}: ${values.join(", ")}` : "";
}
