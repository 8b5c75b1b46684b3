import { mkdirSync, writeFileSync } from "fs";
import { dirname } from "path";
import type { ContentWriter } from "./capabilities.js";

/** Writes to the file system, creating parent directories. Errors propagate. */
export class FileContentWriter implements ContentWriter {
  writeContent(content: string, target: string): void {
    mkdirSync(dirname(target), { recursive: true });
    writeFileSync(target, content, "utf8");
  }
}
