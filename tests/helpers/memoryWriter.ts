import type { ContentWriter } from "../../src/pipeline/capabilities.js";

export class MemoryContentWriter implements ContentWriter {
  readonly files = new Map<string, string>();

  writeContent(content: string, target: string): void {
    this.files.set(target, content);
  }
}

export class FailingContentWriter implements ContentWriter {
  constructor(private readonly cause: Error = new Error("disk full")) {}

  writeContent(): void {
    throw this.cause;
  }
}
