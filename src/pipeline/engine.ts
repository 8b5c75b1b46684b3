import { GenerationUnavailableError, PersistenceError } from "../errors.js";
import { renderGeneratedDocument } from "../stub/noopGenerator.js";
import type { ItemSorter } from "./capabilities.js";
import type { GenericCodeGenerator, GenericFormatter, GenericVisitor } from "./components.js";

/**
 * Kind-agnostic orchestration: visit → validate → collect, then sort and
 * render or generate on request. One engine per kind per unit.
 */
export class AnalysisEngine<T> {
  constructor(
    private readonly visitor: GenericVisitor<T>,
    private readonly sorter: ItemSorter<T>,
    private readonly formatter: GenericFormatter<T>,
    private readonly codeGenerator: GenericCodeGenerator<T> | null,
  ) {}

  analyze(nodes: Iterable<unknown>): void {
    for (const node of nodes) {
      this.visitor.visit(node);
    }
  }

  getSortedResults(): T[] {
    return this.sorter.sortItems(this.visitor.getResults());
  }

  /** `[Level i] …` per rendered item, each followed by its stub when generation is on. */
  renderResults(): string[] {
    const lines: string[] = [];
    this.getSortedResults().forEach((item, level) => {
      const formatted = this.formatter.formatItem(item);
      if (formatted === "") return;
      lines.push(`[Level ${level}] ${formatted}`);

      const stub = this.codeGenerator?.generateImplementation(item) ?? "";
      if (stub !== "") {
        lines.push("", "--- NoOp Implementation ---", stub);
      }
    });
    return lines;
  }

  /** Implementation name → stub, in sorted order. Empty without a generator. */
  generateImplementations(): Map<string, string> {
    const out = new Map<string, string>();
    const generator = this.codeGenerator;
    if (!generator) return out;
    for (const item of this.getSortedResults()) {
      const code = generator.generateImplementation(item);
      if (code !== "") out.set(generator.getImplementationName(item), code);
    }
    return out;
  }

  /** Whole generated document for the collected items. */
  generateDocument(packageName: string): string {
    if (!this.codeGenerator) throw new GenerationUnavailableError();
    return renderGeneratedDocument([...this.generateImplementations().values()], packageName);
  }

  generateCodeFile(target: string, packageName: string): void {
    this.writeImplementations(this.generateImplementations(), target, packageName);
  }

  /** Persist stubs already generated by generateImplementations. */
  writeImplementations(
    implementations: ReadonlyMap<string, string>,
    target: string,
    packageName: string,
  ): void {
    const generator = this.codeGenerator;
    if (!generator) throw new GenerationUnavailableError();
    const content = renderGeneratedDocument([...implementations.values()], packageName);
    try {
      generator.writeContent(content, target);
    } catch (err) {
      throw new PersistenceError(target, err);
    }
  }
}
