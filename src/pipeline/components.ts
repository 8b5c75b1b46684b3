import type {
  CodeGenerator,
  ContentWriter,
  DependencyResolver,
  ImplementationNamer,
  ItemRenderer,
  ItemSorter,
  ItemValidator,
  NodeVisitor,
  ResultCollector,
  TypeNameProvider,
} from "./capabilities.js";

export class ArrayResultCollector<T> implements ResultCollector<T> {
  private readonly results: T[] = [];

  collectResults(): T[] {
    return [...this.results];
  }

  addResult(item: T): void {
    this.results.push(item);
  }
}

/** Valid when the item has a non-empty key. */
export class NamedItemValidator<T> implements ItemValidator<T> {
  constructor(private readonly nameProvider: TypeNameProvider<T>) {}

  isValid(item: T): boolean {
    return this.nameProvider.getTypeName(item) !== "";
  }
}

export class GenericVisitor<T> {
  constructor(
    private readonly nodeVisitor: NodeVisitor<T>,
    private readonly collector: ResultCollector<T>,
    private readonly validator: ItemValidator<T>,
  ) {}

  visit(node: unknown): T {
    const result = this.nodeVisitor.visitNode(node);
    if (this.validator.isValid(result)) this.collector.addResult(result);
    return result;
  }

  getResults(): T[] {
    return this.collector.collectResults();
  }
}

export class DependencySorter<T> implements ItemSorter<T> {
  constructor(private readonly resolver: DependencyResolver<T>) {}

  sortItems(items: readonly T[]): T[] {
    return this.resolver.resolveDependencies(items);
  }
}

export class GenericFormatter<T> {
  constructor(private readonly renderer: ItemRenderer<T>) {}

  formatItem(item: T): string {
    return this.renderer.renderItem(item);
  }
}

export class GenericCodeGenerator<T> {
  constructor(
    private readonly generator: CodeGenerator<T>,
    private readonly namer: ImplementationNamer<T>,
    private readonly writer: ContentWriter,
  ) {}

  generateImplementation(item: T): string {
    return this.generator.generateCode(item);
  }

  getImplementationName(item: T): string {
    return this.namer.getImplementationName(item);
  }

  writeContent(content: string, target: string): void {
    this.writer.writeContent(content, target);
  }
}
