import {
  collectDependencies,
  extractTypeDependencies,
  isBuiltinType,
  isValidIdentifier,
} from "../src/extract/typeDependencies.js";

describe("extractTypeDependencies", () => {
  it("strips pointer, slice and map markers", () => {
    expect(extractTypeDependencies("*[]map[string]UserService")).toEqual(["UserService"]);
  });

  it("builtins yield nothing", () => {
    expect(extractTypeDependencies("int")).toEqual([]);
    expect(extractTypeDependencies("map[string]error")).toEqual([]);
  });

  it("keeps the segment after a package qualifier", () => {
    expect(extractTypeDependencies("pkg.Reader")).toEqual(["Reader"]);
  });

  it("empty fragment yields nothing", () => {
    expect(extractTypeDependencies("")).toEqual([]);
  });

  it("field names are taken along with field types", () => {
    expect(extractTypeDependencies("Handler *services.UserHandler")).toEqual([
      "Handler",
      "UserHandler",
    ]);
  });

  it("function signatures: params and results, builtins dropped", () => {
    expect(extractTypeDependencies("func(ctx Context) (Result, error)")).toEqual([
      "ctx",
      "Context",
      "Result",
    ]);
  });

  it("channel direction and keyword are noise", () => {
    expect(extractTypeDependencies("<-chan Event")).toEqual(["Event"]);
  });

  it("map keys and values both count", () => {
    expect(extractTypeDependencies("map[Key]*Value")).toEqual(["Key", "Value"]);
  });

  it("deduplicates", () => {
    expect(extractTypeDependencies("(Node, Node, *Node)")).toEqual(["Node"]);
  });

  it("malformed input under-extracts instead of failing", () => {
    expect(extractTypeDependencies("a.b.c")).toEqual([]);
    expect(extractTypeDependencies("123abc")).toEqual([]);
    expect(extractTypeDependencies("pkg.")).toEqual([]);
    expect(extractTypeDependencies(")))((,,")).toEqual([]);
  });
});

describe("collectDependencies", () => {
  it("unions fragments and excludes the given self name", () => {
    expect(collectDependencies(["Left *Tree", "Payload Item", "Right *Tree"], "Tree")).toEqual([
      "Left",
      "Payload",
      "Item",
      "Right",
    ]);
  });

  it("without exclusion keeps every name", () => {
    expect(collectDependencies(["*Server", "Server"])).toEqual(["Server"]);
  });
});

describe("identifier helpers", () => {
  it("isBuiltinType", () => {
    expect(isBuiltinType("uintptr")).toBe(true);
    expect(isBuiltinType("any")).toBe(true);
    expect(isBuiltinType("Widget")).toBe(false);
  });

  it("isValidIdentifier", () => {
    expect(isValidIdentifier("_private")).toBe(true);
    expect(isValidIdentifier("Name2")).toBe(true);
    expect(isValidIdentifier("2Name")).toBe(false);
    expect(isValidIdentifier("a-b")).toBe(false);
    expect(isValidIdentifier("")).toBe(false);
  });
});
