import { parseMethodSignature } from "../src/stub/signature.js";
import { zeroValue, zeroValues } from "../src/stub/zeroValues.js";

describe("parseMethodSignature", () => {
  it("splits name, params and returns", () => {
    expect(parseMethodSignature("Write(p []byte) (n int, err error)")).toEqual({
      name: "Write",
      params: "p []byte",
      returns: "(n int, err error)",
    });
    expect(parseMethodSignature("Close() error")).toEqual({ name: "Close", params: "", returns: "error" });
    expect(parseMethodSignature("Reset()")).toEqual({ name: "Reset", params: "", returns: "" });
  });

  it("balances nested parens in the parameter list", () => {
    expect(parseMethodSignature("Do(fn func(int) error) (Result, error)")).toEqual({
      name: "Do",
      params: "fn func(int) error",
      returns: "(Result, error)",
    });
  });

  it("rejects embedded types, unnamed and unbalanced signatures", () => {
    expect(parseMethodSignature("io.Reader")).toBeNull();
    expect(parseMethodSignature("(x int)")).toBeNull();
    expect(parseMethodSignature("Broken(a int")).toBeNull();
  });
});

describe("zeroValue", () => {
  it("builtins", () => {
    expect(zeroValue("int")).toBe("0");
    expect(zeroValue("uint8")).toBe("0");
    expect(zeroValue("float64")).toBe("0.0");
    expect(zeroValue("complex128")).toBe("0+0i");
    expect(zeroValue("bool")).toBe("false");
    expect(zeroValue("string")).toBe('""');
    expect(zeroValue("error")).toBe("nil");
    expect(zeroValue("any")).toBe("nil");
  });

  it("reference-like types are nil", () => {
    expect(zeroValue("*Widget")).toBe("nil");
    expect(zeroValue("[]byte")).toBe("nil");
    expect(zeroValue("map[string]int")).toBe("nil");
    expect(zeroValue("chan int")).toBe("nil");
    expect(zeroValue("<-chan int")).toBe("nil");
    expect(zeroValue("func() error")).toBe("nil");
    expect(zeroValue("interface{}")).toBe("nil");
    expect(zeroValue("io.Reader")).toBe("nil");
  });

  it("other names get a composite literal", () => {
    expect(zeroValue("Widget")).toBe("Widget{}");
    expect(zeroValue(" Exchange ")).toBe("Exchange{}");
  });
});

describe("zeroValues", () => {
  it("one value per result, in order", () => {
    expect(zeroValues("(int, error)")).toBe("0, nil");
    expect(zeroValues("(Result, error)")).toBe("Result{}, nil");
    expect(zeroValues("error")).toBe("nil");
    expect(zeroValues("")).toBe("");
  });

  it("drops result names", () => {
    expect(zeroValues("(n int, err error)")).toBe("0, nil");
    expect(zeroValues("(w *Widget, ok bool)")).toBe("nil, false");
  });

  it("does not split inside brackets", () => {
    expect(zeroValues("(map[string]int, error)")).toBe("nil, nil");
    expect(zeroValues("func(int, string) error")).toBe("nil");
  });

  it("keeps type keywords that look like a result name", () => {
    expect(zeroValues("chan int")).toBe("nil");
  });
});
