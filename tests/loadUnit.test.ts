/**
 * Unit documents: shape validation and discovery on disk.
 */

import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "fs";
import { join } from "path";
import { tmpdir } from "os";
import { UnitFormatError } from "../src/errors.js";
import { isUnitFile, listUnitFiles, unitStem } from "../src/fs/listUnitFiles.js";
import { loadUnit, parseUnit } from "../src/input/loadUnit.js";

const SERVICE_UNIT = `file: service.go
package: service
declarations:
  - kind: interface
    name: Reader
    position: service.go:5:6
    methods: ["Read(p []byte) (int, error)"]
`;

describe("parseUnit", () => {
  it("reads YAML", () => {
    expect(parseUnit(SERVICE_UNIT, "service.yml")).toEqual({
      source: "service.yml",
      file: "service.go",
      package: "service",
      declarations: [
        {
          kind: "interface",
          name: "Reader",
          position: "service.go:5:6",
          methods: ["Read(p []byte) (int, error)"],
        },
      ],
    });
  });

  it("reads JSON; file defaults to the source and declarations to none", () => {
    expect(parseUnit('{"package": "util"}', "util.json")).toEqual({
      source: "util.json",
      file: "util.json",
      package: "util",
      declarations: [],
    });
    expect(parseUnit("package: util\ndeclarations:\n", "u.yml").declarations).toEqual([]);
  });

  it("rejects malformed documents, naming the source", () => {
    expect(() => parseUnit("- a\n- b\n", "list.yml")).toThrow("list.yml: root must be an object");
    expect(() => parseUnit("package: p\nimports: []\n", "x.yml")).toThrow('x.yml: unknown key "imports"');
    expect(() => parseUnit("file: a.go\n", "x.yml")).toThrow("x.yml: package must be a non-empty string");
    expect(() => parseUnit("package: p\nfile: 3\n", "x.yml")).toThrow("x.yml: file must be a non-empty string");
    expect(() => parseUnit("package: p\ndeclarations: {}\n", "x.yml")).toThrow(
      "x.yml: declarations must be an array",
    );
    expect(() => parseUnit("package: [p\n", "x.yml")).toThrow("x.yml: invalid YAML/JSON:");
  });

  it("errors carry the source", () => {
    let caught: unknown;
    try {
      parseUnit("42", "num.yml");
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(UnitFormatError);
    if (caught instanceof UnitFormatError) expect(caught.source).toBe("num.yml");
  });
});

describe("unit files on disk", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = mkdtempSync(join(tmpdir(), "declorder-units-"));
  });

  afterEach(() => {
    rmSync(tmpDir, { recursive: true, force: true });
  });

  it("loadUnit reads and parses", () => {
    const path = join(tmpDir, "service.decl.yml");
    writeFileSync(path, SERVICE_UNIT, "utf8");
    expect(loadUnit(path).package).toBe("service");
  });

  it("loadUnit reports unreadable files", () => {
    const path = join(tmpDir, "gone.decl.yml");
    expect(() => loadUnit(path)).toThrow(`${path}: cannot read:`);
  });

  it("listUnitFiles walks directories for unit suffixes, skipping hidden and build output", () => {
    mkdirSync(join(tmpDir, "b"));
    mkdirSync(join(tmpDir, "node_modules"));
    mkdirSync(join(tmpDir, ".cache"));
    writeFileSync(join(tmpDir, "b", "z.decl.json"), "{}", "utf8");
    writeFileSync(join(tmpDir, "a.decl.yaml"), "", "utf8");
    writeFileSync(join(tmpDir, "c.decl.yml"), "", "utf8");
    writeFileSync(join(tmpDir, "package.json"), "{}", "utf8");
    writeFileSync(join(tmpDir, "ci.yml"), "", "utf8");
    writeFileSync(join(tmpDir, "notes.txt"), "", "utf8");
    writeFileSync(join(tmpDir, ".declorder.yml"), "", "utf8");
    writeFileSync(join(tmpDir, "node_modules", "m.decl.yml"), "", "utf8");
    writeFileSync(join(tmpDir, ".cache", "h.decl.yml"), "", "utf8");

    expect(listUnitFiles([tmpDir])).toEqual([
      join(tmpDir, "a.decl.yaml"),
      join(tmpDir, "b", "z.decl.json"),
      join(tmpDir, "c.decl.yml"),
    ]);
  });

  it("listUnitFiles takes files as given and deduplicates", () => {
    const notes = join(tmpDir, "notes.txt");
    writeFileSync(notes, "", "utf8");
    expect(listUnitFiles([notes, notes])).toEqual([notes]);
  });

  it("listUnitFiles throws on a missing path", () => {
    expect(() => listUnitFiles([join(tmpDir, "nope")])).toThrow();
  });

  it("isUnitFile and unitStem", () => {
    expect(isUnitFile("a.decl.yml")).toBe(true);
    expect(isUnitFile("a.decl.json")).toBe(true);
    expect(isUnitFile("a.yml")).toBe(false);
    expect(isUnitFile("package.json")).toBe(false);
    expect(isUnitFile(".decl.yml")).toBe(false);
    expect(unitStem("service.decl.yaml")).toBe("service");
    expect(unitStem("service.yaml")).toBeNull();
  });
});
