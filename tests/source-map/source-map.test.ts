import { describe, it, expect, beforeEach } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { SourceMap, SourceMapError } from "../../src/source-map/source-map.js";
import { ModulePath } from "../../src/source-map/module-path.js";
import { SourceCode } from "../../src/source-map/source-file.js";
import { branch, leaf, renderTree, walk } from "../../src/source-map/tree.js";
import { TokenKind } from "../../src/lexer/tokens.js";

function setupProject(files: Record<string, string>): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "silver-test-"));
  for (const [name, content] of Object.entries(files)) {
    const filePath = path.join(dir, name);
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, content);
  }
  return dir;
}

describe("ModulePath", () => {
  it("parses a slash-separated path", () => {
    const modulePath = ModulePath.parse("app/util/math.sv");
    expect(modulePath.name).toBe("math.sv");
    expect(modulePath.parent?.name).toBe("util");
    expect(modulePath.segments).toEqual(["app", "util", "math.sv"]);
    expect(modulePath.toString()).toBe("app/util/math.sv");
  });

  it("compares by full path", () => {
    const a = new ModulePath("math.sv", new ModulePath("app"));
    expect(a.equals(ModulePath.parse("app/math.sv"))).toBe(true);
    expect(a.equals(ModulePath.parse("lib/math.sv"))).toBe(false);
  });

  it("rejects an empty path", () => {
    expect(() => ModulePath.parse("/")).toThrow("Invalid module path '/'");
  });
});

describe("Tree", () => {
  const tree = branch("root", [leaf("a"), branch("dir", [leaf("b")]), leaf("c")]);

  it("walks in pre-order", () => {
    expect([...walk(tree)].map((node) => node.value)).toEqual(["root", "a", "dir", "b", "c"]);
  });

  it("renders with one indent per level", () => {
    expect(renderTree(tree, (v) => v)).toBe("|-root\n    |-a\n    |-dir\n        |-b\n    |-c\n");
  });
});

describe("SourceCode", () => {
  it("slices by absolute offsets", () => {
    const code = new SourceCode(10, "hello");
    expect(code.end).toBe(15);
    expect(code.slice(11, 13)).toBe("el");
    expect(code.slice(10, 15)).toBe("hello");
    expect(code.contains(14)).toBe(true);
    expect(code.contains(15)).toBe(false);
  });

  it("rejects ranges outside the file", () => {
    const code = new SourceCode(10, "hello");
    expect(() => code.slice(9, 11)).toThrow(RangeError);
    expect(() => code.slice(12, 16)).toThrow(RangeError);
    expect(() => code.slice(13, 12)).toThrow(RangeError);
  });
});

describe("SourceMap", () => {
  let dir: string;
  let root: string;

  beforeEach(() => {
    dir = setupProject({
      "main.sv": "a\n",
      "util/math.sv": "b = 1\n",
    });
    root = path.basename(dir);
  });

  it("builds the module tree without reading files", () => {
    const map = SourceMap.load(dir);
    expect(map.loaded).toEqual([]);
    expect(map.render()).toBe(`|-${root}\n    |-main.sv\n    |-util\n        |-math.sv\n`);
  });

  it("fails on a missing root", () => {
    expect(() => SourceMap.load(path.join(dir, "nope"))).toThrow(SourceMapError);
    expect(() => SourceMap.load(path.join(dir, "nope"))).toThrow("does not exist");
  });

  it("reports other filesystem errors with their cause", () => {
    const loop = path.join(dir, "loop");
    fs.symlinkSync(loop, loop);
    expect(() => SourceMap.load(loop)).toThrow(SourceMapError);
    expect(() => SourceMap.load(loop)).toThrow(/^Cannot read root path '.*loop': ELOOP/);
  });

  it("fails when the root is a file", () => {
    expect(() => SourceMap.load(path.join(dir, "main.sv"))).toThrow("is not a directory");
  });

  it("assigns offsets in load order", () => {
    const map = SourceMap.load(dir);
    const math = map.getModule(`${root}/util/math.sv`);
    const main = map.getModule(`${root}/main.sv`);

    expect(math?.offset).toBe(0);
    expect(math?.sourceCode?.end).toBe(6);
    expect(main?.offset).toBe(6);
    expect(main?.sourceCode?.end).toBe(8);
    expect(map.loaded.map((f) => f.modulePath.name)).toEqual(["math.sv", "main.sv"]);
  });

  it("caches loaded modules", () => {
    const map = SourceMap.load(dir);
    const first = map.getModule(`${root}/main.sv`);
    const second = map.getModule(ModulePath.parse(`${root}/main.sv`));
    expect(second).toBe(first);
    expect(map.loaded).toHaveLength(1);
  });

  it("loads directories without source code", () => {
    const map = SourceMap.load(dir);
    const util = map.getModule(`${root}/util`);
    expect(util?.sourceCode).toBeUndefined();
    expect(util?.offset).toBeUndefined();
    expect(map.getModule(`${root}/util/math.sv`)?.offset).toBe(0);
  });

  it("returns undefined for unknown modules", () => {
    const map = SourceMap.load(dir);
    expect(map.getModule(`${root}/missing.sv`)).toBeUndefined();
  });

  it("finds the file containing an offset", () => {
    const map = SourceMap.load(dir);
    map.getModule(`${root}/util/math.sv`);
    map.getModule(`${root}/main.sv`);
    expect(map.getFileWithPos(2)?.modulePath.name).toBe("math.sv");
    expect(map.getFileWithPos(7)?.modulePath.name).toBe("main.sv");
    expect(map.getFileWithPos(8)).toBeUndefined();
  });

  it("derives stable ids from module paths", () => {
    const id = SourceMap.fileId(ModulePath.parse("app/main.sv"));
    expect(id).toMatch(/^[0-9a-f]{16}$/);
    expect(SourceMap.fileId(ModulePath.parse("app/main.sv"))).toBe(id);
    expect(SourceMap.fileId(ModulePath.parse("lib/main.sv"))).not.toBe(id);
  });

  it("lexes a module at its base offset", () => {
    const map = SourceMap.load(dir);
    map.getModule(`${root}/util/math.sv`);
    const { file, tokens, errors } = map.lexModule(`${root}/main.sv`);

    expect(errors).toEqual([]);
    expect(file.offset).toBe(6);
    expect(tokens.map((t) => [t.kind, t.span.start, t.span.end])).toEqual([
      [TokenKind.Identifier, 6, 7],
      [TokenKind.NewLine, 7, 8],
    ]);
    expect(file.sourceCode?.slice(6, 7)).toBe("a");
  });

  it("refuses to lex directories and unknown modules", () => {
    const map = SourceMap.load(dir);
    expect(() => map.lexModule(`${root}/util`)).toThrow("is a directory");
    expect(() => map.lexModule(`${root}/missing.sv`)).toThrow("not found");
  });
});
