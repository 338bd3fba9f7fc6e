import { createHash } from "node:crypto";
import * as fs from "fs";
import * as path from "path";
import { Lexer, type LexOutput } from "../lexer/lexer.js";
import type { LexerRule } from "../lexer/rules.js";
import { ModulePath } from "./module-path.js";
import { SourceFile, type DeferredSourceFile } from "./source-file.js";
import { branch, leaf, renderTree, walk, type Tree } from "./tree.js";

/** Truncated SHA-256 of a module's project-relative path. */
export type SourceFileId = string;

export class SourceMapError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SourceMapError";
  }
}

export interface ModuleLexOutput extends LexOutput {
  file: SourceFile;
}

/**
 * The project's files as a tree of deferred entries. A file is read the first
 * time it is requested and is then placed after every file loaded before it,
 * so spans from different files never overlap.
 */
export class SourceMap {
  private readonly files = new Map<SourceFileId, SourceFile>();
  private nextOffset: number = 0;

  private constructor(
    readonly root: string,
    readonly tree: Tree<DeferredSourceFile>,
  ) {}

  static load(rootDir: string): SourceMap {
    const root = path.resolve(rootDir);
    return new SourceMap(root, SourceMap.loadTree(root));
  }

  static fileId(modulePath: ModulePath): SourceFileId {
    return createHash("sha256").update(modulePath.toString()).digest("hex").slice(0, 16);
  }

  private static loadTree(dir: string, parent?: ModulePath): Tree<DeferredSourceFile> {
    let stat: fs.Stats;
    try {
      stat = fs.statSync(dir);
    } catch (e) {
      if (e instanceof Error && "code" in e && e.code === "ENOENT") {
        throw new SourceMapError(`Root path '${dir}' does not exist`);
      }
      throw new SourceMapError(`Cannot read root path '${dir}': ${e instanceof Error ? e.message : String(e)}`);
    }
    if (!stat.isDirectory()) {
      throw new SourceMapError(`Root path '${dir}' is not a directory`);
    }

    const modulePath = ModulePath.fromFsPath(dir, parent);
    const entries = fs.readdirSync(dir, { withFileTypes: true }).sort((a, b) => a.name.localeCompare(b.name));
    const children = entries.map((entry) => {
      const fsPath = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        return SourceMap.loadTree(fsPath, modulePath);
      }
      return leaf<DeferredSourceFile>({
        modulePath: ModulePath.fromFsPath(fsPath, modulePath),
        fsPath,
        isDirectory: false,
      });
    });

    return branch({ modulePath, fsPath: dir, isDirectory: true }, children);
  }

  /** Files loaded so far, in load order. */
  get loaded(): SourceFile[] {
    return [...this.files.values()];
  }

  getModule(modulePath: ModulePath | string): SourceFile | undefined {
    const wanted = typeof modulePath === "string" ? ModulePath.parse(modulePath) : modulePath;
    const id = SourceMap.fileId(wanted);

    const cached = this.files.get(id);
    if (cached) return cached;

    for (const node of walk(this.tree)) {
      if (!node.value.modulePath.equals(wanted)) continue;

      const file = SourceFile.load(node.value, this.nextOffset);
      if (file.sourceCode) {
        this.nextOffset = file.sourceCode.end;
      }
      this.files.set(id, file);
      return file;
    }
    return undefined;
  }

  getFileWithPos(pos: number): SourceFile | undefined {
    for (const file of this.files.values()) {
      if (file.contains(pos)) return file;
    }
    return undefined;
  }

  /** Loads a module if needed and lexes it at its project-wide offset. */
  lexModule(modulePath: ModulePath | string, rules?: readonly LexerRule[]): ModuleLexOutput {
    const file = this.getModule(modulePath);
    if (!file) {
      throw new SourceMapError(`Module '${modulePath.toString()}' not found`);
    }
    if (!file.sourceCode) {
      throw new SourceMapError(`Module '${file.modulePath.toString()}' is a directory`);
    }

    const lexer = new Lexer(file.sourceCode.content, {
      filename: file.modulePath.toString(),
      baseOffset: file.sourceCode.start,
      rules,
    });
    return { file, ...lexer.tokenize() };
  }

  render(): string {
    return renderTree(this.tree, (entry) => entry.modulePath.name);
  }
}
