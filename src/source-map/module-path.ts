import * as path from "path";

/** A module's name plus the chain of directories above it, relative to the project root. */
export class ModulePath {
  constructor(
    readonly name: string,
    readonly parent?: ModulePath,
  ) {}

  static fromFsPath(fsPath: string, parent?: ModulePath): ModulePath {
    return new ModulePath(path.basename(fsPath), parent);
  }

  /** Parses a `/`-separated path such as `app/util/math.sv`. */
  static parse(modulePath: string): ModulePath {
    const [first, ...rest] = modulePath.split("/").filter((s) => s.length > 0);
    if (first === undefined) {
      throw new Error(`Invalid module path '${modulePath}'`);
    }
    return rest.reduce((parent, segment) => new ModulePath(segment, parent), new ModulePath(first));
  }

  get segments(): string[] {
    return this.parent ? [...this.parent.segments, this.name] : [this.name];
  }

  equals(other: ModulePath): boolean {
    return this.toString() === other.toString();
  }

  toString(): string {
    return this.segments.join("/");
  }
}
