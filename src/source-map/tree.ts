export type Tree<T> =
  | { kind: "Leaf"; value: T }
  | { kind: "Branch"; value: T; children: Tree<T>[] };

export function leaf<T>(value: T): Tree<T> {
  return { kind: "Leaf", value };
}

export function branch<T>(value: T, children: Tree<T>[]): Tree<T> {
  return { kind: "Branch", value, children };
}

/** Pre-order walk: a branch comes before its children, children in order. */
export function* walk<T>(tree: Tree<T>): Generator<Tree<T>> {
  yield tree;
  if (tree.kind === "Branch") {
    for (const child of tree.children) {
      yield* walk(child);
    }
  }
}

export function renderTree<T>(tree: Tree<T>, label: (value: T) => string, level: number = 0): string {
  let output = `${"    ".repeat(level)}|-${label(tree.value)}\n`;
  if (tree.kind === "Branch") {
    for (const child of tree.children) {
      output += renderTree(child, label, level + 1);
    }
  }
  return output;
}
