/**
 * Tree adapter for plain JavaScript values, as produced by `JSON.parse`.
 *
 * Values that JSON cannot carry follow `JSON.stringify` semantics: `undefined`
 * map entries are absent, `undefined` sequence items are null, dates become
 * ISO strings and bigints become numbers.
 */
import {
  TreeNode,
  type JsonPrimitive,
  type NodeKind,
  type TreePath,
} from './node.js';

function normalize(value: unknown): unknown {
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (typeof value === 'bigint') {
    return Number(value);
  }
  return value;
}

function isAbsent(value: unknown): boolean {
  return (
    value === undefined ||
    typeof value === 'function' ||
    typeof value === 'symbol'
  );
}

export class JsonTreeNode extends TreeNode {
  private readonly value: unknown;
  private cachedEntries?: Array<[string, TreeNode]>;

  constructor(value: unknown, path: TreePath = []) {
    super(path);
    this.value = normalize(value);
  }

  get kind(): NodeKind {
    const value = this.value;
    if (value === null || isAbsent(value)) {
      return 'null';
    }
    if (Array.isArray(value)) {
      return 'sequence';
    }
    switch (typeof value) {
      case 'string':
        return 'string';
      case 'number':
        return 'number';
      case 'boolean':
        return 'boolean';
      default:
        return 'map';
    }
  }

  protected mapEntries(): Array<[string, TreeNode]> {
    if (!this.cachedEntries) {
      const value = this.value;
      const record = typeof value === 'object' && value !== null ? value : {};
      this.cachedEntries = Object.entries(record)
        .filter(([, child]) => !isAbsent(child))
        .map(([key, child]): [string, TreeNode] => [
          key,
          new JsonTreeNode(child, [...this.path, key]),
        ]);
    }
    return this.cachedEntries;
  }

  protected sequenceItems(): TreeNode[] {
    const value = this.value;
    const items: unknown[] = Array.isArray(value) ? value : [];
    return items.map(
      (child, index) => new JsonTreeNode(child, [...this.path, index])
    );
  }

  protected scalarValue(): JsonPrimitive {
    const value = this.value;
    if (
      typeof value === 'string' ||
      typeof value === 'number' ||
      typeof value === 'boolean'
    ) {
      return value;
    }
    return null;
  }
}

/**
 * Wrap a plain JSON value as a document tree
 */
export function fromJson(value: unknown): TreeNode {
  return new JsonTreeNode(value);
}
