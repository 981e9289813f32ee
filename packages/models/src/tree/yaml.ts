/**
 * Tree adapter for the node tree of a `yaml` Document.
 * Aliases are followed transparently; map keys are read as strings.
 */
import {
  isAlias,
  isMap,
  isScalar,
  isSeq,
  type Document,
  type Pair,
} from 'yaml';
import { ShapeMismatchError } from '../description/errors.js';
import {
  TreeNode,
  type JsonPrimitive,
  type NodeKind,
  type TreePath,
} from './node.js';

function scalarKind(value: unknown): NodeKind {
  if (value === null || value === undefined) {
    return 'null';
  }
  switch (typeof value) {
    case 'number':
    case 'bigint':
      return 'number';
    case 'boolean':
      return 'boolean';
    default:
      return 'string';
  }
}

export class YamlTreeNode extends TreeNode {
  private readonly node: unknown;
  private cachedEntries?: Array<[string, TreeNode]>;

  constructor(
    private readonly doc: Document,
    node: unknown,
    path: TreePath = []
  ) {
    super(path);
    this.node = isAlias(node) ? node.resolve(doc) : node;
  }

  get kind(): NodeKind {
    const node = this.node;
    if (isMap(node)) {
      return 'map';
    }
    if (isSeq(node)) {
      return 'sequence';
    }
    if (isScalar(node)) {
      return scalarKind(node.value);
    }
    return scalarKind(node);
  }

  protected mapEntries(): Array<[string, TreeNode]> {
    if (!this.cachedEntries) {
      const node = this.node;
      const pairs: Array<Pair<unknown, unknown>> = isMap(node)
        ? node.items
        : [];
      this.cachedEntries = pairs.map((pair): [string, TreeNode] => {
        const key = this.keyOf(pair.key);
        return [
          key,
          new YamlTreeNode(this.doc, pair.value, [...this.path, key]),
        ];
      });
    }
    return this.cachedEntries;
  }

  protected sequenceItems(): TreeNode[] {
    const node = this.node;
    const items: unknown[] = isSeq(node) ? node.items : [];
    return items.map(
      (item, index) => new YamlTreeNode(this.doc, item, [...this.path, index])
    );
  }

  protected scalarValue(): JsonPrimitive {
    const node = this.node;
    const value: unknown = isScalar(node) ? node.value : node;
    switch (typeof value) {
      case 'string':
      case 'number':
      case 'boolean':
        return value;
      case 'bigint':
        return Number(value);
      case 'undefined':
        return null;
      default:
        if (value === null) {
          return null;
        }
        return value instanceof Date ? value.toISOString() : String(value);
    }
  }

  private keyOf(key: unknown): string {
    const resolved = isAlias(key) ? key.resolve(this.doc) : key;
    const value: unknown = isScalar(resolved) ? resolved.value : resolved;
    if (
      typeof value === 'string' ||
      typeof value === 'number' ||
      typeof value === 'boolean'
    ) {
      return String(value);
    }
    if (value === null || value === undefined) {
      return '';
    }
    throw new ShapeMismatchError(
      this.path,
      'string',
      isSeq(resolved) ? 'sequence' : 'map'
    );
  }
}

/**
 * Wrap a parsed `yaml` Document as a document tree
 */
export function fromYaml(doc: Document): TreeNode {
  return new YamlTreeNode(doc, doc.contents);
}
