/**
 * Representation-agnostic view over a loosely-typed document tree.
 *
 * Entity builders only ever talk to `TreeNode`; the JSON and YAML adapters
 * translate their concrete representation into this interface.
 */
import { ShapeMismatchError } from '../description/errors.js';

export type NodeKind =
  | 'map'
  | 'sequence'
  | 'string'
  | 'number'
  | 'boolean'
  | 'null';

/** Keys and indices from the document root to a node */
export type TreePath = ReadonlyArray<string | number>;

export type JsonPrimitive = string | number | boolean | null;
export type JsonArray = JsonValue[];
export interface JsonObject {
  [key: string]: JsonValue;
}
export type JsonValue = JsonPrimitive | JsonArray | JsonObject;

export abstract class TreeNode {
  constructor(public readonly path: TreePath) {}

  abstract get kind(): NodeKind;

  /** Map entries in document order. Only called on map nodes. */
  protected abstract mapEntries(): Array<[string, TreeNode]>;

  /** Sequence items in document order. Only called on sequence nodes. */
  protected abstract sequenceItems(): TreeNode[];

  /** Scalar value. Only called on scalar nodes. */
  protected abstract scalarValue(): JsonPrimitive;

  isMap(): boolean {
    return this.kind === 'map';
  }

  isSequence(): boolean {
    return this.kind === 'sequence';
  }

  isScalar(): boolean {
    return this.kind !== 'map' && this.kind !== 'sequence';
  }

  /**
   * Iterate map entries in document order
   * @throws {ShapeMismatchError} If this node is not a map
   */
  entries(): Array<[string, TreeNode]> {
    this.expect('map');
    return this.mapEntries();
  }

  /**
   * Look up a map entry by key
   * @throws {ShapeMismatchError} If this node is not a map
   */
  get(key: string): TreeNode | undefined {
    return this.entries().find(([entryKey]) => entryKey === key)?.[1];
  }

  has(key: string): boolean {
    return this.get(key) !== undefined;
  }

  /**
   * Iterate sequence items
   * @throws {ShapeMismatchError} If this node is not a sequence
   */
  items(): TreeNode[] {
    this.expect('sequence');
    return this.sequenceItems();
  }

  asString(): string {
    this.expect('string');
    return String(this.scalarValue());
  }

  asNumber(): number {
    this.expect('number');
    return Number(this.scalarValue());
  }

  asBoolean(): boolean {
    this.expect('boolean');
    return this.scalarValue() === true;
  }

  scalar(): JsonPrimitive {
    if (!this.isScalar()) {
      throw new ShapeMismatchError(this.path, 'string', this.kind);
    }
    return this.scalarValue();
  }

  /**
   * Copy this node, and everything below it, into plain JSON values
   */
  toValue(): JsonValue {
    switch (this.kind) {
      case 'map':
        return Object.fromEntries(
          this.mapEntries().map(([key, node]): [string, JsonValue] => [
            key,
            node.toValue(),
          ])
        );
      case 'sequence':
        return this.sequenceItems().map(node => node.toValue());
      default:
        return this.scalarValue();
    }
  }

  private expect(kind: NodeKind): void {
    if (this.kind !== kind) {
      throw new ShapeMismatchError(this.path, kind, this.kind);
    }
  }
}
