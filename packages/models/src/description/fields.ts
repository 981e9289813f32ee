/**
 * Helpers to pull typed fields and vendor extensions out of map nodes.
 * Unknown keys without the extension prefix are ignored.
 */
import type { z } from 'zod';
import type { JsonValue, NodeKind, TreeNode } from '../tree/node.js';
import {
  DuplicateIdentifierError,
  InvalidValueError,
  MissingFieldError,
  ShapeMismatchError,
  TypeMismatchError,
} from './errors.js';
import { ComponentKeySchema, EXTENSION_PREFIX } from './schema.js';
import type { ExtensionKey, Extensions, Outputs } from './types.js';

export function isExtensionKey(key: string): key is ExtensionKey {
  return key.startsWith(EXTENSION_PREFIX);
}

export function requireField(map: TreeNode, key: string): TreeNode {
  const node = map.get(key);
  if (!node) {
    throw new MissingFieldError([...map.path, key], key);
  }
  return node;
}

function expectKind(node: TreeNode, key: string, kind: NodeKind): TreeNode {
  if (node.kind !== kind) {
    throw new TypeMismatchError(node.path, key, kind, node.kind);
  }
  return node;
}

/**
 * @throws {ShapeMismatchError} If the node is not a map
 */
export function expectMap(node: TreeNode): TreeNode {
  if (!node.isMap()) {
    throw new ShapeMismatchError(node.path, 'map', node.kind);
  }
  return node;
}

export function requireString(map: TreeNode, key: string): string {
  return expectKind(requireField(map, key), key, 'string').asString();
}

/**
 * Required string that must also be non-empty
 */
export function requireText(map: TreeNode, key: string): string {
  const value = requireString(map, key);
  if (value.length === 0) {
    throw new InvalidValueError(
      [...map.path, key],
      key,
      value,
      'must not be empty'
    );
  }
  return value;
}

export function optionalString(map: TreeNode, key: string): string | undefined {
  const node = map.get(key);
  return node ? expectKind(node, key, 'string').asString() : undefined;
}

export function optionalNumber(map: TreeNode, key: string): number | undefined {
  const node = map.get(key);
  return node ? expectKind(node, key, 'number').asNumber() : undefined;
}

/**
 * Optional map-valued field. Returns the map node itself.
 */
export function optionalMap(map: TreeNode, key: string): TreeNode | undefined {
  const node = map.get(key);
  return node ? expectKind(node, key, 'map') : undefined;
}

export function requireMap(map: TreeNode, key: string): TreeNode {
  return expectKind(requireField(map, key), key, 'map');
}

/**
 * Optional sequence-valued field. Absent fields yield an empty list.
 */
export function optionalSequence(map: TreeNode, key: string): TreeNode[] {
  const node = map.get(key);
  return node ? expectKind(node, key, 'sequence').items() : [];
}

export function optionalStringList(map: TreeNode, key: string): string[] {
  return optionalSequence(map, key).map(item =>
    expectKind(item, key, 'string').asString()
  );
}

/**
 * Check a value against a Zod schema, reporting failures as InvalidValue
 */
export function checkValue<T>(
  schema: z.ZodType<T>,
  value: unknown,
  node: TreeNode,
  key: string,
  reason: string
): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new InvalidValueError(node.path, key, value, reason);
  }
  return result.data;
}

/**
 * Optional string field restricted to the members of a Zod enum
 */
export function optionalEnum<T extends string>(
  map: TreeNode,
  key: string,
  schema: z.ZodType<T> & { options: readonly T[] }
): T | undefined {
  const node = map.get(key);
  if (!node) {
    return undefined;
  }
  const value = expectKind(node, key, 'string').asString();
  return checkValue(
    schema,
    value,
    node,
    key,
    `must be one of ${schema.options.join(', ')}`
  );
}

export function requireEnum<T extends string>(
  map: TreeNode,
  key: string,
  schema: z.ZodType<T> & { options: readonly T[] }
): T {
  const value = optionalEnum(map, key, schema);
  if (value === undefined) {
    throw new MissingFieldError([...map.path, key], key);
  }
  return value;
}

/**
 * Entries of a map whose keys must be unique, valid component or output names
 */
export function namedEntries(map: TreeNode): Array<[string, TreeNode]> {
  const seen = new Set<string>();
  return map.entries().map(([name, node]): [string, TreeNode] => {
    if (seen.has(name)) {
      throw new DuplicateIdentifierError(node.path, name);
    }
    seen.add(name);
    checkValue(
      ComponentKeySchema,
      name,
      node,
      name,
      'names may only contain letters, digits, ".", "-" and "_"'
    );
    return [name, node];
  });
}

/**
 * Output name to runtime expression mapping
 */
export function optionalOutputs(map: TreeNode, key: string): Outputs {
  const outputs = optionalMap(map, key);
  if (!outputs) {
    return {};
  }
  return Object.fromEntries(
    namedEntries(outputs).map(([name, node]): [string, string] => [
      name,
      expectKind(node, name, 'string').asString(),
    ])
  );
}

/**
 * Collect every `x-` entry in document order
 */
export function extractExtensions(map: TreeNode): Extensions {
  const extensions: Record<ExtensionKey, JsonValue> = {};
  for (const [key, node] of map.entries()) {
    if (isExtensionKey(key)) {
      extensions[key] = node.toValue();
    }
  }
  return extensions;
}
