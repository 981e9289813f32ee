/**
 * Resolution of fields that admit one of several shapes.
 *
 * Candidates are tried in the order given; the first whose shape matches
 * builds the value. Payload-like fields use a fixed order: structured
 * fragment, then runtime expression, then literal scalar.
 */
import type { TreeNode } from '../tree/node.js';
import { AmbiguousOrInvalidUnionError } from './errors.js';
import { RuntimeExpressionSchema } from './schema.js';
import type { Payload } from './types.js';

export interface UnionCandidate<T> {
  /** Human readable shape name, used in diagnostics */
  readonly name: string;
  matches(node: TreeNode): boolean;
  build(node: TreeNode): T;
}

export function resolveUnion<T>(
  node: TreeNode,
  candidates: ReadonlyArray<UnionCandidate<T>>
): T {
  const candidate = candidates.find(c => c.matches(node));
  if (!candidate) {
    throw new AmbiguousOrInvalidUnionError(
      node.path,
      candidates.map(c => c.name),
      `No shape matches this ${node.kind}`
    );
  }
  return candidate.build(node);
}

/**
 * Whether a string has the textual shape of a runtime expression
 */
export function isRuntimeExpression(value: string): boolean {
  return RuntimeExpressionSchema.safeParse(value).success;
}

const PAYLOAD_CANDIDATES: ReadonlyArray<UnionCandidate<Payload>> = [
  {
    name: 'structured',
    matches: node => node.isMap() || node.isSequence(),
    build: node => {
      const value = node.toValue();
      if (value === null || typeof value !== 'object') {
        throw new AmbiguousOrInvalidUnionError(
          node.path,
          ['structured'],
          'Structured payload must be a map or a sequence'
        );
      }
      return { kind: 'structured', value };
    },
  },
  {
    name: 'expression',
    matches: node =>
      node.kind === 'string' && isRuntimeExpression(node.asString()),
    build: node => ({ kind: 'expression', expression: node.asString() }),
  },
  {
    name: 'scalar',
    matches: node => node.isScalar(),
    build: node => ({ kind: 'scalar', value: node.scalar() }),
  },
];

export function resolvePayload(node: TreeNode): Payload {
  return resolveUnion(node, PAYLOAD_CANDIDATES);
}

/**
 * The single key of a mutually exclusive group that is present, if any
 * @throws {AmbiguousOrInvalidUnionError} If more than one key is present
 */
export function optionalExclusiveKey<K extends string>(
  map: TreeNode,
  keys: readonly K[]
): K | undefined {
  const present = keys.filter(key => map.has(key));
  if (present.length > 1) {
    throw new AmbiguousOrInvalidUnionError(
      map.path,
      present,
      `Fields ${present.join(', ')} are mutually exclusive`
    );
  }
  return present.length === 1 ? present[0] : undefined;
}

/**
 * @throws {AmbiguousOrInvalidUnionError} Unless exactly one key is present
 */
export function requireExclusiveKey<K extends string>(
  map: TreeNode,
  keys: readonly K[]
): K {
  const key = optionalExclusiveKey(map, keys);
  if (key === undefined) {
    throw new AmbiguousOrInvalidUnionError(
      map.path,
      keys,
      `Exactly one of ${keys.join(', ')} is required`
    );
  }
  return key;
}
