/**
 * Reusable objects: `{ reference: $components.<kind>.<name>, value? }`.
 * The `reference` key marks a node as a reference instead of an inline object.
 */
import type { TreeNode } from '../../tree/node.js';
import { AmbiguousOrInvalidUnionError, InvalidValueError } from '../errors.js';
import { requireText } from '../fields.js';
import { resolvePayload, resolveUnion } from '../unions.js';
import type { ReferenceTargetKind, ReusableObject } from '../types.js';

export const REFERENCE_KEY = 'reference';

export interface InlineShape<T> {
  /** Shape name used in diagnostics */
  readonly name: string;
  /** Keys that belong to the inline shape and may not accompany a reference */
  readonly keys: readonly string[];
  build(node: TreeNode): T;
}

export function isReferenceNode(node: TreeNode): boolean {
  return node.isMap() && node.has(REFERENCE_KEY);
}

export function buildReusableObject(
  node: TreeNode,
  targetKind: ReferenceTargetKind
): ReusableObject {
  const reference = requireText(node, REFERENCE_KEY);
  const valueNode = node.get('value');

  if (valueNode && targetKind !== 'parameters') {
    throw new InvalidValueError(
      valueNode.path,
      'value',
      valueNode.toValue(),
      'only parameter references can override a value'
    );
  }

  return {
    kind: 'reference',
    reference,
    targetKind,
    ...(valueNode ? { value: resolvePayload(valueNode) } : {}),
  };
}

/**
 * Build either a reusable object or the inline shape it stands in for
 */
export function buildReusableOr<T>(
  node: TreeNode,
  targetKind: ReferenceTargetKind,
  inline: InlineShape<T>
): T | ReusableObject {
  return resolveUnion<T | ReusableObject>(node, [
    {
      name: 'reusable object',
      matches: isReferenceNode,
      build: referenceNode => {
        const conflicting = inline.keys.filter(
          key => key !== 'value' && referenceNode.has(key)
        );
        if (conflicting.length > 0) {
          throw new AmbiguousOrInvalidUnionError(
            referenceNode.path,
            ['reusable object', inline.name],
            `A reference cannot also define ${conflicting.join(', ')}`
          );
        }
        return buildReusableObject(referenceNode, targetKind);
      },
    },
    {
      name: inline.name,
      matches: candidate => candidate.isMap(),
      build: inlineNode => inline.build(inlineNode),
    },
  ]);
}
