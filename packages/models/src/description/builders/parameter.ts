import type { TreeNode } from '../../tree/node.js';
import {
  extractExtensions,
  optionalEnum,
  requireField,
  requireText,
} from '../fields.js';
import { ParameterLocationSchema } from '../schema.js';
import type { Parameter, ParameterOrReference } from '../types.js';
import { resolvePayload } from '../unions.js';
import { buildList } from './lists.js';
import { buildReusableOr } from './reusable.js';

const PARAMETER_KEYS = ['name', 'in', 'value'] as const;

export function buildParameter(node: TreeNode): Parameter {
  const location = optionalEnum(node, 'in', ParameterLocationSchema);

  return {
    kind: 'parameter',
    name: requireText(node, 'name'),
    ...(location ? { in: location } : {}),
    value: resolvePayload(requireField(node, 'value')),
    extensions: extractExtensions(node),
  };
}

export function buildParameterOrReference(
  node: TreeNode
): ParameterOrReference {
  return buildReusableOr(node, 'parameters', {
    name: 'parameter',
    keys: PARAMETER_KEYS,
    build: buildParameter,
  });
}

/**
 * Parameters of a workflow or step. Inline parameters are unique by name
 * and location.
 */
export function buildParameterList(
  map: TreeNode,
  key = 'parameters'
): ParameterOrReference[] {
  return buildList(map, key, buildParameterOrReference, {
    identify: parameter =>
      parameter.kind === 'parameter'
        ? `${parameter.name}${parameter.in ? ` in ${parameter.in}` : ''}`
        : undefined,
  });
}
