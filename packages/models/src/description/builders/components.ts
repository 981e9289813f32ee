/**
 * The components section: named inputs, parameters and actions that
 * reusable objects point at.
 */
import type { JsonValue, TreeNode } from '../../tree/node.js';
import {
  expectMap,
  extractExtensions,
  namedEntries,
  optionalMap,
} from '../fields.js';
import type { Components } from '../types.js';
import { buildFailureAction, buildSuccessAction } from './action.js';
import { buildParameter } from './parameter.js';

function buildNamed<T>(
  node: TreeNode,
  key: string,
  build: (entry: TreeNode) => T
): Record<string, T> {
  const map = optionalMap(node, key);
  if (!map) {
    return {};
  }
  return Object.fromEntries(
    namedEntries(map).map(([name, entry]): [string, T] => [
      name,
      build(entry),
    ])
  );
}

export function buildComponents(node: TreeNode): Components {
  return {
    inputs: buildNamed<JsonValue>(node, 'inputs', entry =>
      expectMap(entry).toValue()
    ),
    parameters: buildNamed(node, 'parameters', entry =>
      buildParameter(expectMap(entry))
    ),
    successActions: buildNamed(node, 'successActions', entry =>
      buildSuccessAction(expectMap(entry))
    ),
    failureActions: buildNamed(node, 'failureActions', entry =>
      buildFailureAction(expectMap(entry))
    ),
    extensions: extractExtensions(node),
  };
}
