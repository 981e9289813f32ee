/**
 * Success and failure actions attached to steps, workflows and components.
 */
import type { TreeNode } from '../../tree/node.js';
import { InvalidValueError, MissingFieldError } from '../errors.js';
import {
  checkValue,
  extractExtensions,
  optionalNumber,
  requireEnum,
  requireText,
} from '../fields.js';
import {
  FailureActionTypeSchema,
  RetryAfterSchema,
  RetryLimitSchema,
  SuccessActionTypeSchema,
} from '../schema.js';
import type {
  ActionTarget,
  FailureAction,
  FailureActionOrReference,
  SuccessAction,
  SuccessActionOrReference,
} from '../types.js';
import { optionalExclusiveKey, requireExclusiveKey } from '../unions.js';
import { buildCriteria } from './criterion.js';
import { buildList } from './lists.js';
import { buildReusableOr } from './reusable.js';

const TARGET_KEYS = ['workflowId', 'stepId'] as const;
const RETRY_KEYS = ['retryAfter', 'retryLimit'] as const;

const SUCCESS_ACTION_KEYS = ['name', 'type', ...TARGET_KEYS, 'criteria'];
const FAILURE_ACTION_KEYS = [...SUCCESS_ACTION_KEYS, ...RETRY_KEYS];

function targetFrom(
  node: TreeNode,
  key: (typeof TARGET_KEYS)[number]
): ActionTarget {
  const id = requireText(node, key);
  return key === 'stepId'
    ? { kind: 'step', stepId: id }
    : { kind: 'workflow', workflowId: id };
}

function rejectKeys(node: TreeNode, keys: readonly string[], reason: string) {
  for (const key of keys) {
    const field = node.get(key);
    if (field) {
      throw new InvalidValueError(field.path, key, field.toValue(), reason);
    }
  }
}

export function buildSuccessAction(node: TreeNode): SuccessAction {
  const name = requireText(node, 'name');
  const type = requireEnum(node, 'type', SuccessActionTypeSchema);
  const base = {
    kind: 'successAction' as const,
    name,
    criteria: buildCriteria(node, 'criteria'),
    extensions: extractExtensions(node),
  };

  rejectKeys(node, RETRY_KEYS, 'only allowed when type is retry');

  if (type === 'goto') {
    return {
      ...base,
      type,
      target: targetFrom(node, requireExclusiveKey(node, TARGET_KEYS)),
    };
  }

  rejectKeys(node, TARGET_KEYS, 'only allowed when type is goto');
  return { ...base, type };
}

function retryField(
  node: TreeNode,
  key: (typeof RETRY_KEYS)[number]
): number {
  const value = optionalNumber(node, key);
  const field = node.get(key);
  if (value === undefined || !field) {
    throw new MissingFieldError([...node.path, key], key);
  }
  return key === 'retryAfter'
    ? checkValue(RetryAfterSchema, value, field, key, 'must not be negative')
    : checkValue(
        RetryLimitSchema,
        value,
        field,
        key,
        'must be a non-negative integer'
      );
}

export function buildFailureAction(node: TreeNode): FailureAction {
  const name = requireText(node, 'name');
  const type = requireEnum(node, 'type', FailureActionTypeSchema);
  const base = {
    kind: 'failureAction' as const,
    name,
    criteria: buildCriteria(node, 'criteria'),
    extensions: extractExtensions(node),
  };

  switch (type) {
    case 'goto':
      rejectKeys(node, RETRY_KEYS, 'only allowed when type is retry');
      return {
        ...base,
        type,
        target: targetFrom(node, requireExclusiveKey(node, TARGET_KEYS)),
      };
    case 'retry': {
      const targetKey = optionalExclusiveKey(node, TARGET_KEYS);
      return {
        ...base,
        type,
        retryAfter: retryField(node, 'retryAfter'),
        retryLimit: retryField(node, 'retryLimit'),
        ...(targetKey ? { target: targetFrom(node, targetKey) } : {}),
      };
    }
    case 'end':
      rejectKeys(node, RETRY_KEYS, 'only allowed when type is retry');
      rejectKeys(node, TARGET_KEYS, 'only allowed when type is goto or retry');
      return { ...base, type };
  }
}

export function buildSuccessActionList(
  map: TreeNode,
  key: string
): SuccessActionOrReference[] {
  return buildList(map, key, node =>
    buildReusableOr(node, 'successActions', {
      name: 'success action',
      keys: SUCCESS_ACTION_KEYS,
      build: buildSuccessAction,
    })
  );
}

export function buildFailureActionList(
  map: TreeNode,
  key: string
): FailureActionOrReference[] {
  return buildList(map, key, node =>
    buildReusableOr(node, 'failureActions', {
      name: 'failure action',
      keys: FAILURE_ACTION_KEYS,
      build: buildFailureAction,
    })
  );
}
