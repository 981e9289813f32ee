import type { TreeNode } from '../../tree/node.js';
import {
  extractExtensions,
  optionalMap,
  optionalOutputs,
  optionalString,
  requireText,
} from '../fields.js';
import type { OperationReference, Step } from '../types.js';
import { requireExclusiveKey } from '../unions.js';
import { buildFailureActionList, buildSuccessActionList } from './action.js';
import { buildCriteria } from './criterion.js';
import { buildParameterList } from './parameter.js';
import { buildRequestBody } from './request-body.js';

const OPERATION_KEYS = ['operationId', 'operationPath', 'workflowId'] as const;

/**
 * Exactly one of operationId, operationPath or workflowId
 */
function buildOperationReference(node: TreeNode): OperationReference {
  const key = requireExclusiveKey(node, OPERATION_KEYS);
  const value = requireText(node, key);

  switch (key) {
    case 'operationId':
      return { kind: key, operationId: value };
    case 'operationPath':
      return { kind: key, operationPath: value };
    case 'workflowId':
      return { kind: key, workflowId: value };
  }
}

export function buildStep(node: TreeNode): Step {
  const stepId = requireText(node, 'stepId');
  const description = optionalString(node, 'description');
  const operation = buildOperationReference(node);
  const parameters = buildParameterList(node);
  const requestBodyNode = optionalMap(node, 'requestBody');

  return {
    stepId,
    ...(description !== undefined ? { description } : {}),
    operation,
    parameters,
    ...(requestBodyNode
      ? { requestBody: buildRequestBody(requestBodyNode) }
      : {}),
    successCriteria: buildCriteria(node, 'successCriteria'),
    onSuccess: buildSuccessActionList(node, 'onSuccess'),
    onFailure: buildFailureActionList(node, 'onFailure'),
    outputs: optionalOutputs(node, 'outputs'),
    extensions: extractExtensions(node),
  };
}
