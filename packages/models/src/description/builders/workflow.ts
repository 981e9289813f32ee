import type { TreeNode } from '../../tree/node.js';
import { logDebug } from '../../log.js';
import {
  extractExtensions,
  optionalMap,
  optionalOutputs,
  optionalString,
  optionalStringList,
  requireText,
} from '../fields.js';
import type { Workflow } from '../types.js';
import { buildFailureActionList, buildSuccessActionList } from './action.js';
import { buildList } from './lists.js';
import { buildParameterList } from './parameter.js';
import { buildStep } from './step.js';

export function buildWorkflow(node: TreeNode): Workflow {
  const workflowId = requireText(node, 'workflowId');
  const summary = optionalString(node, 'summary');
  const description = optionalString(node, 'description');
  const inputs = optionalMap(node, 'inputs');

  const steps = buildList(node, 'steps', buildStep, {
    required: true,
    identify: step => step.stepId,
  });

  const workflow: Workflow = {
    workflowId,
    ...(summary !== undefined ? { summary } : {}),
    ...(description !== undefined ? { description } : {}),
    ...(inputs ? { inputs: inputs.toValue() } : {}),
    dependsOn: optionalStringList(node, 'dependsOn'),
    parameters: buildParameterList(node),
    steps,
    successActions: buildSuccessActionList(node, 'successActions'),
    failureActions: buildFailureActionList(node, 'failureActions'),
    outputs: optionalOutputs(node, 'outputs'),
    extensions: extractExtensions(node),
  };

  logDebug('build', `workflow ${workflowId} with ${steps.length} step(s)`);
  return workflow;
}

export function buildWorkflowList(map: TreeNode): Workflow[] {
  return buildList(map, 'workflows', buildWorkflow, {
    required: true,
    identify: workflow => workflow.workflowId,
  });
}
