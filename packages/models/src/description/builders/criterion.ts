import type { TreeNode } from '../../tree/node.js';
import { MissingFieldError } from '../errors.js';
import {
  checkValue,
  extractExtensions,
  optionalString,
  requireEnum,
  requireText,
} from '../fields.js';
import {
  CriterionExpressionTypeNameSchema,
  CriterionTypeSchema,
} from '../schema.js';
import type {
  Criterion,
  CriterionExpressionType,
  CriterionType,
} from '../types.js';
import { resolveUnion } from '../unions.js';
import { buildList } from './lists.js';

function buildCriterionExpressionType(node: TreeNode): CriterionExpressionType {
  return {
    type: requireEnum(node, 'type', CriterionExpressionTypeNameSchema),
    version: requireText(node, 'version'),
    extensions: extractExtensions(node),
  };
}

function resolveCriterionType(
  node: TreeNode
): CriterionType | CriterionExpressionType {
  return resolveUnion<CriterionType | CriterionExpressionType>(node, [
    {
      name: 'criterion expression type',
      matches: candidate => candidate.isMap(),
      build: buildCriterionExpressionType,
    },
    {
      name: 'criterion type name',
      matches: candidate => candidate.kind === 'string',
      build: candidate =>
        checkValue(
          CriterionTypeSchema,
          candidate.asString(),
          candidate,
          'type',
          `must be one of ${CriterionTypeSchema.options.join(', ')}`
        ),
    },
  ]);
}

function typeName(type: Criterion['type']): CriterionType {
  if (type === undefined) {
    return 'simple';
  }
  return typeof type === 'string' ? type : type.type;
}

export function buildCriterion(node: TreeNode): Criterion {
  const condition = requireText(node, 'condition');
  const typeNode = node.get('type');
  const type = typeNode ? resolveCriterionType(typeNode) : undefined;
  const context = optionalString(node, 'context');

  const name = typeName(type);
  if ((name === 'jsonpath' || name === 'xpath') && context === undefined) {
    throw new MissingFieldError([...node.path, 'context'], 'context');
  }

  return {
    condition,
    ...(context !== undefined ? { context } : {}),
    ...(type !== undefined ? { type } : {}),
    extensions: extractExtensions(node),
  };
}

export function buildCriteria(map: TreeNode, key: string): Criterion[] {
  return buildList(map, key, buildCriterion);
}
