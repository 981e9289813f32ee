import type { TreeNode } from '../../tree/node.js';
import { extractExtensions, requireField, requireText } from '../fields.js';
import type { PayloadReplacement, RequestBody } from '../types.js';
import { resolvePayload } from '../unions.js';
import { buildList } from './lists.js';

export function buildPayloadReplacement(node: TreeNode): PayloadReplacement {
  return {
    target: requireText(node, 'target'),
    value: resolvePayload(requireField(node, 'value')),
    extensions: extractExtensions(node),
  };
}

export function buildRequestBody(node: TreeNode): RequestBody {
  const payloadNode = node.get('payload');

  return {
    contentType: requireText(node, 'contentType'),
    ...(payloadNode ? { payload: resolvePayload(payloadNode) } : {}),
    replacements: buildList(node, 'replacements', buildPayloadReplacement),
    extensions: extractExtensions(node),
  };
}
