import type { TreeNode } from '../../tree/node.js';
import { UnsupportedVersionError } from '../errors.js';
import {
  expectMap,
  extractExtensions,
  optionalEnum,
  optionalMap,
  optionalString,
  requireMap,
  requireString,
  requireText,
} from '../fields.js';
import {
  ArazzoVersionSchema,
  SourceDescriptionTypeSchema,
  SUPPORTED_ARAZZO_VERSIONS,
} from '../schema.js';
import type { Description, Info, SourceDescription } from '../types.js';
import { buildComponents } from './components.js';
import { buildList } from './lists.js';
import { buildWorkflowList } from './workflow.js';

export function buildInfo(node: TreeNode): Info {
  const summary = optionalString(node, 'summary');
  const description = optionalString(node, 'description');

  return {
    title: requireText(node, 'title'),
    ...(summary !== undefined ? { summary } : {}),
    ...(description !== undefined ? { description } : {}),
    version: requireText(node, 'version'),
    extensions: extractExtensions(node),
  };
}

export function buildSourceDescription(node: TreeNode): SourceDescription {
  const type = optionalEnum(node, 'type', SourceDescriptionTypeSchema);

  return {
    name: requireText(node, 'name'),
    url: requireText(node, 'url'),
    ...(type ? { type } : {}),
    extensions: extractExtensions(node),
  };
}

/**
 * Check the `arazzo` field before anything else is read
 */
function requireSupportedVersion(node: TreeNode): string {
  const version = requireString(node, 'arazzo');
  if (!ArazzoVersionSchema.safeParse(version).success) {
    throw new UnsupportedVersionError(
      [...node.path, 'arazzo'],
      version,
      SUPPORTED_ARAZZO_VERSIONS
    );
  }
  return version;
}

export function buildDescription(root: TreeNode): Description {
  const node = expectMap(root);
  const arazzo = requireSupportedVersion(node);
  const info = buildInfo(requireMap(node, 'info'));
  const sourceDescriptions = buildList(
    node,
    'sourceDescriptions',
    buildSourceDescription,
    { required: true, identify: source => source.name }
  );
  const workflows = buildWorkflowList(node);
  const components = optionalMap(node, 'components');

  return {
    arazzo,
    info,
    sourceDescriptions,
    workflows,
    ...(components ? { components: buildComponents(components) } : {}),
    extensions: extractExtensions(node),
  };
}
