export { VERBOSE, setVerbose } from './log.js';

// Document trees
export {
  TreeNode,
  JsonTreeNode,
  YamlTreeNode,
  fromJson,
  fromYaml,
  type NodeKind,
  type TreePath,
  type JsonPrimitive,
  type JsonArray,
  type JsonObject,
  type JsonValue,
} from './tree/index.js';

// Description model
export * from './description/index.js';

export { ZodError } from 'zod';
