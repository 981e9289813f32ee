export {
  TreeNode,
  type NodeKind,
  type TreePath,
  type JsonPrimitive,
  type JsonArray,
  type JsonObject,
  type JsonValue,
} from './node.js';

export { JsonTreeNode, fromJson } from './json.js';

export { YamlTreeNode, fromYaml } from './yaml.js';
