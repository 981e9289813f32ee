import type { TreeNode } from '../../tree/node.js';
import {
  DuplicateIdentifierError,
  InvalidValueError,
  MissingFieldError,
} from '../errors.js';
import { expectMap, optionalSequence } from '../fields.js';

export interface ListOptions<T> {
  /** Fail when the field is absent or empty */
  required?: boolean;

  /**
   * Identity used for the uniqueness check. Items returning undefined are
   * not checked.
   */
  identify?: (item: T) => string | undefined;
}

/**
 * Build every map in a sequence-valued field, in document order
 */
export function buildList<T>(
  map: TreeNode,
  key: string,
  build: (node: TreeNode) => T,
  options: ListOptions<T> = {}
): T[] {
  if (options.required && !map.has(key)) {
    throw new MissingFieldError([...map.path, key], key);
  }

  const nodes = optionalSequence(map, key);
  if (options.required && nodes.length === 0) {
    throw new InvalidValueError(
      [...map.path, key],
      key,
      [],
      'must contain at least one entry'
    );
  }

  const seen = new Set<string>();
  return nodes.map(node => {
    const item = build(expectMap(node));
    const id = options.identify?.(item);
    if (id !== undefined) {
      if (seen.has(id)) {
        throw new DuplicateIdentifierError(node.path, id);
      }
      seen.add(id);
    }
    return item;
  });
}
