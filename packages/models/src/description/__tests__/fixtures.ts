import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import type { JsonObject, JsonValue, TreePath } from '../../tree/node.js';

export function fixturePath(name: string): string {
  return fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url));
}

export function readFixture(name: string): string {
  return readFileSync(fixturePath(name), 'utf-8');
}

/**
 * A fresh copy of the smallest valid description
 */
export function minimalDocument(): JsonObject {
  return {
    arazzo: '1.0.1',
    info: { title: 'Pet adoption', version: '1.0.0' },
    sourceDescriptions: [
      {
        name: 'petStore',
        url: 'https://example.com/petstore.openapi.yaml',
        type: 'openapi',
      },
    ],
    workflows: [
      {
        workflowId: 'adoptPet',
        steps: [{ stepId: 'findPet', operationId: 'findPets' }],
      },
    ],
  };
}

function update(
  value: JsonValue,
  path: TreePath,
  apply: (parent: JsonObject | JsonValue[], key: string | number) => void
): JsonValue {
  const copy: JsonValue = structuredClone(value);
  let parent: JsonValue = copy;

  for (const [index, key] of path.entries()) {
    const last = index === path.length - 1;
    if (Array.isArray(parent) && typeof key === 'number') {
      if (last) {
        apply(parent, key);
        break;
      }
      parent = parent[key];
    } else if (
      parent !== null &&
      typeof parent === 'object' &&
      !Array.isArray(parent) &&
      typeof key === 'string'
    ) {
      if (last) {
        apply(parent, key);
        break;
      }
      parent = parent[key];
    } else {
      throw new Error(`Cannot follow ${String(key)} in fixture`);
    }
  }
  return copy;
}

/**
 * Copy of a document with the entry at `path` removed
 */
export function withoutKey(value: JsonValue, path: TreePath): JsonValue {
  return update(value, path, (parent, key) => {
    if (Array.isArray(parent) && typeof key === 'number') {
      parent.splice(key, 1);
    } else if (!Array.isArray(parent) && typeof key === 'string') {
      delete parent[key];
    }
  });
}

/**
 * Copy of a document with the entry at `path` set to `entry`
 */
export function withValue(
  value: JsonValue,
  path: TreePath,
  entry: JsonValue
): JsonValue {
  return update(value, path, (parent, key) => {
    if (Array.isArray(parent) && typeof key === 'number') {
      parent[key] = entry;
    } else if (!Array.isArray(parent) && typeof key === 'string') {
      parent[key] = entry;
    }
  });
}
