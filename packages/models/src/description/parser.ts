/**
 * Entry points between document trees and the typed description model
 */

import { Document, isDocument } from 'yaml';
import { fromJson } from '../tree/json.js';
import { type JsonObject, TreeNode } from '../tree/node.js';
import { fromYaml } from '../tree/yaml.js';
import { logDebug } from '../log.js';
import { buildDescription } from './builders/description.js';
import { emitDescription } from './emit.js';
import { ArazzoError, ParseOptionsValidationError } from './errors.js';
import { resolveReferences } from './references.js';
import { ParseOptionsSchema } from './schema.js';
import type { Description, ParseOptions, ResolvedParseOptions } from './types.js';

export type ParseResult =
  | { success: true; data: Description }
  | { success: false; error: ArazzoError };

function resolveOptions(options: ParseOptions = {}): ResolvedParseOptions {
  const result = ParseOptionsSchema.safeParse(options);
  if (!result.success) {
    const errorMessages = result.error.issues
      .map(err => `  - ${err.path.join('.')}: ${err.message}`)
      .join('\n');
    throw new ParseOptionsValidationError(
      `Invalid parse options:\n${errorMessages}`,
      result.error
    );
  }
  return result.data;
}

/**
 * Wrap any supported input as a tree. `yaml` Documents use the YAML
 * adapter and everything else is read as a plain JSON value.
 */
export function toTree(input: unknown): TreeNode {
  if (input instanceof TreeNode) {
    return input;
  }
  if (isDocument(input)) {
    return fromYaml(input);
  }
  return fromJson(input);
}

/**
 * Build a description from a document tree
 *
 * @param input - A TreeNode, a `yaml` Document or a plain JSON value
 * @returns The typed description
 * @throws {ArazzoError} On the first structural or semantic failure
 * @throws {ParseOptionsValidationError} If the options are malformed
 *
 * @example
 * ```typescript
 * import { parseDocument } from 'arazzo-models';
 *
 * const description = parseDocument(JSON.parse(text));
 * console.log(description.workflows.map(w => w.workflowId));
 * ```
 */
export function parseDocument(
  input: unknown,
  options?: ParseOptions
): Description {
  const { resolveReferences: resolve } = resolveOptions(options);

  logDebug('parse', 'building description');
  const description = buildDescription(toTree(input));

  if (resolve) {
    resolveReferences(description);
  }

  logDebug(
    'parse',
    `built ${description.workflows.length} workflow(s) for ${description.info.title}`
  );
  return description;
}

/**
 * Same as parseDocument, returning the first ArazzoError as a value
 */
export function safeParseDocument(
  input: unknown,
  options?: ParseOptions
): ParseResult {
  try {
    return { success: true, data: parseDocument(input, options) };
  } catch (error) {
    if (error instanceof ArazzoError) {
      return { success: false, error };
    }
    throw error;
  }
}

/**
 * Emit a description as a plain JSON tree
 */
export function serializeDocument(description: Description): JsonObject {
  return emitDescription(description);
}

/**
 * Emit a description as a `yaml` Document
 */
export function serializeDocumentToYaml(description: Description): Document {
  return new Document(emitDescription(description));
}
