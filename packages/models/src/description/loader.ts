/**
 * Description loader for reading Arazzo documents from JSON or YAML text
 */

import { readFileSync } from 'node:fs';
import { extname } from 'node:path';
import { parseDocument as parseYamlDocument, stringify } from 'yaml';
import { DescriptionLoadError } from './errors.js';
import { parseDocument, serializeDocument } from './parser.js';
import type { Description, ParseOptions } from './types.js';

export type DescriptionFormat = 'json' | 'yaml';

/**
 * `.json` files are read as JSON; anything else as YAML, which also
 * accepts JSON text
 */
export function detectFormat(filePath: string): DescriptionFormat {
  return extname(filePath).toLowerCase() === '.json' ? 'json' : 'yaml';
}

function parseText(content: string, format: DescriptionFormat): unknown {
  if (format === 'json') {
    try {
      return JSON.parse(content);
    } catch (error) {
      throw new DescriptionLoadError(
        `Failed to parse JSON: ${error instanceof Error ? error.message : String(error)}`,
        error
      );
    }
  }

  const doc = parseYamlDocument(content);
  if (doc.errors.length > 0) {
    throw new DescriptionLoadError(
      `Failed to parse YAML: ${doc.errors[0].message}`,
      doc.errors[0]
    );
  }
  return doc;
}

/**
 * Load and build a description from a file
 *
 * @param filePath - Path to a `.json`, `.yaml` or `.yml` file
 * @throws {DescriptionLoadError} If the file cannot be read or parsed
 * @throws {ArazzoError} If the document is not a valid description
 *
 * @example
 * ```typescript
 * import { loadDescription } from 'arazzo-models';
 *
 * const description = loadDescription('./pet-adoption.arazzo.yaml');
 * console.log(`Loaded ${description.info.title}`);
 * ```
 */
export function loadDescription(
  filePath: string,
  options?: ParseOptions
): Description {
  let content: string;

  try {
    content = readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new DescriptionLoadError(
      `Failed to read description file at ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      error
    );
  }

  return parseDocument(parseText(content, detectFormat(filePath)), options);
}

/**
 * Load and build a description from JSON or YAML text
 */
export function loadDescriptionFromString(
  content: string,
  format: DescriptionFormat = 'yaml',
  options?: ParseOptions
): Description {
  return parseDocument(parseText(content, format), options);
}

/**
 * Render a description as JSON or YAML text
 */
export function stringifyDescription(
  description: Description,
  format: DescriptionFormat
): string {
  const tree = serializeDocument(description);

  if (format === 'json') {
    return `${JSON.stringify(tree, null, 2)}\n`;
  }
  return stringify(tree, { indent: 2, lineWidth: 80, minContentWidth: 20 });
}
