/**
 * Re-emit a description as JSON or YAML on stdout.
 */
import { stringifyDescription, type DescriptionFormat } from 'arazzo-models';
import type { CommandDefinition } from '../types.js';
import { loadForCommand } from '../lib/load.js';
import { exitWithError } from '../utils/exit.js';

interface ConvertCommandOptions {
  format?: DescriptionFormat;
  references?: boolean;
}

export const convertCommand = async (
  file: string,
  options: ConvertCommandOptions = {}
) => {
  const { description, output, details } = loadForCommand(
    file,
    options.references !== false
  );

  if (!description) {
    exitWithError(output, false, details);
    return;
  }

  process.stdout.write(
    stringifyDescription(description, options.format ?? 'yaml')
  );
};

export default {
  name: 'convert',
  description: 'Convert an Arazzo description between JSON and YAML',
  action: convertCommand,
} satisfies CommandDefinition;
