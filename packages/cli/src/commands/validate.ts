/**
 * Validate an Arazzo description file and report the first error found.
 */
import type { CommandDefinition, DescriptionJsonOutput } from '../types.js';
import { countSteps, loadForCommand } from '../lib/load.js';
import { exitWithError, exitWithSuccess } from '../utils/exit.js';

interface ValidateCommandOptions {
  json?: boolean;
  /** Set to false by --no-references */
  references?: boolean;
}

interface ValidateOutput extends DescriptionJsonOutput {
  arazzo?: string;
  workflows?: number;
  steps?: number;
}

export const validateCommand = async (
  file: string,
  options: ValidateCommandOptions = {}
) => {
  const json = options.json === true;
  const { description, output, details } = loadForCommand(
    file,
    options.references !== false
  );

  if (!description) {
    exitWithError(output, json, details);
    return;
  }

  const steps = countSteps(description);
  const jsonOutput: ValidateOutput = {
    success: true,
    arazzo: description.arazzo,
    workflows: description.workflows.length,
    steps,
  };

  exitWithSuccess(
    `${file} is a valid Arazzo ${description.arazzo} description`,
    jsonOutput,
    json,
    [`${description.workflows.length} workflow(s), ${steps} step(s)`]
  );
};

export default {
  name: 'validate',
  description: 'Validate an Arazzo description',
  action: validateCommand,
} satisfies CommandDefinition;
