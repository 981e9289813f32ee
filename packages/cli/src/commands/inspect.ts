/**
 * Show the workflows and steps of a description.
 */
import colors from 'ansi-colors';
import {
  serializeDocument,
  type OperationReference,
  type Workflow,
} from 'arazzo-models';
import type { CommandDefinition } from '../types.js';
import { loadForCommand } from '../lib/load.js';
import { showList, showProperties, showTitle } from '../utils/display.js';
import { exitWithError } from '../utils/exit.js';

interface InspectCommandOptions {
  // Output formats
  json?: boolean;
  references?: boolean;
}

export function formatOperation(operation: OperationReference): string {
  switch (operation.kind) {
    case 'operationId':
      return `operationId ${operation.operationId}`;
    case 'operationPath':
      return `operationPath ${operation.operationPath}`;
    case 'workflowId':
      return `workflow ${operation.workflowId}`;
  }
}

function showWorkflow(workflow: Workflow): void {
  showTitle(`Workflow ${workflow.workflowId}`);

  if (workflow.summary) {
    console.log(workflow.summary);
  }
  if (workflow.dependsOn.length > 0) {
    showProperties({ 'Depends on': workflow.dependsOn.join(', ') });
  }

  showList(
    workflow.steps.map(
      step =>
        `${colors.cyan(step.stepId)} ${colors.gray('→')} ${formatOperation(step.operation)}`
    ),
    'No steps'
  );
}

export const inspectCommand = async (
  file: string,
  options: InspectCommandOptions = {}
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

  if (json) {
    console.log(
      JSON.stringify(
        { success: true, description: serializeDocument(description) },
        null,
        2
      )
    );
    return;
  }

  showTitle('Description');
  showProperties({
    Title: description.info.title,
    Version: description.info.version,
    Arazzo: description.arazzo,
  });

  showTitle('Source descriptions');
  showList(
    description.sourceDescriptions.map(
      source =>
        `${source.name} ${source.url}${source.type ? colors.gray(` (${source.type})`) : ''}`
    )
  );

  description.workflows.forEach(showWorkflow);
};

export default {
  name: 'inspect',
  description: 'Show the workflows and steps of an Arazzo description',
  action: inspectCommand,
} satisfies CommandDefinition;
