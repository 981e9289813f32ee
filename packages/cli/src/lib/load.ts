import {
  ArazzoError,
  formatPath,
  loadDescription,
  type Description,
} from 'arazzo-models';
import type { DescriptionJsonOutput } from '../types.js';

export interface LoadOutcome {
  description?: Description;
  output: DescriptionJsonOutput;
  /** Extra lines shown below the error in text mode */
  details: string[];
}

/**
 * Load a description for a command, turning failures into JSON output
 */
export function loadForCommand(
  file: string,
  resolveReferences: boolean
): LoadOutcome {
  try {
    const description = loadDescription(file, { resolveReferences });
    return { description, output: { success: true }, details: [] };
  } catch (error) {
    if (error instanceof ArazzoError) {
      const path = formatPath(error.path);
      return {
        output: { success: false, error: error.message, kind: error.kind, path },
        details: [`kind: ${error.kind}`, `path: ${path}`],
      };
    }
    return {
      output: {
        success: false,
        error: error instanceof Error ? error.message : String(error),
      },
      details: [],
    };
  }
}

export function countSteps(description: Description): number {
  return description.workflows.reduce(
    (total, workflow) => total + workflow.steps.length,
    0
  );
}
