import colors from 'ansi-colors';
import type { CLIJsonOutput } from '../types.js';

/**
 * Print the error, as JSON or as a red line, and exit with code 1
 */
export function exitWithError(
  jsonOutput: CLIJsonOutput,
  json: boolean,
  details: string[] = []
): void {
  if (json) {
    console.log(JSON.stringify(jsonOutput, null, 2));
  } else {
    console.error(colors.red(`✗ ${jsonOutput.error ?? 'Unknown error'}`));
    for (const detail of details) {
      console.error(colors.gray(`  ${detail}`));
    }
  }
  process.exit(1);
}

/**
 * Print the result, as JSON or as a green line
 */
export function exitWithSuccess(
  message: string,
  jsonOutput: CLIJsonOutput,
  json: boolean,
  details: string[] = []
): void {
  if (json) {
    console.log(JSON.stringify(jsonOutput, null, 2));
    return;
  }
  console.log(colors.green(`✓ ${message}`));
  for (const detail of details) {
    console.log(colors.gray(`  ${detail}`));
  }
}
