export interface CLIJsonOutput {
  success: boolean;
  error?: string;
}

/**
 * JSON output for commands that load a description. Failures carry the
 * error kind and document path when the description itself is invalid.
 */
export interface DescriptionJsonOutput extends CLIJsonOutput {
  kind?: string;
  path?: string;
}

export interface CommandDefinition {
  /** Command name used in CLI (e.g., 'validate', 'convert') */
  name: string;
  /** Description shown in help text */
  description: string;
  /** The command action handler */
  action: (file: string, options: never) => Promise<void>;
}
