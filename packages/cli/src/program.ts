import { Command, Option } from 'commander';
import colors from 'ansi-colors';
import { setVerbose } from 'arazzo-models';
import validateCmd from './commands/validate.js';
import convertCmd from './commands/convert.js';
import inspectCmd from './commands/inspect.js';

/**
 * Initialize the CLI program with all the available commands.
 *
 * @returns Command The initialized CLI program
 */
export function createProgram(): Command {
  const program = new Command();

  program.hook('preAction', thisCommand => {
    // Configure the models lib in verbose mode
    setVerbose(thisCommand.opts().verbose === true);
  });

  program.option('-v, --verbose', 'Log diagnostic information to stderr');

  program
    .name('arazzo')
    .description('Validate, convert and inspect Arazzo workflow descriptions')
    .version('0.1.0');

  program.optionsGroup(colors.cyan('Options'));

  program.commandsGroup(colors.cyan('Descriptions:'));

  program
    .command(validateCmd.name)
    .description(validateCmd.description)
    .argument('<file>', 'Path to a JSON or YAML description')
    .option('--no-references', 'Skip checking component references')
    .option('--json', 'Output the result in JSON format')
    .action(validateCmd.action);

  program
    .command(convertCmd.name)
    .description(convertCmd.description)
    .argument('<file>', 'Path to a JSON or YAML description')
    .addOption(
      new Option('-f, --format <format>', 'Output format')
        .choices(['json', 'yaml'])
        .default('yaml')
    )
    .option('--no-references', 'Skip checking component references')
    .action(convertCmd.action);

  program
    .command(inspectCmd.name)
    .description(inspectCmd.description)
    .argument('<file>', 'Path to a JSON or YAML description')
    .option('--no-references', 'Skip checking component references')
    .option('--json', 'Output the description in JSON format')
    .action(inspectCmd.action);

  return program;
}
