import yargs, { type Argv } from 'yargs';
import { chunkCommand } from './commands/chunk';
import { configCommand } from './commands/config';
import { listCommand } from './commands/list';
import { structureCommand } from './commands/structure';
import { errorMessage } from './options';

/**
 * Build the `docindexer` command line for the given arguments (without the
 * node and script entries).
 */
export function buildCli(args: string[]): Argv {
  return yargs(args)
    .scriptName('docindexer')
    .usage('$0 <command> [options]')
    .command(listCommand)
    .command(structureCommand)
    .command(chunkCommand)
    .command(configCommand)
    .demandCommand(1, 'Please specify a command')
    .strict()
    .fail((msg, err, cli) => {
      if (!err) cli.showHelp();
      console.error(`Error: ${err ? err.message : msg}`);
      process.exitCode = 1;
    })
    .help();
}

/**
 * Parse and run one command. Failures print `Error: <message>` to stderr and
 * set exit code 1.
 */
export async function runCli(args: string[]): Promise<void> {
  try {
    await buildCli(args).parseAsync();
  } catch (err) {
    console.error(`Error: ${errorMessage(err)}`);
    process.exitCode = 1;
  }
}
