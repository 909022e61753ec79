import type { CommandModule } from 'yargs';
import {
  CONFIG_SOURCES,
  configExists,
  createDefaultConfig,
  describeConfig,
  formatConfig,
  getGlobalConfigPath,
  getLocalConfigPath,
  saveConfig,
} from '../../backend/config';
import { loadCommandConfig } from '../options';

interface InitArgs {
  global?: boolean;
  force?: boolean;
}

interface ShowArgs {
  config?: string;
  source?: (typeof CONFIG_SOURCES)[number];
}

const initCommand: CommandModule<object, InitArgs> = {
  command: 'init',
  describe: 'Write a config file with the default settings',
  builder: (yargs) =>
    yargs
      .option('global', {
        alias: 'g',
        type: 'boolean',
        description: 'Write ~/.docindexer/config.toml instead of ./.docindexer/config.toml',
      })
      .option('force', {
        alias: 'f',
        type: 'boolean',
        description: 'Overwrite an existing config file',
      }),
  handler: (argv) => {
    const configPath = argv.global ? getGlobalConfigPath() : getLocalConfigPath();
    if (configExists(configPath) && !argv.force) {
      throw new Error(`Config already exists at ${configPath} (use --force to overwrite)`);
    }
    saveConfig(configPath, createDefaultConfig());
    console.log(`Wrote ${configPath}`);
  },
};

const showCommand: CommandModule<object, ShowArgs> = {
  command: 'show',
  describe: 'Print the configuration as TOML',
  builder: (yargs) =>
    yargs
      .option('config', {
        type: 'string',
        description: 'Config file (default: ~/.docindexer then ./.docindexer)',
      })
      .option('source', {
        choices: CONFIG_SOURCES,
        default: 'effective' as const,
        description: 'Which layer to print: the merged result, one file, or all of them',
      }),
  handler: (argv) => {
    const source = argv.source ?? 'effective';
    if (argv.config) {
      // --config replaces both layers
      if (source === 'effective') {
        console.log(formatConfig(loadCommandConfig(argv.config)));
      } else {
        console.log(describeConfig(source, { localPath: argv.config }));
      }
      return;
    }
    console.log(describeConfig(source, { globalPath: getGlobalConfigPath(), localPath: getLocalConfigPath() }));
  },
};

export const configCommand: CommandModule<object, object> = {
  command: 'config',
  describe: 'Manage configuration files',
  builder: (yargs) =>
    yargs.command(initCommand).command(showCommand).demandCommand(1, 'Please specify a config subcommand'),
  handler: () => {
    // parent command, no-op
  },
};
