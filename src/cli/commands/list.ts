import type { CommandModule } from 'yargs';
import { listFiles } from '../../backend/file-iterator';
import { loadRunOptions, withFileOptions, type FileArgs } from '../options';

interface ListArgs extends FileArgs {
  json?: boolean;
}

export const listCommand: CommandModule<object, ListArgs> = {
  command: 'list',
  describe: 'List the files a run would process',
  builder: (yargs) =>
    withFileOptions(yargs).option('json', {
      type: 'boolean',
      description: 'Print file details as JSON',
    }),
  handler: (argv) => {
    const { files: options } = loadRunOptions(argv);
    const files = listFiles(options);

    if (argv.json) {
      const rows = files.map((file) => ({ ...file, modified: file.modified.toISOString() }));
      console.log(JSON.stringify(rows, null, 2));
      return;
    }
    if (files.length === 0) {
      console.log('No files found.');
      return;
    }
    for (const file of files) {
      console.log(file.path);
    }
  },
};
