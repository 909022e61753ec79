import type { CommandModule } from 'yargs';
import { listFiles } from '../../backend/file-iterator';
import { structureFile, writeStructureOutputs } from '../../backend/pipeline';
import { parsePropertyList } from '../../backend/structure/filter';
import { countNodes } from '../../backend/structure/nodes';
import { errorMessage, loadRunOptions, withFileOptions, type FileArgs } from '../options';

interface StructureArgs extends FileArgs {
  'output-folder'?: string;
  'omit-properties'?: string;
}

export const structureCommand: CommandModule<object, StructureArgs> = {
  command: 'structure',
  describe: 'Organize markdown files into structure trees',
  builder: (yargs) =>
    withFileOptions(yargs)
      .option('output-folder', {
        alias: 'o',
        type: 'string',
        description: 'Folder for <name>.structure.json files',
      })
      .option('omit-properties', {
        type: 'string',
        description: 'Comma-separated node properties to leave out, e.g. "items,size"',
      }),
  handler: (argv) => {
    const run = loadRunOptions(argv, {
      outputFolder: argv.outputFolder,
      omitProperties: argv.omitProperties === undefined ? undefined : parsePropertyList(argv.omitProperties),
    });
    const files = listFiles(run.files);
    if (files.length === 0) {
      console.log('No files found.');
      return;
    }

    let written = 0;
    let failed = 0;
    for (const file of files) {
      try {
        const { tree } = structureFile(file.path);
        const output = writeStructureOutputs(file.path, tree, run.structure.outputFolder, run.structure.omitProperties);
        console.log(`[structure] ${file.name}: ${countNodes(tree)} nodes → ${output.structure}`);
        written++;
      } catch (err) {
        console.error(`[structure] Failed ${file.path}: ${errorMessage(err)}`);
        failed++;
      }
    }

    console.log(`Structured ${written} file(s), ${failed} failed.`);
    if (failed > 0) process.exitCode = 1;
  },
};
