#!/usr/bin/env node
import { hideBin } from 'yargs/helpers';
import { runCli } from './program';

await runCli(hideBin(process.argv));
