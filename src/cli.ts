#!/usr/bin/env node
import { hideBin } from 'yargs/helpers';
import { run } from './cli/run.js';

process.exitCode = run(hideBin(process.argv));
