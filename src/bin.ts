#!/usr/bin/env node
import { createCli } from './cli/index.js';
import { exitWithError } from './cli/runtime.js';

createCli().parseAsync(process.argv).catch(exitWithError);
