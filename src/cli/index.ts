/**
 * CLI program definition.
 */
import { Command } from 'commander';
import { readFileSync } from 'fs';
import { dirname, resolve } from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { createAddCommand } from './commands/add.js';
import { createAnswerCommand } from './commands/answer.js';
import { createNextCommand } from './commands/next.js';
import { createListCommand } from './commands/list.js';
import { createSyncCommand } from './commands/sync.js';
import { createQueryCommand } from './commands/query.js';
import { createIngestCommand } from './commands/ingest.js';
import { createKbCommand } from './commands/kb.js';
import { createInitCommand } from './commands/init.js';
import { createProvidersCommand } from './commands/providers.js';

const __dirname = dirname(fileURLToPath(import.meta.url));
const VERSION = z.object({ version: z.string() })
  .parse(JSON.parse(readFileSync(resolve(__dirname, '../../package.json'), 'utf-8')))
  .version;

/** Create the CLI program. */
export function createCli(): Command {
  const program = new Command()
    .name('qa-store')
    .description('Question hierarchy with a similarity-searchable answer store')
    .version(VERSION)
    .option('-c, --config <path>', 'Path to config file (default: .qa-store/config.yaml)')
    .option('--verbose', 'Show debug output')
    .option('--quiet', 'Only show errors');
  [createInitCommand, createAddCommand, createAnswerCommand, createNextCommand, createListCommand,
   createSyncCommand, createQueryCommand, createIngestCommand, createKbCommand,
   createProvidersCommand].forEach((cmd) => program.addCommand(cmd()));
  return program;
}
