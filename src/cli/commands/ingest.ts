/**
 * ingest - extract QA pairs from a text file into the knowledge base.
 */
import * as path from 'node:path';
import { Command } from 'commander';
import { exitWithError, withSystem } from '../runtime.js';
import { formatQaPair } from '../format.js';
import { readFile } from '../../utils/file-system.js';
import { logger as log } from '../../utils/logger.js';

interface IngestOptions {
  json?: boolean;
}

export function createIngestCommand(): Command {
  return new Command('ingest')
    .description('Generate question/answer pairs from a text file and index them')
    .argument('<file>', 'Text file to read')
    .option('--json', 'Output as JSON')
    .action(async (file: string, options: IngestOptions, command: Command) => {
      try {
        const text = await readFile(path.resolve(process.cwd(), file));
        const pairs = await withSystem(command, system => system.ingestText(text));

        if (options.json) {
          console.log(JSON.stringify(pairs, null, 2));
          return;
        }
        pairs.forEach((pair, i) => console.log(formatQaPair(pair, i)));
        log.success(`Indexed ${pairs.length} question/answer pairs`);
      } catch (error) {
        exitWithError(error);
      }
    });
}
