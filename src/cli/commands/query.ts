/**
 * query - similarity search over the knowledge base.
 */
import { Command } from 'commander';
import { exitWithError, parseCount, parseKeyValues, withSystem } from '../runtime.js';
import { formatMatch } from '../format.js';

interface QueryOptions {
  nResults?: number;
  rewordings?: number;
  where?: string[];
  json?: boolean;
}

export function createQueryCommand(): Command {
  return new Command('query')
    .description('Find stored answers for a question')
    .argument('<question>', 'Question text')
    .option('-n, --n-results <count>', 'Maximum number of results', parseCount)
    .option('-r, --rewordings <count>', 'Rewordings to generate and query as well', parseCount)
    .option('-w, --where <pairs...>', 'Metadata equality filter as key=value')
    .option('--json', 'Output as JSON')
    .action(async (question: string, options: QueryOptions, command: Command) => {
      try {
        const where = parseKeyValues(options.where);
        const matches = await withSystem(command, system =>
          system.query(question, {
            nResults: options.nResults,
            numRewordings: options.rewordings,
            metadataFilter: where,
          })
        );

        if (options.json) {
          console.log(JSON.stringify(matches, null, 2));
        } else if (matches.length === 0) {
          console.log('No matches');
        } else {
          matches.forEach(match => console.log(formatMatch(match)));
        }
      } catch (error) {
        exitWithError(error);
      }
    });
}
