/**
 * add - put a question into the tree and index it.
 */
import { Command } from 'commander';
import { exitWithError, parseId, withSystem } from '../runtime.js';
import { logger as log } from '../../utils/logger.js';

interface AddOptions {
  parent?: number;
  json?: boolean;
}

export function createAddCommand(): Command {
  return new Command('add')
    .description('Add a question, optionally under a parent question')
    .argument('<question>', 'Question text')
    .option('-p, --parent <id>', 'Parent question id', parseId)
    .option('--json', 'Output as JSON')
    .action(async (question: string, options: AddOptions, command: Command) => {
      try {
        const id = await withSystem(command, system => system.addQuestion(question, options.parent));
        if (options.json) {
          console.log(JSON.stringify({ id }, null, 2));
        } else {
          log.success(`Added question ${id}`);
        }
      } catch (error) {
        exitWithError(error);
      }
    });
}
