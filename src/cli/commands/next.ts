/**
 * next - suggest the highest-priority unanswered question.
 */
import { Command } from 'commander';
import { exitWithError, withSystem } from '../runtime.js';
import { formatSuggestion } from '../format.js';
import { logger as log } from '../../utils/logger.js';

interface NextOptions {
  json?: boolean;
}

export function createNextCommand(): Command {
  return new Command('next')
    .description('Suggest the next question to ask')
    .option('--json', 'Output as JSON')
    .action(async (options: NextOptions, command: Command) => {
      try {
        const suggestion = await withSystem(command, async system => system.suggestNextQuestion());
        if (options.json) {
          console.log(JSON.stringify(suggestion, null, 2));
        } else if (suggestion) {
          console.log(formatSuggestion(suggestion));
        } else {
          log.info('Every question is answered');
        }
      } catch (error) {
        exitWithError(error);
      }
    });
}
