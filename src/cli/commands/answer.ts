/**
 * answer - record an answer in the tree and its knowledge base entries.
 */
import { Command } from 'commander';
import { exitWithError, parseId, withSystem } from '../runtime.js';
import { logger as log } from '../../utils/logger.js';

export function createAnswerCommand(): Command {
  return new Command('answer')
    .description('Answer a question')
    .argument('<id>', 'Question id', parseId)
    .argument('<answer>', 'Answer text')
    .action(async (id: number, answer: string, _options: unknown, command: Command) => {
      try {
        await withSystem(command, system => system.answerQuestion(id, answer));
        log.success(`Answered question ${id}`);
      } catch (error) {
        exitWithError(error);
      }
    });
}
