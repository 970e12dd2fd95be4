/**
 * list - print questions in id order.
 */
import { Command } from 'commander';
import { exitWithError, withSystem } from '../runtime.js';
import { formatQuestion } from '../format.js';
import type { QuestionNode } from '../../core/tree/types.js';

interface ListOptions {
  answered?: boolean;
  unanswered?: boolean;
  json?: boolean;
}

export function createListCommand(): Command {
  return new Command('list')
    .description('List questions')
    .option('--answered', 'Only answered questions')
    .option('--unanswered', 'Only unanswered questions')
    .option('--json', 'Output as JSON')
    .action(async (options: ListOptions, command: Command) => {
      try {
        const questions = await withSystem(command, async (system): Promise<QuestionNode[]> => {
          if (options.answered && !options.unanswered) return system.tree.getAnsweredQuestions();
          if (options.unanswered && !options.answered) return system.tree.getUnansweredQuestions();
          return system.tree.getAllQuestions();
        });

        if (options.json) {
          console.log(JSON.stringify(questions.map(({ id, question, answer, parentId, createdAt }) => ({
            id, question, answer, parentId, createdAt,
          })), null, 2));
          return;
        }
        if (questions.length === 0) {
          console.log('No questions');
          return;
        }
        questions.forEach(question => console.log(formatQuestion(question)));
      } catch (error) {
        exitWithError(error);
      }
    });
}
