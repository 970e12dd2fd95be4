/**
 * kb - direct knowledge base maintenance.
 */
import { Command } from 'commander';
import { exitWithError, parseCount, parseKeyValues, withSystem } from '../runtime.js';
import { logger as log } from '../../utils/logger.js';

interface KbAddOptions {
  meta?: string[];
  rewordings?: number;
}

function createKbAddCommand(): Command {
  return new Command('add')
    .description('Index a question/answer pair')
    .argument('<question>', 'Question text')
    .argument('<answer>', 'Answer text')
    .option('-m, --meta <pairs...>', 'Metadata as key=value')
    .option('-r, --rewordings <count>', 'Rewordings to index as well', parseCount)
    .action(async (question: string, answer: string, options: KbAddOptions, command: Command) => {
      try {
        const metadata = parseKeyValues(options.meta);
        const indexed = await withSystem(command, system =>
          system.kb.addQa(question, answer, metadata, options.rewordings ?? 0)
        );
        log.success(`Indexed ${indexed.size} question${indexed.size === 1 ? '' : 's'}`);
      } catch (error) {
        exitWithError(error);
      }
    });
}

function createKbResetCommand(): Command {
  return new Command('reset')
    .description('Drop and recreate the knowledge base collection')
    .action(async (_options: unknown, command: Command) => {
      try {
        const name = await withSystem(command, async system => {
          await system.kb.resetDatabase();
          return system.kb.collectionName;
        });
        log.success(`Collection '${name}' has been reset`);
      } catch (error) {
        exitWithError(error);
      }
    });
}

export function createKbCommand(): Command {
  return new Command('kb')
    .description('Knowledge base maintenance')
    .addCommand(createKbAddCommand())
    .addCommand(createKbResetCommand());
}
