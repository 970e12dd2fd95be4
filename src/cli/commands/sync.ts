/**
 * sync - reconcile answers between the tree and the knowledge base.
 */
import { Command, Option } from 'commander';
import { exitWithError, withSystem } from '../runtime.js';
import { formatSyncReport } from '../format.js';
import type { SyncReport } from '../../core/sync/synchronizer.js';

type Direction = 'kb-to-tree' | 'tree-to-kb' | 'both';

interface SyncOptions {
  direction: Direction;
  json?: boolean;
}

export function createSyncCommand(): Command {
  return new Command('sync')
    .description('Synchronize answers between the question tree and the knowledge base')
    .addOption(
      new Option('-d, --direction <direction>', 'Which way to copy answers')
        .choices(['kb-to-tree', 'tree-to-kb', 'both'])
        .default('both')
    )
    .option('--json', 'Output as JSON')
    .action(async (options: SyncOptions, command: Command) => {
      try {
        const reports = await withSystem(command, async system => {
          const done: SyncReport[] = [];
          if (options.direction !== 'tree-to-kb') done.push(await system.syncKbToTree());
          if (options.direction !== 'kb-to-tree') done.push(await system.syncTreeToKb());
          return done;
        });

        if (options.json) {
          console.log(JSON.stringify(reports, null, 2));
        } else {
          reports.forEach(report => console.log(formatSyncReport(report)));
        }
      } catch (error) {
        exitWithError(error);
      }
    });
}
