/**
 * init - write a configuration file with every default spelled out.
 */
import * as path from 'node:path';
import { Command } from 'commander';
import { exitWithError, type GlobalOptions } from '../runtime.js';
import { getConfigPath, getDefaultConfig } from '../../core/config/loader.js';
import { fileExists } from '../../utils/file-system.js';
import { writeYaml } from '../../utils/yaml.js';
import { logger as log } from '../../utils/logger.js';

interface InitOptions {
  force?: boolean;
}

export function createInitCommand(): Command {
  return new Command('init')
    .description('Create a default configuration file')
    .option('--force', 'Overwrite an existing configuration file')
    .action(async (options: InitOptions, command: Command) => {
      try {
        const projectRoot = process.cwd();
        const { config } = command.optsWithGlobals<GlobalOptions>();
        const configPath = config ? path.resolve(projectRoot, config) : getConfigPath(projectRoot);
        const shown = path.relative(projectRoot, configPath);

        if (!options.force && (await fileExists(configPath))) {
          log.warn(`${shown} already exists. Use --force to overwrite.`);
          return;
        }

        await writeYaml(configPath, getDefaultConfig());
        log.success(`Created ${shown}`);
      } catch (error) {
        exitWithError(error);
      }
    });
}
