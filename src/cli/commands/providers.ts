/**
 * providers - show which completion providers have an API key.
 */
import { Command } from 'commander';
import { exitWithError, type GlobalOptions } from '../runtime.js';
import { formatProvider } from '../format.js';
import { loadConfig } from '../../core/config/loader.js';
import { listProviders } from '../../llm/providers/factory.js';
import { loadCredentials } from '../../utils/credentials.js';

interface ProvidersOptions {
  json?: boolean;
}

export function createProvidersCommand(): Command {
  return new Command('providers')
    .description('List completion providers and whether each is configured')
    .option('--json', 'Output as JSON')
    .action(async (options: ProvidersOptions, command: Command) => {
      try {
        const projectRoot = process.cwd();
        const config = await loadConfig(projectRoot, command.optsWithGlobals<GlobalOptions>().config);
        const providers = listProviders(config.llm, await loadCredentials(projectRoot));

        if (options.json) {
          console.log(JSON.stringify(providers, null, 2));
          return;
        }
        providers.forEach(provider => console.log(formatProvider(provider, config.llm.default_provider)));
      } catch (error) {
        exitWithError(error);
      }
    });
}
