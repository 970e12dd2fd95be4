/**
 * Shared plumbing for CLI commands: opening the system from the global
 * options, option parsers, and error exit.
 */
import { InvalidArgumentError, type Command } from 'commander';
import { loadConfig } from '../core/config/loader.js';
import {
  openQuestionAnswerSystem,
  type QuestionAnswerSystem,
} from '../core/service/question-service.js';
import type { Metadata, MetadataValue } from '../core/kb/types.js';
import { loadCredentials } from '../utils/credentials.js';
import { QaStoreError, errorMessage } from '../utils/errors.js';
import { logger as log } from '../utils/logger.js';

export type GlobalOptions = {
  config?: string;
  verbose?: boolean;
  quiet?: boolean;
};

/**
 * Load configuration relative to the working directory and open the system.
 * --verbose and --quiet override the configured log level.
 */
export async function openSystem(options: GlobalOptions): Promise<QuestionAnswerSystem> {
  const projectRoot = process.cwd();
  const config = await loadConfig(projectRoot, options.config);
  log.setLevel(options.verbose ? 'debug' : options.quiet ? 'error' : config.logging.level);

  const credentials = await loadCredentials(projectRoot);
  return openQuestionAnswerSystem(projectRoot, config, credentials);
}

/**
 * Run `fn` against an open system and close it afterwards.
 */
export async function withSystem<T>(
  command: Command,
  fn: (system: QuestionAnswerSystem) => Promise<T>
): Promise<T> {
  const system = await openSystem(command.optsWithGlobals<GlobalOptions>());
  try {
    return await fn(system);
  } finally {
    system.close();
  }
}

/**
 * Print the error and exit with status 1.
 */
export function exitWithError(error: unknown): never {
  if (error instanceof QaStoreError) {
    log.error(`${error.code}: ${error.message}`);
  } else {
    log.error(errorMessage(error));
  }
  process.exit(1);
}

/** Commander parser for question ids. */
export function parseId(value: string): number {
  const id = Number(value);
  if (!Number.isInteger(id) || id < 1) {
    throw new InvalidArgumentError('Expected a positive integer id.');
  }
  return id;
}

/** Commander parser for non-negative counts. */
export function parseCount(value: string): number {
  const count = Number(value);
  if (!Number.isInteger(count) || count < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return count;
}

function parseScalar(raw: string): MetadataValue {
  if (raw === 'true') return true;
  if (raw === 'false') return false;
  if (raw.trim() !== '' && Number.isFinite(Number(raw))) return Number(raw);
  return raw;
}

/**
 * Turn `key=value` arguments into metadata. `true`/`false` become booleans
 * and numeric values numbers.
 */
export function parseKeyValues(pairs: string[] = []): Metadata {
  const metadata: Metadata = {};
  for (const pair of pairs) {
    const eq = pair.indexOf('=');
    if (eq <= 0) {
      throw new InvalidArgumentError(`Expected key=value, got "${pair}".`);
    }
    metadata[pair.slice(0, eq).trim()] = parseScalar(pair.slice(eq + 1).trim());
  }
  return metadata;
}
