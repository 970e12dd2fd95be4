import * as path from 'node:path';
import { ConfigSchema, LogLevelSchema, type Config } from './schema.js';
import { loadYamlWithSchema, fileExists } from '../../utils/index.js';
import { ConfigError, ErrorCodes } from '../../utils/errors.js';

const DEFAULT_CONFIG_PATH = '.qa-store/config.yaml';

type Env = Record<string, string | undefined>;

/**
 * Default configuration values.
 * Used when no config file exists.
 */
export function getDefaultConfig(): Config {
  return ConfigSchema.parse({});
}

/**
 * Apply environment variable overrides on top of file settings.
 */
export function applyEnvOverrides(config: Config, env: Env = process.env): Config {
  const level = LogLevelSchema.safeParse(env.LOG_LEVEL?.toLowerCase());

  return {
    ...config,
    storage: {
      ...config.storage,
      db_dir: env.DB_DIR || config.storage.db_dir,
      collection: env.DEFAULT_COLLECTION_NAME || config.storage.collection,
    },
    embedding: {
      ...config.embedding,
      model: env.EMBEDDING_MODEL_NAME || config.embedding.model,
    },
    llm: {
      ...config.llm,
      rewording_model: env.REWORDING_MODEL_NAME || config.llm.rewording_model,
      qa_pairs_model: env.QA_PAIRS_MODEL_NAME || config.llm.qa_pairs_model,
    },
    logging: level.success ? { level: level.data } : config.logging,
  };
}

/**
 * Load configuration from a file.
 * Falls back to defaults if the file doesn't exist. Environment variables
 * take precedence over both.
 */
export async function loadConfig(
  projectRoot: string,
  configPath?: string,
  env: Env = process.env
): Promise<Config> {
  const fullPath = configPath
    ? path.resolve(projectRoot, configPath)
    : path.resolve(projectRoot, DEFAULT_CONFIG_PATH);

  if (!(await fileExists(fullPath))) {
    return applyEnvOverrides(getDefaultConfig(), env);
  }

  try {
    return applyEnvOverrides(await loadYamlWithSchema(fullPath, ConfigSchema), env);
  } catch (error) {
    if (error instanceof Error) {
      throw new ConfigError(
        ErrorCodes.CONFIG_LOAD_ERROR,
        `Failed to load config from ${fullPath}: ${error.message}`,
        { path: fullPath, originalError: error.message }
      );
    }
    throw error;
  }
}

/**
 * Get the expected config file path for a project.
 */
export function getConfigPath(projectRoot: string): string {
  return path.resolve(projectRoot, DEFAULT_CONFIG_PATH);
}

/**
 * Resolve the tree database and vector database paths for a configuration.
 */
export function resolveStoragePaths(
  projectRoot: string,
  config: Config
): { treeDbPath: string; vectorDbPath: string } {
  const dbDir = path.resolve(projectRoot, config.storage.db_dir);
  return {
    treeDbPath: path.join(dbDir, `${config.storage.collection}.db`),
    vectorDbPath: path.join(dbDir, 'vectors.sqlite'),
  };
}
