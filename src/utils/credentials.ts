/**
 * API keys kept in `.qaconfig` files.
 *
 * A `.qaconfig` holds dotenv-style KEY=value lines. `~/.qaconfig` is read
 * first; the project's own file wins for any key both define.
 */
import * as os from 'node:os';
import * as path from 'node:path';
import { fileExists, readFile } from './file-system.js';
import { ConfigError, ErrorCodes, errorMessage } from './errors.js';

export const CREDENTIALS_FILENAME = '.qaconfig';

/** Services whose key may come from a .qaconfig or the environment. */
export type KeyedService = 'openai' | 'anthropic';

/** Lowercased variable names to values, e.g. `openai_api_key`. */
export type Credentials = Record<string, string | undefined>;

const ENTRY = /^([A-Za-z_][\w.-]*)\s*=\s*(.*)$/;

function unquote(value: string): string {
  const quote = value[0];
  if (value.length >= 2 && (quote === '"' || quote === "'") && value.endsWith(quote)) {
    return value.slice(1, -1);
  }
  return value;
}

export function parseCredentials(content: string): Credentials {
  const entries = content
    .split(/\r?\n/)
    .map(line => line.trim())
    .filter(line => line.length > 0 && !line.startsWith('#'))
    .flatMap((line): Array<[string, string]> => {
      const match = ENTRY.exec(line);
      return match ? [[match[1].toLowerCase(), unquote(match[2].trim())]] : [];
    });
  return Object.fromEntries(entries);
}

async function readCredentialsFile(filePath: string): Promise<Credentials> {
  if (!(await fileExists(filePath))) return {};
  try {
    return parseCredentials(await readFile(filePath));
  } catch (error) {
    throw new ConfigError(
      ErrorCodes.CONFIG_LOAD_ERROR,
      `Failed to read ${filePath}: ${errorMessage(error)}`,
      { path: filePath }
    );
  }
}

/**
 * Merge `~/.qaconfig` and, when a project root is given, its `.qaconfig`.
 *
 * @throws ConfigError when a file exists but cannot be read
 */
export async function loadCredentials(
  projectRoot?: string,
  homeDir: string = os.homedir()
): Promise<Credentials> {
  const files = [path.join(homeDir, CREDENTIALS_FILENAME)];
  if (projectRoot) {
    files.push(path.resolve(projectRoot, CREDENTIALS_FILENAME));
  }

  const merged: Credentials = {};
  for (const file of files) {
    Object.assign(merged, await readCredentialsFile(file));
  }
  return merged;
}

/**
 * `<service>_api_key` from the credentials, else `<SERVICE>_API_KEY` from the environment.
 */
export function resolveApiKey(
  credentials: Credentials,
  service: KeyedService,
  env: Record<string, string | undefined> = process.env
): string | undefined {
  return credentials[`${service}_api_key`] || env[`${service.toUpperCase()}_API_KEY`];
}
