// Loads KEY=value pairs from a .env file into the environment before settings are read
import { config, type DotenvPopulateInput } from 'dotenv';

export const DEFAULT_ENV_FILE = '.env';

/**
 * Apply the variables of `path` to `env` (process.env by default).
 * Variables already set in the environment win. A missing file is not an error.
 *
 * @returns the names of the variables found in the file
 */
export function loadEnvFile(path: string = DEFAULT_ENV_FILE, env?: DotenvPopulateInput): string[] {
  const result = env ? config({ path, processEnv: env }) : config({ path });

  if (result.error) {
    if ('code' in result.error && result.error.code === 'ENOENT') {
      return [];
    }
    throw result.error;
  }

  return Object.keys(result.parsed ?? {});
}
