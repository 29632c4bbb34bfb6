import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import YAML from 'yaml';
import { ConfigError } from '../errors.js';
import { createLogger } from '../logger.js';
import { ConfigSchema, type GradfetchConfig } from '../types/schemas.js';

const log = createLogger('config');

/**
 * Config file location:
 * `$GRADFETCH_CONFIG`, else `$XDG_CONFIG_HOME/gradfetch/config.yaml`,
 * else `~/.config/gradfetch/config.yaml`.
 */
export function configPath(env: NodeJS.ProcessEnv = process.env): string {
  if (env.GRADFETCH_CONFIG) return env.GRADFETCH_CONFIG;
  const base = env.XDG_CONFIG_HOME || path.join(os.homedir(), '.config');
  return path.join(base, 'gradfetch', 'config.yaml');
}

/**
 * Load and validate the config file.
 * Returns null when the file does not exist.
 */
export function loadConfig(filePath: string = configPath()): GradfetchConfig | null {
  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      log.debug('no config file', filePath);
      return null;
    }
    throw new ConfigError(filePath, 'Failed to read config file', { cause: err });
  }

  let raw: unknown;
  try {
    raw = YAML.parse(content);
  } catch (err) {
    throw new ConfigError(filePath, 'Config file is not valid YAML', { cause: err });
  }

  // An empty file parses to null
  const result = ConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    throw new ConfigError(filePath, `Invalid config (${where}${issue.message})`, { cause: result.error });
  }

  log.debug('loaded config', filePath, result.data);
  return result.data;
}

/** Write the config as YAML, creating parent directories as needed. */
export function saveConfig(config: GradfetchConfig, filePath: string = configPath()): void {
  try {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, YAML.stringify(config));
  } catch (err) {
    throw new ConfigError(filePath, 'Failed to write config file', { cause: err });
  }
  log.info('saved config', filePath);
}
