import chalk from 'chalk';
import YAML from 'yaml';
import { ALL_BACKENDS, backends } from '../backends/registry.js';
import { getAvailableBackends } from '../backends/run.js';
import { formatBackendLine } from '../display/format.js';
import { configPath, loadConfig } from '../utils/config.js';
import { reportError } from './_shared.js';

/**
 * Config command — show where the config lives, what it holds and which
 * backends are installed
 */
export async function configCommand(options: { path?: boolean }): Promise<void> {
  try {
    const filePath = configPath();
    if (options.path) {
      console.log(filePath);
      return;
    }

    const config = loadConfig(filePath);
    if (!config) {
      console.log(chalk.gray(`No config file at ${filePath}`));
      console.log(chalk.gray('Create one with "gradfetch render --save ..."'));
    } else {
      console.log(chalk.gray(`# ${filePath}`));
      process.stdout.write(YAML.stringify(config));
    }

    const available = new Set(await getAvailableBackends());
    console.log();
    console.log(chalk.gray('Backends:'));
    for (const name of ALL_BACKENDS) {
      console.log(formatBackendLine(backends[name], available.has(name)));
    }
  } catch (error) {
    reportError(error);
  }
}
