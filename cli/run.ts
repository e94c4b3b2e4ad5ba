import { applyCipherConfiguration } from '../services/cipherConfigurator.js';
import { loadConfig, resolveConfigPath } from '../services/config.js';
import { describeFailure, exitCodeFor } from '../services/errors.js';
import type { FirewallConnector } from '../types.js';

export interface RunOptions {
  env?: Record<string, string | undefined>;
  connect?: FirewallConnector;
}

/** Runs the whole sequence once and returns the process exit code. */
export async function run(options: RunOptions = {}): Promise<number> {
  const env = options.env ?? process.env;

  try {
    const configPath = resolveConfigPath(env);
    console.log(`Loading configuration from ${configPath}`);
    const config = await loadConfig(configPath, env);

    const result = await applyCipherConfiguration(config, options.connect);
    console.log(result.applied
      ? 'SSH ciphers applied; the firewall is rebooting.'
      : 'SSH ciphers already applied; the firewall was left untouched.');
    return 0;
  } catch (error) {
    console.error(describeFailure(error));
    return exitCodeFor(error);
  }
}
