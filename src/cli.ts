import { loadConfig, type ConfigResult } from './config/loader.js';
import { createLogger } from './logger.js';
import { runEntrypoint } from './entrypoint.js';
import { runProvisioning } from './provision/provisioner.js';
import { handOff } from './handoff/handoff.js';
import { EntrypointError } from './shared/errors.js';

/**
 * Loads configuration, provisions, then hands off to `argv`.
 * Resolves with the status the process should exit with.
 */
export async function main(argv: readonly string[], env: Record<string, string | undefined> = process.env): Promise<number> {
  let loaded: ConfigResult;
  try {
    loaded = loadConfig(env);
  } catch (err) {
    if (!(err instanceof EntrypointError)) throw err;
    createLogger().error({ code: err.code, context: err.context }, err.message);
    return err.exitCode;
  }

  const { config, configPath } = loaded;
  const logger = createLogger(config.log_level);
  logger.debug({ configPath, config }, 'Configuration loaded');

  const outcome = await runEntrypoint(argv, config, {
    provision: (provisioner) => runProvisioning(provisioner, logger),
    handOff: (command) => handOff(command, logger),
    logger,
  });
  logger.debug({ outcome }, 'Entrypoint finished');
  return outcome.exitCode;
}
