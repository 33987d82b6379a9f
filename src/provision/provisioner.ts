import type { Logger } from 'pino';
import type { ProvisionerConfig } from '../types/config.js';
import { runAttached } from '../shared/exec.js';

/** `-i <inventory> <playbook> [...extra]`; the defaults give `-i inventory/hosts.ini site.yml`. */
export function buildProvisionArgs(config: ProvisionerConfig): string[] {
  return ['-i', config.inventory, config.playbook, ...config.extra_args];
}

/**
 * Runs the provisioning playbook to completion and returns its exit status.
 * Blocks for as long as the provisioner runs; there is no timeout.
 */
export async function runProvisioning(config: ProvisionerConfig, logger: Logger): Promise<number> {
  const args = buildProvisionArgs(config);
  logger.debug({ command: config.command, args }, 'Spawning provisioner');
  const { exitCode, signal } = await runAttached(config.command, args);
  logger.debug({ command: config.command, exitCode, signal }, 'Provisioner exited');
  return exitCode;
}
