// Entrypoint sequencing: PROVISIONING → HANDED_OFF, or PROVISIONING → FAILED.
// Provisioning must exit 0 before the hand-off is attempted; nothing is
// retried and no state is ever re-entered.
import type { Logger } from 'pino';
import type { EntrypointConfig, ProvisionerConfig } from './types/config.js';
import { EntrypointError, ExitCode } from './shared/errors.js';
import { assertCommand } from './handoff/handoff.js';

export type EntrypointState = 'PROVISIONING' | 'HANDED_OFF' | 'FAILED';

export interface EntrypointOutcome {
  state: EntrypointState;
  /** Status the wrapper process must exit with. */
  exitCode: number;
}

export interface EntrypointDeps {
  provision: (config: ProvisionerConfig) => Promise<number>;
  handOff: (argv: readonly string[]) => Promise<number>;
  logger: Logger;
}

export async function runEntrypoint(
  argv: readonly string[],
  config: EntrypointConfig,
  deps: EntrypointDeps
): Promise<EntrypointOutcome> {
  const { logger } = deps;
  let state: EntrypointState = 'PROVISIONING';

  try {
    // Refuse before provisioning: a run that cannot hand off should not mutate anything.
    assertCommand(argv);

    const { command, inventory, playbook } = config.provisioner;
    logger.info({ state, command, inventory, playbook }, '===> Running provisioning playbook');
    const provisionStatus = await deps.provision(config.provisioner);
    if (provisionStatus !== ExitCode.OK) {
      logger.error({ exitCode: provisionStatus }, 'Provisioning failed; main process not started');
      return { state: 'FAILED', exitCode: provisionStatus };
    }

    state = 'HANDED_OFF';
    logger.info({ state, argv }, `===> Handing off to main process: ${argv.join(' ')}`);
    const exitCode = await deps.handOff(argv);
    return { state, exitCode };
  } catch (err) {
    if (!(err instanceof EntrypointError)) throw err;
    logger.error({ code: err.code, context: err.context, failedIn: state }, err.message);
    return { state: 'FAILED', exitCode: err.exitCode };
  }
}
