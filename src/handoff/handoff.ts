// Hand-off to the container's main process. Node has no execve(), so the
// command runs as our child with inherited stdio and environment, receives the
// signals we receive, and its exit status becomes ours.
import type { Logger } from 'pino';
import { runAttached } from '../shared/exec.js';
import { EntrypointError, EntrypointErrorCode } from '../shared/errors.js';

export function assertCommand(argv: readonly string[]): [string, ...string[]] {
  const [command, ...args] = argv;
  if (command === undefined || command === '') {
    throw new EntrypointError(
      EntrypointErrorCode.EMPTY_COMMAND,
      'No command to hand off to. Usage: container-entrypoint <command> [args...]'
    );
  }
  return [command, ...args];
}

export async function handOff(argv: readonly string[], logger: Logger): Promise<number> {
  const [command, ...args] = assertCommand(argv);
  const { exitCode, signal } = await runAttached(command, args);
  logger.debug({ command, exitCode, signal }, 'Main process exited');
  return exitCode;
}
