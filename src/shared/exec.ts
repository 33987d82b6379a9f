// Attached process runner — both the provisioning step and the hand-off go
// through runAttached(). The child shares our stdin/stdout/stderr and
// environment, runs with no timeout, and receives the termination signals
// sent to us (as PID 1 we are the only process the container runtime signals).
import { constants } from 'node:os';
import execa from 'execa';
import { EntrypointError, EntrypointErrorCode, ExitCode } from './errors.js';

export interface ExecResult {
  exitCode: number;
  signal?: string;
}

export const FORWARDED_SIGNALS: readonly NodeJS.Signals[] = ['SIGTERM', 'SIGINT', 'SIGHUP', 'SIGQUIT', 'SIGUSR2'];

/**
 * On a terminal the child shares our process group, so Ctrl-C already reaches
 * it; forwarding SIGINT as well would deliver it twice.
 */
export function forwardedSignals(interactive: boolean): NodeJS.Signals[] {
  return FORWARDED_SIGNALS.filter((signal) => !(interactive && signal === 'SIGINT'));
}

const SIGNAL_NUMBERS = new Map<string, number>(Object.entries(constants.signals));

const NOT_EXECUTABLE_CODES = new Set(['EACCES', 'EISDIR', 'ENOEXEC']);

export async function runAttached(command: string, args: readonly string[]): Promise<ExecResult> {
  const child = execa(command, [...args], {
    stdio: 'inherit',
    reject: false,
  });

  // The child owns its shutdown: no SIGKILL escalation after a forwarded SIGTERM.
  const forward = (signal: NodeJS.Signals): void => {
    child.kill(signal, { forceKillAfterTimeout: false });
  };
  const signals = forwardedSignals(process.stdin.isTTY === true);
  for (const signal of signals) process.on(signal, forward);

  try {
    let result: execa.ExecaReturnValue;
    try {
      result = await child;
    } catch (err) {
      throw new EntrypointError(EntrypointErrorCode.SPAWN_FAILED, `Command failed to spawn: ${command}`, {
        cause: err instanceof Error ? err.message : String(err),
      });
    }
    if (result.failed && 'code' in result && typeof result.code === 'string') {
      throw spawnError(command, result.code);
    }
    const signal = result.signal ?? undefined;
    return { exitCode: exitStatus(result.exitCode, signal), signal };
  } finally {
    for (const signal of signals) process.off(signal, forward);
  }
}

/** Shell convention: a child killed by signal N reports 128 + N. */
export function exitStatus(exitCode: number | undefined, signal: string | undefined): number {
  if (signal) return ExitCode.SIGNAL_BASE + (SIGNAL_NUMBERS.get(signal) ?? 0);
  return typeof exitCode === 'number' ? exitCode : ExitCode.FAILURE;
}

function spawnError(command: string, errno: string): EntrypointError {
  if (errno === 'ENOENT') {
    return new EntrypointError(EntrypointErrorCode.COMMAND_NOT_FOUND, `Command not found: ${command}`, { errno });
  }
  if (NOT_EXECUTABLE_CODES.has(errno)) {
    return new EntrypointError(EntrypointErrorCode.COMMAND_NOT_EXECUTABLE, `Command is not executable: ${command}`, {
      errno,
    });
  }
  return new EntrypointError(EntrypointErrorCode.SPAWN_FAILED, `Command failed to spawn: ${command}`, { errno });
}
