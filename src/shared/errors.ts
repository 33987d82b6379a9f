/** Exit statuses the wrapper itself produces (sysexits.h and shell conventions). */
export const ExitCode = {
  OK: 0,
  FAILURE: 1,
  USAGE: 64,
  CONFIG: 78,
  NOT_EXECUTABLE: 126,
  NOT_FOUND: 127,
  SIGNAL_BASE: 128,
} as const;

export enum EntrypointErrorCode {
  EMPTY_COMMAND = 'EMPTY_COMMAND',
  COMMAND_NOT_FOUND = 'COMMAND_NOT_FOUND',
  COMMAND_NOT_EXECUTABLE = 'COMMAND_NOT_EXECUTABLE',
  SPAWN_FAILED = 'SPAWN_FAILED',
  CONFIG_INVALID = 'CONFIG_INVALID',
}

const DEFAULT_EXIT_CODES: Record<EntrypointErrorCode, number> = {
  [EntrypointErrorCode.EMPTY_COMMAND]: ExitCode.USAGE,
  [EntrypointErrorCode.COMMAND_NOT_FOUND]: ExitCode.NOT_FOUND,
  [EntrypointErrorCode.COMMAND_NOT_EXECUTABLE]: ExitCode.NOT_EXECUTABLE,
  [EntrypointErrorCode.SPAWN_FAILED]: ExitCode.NOT_EXECUTABLE,
  [EntrypointErrorCode.CONFIG_INVALID]: ExitCode.CONFIG,
};

export class EntrypointError extends Error {
  readonly code: EntrypointErrorCode;
  readonly exitCode: number;
  readonly context?: Record<string, unknown>;

  constructor(code: EntrypointErrorCode, message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'EntrypointError';
    this.code = code;
    this.exitCode = DEFAULT_EXIT_CODES[code];
    this.context = context;
  }
}
