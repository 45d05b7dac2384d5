/**
 * Error taxonomy
 * Every failure that ends an invocation is a KeepcError with a stable code.
 */

export type KeepcErrorCode =
  | 'CONFIG_DIR_UNAVAILABLE'
  | 'STORE_CORRUPT'
  | 'STORE_WRITE_FAILED'
  | 'EMPTY_COMMAND_TEXT'
  | 'EDITOR_LAUNCH_FAILED'
  | 'EDITOR_NON_ZERO_EXIT'
  | 'SHELL_LAUNCH_FAILED'
  | 'SHELL_NON_ZERO_EXIT';

export class KeepcError extends Error {
  readonly code: KeepcErrorCode;
  readonly exitCode: number;

  constructor(code: KeepcErrorCode, message: string, options: { cause?: unknown; exitCode?: number } = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'KeepcError';
    this.code = code;
    this.exitCode = options.exitCode ?? 1;
  }
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

export class ConfigDirUnavailableError extends KeepcError {
  constructor(reason: string) {
    super('CONFIG_DIR_UNAVAILABLE', `Could not determine config directory: ${reason}`);
    this.name = 'ConfigDirUnavailableError';
  }
}

export class StoreCorruptError extends KeepcError {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    super('STORE_CORRUPT', `Failed to parse commands file ${path}: ${describeCause(cause)}`, { cause });
    this.name = 'StoreCorruptError';
    this.path = path;
  }
}

export class StoreWriteFailedError extends KeepcError {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    super('STORE_WRITE_FAILED', `Failed to write commands file ${path}: ${describeCause(cause)}`, { cause });
    this.name = 'StoreWriteFailedError';
    this.path = path;
  }
}

export class EmptyCommandTextError extends KeepcError {
  constructor() {
    super('EMPTY_COMMAND_TEXT', 'Command cannot be empty');
    this.name = 'EmptyCommandTextError';
  }
}

export class EditorLaunchFailedError extends KeepcError {
  readonly editor: string;

  constructor(editor: string, cause: unknown) {
    super('EDITOR_LAUNCH_FAILED', `Failed to open editor ${editor}: ${describeCause(cause)}`, { cause });
    this.name = 'EditorLaunchFailedError';
    this.editor = editor;
  }
}

export class EditorNonZeroExitError extends KeepcError {
  readonly status: number;

  constructor(editor: string, status: number) {
    super('EDITOR_NON_ZERO_EXIT', `Editor ${editor} exited with non-zero status ${status}`);
    this.name = 'EditorNonZeroExitError';
    this.status = status;
  }
}

export class ShellLaunchFailedError extends KeepcError {
  readonly command: string;

  constructor(command: string, cause: unknown) {
    super('SHELL_LAUNCH_FAILED', `Failed to execute ${command}: ${describeCause(cause)}`, { cause });
    this.name = 'ShellLaunchFailedError';
    this.command = command;
  }
}

/**
 * The child's status becomes the process exit code
 */
export class ShellNonZeroExitError extends KeepcError {
  readonly command: string;
  readonly status: number;

  constructor(command: string, status: number) {
    super('SHELL_NON_ZERO_EXIT', `Command exited with status ${status}: ${command}`, { exitCode: status });
    this.name = 'ShellNonZeroExitError';
    this.command = command;
    this.status = status;
  }
}

export function isKeepcError(error: unknown): error is KeepcError {
  return error instanceof KeepcError;
}
