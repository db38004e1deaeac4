export type EngineErrorCode =
  | 'COMMAND_REJECTED'
  | 'COLLABORATOR_FAILED'
  | 'PROTOCOL'
  | 'CONFIG';

export class EngineError extends Error {
  readonly code: EngineErrorCode;

  constructor(code: EngineErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** A command that has no transition from the current state. */
export class CommandRejectedError extends EngineError {
  constructor(message: string) {
    super('COMMAND_REJECTED', message);
  }
}

/** System inspection, disk enumeration, project or reboot call failed. */
export class CollaboratorError extends EngineError {
  readonly operation: string;

  constructor(operation: string, cause: unknown) {
    super('COLLABORATOR_FAILED', `${operation} failed: ${errorMessage(cause)}`, { cause });
    this.operation = operation;
  }
}

export class ProtocolError extends EngineError {
  constructor(message: string) {
    super('PROTOCOL', message);
  }
}

export class ConfigError extends EngineError {
  constructor(message: string) {
    super('CONFIG', message);
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === 'string') return err;
  try {
    return JSON.stringify(err);
  } catch {
    return String(err);
  }
}
