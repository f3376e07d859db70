export class FlagrunnerError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'FlagrunnerError';
  }
}

export class ConfigError extends FlagrunnerError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class CryptoError extends FlagrunnerError {
  constructor(message: string) {
    super(message);
    this.name = 'CryptoError';
  }
}

export type SettingsErrorKind = 'invalid_token' | 'invalid_json' | 'not_object';

export class SettingsError extends FlagrunnerError {
  readonly kind: SettingsErrorKind;

  constructor(kind: SettingsErrorKind, message: string) {
    super(message);
    this.name = 'SettingsError';
    this.kind = kind;
  }
}

export class BrokerUnavailableError extends FlagrunnerError {
  constructor(message: string) {
    super(message);
    this.name = 'BrokerUnavailableError';
  }
}

export class EngineError extends FlagrunnerError {
  constructor(message: string) {
    super(message);
    this.name = 'EngineError';
  }
}

export class CompletionTimeoutError extends FlagrunnerError {
  readonly id: string;

  constructor(id: string, timeoutMs: number) {
    super(`No completion for ${id} within ${timeoutMs}ms`);
    this.name = 'CompletionTimeoutError';
    this.id = id;
  }
}

export class CompletionCancelledError extends FlagrunnerError {
  readonly id: string;

  constructor(id: string, reason: string) {
    super(`Completion for ${id} cancelled: ${reason}`);
    this.name = 'CompletionCancelledError';
    this.id = id;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
