/**
 * Error hierarchy shared by the knowledge base, configuration and CLI.
 */

export interface ThreatScopeErrorOptions {
  cause?: unknown;
  /** The message has already been shown to the user. */
  reported?: boolean;
}

export class ThreatScopeError extends Error {
  public readonly reported: boolean;

  constructor(message: string, options: ThreatScopeErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = 'ThreatScopeError';
    this.reported = options.reported ?? false;
  }
}

/** The ATT&CK dataset could not be fetched, read, parsed or cached. */
export class AttackDataError extends ThreatScopeError {
  constructor(message: string, options?: ThreatScopeErrorOptions) {
    super(message, options);
    this.name = 'AttackDataError';
  }
}

export class ConfigError extends ThreatScopeError {
  constructor(
    message: string,
    public readonly key?: string,
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

/** A named actor or tool does not exist in the dataset. */
export class LookupError extends ThreatScopeError {
  constructor(
    public readonly kind: 'actor' | 'tool',
    public readonly query: string,
  ) {
    super(`No ${kind} named "${query}" in the ATT&CK dataset`);
    this.name = 'LookupError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
