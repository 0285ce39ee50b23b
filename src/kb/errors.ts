/**
 * Error taxonomy for ingestion and retrieval
 */

export type ProviderErrorKind = 'quota_exceeded' | 'auth_error' | 'unavailable' | 'malformed';

export type Subsystem = 'vector_store' | 'item_store' | 'metadata' | 'provider';

export class SynapseError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * A model backend call failed. `kind` drives fallback and degradation;
 * the message is for diagnostics only.
 */
export class ProviderError extends SynapseError {
  readonly kind: ProviderErrorKind;
  readonly provider: string;
  readonly status?: number;

  constructor(
    provider: string,
    kind: ProviderErrorKind,
    message: string,
    options: { status?: number; cause?: unknown } = {},
  ) {
    super(`provider_${kind}`, `${provider}: ${message}`, { cause: options.cause });
    this.provider = provider;
    this.kind = kind;
    this.status = options.status;
  }
}

/**
 * Quota and availability failures are eligible for fallback or retry.
 */
export function isTransientProviderError(err: unknown): err is ProviderError {
  return err instanceof ProviderError && (err.kind === 'quota_exceeded' || err.kind === 'unavailable');
}

export class FatalInputError extends SynapseError {}

export class EmbeddingUnavailableError extends FatalInputError {
  constructor(cause: unknown) {
    super(
      'embedding_unavailable',
      `Failed to generate embedding: ${describeError(cause)}`,
      { cause },
    );
  }
}

/**
 * One subsystem failed while an alternative path kept the request alive.
 * Logged, never thrown to callers.
 */
export class PartialSubsystemFailure extends SynapseError {
  readonly subsystem: Subsystem;

  constructor(subsystem: Subsystem, message: string, cause?: unknown) {
    super('partial_subsystem_failure', `${subsystem}: ${message}`, { cause });
    this.subsystem = subsystem;
  }
}

export class DualSubsystemFailure extends SynapseError {
  readonly vectorError: unknown;
  readonly textError: unknown;

  constructor(vectorError: unknown, textError: unknown) {
    super(
      'search_unavailable',
      `Search failed: semantic=${describeError(vectorError)}, text=${describeError(textError)}`,
    );
    this.vectorError = vectorError;
    this.textError = textError;
  }
}

export class RequestTimeoutError extends SynapseError {
  constructor(operation: string, cause?: unknown) {
    super('request_timeout', `${operation} timed out or was cancelled`, { cause });
  }
}

export class InvalidInputError extends SynapseError {
  constructor(message: string) {
    super('invalid_input', message);
  }
}

export class ItemNotFoundError extends SynapseError {
  constructor(id: string) {
    super('item_not_found', `Item not found: ${id}`);
  }
}

export class ConfigError extends SynapseError {
  constructor(message: string) {
    super('invalid_config', message);
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
