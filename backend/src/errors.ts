import type { ZodError } from 'zod';
import type { Capability, ErrorKind, ProviderRole, TurnFailure } from './types';

/**
 * Base class for every failure the turn pipeline knows how to report.
 * `kind` is what ends up in an OrchestratorResult.
 */
export class PipelineError extends Error {
  public readonly kind: ErrorKind;
  public readonly capability?: Capability;

  constructor(kind: ErrorKind, message: string, capability?: Capability) {
    super(message);
    this.name = 'PipelineError';
    this.kind = kind;
    this.capability = capability;
    Object.setPrototypeOf(this, PipelineError.prototype);
  }

  toFailure(): TurnFailure {
    return this.capability
      ? { kind: this.kind, capability: this.capability, message: this.message }
      : { kind: this.kind, message: this.message };
  }
}

export class ProviderTimeoutError extends PipelineError {
  public readonly provider: string;
  public readonly timeoutMs: number;

  constructor(capability: Capability, provider: string, timeoutMs: number) {
    super('ProviderTimeout', `${provider} did not answer within ${timeoutMs}ms`, capability);
    this.name = 'ProviderTimeoutError';
    this.provider = provider;
    this.timeoutMs = timeoutMs;
    Object.setPrototypeOf(this, ProviderTimeoutError.prototype);
  }
}

export class ProviderError extends PipelineError {
  public readonly provider: string;
  public override readonly cause: unknown;

  constructor(capability: Capability, provider: string, reason: string, cause?: unknown) {
    super('ProviderError', `${provider} failed: ${reason}`, capability);
    this.name = 'ProviderError';
    this.provider = provider;
    this.cause = cause;
    Object.setPrototypeOf(this, ProviderError.prototype);
  }
}

export class MarkupBuildError extends PipelineError {
  constructor(reason: string) {
    super('MarkupBuildFailure', `Markup is not well-formed: ${reason}`, 'synthesis');
    this.name = 'MarkupBuildError';
    Object.setPrototypeOf(this, MarkupBuildError.prototype);
  }
}

export class MemoryWriteError extends PipelineError {
  public readonly sessionId: string;
  public override readonly cause: unknown;

  constructor(sessionId: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super('MemoryWriteFailure', `Failed to persist turn for ${sessionId}: ${reason}`);
    this.name = 'MemoryWriteError';
    this.sessionId = sessionId;
    this.cause = cause;
    Object.setPrototypeOf(this, MemoryWriteError.prototype);
  }
}

export class BothProvidersFailedError extends PipelineError {
  public readonly failures: Record<ProviderRole, PipelineError>;

  constructor(capability: Capability, failures: Record<ProviderRole, PipelineError>) {
    super(
      'BothProvidersFailed',
      `All ${capability} providers failed (primary: ${failures.primary.message}; fallback: ${failures.fallback.message})`,
      capability
    );
    this.name = 'BothProvidersFailedError';
    this.failures = failures;
    Object.setPrototypeOf(this, BothProvidersFailedError.prototype);
  }
}

export class TurnCancelledError extends PipelineError {
  constructor(capability?: Capability) {
    super('TurnCancelled', 'Turn was cancelled by the caller', capability);
    this.name = 'TurnCancelledError';
    Object.setPrototypeOf(this, TurnCancelledError.prototype);
  }
}

/**
 * Thrown at startup when the environment fails schema validation.
 */
export class ConfigError extends Error {
  public readonly zodError: ZodError;

  constructor(zodError: ZodError) {
    const brief = zodError.issues
      .map((i) => `  [${i.path.join('.')}] ${i.message}`)
      .join('\n');
    super(`Invalid configuration:\n${brief}`);
    this.name = 'ConfigError';
    this.zodError = zodError;
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
