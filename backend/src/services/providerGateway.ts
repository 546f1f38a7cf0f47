import {
  BothProvidersFailedError,
  PipelineError,
  ProviderError,
  ProviderTimeoutError,
  TurnCancelledError,
  describeError,
} from '../errors';
import type { Logger } from '../logger';
import type { Capability, Provider, ProviderRole } from '../types';
import type { FallbackManager, ProviderLease } from './fallbackManager';

export interface GatewayOptions<Req, Res> {
  capability: Capability;
  providers: Record<ProviderRole, Provider<Req, Res>>;
  fallbackManager: FallbackManager;
  timeoutMs: number;
  /** Returns why a result is unusable, or null when it is fine. */
  validate?: (result: Res) => string | null;
  logger?: Logger;
}

export interface GatewayResult<Res> {
  value: Res;
  role: ProviderRole;
  provider: string;
  /** Failures that happened before the call succeeded on the alternate. */
  recovered: PipelineError[];
}

type Attempt<Res> = { ok: true; value: Res } | { ok: false; error: PipelineError };

/**
 * Runs `task` with its own AbortSignal, rejecting with `onTimeout()` once
 * `timeoutMs` passes and with `onCancel()` when `parent` aborts.
 */
export function runWithTimeout<T>(
  task: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  parent: AbortSignal | undefined,
  onTimeout: () => Error,
  onCancel: () => Error
): Promise<T> {
  const controller = new AbortController();

  return new Promise<T>((resolve, reject) => {
    const cleanup = () => {
      clearTimeout(timer);
      parent?.removeEventListener('abort', cancel);
    };
    const cancel = () => {
      cleanup();
      controller.abort();
      reject(onCancel());
    };
    const timer = setTimeout(() => {
      cleanup();
      controller.abort();
      reject(onTimeout());
    }, timeoutMs);

    if (parent?.aborted) {
      cancel();
      return;
    }
    parent?.addEventListener('abort', cancel, { once: true });

    Promise.resolve()
      .then(() => task(controller.signal))
      .then(
        (value) => {
          cleanup();
          resolve(value);
        },
        (error: unknown) => {
          cleanup();
          reject(error);
        }
      );
  });
}

/**
 * One capability, two interchangeable providers. Each call goes to the
 * provider the FallbackManager picks and, on failure, gets exactly one
 * retry on the provider it names next.
 */
export class ProviderGateway<Req, Res> {
  readonly capability: Capability;
  private readonly providers: Record<ProviderRole, Provider<Req, Res>>;
  private readonly fallbackManager: FallbackManager;
  private readonly timeoutMs: number;
  private readonly validate?: (result: Res) => string | null;
  private readonly logger?: Logger;

  constructor(options: GatewayOptions<Req, Res>) {
    this.capability = options.capability;
    this.providers = options.providers;
    this.fallbackManager = options.fallbackManager;
    this.timeoutMs = options.timeoutMs;
    this.validate = options.validate;
    this.logger = options.logger?.child({ capability: options.capability });
  }

  async call(request: Req, signal?: AbortSignal): Promise<GatewayResult<Res>> {
    const first = this.fallbackManager.selectProvider(this.capability);
    const firstAttempt = await this.attempt(first, request, signal);
    if (firstAttempt.ok) {
      return { value: firstAttempt.value, role: first.role, provider: this.providers[first.role].name, recovered: [] };
    }

    const second = this.fallbackManager.retryTarget(this.capability, first.role);
    const secondAttempt = await this.attempt(second, request, signal);
    if (secondAttempt.ok) {
      return {
        value: secondAttempt.value,
        role: second.role,
        provider: this.providers[second.role].name,
        recovered: [firstAttempt.error],
      };
    }

    const failures =
      first.role === 'primary'
        ? { primary: firstAttempt.error, fallback: secondAttempt.error }
        : { primary: secondAttempt.error, fallback: firstAttempt.error };
    throw new BothProvidersFailedError(this.capability, failures);
  }

  async close(): Promise<void> {
    await Promise.all([this.providers.primary.close?.(), this.providers.fallback.close?.()]);
  }

  /** Provider names, for health reporting. */
  describe(): Record<ProviderRole, string> {
    return { primary: this.providers.primary.name, fallback: this.providers.fallback.name };
  }

  private async attempt(lease: ProviderLease, request: Req, signal?: AbortSignal): Promise<Attempt<Res>> {
    const { role } = lease;
    const provider = this.providers[role];
    const started = Date.now();

    try {
      const value = await runWithTimeout(
        (providerSignal) => provider.call(request, providerSignal),
        this.timeoutMs,
        signal,
        () => new ProviderTimeoutError(this.capability, provider.name, this.timeoutMs),
        () => new TurnCancelledError(this.capability)
      );

      const problem = this.validate?.(value) ?? null;
      if (problem !== null) {
        throw new ProviderError(this.capability, provider.name, problem);
      }

      this.fallbackManager.reportOutcome(this.capability, lease, true);
      this.logger?.debug({ role, probe: lease.probe, provider: provider.name, ms: Date.now() - started }, 'Provider call succeeded');
      return { ok: true, value };
    } catch (error) {
      if (error instanceof TurnCancelledError) {
        this.fallbackManager.abandon(this.capability, lease);
        throw error;
      }

      const failure =
        error instanceof PipelineError
          ? error
          : new ProviderError(this.capability, provider.name, describeError(error), error);
      this.fallbackManager.reportOutcome(this.capability, lease, false);
      this.logger?.warn(
        { role, provider: provider.name, kind: failure.kind, ms: Date.now() - started, err: failure.message },
        'Provider call failed'
      );
      return { ok: false, error: failure };
    }
  }
}
