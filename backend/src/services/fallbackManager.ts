import type { FallbackSettings } from '../config';
import type { Logger } from '../logger';
import { CAPABILITIES, type Capability, type ProviderHealth, type ProviderRole } from '../types';

export interface FallbackManagerOptions extends FallbackSettings {
  now?: () => number;
  logger?: Logger;
}

export type HealthSnapshot = Record<Capability, Record<ProviderRole, ProviderHealth>>;

/**
 * A provider handed out for one call. `probe` is set when this call is the
 * single probe of a disabled provider; only that call may settle the probe.
 */
export interface ProviderLease {
  role: ProviderRole;
  probe: number | null;
}

const ROLES: readonly ProviderRole[] = ['primary', 'fallback'];

export function alternateOf(role: ProviderRole): ProviderRole {
  return role === 'primary' ? 'fallback' : 'primary';
}

/**
 * Process-wide provider health, one entry per (capability, role).
 *
 * Entries are only read and written synchronously inside these methods, so
 * each update runs to completion before any other turn can observe it.
 */
export class FallbackManager {
  private readonly health = new Map<string, ProviderHealth>();
  // Probe token currently in flight, per (capability, role).
  private readonly probes = new Map<string, number>();
  private probeSeq = 0;
  private readonly settings: FallbackSettings;
  private readonly now: () => number;
  private readonly logger?: Logger;

  constructor(options: FallbackManagerOptions) {
    this.settings = {
      failureThreshold: options.failureThreshold,
      cooldownMs: options.cooldownMs,
      cooldownBackoff: options.cooldownBackoff,
      cooldownMaxMs: options.cooldownMaxMs,
    };
    this.now = options.now ?? Date.now;
    this.logger = options.logger;
    this.reset();
  }

  /**
   * Which provider the next call for this capability should go to.
   * Falls through to the alternate while a provider cools down and hands
   * out exactly one probe once the cool-down has elapsed. With both sides
   * disabled the primary gets a last-resort attempt.
   */
  selectProvider(capability: Capability): ProviderLease {
    const now = this.now();
    for (const role of ROLES) {
      const lease = this.acquire(capability, role, now);
      if (lease) return lease;
    }
    this.logger?.warn({ capability }, 'All providers disabled, last-resort attempt on primary');
    return { role: 'primary', probe: null };
  }

  /**
   * Records how a leased call ended. A failure only restarts the cool-down
   * when it is the probe's own failure; other calls that reach a disabled
   * provider just add to its failure count.
   */
  reportOutcome(capability: Capability, lease: ProviderLease, success: boolean): void {
    const { role } = lease;
    const k = key(capability, role);
    const entry = this.entry(capability, role);
    const now = this.now();
    const ownsProbe = this.ownsProbe(k, lease);

    if (success) {
      if (entry.disabled) {
        this.logger?.info({ capability, role }, 'Provider recovered');
      }
      Object.assign(entry, initialHealth(this.settings.cooldownMs));
      this.probes.delete(k);
      return;
    }

    entry.consecutiveFailures++;
    entry.lastFailureAt = now;

    if (ownsProbe) {
      entry.probing = false;
      this.probes.delete(k);
      entry.cooldownMs = Math.min(this.settings.cooldownMaxMs, entry.cooldownMs * this.settings.cooldownBackoff);
      entry.disabledUntil = now + entry.cooldownMs;
      this.logger?.warn({ capability, role, cooldownMs: entry.cooldownMs }, 'Probe failed, cool-down restarted');
    } else if (!entry.disabled && entry.consecutiveFailures >= this.settings.failureThreshold) {
      entry.disabled = true;
      entry.disabledUntil = now + entry.cooldownMs;
      this.logger?.warn(
        { capability, role, failures: entry.consecutiveFailures, cooldownMs: entry.cooldownMs },
        'Provider disabled'
      );
    }
  }

  /**
   * Where the single retry goes after `failed` let a call down. A turn
   * never retries the same provider.
   */
  retryTarget(capability: Capability, failed: ProviderRole): ProviderLease {
    const target = alternateOf(failed);
    this.logger?.info({ capability, failed, target }, 'Retrying on alternate provider');
    return this.acquire(capability, target, this.now()) ?? { role: target, probe: null };
  }

  /**
   * Releases the probe slot without counting an outcome, for calls the
   * caller cancelled before the provider answered. Leases that do not own
   * the probe leave it alone.
   */
  abandon(capability: Capability, lease: ProviderLease): void {
    const k = key(capability, lease.role);
    if (!this.ownsProbe(k, lease)) return;
    this.entry(capability, lease.role).probing = false;
    this.probes.delete(k);
  }

  snapshot(): HealthSnapshot {
    const copy = (capability: Capability) => ({
      primary: { ...this.entry(capability, 'primary') },
      fallback: { ...this.entry(capability, 'fallback') },
    });
    return {
      transcription: copy('transcription'),
      completion: copy('completion'),
      synthesis: copy('synthesis'),
    };
  }

  /** Admin reset: every provider healthy again. */
  reset(): void {
    for (const capability of CAPABILITIES) {
      for (const role of ROLES) {
        this.health.set(key(capability, role), initialHealth(this.settings.cooldownMs));
      }
    }
    this.probes.clear();
  }

  private acquire(capability: Capability, role: ProviderRole, now: number): ProviderLease | null {
    const entry = this.entry(capability, role);
    if (!entry.disabled) return { role, probe: null };
    if (entry.probing || entry.disabledUntil === null || now < entry.disabledUntil) return null;

    const probe = ++this.probeSeq;
    entry.probing = true;
    this.probes.set(key(capability, role), probe);
    this.logger?.info({ capability, role, probe }, 'Cool-down elapsed, probing provider');
    return { role, probe };
  }

  private ownsProbe(k: string, lease: ProviderLease): boolean {
    return lease.probe !== null && this.probes.get(k) === lease.probe;
  }

  private entry(capability: Capability, role: ProviderRole): ProviderHealth {
    const k = key(capability, role);
    let entry = this.health.get(k);
    if (!entry) {
      entry = initialHealth(this.settings.cooldownMs);
      this.health.set(k, entry);
    }
    return entry;
  }
}

function key(capability: Capability, role: ProviderRole): string {
  return `${capability}:${role}`;
}

function initialHealth(cooldownMs: number): ProviderHealth {
  return {
    consecutiveFailures: 0,
    lastFailureAt: null,
    disabled: false,
    disabledUntil: null,
    cooldownMs,
    probing: false,
  };
}
