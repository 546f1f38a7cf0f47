import { describe, it, expect, beforeEach } from 'vitest';
import { FallbackManager, alternateOf, type ProviderLease } from '../fallbackManager';
import { FALLBACK_SETTINGS } from '../../testing/fakes';

const PRIMARY: ProviderLease = { role: 'primary', probe: null };
const FALLBACK: ProviderLease = { role: 'fallback', probe: null };

describe('FallbackManager', () => {
  let clock: number;
  let manager: FallbackManager;

  beforeEach(() => {
    clock = 10_000;
    manager = new FallbackManager({ ...FALLBACK_SETTINGS, now: () => clock });
  });

  function failPrimary(times: number): void {
    for (let i = 0; i < times; i++) manager.reportOutcome('completion', PRIMARY, false);
  }

  function selected(): string {
    return manager.selectProvider('completion').role;
  }

  it('selects the primary while it is healthy', () => {
    expect(manager.selectProvider('completion')).toEqual({ role: 'primary', probe: null });
    failPrimary(2);
    expect(selected()).toBe('primary');
  });

  it('disables the primary after the failure threshold and routes to the fallback', () => {
    failPrimary(3);
    expect(manager.snapshot().completion.primary).toEqual({
      consecutiveFailures: 3,
      lastFailureAt: 10_000,
      disabled: true,
      disabledUntil: 11_000,
      cooldownMs: 1_000,
      probing: false,
    });
    expect(manager.selectProvider('completion')).toEqual({ role: 'fallback', probe: null });
  });

  it('keeps capabilities independent', () => {
    failPrimary(3);
    expect(manager.selectProvider('synthesis').role).toBe('primary');
    expect(manager.selectProvider('transcription').role).toBe('primary');
  });

  it('resets the failure streak on success', () => {
    failPrimary(2);
    manager.reportOutcome('completion', PRIMARY, true);
    failPrimary(2);
    expect(manager.snapshot().completion.primary.consecutiveFailures).toBe(2);
    expect(selected()).toBe('primary');
  });

  it('hands out exactly one probe after the cool-down', () => {
    failPrimary(3);
    clock = 10_999;
    expect(selected()).toBe('fallback');

    clock = 11_000;
    const probe = manager.selectProvider('completion');
    expect(probe.role).toBe('primary');
    expect(probe.probe).not.toBeNull();
    expect(manager.snapshot().completion.primary.probing).toBe(true);
    // A concurrent turn does not get a second probe.
    expect(selected()).toBe('fallback');
  });

  it('re-enables the primary when the probe succeeds', () => {
    failPrimary(3);
    clock = 11_000;
    const probe = manager.selectProvider('completion');
    manager.reportOutcome('completion', probe, true);

    expect(manager.snapshot().completion.primary).toEqual({
      consecutiveFailures: 0,
      lastFailureAt: null,
      disabled: false,
      disabledUntil: null,
      cooldownMs: 1_000,
      probing: false,
    });
    expect(selected()).toBe('primary');
  });

  it('restarts a longer cool-down when the probe fails, up to the maximum', () => {
    failPrimary(3);

    clock = 11_000;
    manager.reportOutcome('completion', manager.selectProvider('completion'), false);
    let health = manager.snapshot().completion.primary;
    expect(health.cooldownMs).toBe(2_000);
    expect(health.disabledUntil).toBe(13_000);
    expect(health.probing).toBe(false);
    expect(selected()).toBe('fallback');

    for (const expected of [4_000, 8_000, 8_000]) {
      clock = health.disabledUntil ?? clock;
      const probe = manager.selectProvider('completion');
      expect(probe.role).toBe('primary');
      manager.reportOutcome('completion', probe, false);
      health = manager.snapshot().completion.primary;
      expect(health.cooldownMs).toBe(expected);
    }
  });

  it('gives the primary a last-resort attempt when both providers are disabled', () => {
    failPrimary(3);
    for (let i = 0; i < 3; i++) manager.reportOutcome('completion', FALLBACK, false);
    expect(manager.selectProvider('completion')).toEqual({ role: 'primary', probe: null });
  });

  it('returns the other provider as the retry target', () => {
    expect(manager.retryTarget('synthesis', 'primary')).toEqual({ role: 'fallback', probe: null });
    expect(manager.retryTarget('synthesis', 'fallback')).toEqual({ role: 'primary', probe: null });
    expect(alternateOf('fallback')).toBe('primary');
  });

  it('lets a retry take the probe when the cool-down has elapsed', () => {
    failPrimary(3);
    clock = 11_000;

    const retry = manager.retryTarget('completion', 'fallback');

    expect(retry.role).toBe('primary');
    expect(retry.probe).not.toBeNull();
    expect(selected()).toBe('fallback');
  });

  it('releases an abandoned probe so the next turn can probe', () => {
    failPrimary(3);
    clock = 11_000;
    const probe = manager.selectProvider('completion');
    manager.abandon('completion', probe);
    expect(manager.selectProvider('completion').role).toBe('primary');
  });

  it('keeps the probe when a call that does not own it is cancelled', () => {
    failPrimary(3);
    clock = 11_000;
    const probe = manager.selectProvider('completion');

    const retry = manager.retryTarget('completion', 'fallback');
    expect(retry).toEqual({ role: 'primary', probe: null });
    manager.abandon('completion', retry);

    expect(manager.snapshot().completion.primary.probing).toBe(true);
    expect(selected()).toBe('fallback');

    manager.reportOutcome('completion', probe, true);
    expect(selected()).toBe('primary');
  });

  it('does not back off when a call that does not own the probe fails', () => {
    failPrimary(3);
    clock = 11_000;
    manager.selectProvider('completion');

    manager.reportOutcome('completion', manager.retryTarget('completion', 'fallback'), false);

    const health = manager.snapshot().completion.primary;
    expect(health).toMatchObject({ consecutiveFailures: 4, cooldownMs: 1_000, disabledUntil: 11_000, probing: true });
  });

  it('ignores the outcome of a probe that a reset superseded', () => {
    failPrimary(3);
    clock = 11_000;
    const stale = manager.selectProvider('completion');
    manager.reset();

    manager.abandon('completion', stale);
    manager.reportOutcome('completion', stale, false);

    expect(manager.snapshot().completion.primary).toMatchObject({ consecutiveFailures: 1, disabled: false });
  });

  it('re-enables everything on reset', () => {
    failPrimary(3);
    manager.reset();
    expect(manager.snapshot().completion.primary.disabled).toBe(false);
    expect(selected()).toBe('primary');
  });

  it('returns copies from snapshot', () => {
    const snapshot = manager.snapshot();
    snapshot.completion.primary.disabled = true;
    expect(selected()).toBe('primary');
  });
});
