import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { OutageController, ControllerExit } from '../outage/controller.js';
import { IllegalPhaseTransitionError } from '../outage/errors.js';
import { canTransition, getPhaseMetadata } from '../outage/phases.js';
import { OutageState } from '../outage/state.js';
import type { PhaseTransition } from '../outage/transitions.js';

describe('outage phases', () => {
  it('only allows NORMAL ⇄ OUTAGE', () => {
    expect(canTransition('NORMAL', 'OUTAGE')).toBe(true);
    expect(canTransition('OUTAGE', 'NORMAL')).toBe(true);
    expect(canTransition('NORMAL', 'NORMAL')).toBe(false);
    expect(canTransition('OUTAGE', 'OUTAGE')).toBe(false);
  });

  it('marks only OUTAGE as active', () => {
    expect(getPhaseMetadata('NORMAL').active).toBe(false);
    expect(getPhaseMetadata('OUTAGE').active).toBe(true);
  });
});

describe('OutageState', () => {
  it('starts in NORMAL and reads the same value until a transition', () => {
    const state = new OutageState();

    expect(state.getPhase()).toBe('NORMAL');
    expect(state.isActive()).toBe(false);
    expect(state.isActive()).toBe(false);

    state.transition('OUTAGE', 'test');

    expect(state.isActive()).toBe(true);
    expect(state.isActive()).toBe(true);
  });

  it('rejects a transition into the current phase', () => {
    const state = new OutageState();

    expect(() => state.transition('NORMAL')).toThrow(IllegalPhaseTransitionError);
    expect(() => state.transition('NORMAL')).toThrow(
      'Illegal outage transition: NORMAL → NORMAL: Invalid transition from NORMAL to NORMAL'
    );
    expect(state.getTransitionHistory()).toEqual([]);
  });

  it('notifies listeners until they unsubscribe', () => {
    const state = new OutageState();
    const seen: PhaseTransition[] = [];
    const unsubscribe = state.onTransition(t => seen.push(t));

    state.transition('OUTAGE', 'opened');
    unsubscribe();
    state.transition('NORMAL', 'closed');

    expect(seen).toHaveLength(1);
    expect(seen[0]).toMatchObject({ from: 'NORMAL', to: 'OUTAGE', reason: 'opened' });
  });

  it('keeps a bounded transition history', () => {
    const state = new OutageState();

    for (let i = 0; i < 150; i++) {
      state.transition(state.isActive() ? 'NORMAL' : 'OUTAGE');
    }

    const history = state.getTransitionHistory();
    expect(history).toHaveLength(100);
    expect(history[99]).toMatchObject({ from: 'OUTAGE', to: 'NORMAL' });
  });
});

describe('OutageController', () => {
  let state: OutageState;
  let shutdown: AbortController;

  beforeEach(() => {
    vi.useFakeTimers();
    state = new OutageState();
    shutdown = new AbortController();
  });

  afterEach(() => {
    shutdown.abort();
    vi.useRealTimers();
  });

  function track(run: Promise<ControllerExit>): { exit: ControllerExit | undefined } {
    const result: { exit: ControllerExit | undefined } = { exit: undefined };
    run.then(exit => { result.exit = exit; });
    return result;
  }

  it('stays inert unless both durations are positive', async () => {
    const noDuration = new OutageController({ outageAfterMs: 1000, outageForMs: 0, outageRepeat: true }, state);
    const noDelay = new OutageController({ outageAfterMs: 0, outageForMs: 1000, outageRepeat: true }, state);

    expect(noDuration.isEnabled()).toBe(false);
    await expect(noDuration.run(shutdown.signal)).resolves.toBe('disabled');
    await expect(noDelay.run(shutdown.signal)).resolves.toBe('disabled');

    await vi.advanceTimersByTimeAsync(10_000);
    expect(state.isActive()).toBe(false);
    expect(state.getTransitionHistory()).toEqual([]);
  });

  it('holds a month-long normal phase before the outage opens', async () => {
    const thirtyDays = 30 * 24 * 3600 * 1000;
    const controller = new OutageController({ outageAfterMs: thirtyDays, outageForMs: 1000, outageRepeat: false }, state);
    track(controller.run(shutdown.signal));

    await vi.advanceTimersByTimeAsync(1000);
    expect(state.isActive()).toBe(false);

    await vi.advanceTimersByTimeAsync(thirtyDays - 1001);
    expect(state.isActive()).toBe(false);

    await vi.advanceTimersByTimeAsync(1);
    expect(state.isActive()).toBe(true);
  });

  it('runs a single outage window when not repeating', async () => {
    const controller = new OutageController({ outageAfterMs: 1000, outageForMs: 2000, outageRepeat: false }, state);
    const result = track(controller.run(shutdown.signal));

    await vi.advanceTimersByTimeAsync(999);
    expect(state.isActive()).toBe(false);

    await vi.advanceTimersByTimeAsync(1);
    expect(state.isActive()).toBe(true);

    await vi.advanceTimersByTimeAsync(1999);
    expect(state.isActive()).toBe(true);

    await vi.advanceTimersByTimeAsync(1);
    expect(state.isActive()).toBe(false);
    expect(result.exit).toBe('completed');

    await vi.advanceTimersByTimeAsync(60_000);
    expect(state.isActive()).toBe(false);
    expect(controller.getCompletedCycles()).toBe(1);
    expect(state.getTransitionHistory().map(t => `${t.from}→${t.to}`)).toEqual([
      'NORMAL→OUTAGE',
      'OUTAGE→NORMAL',
    ]);
  });

  it('repeats the cycle with period outageAfter + outageFor', async () => {
    const controller = new OutageController({ outageAfterMs: 1000, outageForMs: 2000, outageRepeat: true }, state);
    const result = track(controller.run(shutdown.signal));

    const samples: Array<[number, boolean]> = [];
    let elapsed = 0;
    for (const at of [500, 1500, 3500, 4500, 6500, 7500, 9500, 10500]) {
      await vi.advanceTimersByTimeAsync(at - elapsed);
      elapsed = at;
      samples.push([at, state.isActive()]);
    }

    expect(samples).toEqual([
      [500, false],
      [1500, true],
      [3500, false],
      [4500, true],
      [6500, false],
      [7500, true],
      [9500, false],
      [10500, true],
    ]);
    expect(controller.getCompletedCycles()).toBe(3);

    shutdown.abort();
    await vi.advanceTimersByTimeAsync(0);
    expect(result.exit).toBe('cancelled');
  });

  it('stops without a further transition when shut down mid-outage', async () => {
    const controller = new OutageController({ outageAfterMs: 1000, outageForMs: 2000, outageRepeat: true }, state);
    const run = controller.run(shutdown.signal);

    await vi.advanceTimersByTimeAsync(1500);
    shutdown.abort();

    await expect(run).resolves.toBe('cancelled');
    expect(state.getTransitionHistory()).toHaveLength(1);
    expect(vi.getTimerCount()).toBe(0);
  });
});
