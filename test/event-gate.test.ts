import { beforeEach, describe, expect, it, vi } from 'vitest';
import { EventGate, type FrameMatcher } from '../src/detection/event-gate.js';
import { SessionStore } from '../src/state/session-store.js';
import type { Frame, MatchResult } from '../src/types/index.js';

const FRAME: Frame = { width: 1, height: 1, channels: 1, data: new Uint8Array(1) };

class ScriptedMatcher implements FrameMatcher {
  result: MatchResult = { matched: true, confidence: 0.9 };
  isMatch = vi.fn((_frame: Frame | null): MatchResult => this.result);
}

describe('EventGate', () => {
  let store: SessionStore;
  let matcher: ScriptedMatcher;

  beforeEach(() => {
    store = new SessionStore({ now: () => 0 });
    store.set('connected', true);
    matcher = new ScriptedMatcher();
  });

  it('emits one event per cooldown window while the screen keeps matching', async () => {
    const gate = new EventGate(matcher, store, { cooldownSeconds: 5 });
    const fired: number[] = [];

    for (let t = 0; t <= 5000; t += 100) {
      if (await gate.evaluate(FRAME, t)) fired.push(t);
    }

    expect(fired).toEqual([0, 5000]);
  });

  it('fires again once the cooldown has elapsed', async () => {
    const gate = new EventGate(matcher, store, { cooldownSeconds: 3 });
    expect(await gate.evaluate(FRAME, 10_000)).not.toBeNull();
    expect(await gate.evaluate(FRAME, 12_999)).toBeNull();
    expect(await gate.evaluate(FRAME, 13_000)).not.toBeNull();
  });

  it('does not query the matcher while detection is disabled', async () => {
    store.set('detectionEnabled', false);
    const gate = new EventGate(matcher, store);

    for (let t = 0; t < 10; t++) expect(await gate.evaluate(FRAME, t * 1000)).toBeNull();

    expect(matcher.isMatch).not.toHaveBeenCalled();
  });

  it('does not query the matcher while disconnected', async () => {
    store.set('connected', false);
    const gate = new EventGate(matcher, store);

    expect(await gate.evaluate(FRAME, 0)).toBeNull();
    expect(gate.isArmed()).toBe(false);
    expect(matcher.isMatch).not.toHaveBeenCalled();
  });

  it('samples boss mode at the moment of detection', async () => {
    const gate = new EventGate(matcher, store, { cooldownSeconds: 3 });

    expect(await gate.evaluate(FRAME, 0)).toEqual({ boss: false, confidence: 0.9, at: 0 });
    store.set('bossMode', true);
    expect(await gate.evaluate(FRAME, 3000)).toEqual({ boss: true, confidence: 0.9, at: 3000 });
  });

  it('returns nothing for non-matching frames', async () => {
    matcher.result = { matched: false, confidence: 0.2 };
    const gate = new EventGate(matcher, store);
    expect(await gate.evaluate(FRAME, 0)).toBeNull();
    expect(matcher.isMatch).toHaveBeenCalledTimes(1);
  });

  it('requires consecutive matches when a streak is configured', async () => {
    const gate = new EventGate(matcher, store, { requiredStreak: 3 });

    expect(await gate.evaluate(FRAME, 0)).toBeNull();
    expect(await gate.evaluate(FRAME, 100)).toBeNull();
    matcher.result = { matched: false, confidence: 0.1 };
    expect(await gate.evaluate(FRAME, 200)).toBeNull();
    matcher.result = { matched: true, confidence: 0.9 };
    expect(await gate.evaluate(FRAME, 300)).toBeNull();
    expect(await gate.evaluate(FRAME, 400)).toBeNull();
    expect(await gate.evaluate(FRAME, 500)).not.toBeNull();
  });

  it('forgets the last event on reset', async () => {
    const gate = new EventGate(matcher, store, { cooldownSeconds: 10 });
    expect(await gate.evaluate(FRAME, 0)).not.toBeNull();
    gate.reset();
    expect(await gate.evaluate(FRAME, 1000)).not.toBeNull();
  });

  it('applies a new cooldown immediately', async () => {
    const gate = new EventGate(matcher, store, { cooldownSeconds: 10 });
    expect(await gate.evaluate(FRAME, 0)).not.toBeNull();
    gate.setCooldown(3);
    expect(gate.cooldownSeconds).toBe(3);
    expect(await gate.evaluate(FRAME, 3000)).not.toBeNull();
  });

  it('waits for a matcher that answers asynchronously', async () => {
    const gate = new EventGate({ isMatch: async () => ({ matched: true, confidence: 0.8 }) }, store);
    expect(await gate.evaluate(FRAME, 0)).toEqual({ boss: false, confidence: 0.8, at: 0 });
  });

  it('drops a match that lands after detection was switched off', async () => {
    let answer: (result: MatchResult) => void = () => {};
    const slow: FrameMatcher = {
      isMatch: () => new Promise<MatchResult>((resolve) => {
        answer = resolve;
      }),
    };
    const gate = new EventGate(slow, store);

    const pending = gate.evaluate(FRAME, 0);
    store.set('detectionEnabled', false);
    answer({ matched: true, confidence: 0.99 });

    expect(await pending).toBeNull();
  });
});

describe('EventGate cooldown choices', () => {
  it('snaps an unsupported cooldown to the nearest allowed one', () => {
    const store = new SessionStore();
    const gate = new EventGate({ isMatch: () => ({ matched: true, confidence: 1 }) }, store, { cooldownSeconds: 7 });
    expect(gate.cooldownSeconds).toBe(5);
    gate.setCooldown(60);
    expect(gate.cooldownSeconds).toBe(10);
  });
});
