import { COOLDOWN_CHOICES, snapToChoice } from '../config.js';
import { logger } from '../logger.js';
import type { SessionStore } from '../state/session-store.js';
import type { DeathEvent, Frame, MatchResult } from '../types/index.js';

export const DEFAULT_COOLDOWN_SECONDS = 5;

/** The part of Matcher the gate depends on. WorkerMatcher answers asynchronously. */
export interface FrameMatcher {
  isMatch(frame: Frame | null): MatchResult | Promise<MatchResult>;
}

export interface EventGateOptions {
  /** Snapped to one of COOLDOWN_CHOICES. */
  cooldownSeconds?: number;
  /** Consecutive matching frames needed before an event may fire. */
  requiredStreak?: number;
}

/**
 * Turns per-frame match results into at most one DeathEvent per cooldown
 * window. The only mutable state is the last event time and the hit streak;
 * delivery is someone else's concern.
 */
export class EventGate {
  private lastEventTime = Number.NEGATIVE_INFINITY;
  private streak = 0;
  private cooldownMs: number;
  private requiredStreak: number;

  constructor(
    private readonly matcher: FrameMatcher,
    private readonly store: SessionStore,
    options: EventGateOptions = {},
  ) {
    this.cooldownMs = snapToChoice(options.cooldownSeconds ?? DEFAULT_COOLDOWN_SECONDS, COOLDOWN_CHOICES) * 1000;
    this.requiredStreak = Math.max(1, options.requiredStreak ?? 1);
  }

  get cooldownSeconds(): number {
    return this.cooldownMs / 1000;
  }

  setCooldown(seconds: number): void {
    this.cooldownMs = snapToChoice(seconds, COOLDOWN_CHOICES) * 1000;
  }

  setRequiredStreak(streak: number): void {
    this.requiredStreak = Math.max(1, streak);
    this.streak = 0;
  }

  /** False when detection is switched off or there is no connection to report to. */
  isArmed(): boolean {
    return this.store.get('detectionEnabled') && this.store.get('connected');
  }

  async evaluate(frame: Frame | null, now: number = Date.now()): Promise<DeathEvent | null> {
    if (!this.isArmed()) return null;

    const { matched, confidence } = await this.matcher.isMatch(frame);
    // Disarmed while the frame was being matched
    if (!this.isArmed()) return null;
    if (!matched) {
      this.streak = 0;
      return null;
    }

    this.streak++;
    if (this.streak < this.requiredStreak) return null;

    // Same death screen still visible
    if (now - this.lastEventTime < this.cooldownMs) return null;

    this.lastEventTime = now;
    this.streak = 0;
    const boss = this.store.get('bossMode');
    logger.info(`EventGate: death detected (confidence ${confidence.toFixed(3)}${boss ? ', boss fight' : ''})`);
    return { boss, confidence, at: now };
  }

  reset(): void {
    this.lastEventTime = Number.NEGATIVE_INFINITY;
    this.streak = 0;
  }
}
