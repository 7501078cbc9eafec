import { z } from 'zod';
import { logger } from '../logger.js';
import { InvalidFieldValueError, InvariantViolationError, UnknownFieldError } from '../errors.js';
import type {
  DerivedState,
  SessionKey,
  SessionState,
  StateChangeArgs,
  StateKey,
  StateListener,
  StateView,
} from '../types/index.js';

const sessionStateSchema = z.object({
  deathCount: z.number().int().nonnegative(),
  elapsedMs: z.number().int().nonnegative(),
  running: z.boolean(),
  bossMode: z.boolean(),
  bossPaused: z.boolean(),
  bossDeathCount: z.number().int().nonnegative(),
  connected: z.boolean(),
  canEdit: z.boolean(),
  detectionEnabled: z.boolean(),
  profileId: z.string(),
  profileDisplayName: z.string(),
}) satisfies z.ZodType<SessionState>;

const SESSION_KEYS: ReadonlySet<string> = new Set(Object.keys(sessionStateSchema.shape));

export function isSessionKey(key: string): key is SessionKey {
  return SESSION_KEYS.has(key);
}

/** Fresh state with all-default values. */
export function createInitialSessionState(): SessionState {
  return {
    deathCount: 0,
    elapsedMs: 0,
    running: false,
    bossMode: false,
    bossPaused: false,
    bossDeathCount: 0,
    connected: false,
    canEdit: false,
    detectionEnabled: true,
    profileId: '',
    profileDisplayName: '',
  };
}

export type ListenerErrorHook = (error: unknown, change: StateChangeArgs) => void;

const defaultErrorHook: ListenerErrorHook = (error, [key]) => {
  logger.warn(`SessionStore: listener failed on '${key}':`, error);
};

/**
 * Single source of truth for session counters and connection flags.
 *
 * Writes are applied synchronously, so a reader never sees a half-applied
 * merge. Change notifications go through one FIFO queue: a write made from
 * inside a listener is delivered after the changes already in flight.
 */
export class SessionStore {
  private state: SessionState;
  private derived: DerivedState = { displayElapsedMs: 0 };
  /** Epoch ms at which elapsedMs was last written. */
  private elapsedSyncedAt = 0;
  private listeners: StateListener[] = [];
  private pending: StateChangeArgs[] = [];
  private delivering = false;
  private readonly onListenerError: ListenerErrorHook;
  private readonly now: () => number;

  constructor(options: { onListenerError?: ListenerErrorHook; now?: () => number } = {}) {
    this.state = createInitialSessionState();
    this.onListenerError = options.onListenerError ?? defaultErrorHook;
    this.now = options.now ?? Date.now;
  }

  // Reads

  get<K extends StateKey>(key: K): StateView[K];
  get(key: string): StateView[StateKey];
  get(key: string): StateView[StateKey] {
    if (key === 'displayElapsedMs') return this.derived.displayElapsedMs;
    if (!isSessionKey(key)) throw new UnknownFieldError(key);
    return this.state[key];
  }

  snapshot(): Readonly<StateView> {
    return { ...this.state, ...this.derived };
  }

  // Writes

  set<K extends SessionKey>(key: K, value: SessionState[K]): void;
  set(key: string, value: unknown): void;
  set(key: string, value: unknown): void {
    this.merge({ [key]: value });
  }

  /**
   * Bulk update. Every key is validated before anything is written, so an
   * invalid snapshot leaves the state untouched.
   */
  merge(partial: Partial<SessionState> | Record<string, unknown>): void {
    for (const key of Object.keys(partial)) {
      if (!isSessionKey(key)) throw new UnknownFieldError(key);
    }
    const parsed = sessionStateSchema.safeParse({ ...this.state, ...partial });
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new InvalidFieldValueError(String(issue?.path[0] ?? '?'), issue?.message ?? 'rejected');
    }
    const next = parsed.data;

    if ('connected' in partial && !next.connected) {
      next.canEdit = false;
    }
    if (next.canEdit && !next.connected) {
      throw new InvariantViolationError('canEdit cannot be true while disconnected');
    }

    const changed: StateChangeArgs[] = [];
    for (const key of KEY_ORDER) {
      if (!Object.is(this.state[key], next[key])) {
        changed.push(CHANGE_OF[key](next));
      }
    }
    if (changed.length === 0) return;

    if (next.elapsedMs !== this.state.elapsedMs || next.running !== this.state.running) {
      this.elapsedSyncedAt = this.now();
    }
    this.state = next;
    this.enqueue(changed);
    this.advanceClock(this.now());
  }

  // Derived clock

  /**
   * Recompute displayElapsedMs: elapsedMs plus local time since the last
   * authoritative write while the timer runs. Display only; never sent.
   */
  advanceClock(now: number): void {
    const base = this.state.elapsedMs;
    const value = this.state.running ? base + Math.max(0, now - this.elapsedSyncedAt) : base;
    if (value === this.derived.displayElapsedMs) return;
    this.derived = { displayElapsedMs: value };
    this.enqueue([['displayElapsedMs', value]]);
  }

  // Subscriptions

  subscribe(listener: StateListener): () => void {
    this.listeners.push(listener);
    return () => this.unsubscribe(listener);
  }

  unsubscribe(listener: StateListener): void {
    const idx = this.listeners.indexOf(listener);
    if (idx >= 0) this.listeners.splice(idx, 1);
  }

  get listenerCount(): number {
    return this.listeners.length;
  }

  private enqueue(changes: StateChangeArgs[]): void {
    this.pending.push(...changes);
    if (this.delivering) return;
    this.delivering = true;
    try {
      let change = this.pending.shift();
      while (change) {
        for (const listener of [...this.listeners]) {
          try {
            listener(...change);
          } catch (err) {
            this.reportListenerError(err, change);
          }
        }
        change = this.pending.shift();
      }
    } finally {
      this.delivering = false;
    }
  }

  private reportListenerError(error: unknown, change: StateChangeArgs): void {
    try {
      this.onListenerError(error, change);
    } catch (hookErr) {
      logger.error('SessionStore: listener error hook threw:', hookErr);
    }
  }
}

/** Notification order within one write: connection flags first. */
const KEY_ORDER: readonly SessionKey[] = [
  'connected',
  'canEdit',
  'profileId',
  'profileDisplayName',
  'deathCount',
  'elapsedMs',
  'running',
  'bossMode',
  'bossPaused',
  'bossDeathCount',
  'detectionEnabled',
];

const CHANGE_OF: { [K in SessionKey]: (state: SessionState) => StateChangeArgs } = {
  connected: (s) => ['connected', s.connected],
  canEdit: (s) => ['canEdit', s.canEdit],
  profileId: (s) => ['profileId', s.profileId],
  profileDisplayName: (s) => ['profileDisplayName', s.profileDisplayName],
  deathCount: (s) => ['deathCount', s.deathCount],
  elapsedMs: (s) => ['elapsedMs', s.elapsedMs],
  running: (s) => ['running', s.running],
  bossMode: (s) => ['bossMode', s.bossMode],
  bossPaused: (s) => ['bossPaused', s.bossPaused],
  bossDeathCount: (s) => ['bossDeathCount', s.bossDeathCount],
  detectionEnabled: (s) => ['detectionEnabled', s.detectionEnabled],
};
