// Session State

export interface SessionState {
  deathCount: number;
  /** Server-authoritative timer value. */
  elapsedMs: number;
  running: boolean;
  bossMode: boolean;
  bossPaused: boolean;
  /** Only meaningful while bossMode is true. */
  bossDeathCount: number;
  connected: boolean;
  /** Edit rights granted by the server; implies connected. */
  canEdit: boolean;
  detectionEnabled: boolean;
  profileId: string;
  profileDisplayName: string;
}

export type SessionKey = keyof SessionState;

/** Locally extrapolated values. Observable, never settable, never sent. */
export interface DerivedState {
  displayElapsedMs: number;
}

export type StateView = SessionState & DerivedState;

export type StateKey = keyof StateView;

/** Listener arguments as a discriminated tuple, so `key` narrows `value`. */
export type StateChangeArgs = {
  [K in StateKey]: [key: K, value: StateView[K]];
}[StateKey];

export type StateListener = (...change: StateChangeArgs) => void;

// Frames & Templates

export type ChannelCount = 1 | 2 | 3 | 4;

/** One captured pixel buffer, row-major, interleaved channels (RGB order). */
export interface Frame {
  width: number;
  height: number;
  channels: ChannelCount;
  data: Uint8Array;
}

export interface Region {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface ReferenceTemplate {
  readonly width: number;
  readonly height: number;
  /** Single-channel intensity, width * height bytes. */
  readonly gray: Uint8Array;
  /** Where the template came from (file path or label), for logs. */
  readonly source: string;
}

export interface MatchResult {
  matched: boolean;
  confidence: number;
}

export interface DeathEvent {
  boss: boolean;
  confidence: number;
  /** Epoch ms at which the gate fired. */
  at: number;
}

// Commands

export type ProtocolCommand =
  | { type: 'death' }
  | { type: 'boss-death' }
  | { type: 'boss-start' }
  | { type: 'boss-pause' }
  | { type: 'boss-resume' }
  | { type: 'boss-victory'; name: string }
  | { type: 'boss-cancel' }
  | { type: 'timer-start' }
  | { type: 'timer-stop' }
  | { type: 'timer-reset' }
  | { type: 'set-time'; elapsedMs: number }
  | { type: 'set-deaths'; deaths: number }
  | { type: 'milestone-add'; name: string; icon: string }
  | { type: 'milestone-edit'; id: string; name: string; icon: string; timestamp?: number }
  | { type: 'milestone-delete'; id: string };

export type ProtocolCommandType = ProtocolCommand['type'];

/** Commands resolved against local state before anything is sent. */
export type LocalCommand =
  | { type: 'manual-death' }
  | { type: 'toggle-boss' }
  | { type: 'toggle-detection' }
  | { type: 'toggle-display-mode' };

export type HotkeyAction = LocalCommand['type'];

export type EngineCommand = ProtocolCommand | LocalCommand;

/** Where a command was issued from, for logs. */
export type CommandOrigin = 'detector' | 'hotkey' | 'ui';

export interface QueuedCommand {
  command: EngineCommand;
  origin: CommandOrigin;
}

// Sync Client

export enum SyncStatus {
  DISCONNECTED = 'DISCONNECTED',
  CONNECTING = 'CONNECTING',
  /** Socket open, no edit rights yet. */
  UNAUTHENTICATED = 'UNAUTHENTICATED',
  AUTHENTICATED = 'AUTHENTICATED',
}

export interface AuthResult {
  success: boolean;
  error: string | null;
}
