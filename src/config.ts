import { config as dotenvConfig } from 'dotenv';
import { registerSecret, logger } from './logger.js';
import { clampThreshold } from './detection/matcher.js';
import type { Region } from './types/index.js';

dotenvConfig();

export type SettingValue =
  | string
  | number
  | boolean
  | null
  | SettingValue[]
  | { [key: string]: SettingValue };

type SettingTree = { [key: string]: SettingValue };

/** Dotted-key configuration contract consumed by the engine. */
export interface Configuration {
  get(key: string, fallback: string): string;
  get(key: string, fallback: number): number;
  get(key: string, fallback: boolean): boolean;
  get<T extends SettingValue>(key: string, fallback: T): T;
  set(key: string, value: SettingValue): void;
}

export const DEFAULT_SETTINGS: SettingTree = {
  sync: {
    url: 'ws://127.0.0.1:3000/ws',
    reconnectDelayMs: 3000,
    reconnectMaxDelayMs: 30_000,
    sendTimeoutMs: 2000,
    handshakeTimeoutMs: 10_000,
  },
  profile: {
    name: '',
    password: '',
    autoConnect: true,
  },
  detection: {
    fps: 10,
    cooldownSeconds: 5,
    threshold: 0.75,
    streak: 1,
    scale: 1,
    // "x,y,width,height" in screen pixels; empty = whole frame
    region: '',
    templatePath: './templates/you_died_en.png',
    framePath: '',
  },
  hotkeys: {
    manualDeath: 'ctrl+shift+d',
    toggleBoss: 'ctrl+shift+b',
    toggleDetection: 'ctrl+shift+p',
    toggleDisplay: 'ctrl+shift+o',
  },
};

export const FPS_CHOICES = [5, 10, 15, 20, 30] as const;
export const COOLDOWN_CHOICES = [3, 5, 10] as const;

function isTree(value: SettingValue | undefined): value is SettingTree {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function sameKind<T extends SettingValue>(value: SettingValue, fallback: T): value is T {
  if (fallback === null) return value === null;
  if (Array.isArray(fallback)) return Array.isArray(value);
  if (isTree(fallback)) return isTree(value);
  return typeof value === typeof fallback;
}

function cloneTree(tree: SettingTree): SettingTree {
  return structuredClone(tree);
}

/**
 * In-memory dotted-key settings. Reads never assume a key exists: every
 * lookup carries its own fallback, and a value of the wrong kind falls back too.
 */
export class SettingsStore implements Configuration {
  private data: SettingTree;

  constructor(initial: SettingTree = DEFAULT_SETTINGS) {
    this.data = cloneTree(initial);
  }

  get(key: string, fallback: string): string;
  get(key: string, fallback: number): number;
  get(key: string, fallback: boolean): boolean;
  get<T extends SettingValue>(key: string, fallback: T): T;
  get(key: string, fallback: SettingValue): SettingValue {
    let node: SettingValue | undefined = this.data;
    for (const part of key.split('.')) {
      if (!isTree(node) || !(part in node)) return fallback;
      node = node[part];
    }
    if (node === undefined || node === null) return fallback;
    return sameKind(node, fallback) ? node : fallback;
  }

  set(key: string, value: SettingValue): void {
    const parts = key.split('.');
    const last = parts.pop();
    if (!last) return;
    let node = this.data;
    for (const part of parts) {
      const next = node[part];
      if (isTree(next)) {
        node = next;
      } else {
        const created: SettingTree = {};
        node[part] = created;
        node = created;
      }
    }
    node[last] = value;
  }

  toJSON(): SettingTree {
    return cloneTree(this.data);
  }
}

// Environment overrides

type EnvKind = 'string' | 'number' | 'boolean';

const ENV_BINDINGS: ReadonlyArray<[env: string, key: string, kind: EnvKind]> = [
  ['SYNC_URL', 'sync.url', 'string'],
  ['SYNC_RECONNECT_DELAY_MS', 'sync.reconnectDelayMs', 'number'],
  ['SYNC_RECONNECT_MAX_DELAY_MS', 'sync.reconnectMaxDelayMs', 'number'],
  ['SYNC_SEND_TIMEOUT_MS', 'sync.sendTimeoutMs', 'number'],
  ['PROFILE_NAME', 'profile.name', 'string'],
  ['PROFILE_PASSWORD', 'profile.password', 'string'],
  ['AUTO_CONNECT', 'profile.autoConnect', 'boolean'],
  ['DETECTION_FPS', 'detection.fps', 'number'],
  ['DETECTION_COOLDOWN_SECONDS', 'detection.cooldownSeconds', 'number'],
  ['DETECTION_THRESHOLD', 'detection.threshold', 'number'],
  ['DETECTION_STREAK', 'detection.streak', 'number'],
  ['DETECTION_SCALE', 'detection.scale', 'number'],
  ['DETECTION_REGION', 'detection.region', 'string'],
  ['TEMPLATE_PATH', 'detection.templatePath', 'string'],
  ['FRAME_PATH', 'detection.framePath', 'string'],
  ['HOTKEY_MANUAL_DEATH', 'hotkeys.manualDeath', 'string'],
  ['HOTKEY_TOGGLE_BOSS', 'hotkeys.toggleBoss', 'string'],
  ['HOTKEY_TOGGLE_DETECTION', 'hotkeys.toggleDetection', 'string'],
  ['HOTKEY_TOGGLE_DISPLAY', 'hotkeys.toggleDisplay', 'string'],
];

function parseEnvValue(raw: string, kind: EnvKind): SettingValue | undefined {
  switch (kind) {
    case 'string':
      return raw;
    case 'number': {
      const n = Number(raw);
      return Number.isFinite(n) ? n : undefined;
    }
    case 'boolean':
      return raw.toLowerCase() !== 'false' && raw !== '0';
  }
}

/** Apply environment overrides on top of the store's current values. */
export function applyEnv(store: SettingsStore, env: NodeJS.ProcessEnv = process.env): void {
  for (const [name, key, kind] of ENV_BINDINGS) {
    const raw = env[name];
    if (raw === undefined || raw === '') continue;
    const value = parseEnvValue(raw, kind);
    if (value === undefined) {
      logger.warn(`[config] ignoring ${name}="${raw}" (expected ${kind})`);
      continue;
    }
    store.set(key, value);
  }
}

let _settings: SettingsStore | null = null;

export function getSettings(): SettingsStore {
  if (_settings) return _settings;
  const store = new SettingsStore();
  applyEnv(store);
  const password = store.get('profile.password', '');
  if (password) registerSecret(password);
  _settings = store;
  return store;
}

/** Reset cached settings (for testing). */
export function resetSettings(): void {
  _settings = null;
}

// Resolved engine configuration

export interface EngineConfig {
  syncUrl: string;
  profileName: string;
  profilePassword: string;
  autoConnect: boolean;
  reconnectDelayMs: number;
  reconnectMaxDelayMs: number;
  sendTimeoutMs: number;
  handshakeTimeoutMs: number;

  fps: number;                 // one of FPS_CHOICES
  cooldownSeconds: number;     // one of COOLDOWN_CHOICES
  threshold: number;           // clamped to [0.5, 0.95]
  requiredStreak: number;
  matchScale: number;
  region: Region | null;
  templatePath: string;
  framePath: string;

  hotkeys: {
    manualDeath: string;
    toggleBoss: string;
    toggleDetection: string;
    toggleDisplay: string;
  };
}

/** Snap to the nearest allowed value; ties go to the smaller choice. */
export function snapToChoice(value: number, choices: readonly number[]): number {
  let best = choices[0];
  for (const choice of choices) {
    if (Math.abs(choice - value) < Math.abs(best - value)) best = choice;
  }
  return best;
}

export function parseRegion(raw: string): Region | null {
  if (!raw.trim()) return null;
  const parts = raw.split(',').map((p) => Number(p.trim()));
  if (parts.length !== 4 || parts.some((n) => !Number.isInteger(n) || n < 0)) {
    logger.warn(`[config] ignoring detection region "${raw}" (expected x,y,width,height)`);
    return null;
  }
  const [x, y, width, height] = parts;
  if (width === 0 || height === 0) return null;
  return { x, y, width, height };
}

export function resolveEngineConfig(settings: Configuration): EngineConfig {
  const scale = settings.get('detection.scale', 1);
  return {
    syncUrl: settings.get('sync.url', 'ws://127.0.0.1:3000/ws'),
    profileName: settings.get('profile.name', ''),
    profilePassword: settings.get('profile.password', ''),
    autoConnect: settings.get('profile.autoConnect', true),
    reconnectDelayMs: Math.max(100, settings.get('sync.reconnectDelayMs', 3000)),
    reconnectMaxDelayMs: Math.max(100, settings.get('sync.reconnectMaxDelayMs', 30_000)),
    sendTimeoutMs: Math.max(100, settings.get('sync.sendTimeoutMs', 2000)),
    handshakeTimeoutMs: Math.max(1000, settings.get('sync.handshakeTimeoutMs', 10_000)),

    fps: snapToChoice(settings.get('detection.fps', 10), FPS_CHOICES),
    cooldownSeconds: snapToChoice(settings.get('detection.cooldownSeconds', 5), COOLDOWN_CHOICES),
    threshold: clampThreshold(settings.get('detection.threshold', 0.75)),
    requiredStreak: Math.max(1, Math.round(settings.get('detection.streak', 1))),
    matchScale: scale > 0 && scale <= 1 ? scale : 1,
    region: parseRegion(settings.get('detection.region', '')),
    templatePath: settings.get('detection.templatePath', './templates/you_died_en.png'),
    framePath: settings.get('detection.framePath', ''),

    hotkeys: {
      manualDeath: settings.get('hotkeys.manualDeath', 'ctrl+shift+d'),
      toggleBoss: settings.get('hotkeys.toggleBoss', 'ctrl+shift+b'),
      toggleDetection: settings.get('hotkeys.toggleDetection', 'ctrl+shift+p'),
      toggleDisplay: settings.get('hotkeys.toggleDisplay', 'ctrl+shift+o'),
    },
  };
}
