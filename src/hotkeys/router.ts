import { logger } from '../logger.js';
import type { CommandChannel } from '../state/command-channel.js';
import type { HotkeyAction, QueuedCommand } from '../types/index.js';
import { formatCombo, normalizeKey, parseCombo } from './combos.js';

/** A global keyboard hook. Key names are passed raw; the router normalizes them. */
export interface KeySource {
  start(onKeyDown: (key: string) => void, onKeyUp: (key: string) => void): void;
  stop(): void;
}

/**
 * Tracks held keys and fires a bound action when the held set equals a
 * registered combo exactly. A combo fires once per press; auto-repeat
 * keydowns for an already-held key do nothing.
 *
 * Runs on the hook's callback; it only ever publishes to the channel.
 */
export class HotkeyRouter {
  private readonly bindings = new Map<string, HotkeyAction>();
  private readonly held = new Set<string>();
  private running = false;

  constructor(
    private readonly channel: CommandChannel<QueuedCommand>,
    private readonly keySource: KeySource | null = null,
  ) {}

  get isRunning(): boolean {
    return this.running;
  }

  /** Bind a combo. Returns false when the combo cannot be parsed. */
  register(combo: string, action: HotkeyAction): boolean {
    const keys = parseCombo(combo);
    if (!keys) {
      logger.warn(`HotkeyRouter: ignoring invalid combo "${combo}" for ${action}`);
      return false;
    }
    const canonical = formatCombo(keys);
    const previous = this.bindings.get(canonical);
    if (previous && previous !== action) {
      logger.warn(`HotkeyRouter: ${canonical} rebound from ${previous} to ${action}`);
    }
    this.bindings.set(canonical, action);
    logger.debug(`HotkeyRouter: ${canonical} → ${action}`);
    return true;
  }

  unregister(combo: string): boolean {
    const keys = parseCombo(combo);
    return keys ? this.bindings.delete(formatCombo(keys)) : false;
  }

  bindingFor(combo: string): HotkeyAction | undefined {
    const keys = parseCombo(combo);
    return keys ? this.bindings.get(formatCombo(keys)) : undefined;
  }

  /** Returns false when the key hook could not be started; the router stays stopped. */
  start(): boolean {
    if (this.running) return true;
    this.running = true;
    this.held.clear();
    if (this.keySource) {
      try {
        this.keySource.start(
          (key) => this.keyDown(key),
          (key) => this.keyUp(key),
        );
      } catch (err) {
        this.running = false;
        logger.warn('HotkeyRouter: key hook failed to start — hotkeys disabled:', err);
        return false;
      }
    }
    logger.info(`HotkeyRouter: listening (${this.bindings.size} bindings)`);
    return true;
  }

  stop(): void {
    if (!this.running) return;
    this.running = false;
    this.held.clear();
    this.keySource?.stop();
    logger.info('HotkeyRouter: stopped');
  }

  /** Returns the action fired by this keydown, if any. */
  keyDown(name: string): HotkeyAction | null {
    if (!this.running) return null;
    const key = normalizeKey(name);
    if (this.held.has(key)) return null;
    this.held.add(key);

    const action = this.bindings.get(formatCombo(this.held));
    if (!action) return null;

    const accepted = this.channel.publish({ command: { type: action }, origin: 'hotkey' });
    if (!accepted) {
      logger.warn(`HotkeyRouter: ${action} not queued`);
      return null;
    }
    return action;
  }

  keyUp(name: string): void {
    this.held.delete(normalizeKey(name));
  }
}
