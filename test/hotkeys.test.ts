import { describe, expect, it, vi } from 'vitest';
import { canonicalCombo, formatCombo, normalizeKey, parseCombo } from '../src/hotkeys/combos.js';
import { HotkeyRouter, type KeySource } from '../src/hotkeys/router.js';
import { CommandChannel } from '../src/state/command-channel.js';
import type { QueuedCommand } from '../src/types/index.js';

// ── Combo parsing ──────────────────────────────────────────────────────────

describe('combos', () => {
  it('normalizes platform modifier names', () => {
    expect(normalizeKey('Cmd')).toBe('ctrl');
    expect(normalizeKey('Control')).toBe('ctrl');
    expect(normalizeKey('Option')).toBe('alt');
    expect(normalizeKey('Escape')).toBe('esc');
    expect(normalizeKey(' D ')).toBe('d');
  });

  it('gives equivalent combos the same canonical form', () => {
    expect(canonicalCombo('Shift+Control+D')).toBe('ctrl+shift+d');
    expect(canonicalCombo('cmd+shift+d')).toBe('ctrl+shift+d');
    expect(canonicalCombo('alt+f9')).toBe('alt+f9');
  });

  it('rejects empty segments', () => {
    expect(parseCombo('')).toBeNull();
    expect(parseCombo('ctrl++d')).toBeNull();
    expect(canonicalCombo('shift+')).toBeNull();
  });

  it('orders modifiers before other keys', () => {
    expect(formatCombo(['b', 'alt', 'a', 'ctrl'])).toBe('ctrl+alt+a+b');
  });
});

// ── Router ─────────────────────────────────────────────────────────────────

function setup() {
  const channel = new CommandChannel<QueuedCommand>();
  const published: QueuedCommand[] = [];
  const publish = vi.spyOn(channel, 'publish').mockImplementation((item) => {
    published.push(item);
    return true;
  });
  const router = new HotkeyRouter(channel);
  router.register('ctrl+shift+d', 'manual-death');
  router.register('ctrl+shift+b', 'toggle-boss');
  router.start();
  return { channel, router, published, publish };
}

describe('HotkeyRouter', () => {
  it('fires when the held keys equal a combo', () => {
    const { router, published } = setup();

    router.keyDown('Control');
    router.keyDown('Shift');
    const fired = router.keyDown('D');

    expect(fired).toBe('manual-death');
    expect(published).toEqual([{ command: { type: 'manual-death' }, origin: 'hotkey' }]);
  });

  it('does not fire for a superset of a combo', () => {
    const { router, published } = setup();

    router.keyDown('ctrl');
    router.keyDown('alt');
    router.keyDown('shift');
    router.keyDown('d');

    expect(published).toEqual([]);
  });

  it('fires once per press despite auto-repeat', () => {
    const { router, published } = setup();

    router.keyDown('ctrl');
    router.keyDown('shift');
    router.keyDown('d');
    router.keyDown('d');
    router.keyDown('d');
    router.keyUp('d');
    router.keyDown('d');

    expect(published).toHaveLength(2);
  });

  it('treats meta as ctrl', () => {
    const { router, published } = setup();
    router.keyDown('meta');
    router.keyDown('shift');
    router.keyDown('b');
    expect(published).toEqual([{ command: { type: 'toggle-boss' }, origin: 'hotkey' }]);
  });

  it('ignores keys while stopped and after unregister', () => {
    const { router, published } = setup();
    router.stop();
    router.keyDown('ctrl');
    router.keyDown('shift');
    router.keyDown('d');
    expect(published).toEqual([]);

    router.start();
    expect(router.unregister('Shift+Ctrl+D')).toBe(true);
    router.keyDown('ctrl');
    router.keyDown('shift');
    router.keyDown('d');
    expect(published).toEqual([]);
  });

  it('refuses invalid combos', () => {
    const { router } = setup();
    expect(router.register('ctrl+', 'toggle-detection')).toBe(false);
    expect(router.bindingFor('shift+ctrl+b')).toBe('toggle-boss');
  });

  it('starts and stops its key source', () => {
    const channel = new CommandChannel<QueuedCommand>();
    const source: KeySource = { start: vi.fn(), stop: vi.fn() };
    const router = new HotkeyRouter(channel, source);

    router.start();
    router.start();
    router.stop();

    expect(source.start).toHaveBeenCalledTimes(1);
    expect(source.stop).toHaveBeenCalledTimes(1);
    expect(router.isRunning).toBe(false);
  });

  it('routes key events delivered by the key source', () => {
    const channel = new CommandChannel<QueuedCommand>();
    vi.spyOn(channel, 'publish').mockReturnValue(true);
    let down: (key: string) => void = () => undefined;
    const source: KeySource = {
      start: (onKeyDown) => {
        down = onKeyDown;
      },
      stop: () => undefined,
    };
    const router = new HotkeyRouter(channel, source);
    router.register('f9', 'toggle-detection');
    router.start();

    down('F9');

    expect(channel.publish).toHaveBeenCalledWith({ command: { type: 'toggle-detection' }, origin: 'hotkey' });
  });

  it('stays stopped instead of throwing when the key hook cannot start', () => {
    const channel = new CommandChannel<QueuedCommand>();
    const publish = vi.spyOn(channel, 'publish');
    const source: KeySource = {
      start: () => {
        throw new Error('accessibility permission denied');
      },
      stop: vi.fn(),
    };
    const router = new HotkeyRouter(channel, source);
    router.register('f9', 'toggle-detection');

    expect(router.start()).toBe(false);
    expect(router.isRunning).toBe(false);
    expect(router.keyDown('F9')).toBeNull();
    expect(publish).not.toHaveBeenCalled();

    router.stop();
    expect(source.stop).not.toHaveBeenCalled();
  });
});
