import { uIOhook, UiohookKey, type UiohookKeyboardEvent } from 'uiohook-napi';
import type { KeySource } from './router.js';

// keycode → name, with left/right modifier variants folded together
const KEY_NAMES = new Map<number, string>();
for (const [name, code] of Object.entries(UiohookKey)) {
  const folded = name.replace(/^(Ctrl|Alt|Shift|Meta)Right$/, '$1').toLowerCase();
  if (!KEY_NAMES.has(code)) KEY_NAMES.set(code, folded);
}

export function keyName(keycode: number): string {
  return KEY_NAMES.get(keycode) ?? `key${keycode}`;
}

/** System-wide keyboard hook backed by libuiohook. */
export class UiohookKeySource implements KeySource {
  private onDown: ((e: UiohookKeyboardEvent) => void) | null = null;
  private onUp: ((e: UiohookKeyboardEvent) => void) | null = null;

  start(onKeyDown: (key: string) => void, onKeyUp: (key: string) => void): void {
    this.stop();
    this.onDown = (e) => onKeyDown(keyName(e.keycode));
    this.onUp = (e) => onKeyUp(keyName(e.keycode));
    uIOhook.on('keydown', this.onDown);
    uIOhook.on('keyup', this.onUp);
    uIOhook.start();
  }

  stop(): void {
    if (!this.onDown || !this.onUp) return;
    uIOhook.off('keydown', this.onDown);
    uIOhook.off('keyup', this.onUp);
    this.onDown = null;
    this.onUp = null;
    uIOhook.stop();
  }
}
