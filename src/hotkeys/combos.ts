// Key combos are sets of lowercase key names. "ctrl+shift+d" and
// "Shift+Control+D" describe the same combo.

const ALIASES: Record<string, string> = {
  cmd: 'ctrl',
  command: 'ctrl',
  meta: 'ctrl',
  super: 'ctrl',
  win: 'ctrl',
  control: 'ctrl',
  option: 'alt',
  altgr: 'alt',
  escape: 'esc',
  return: 'enter',
};

export const MODIFIERS: ReadonlySet<string> = new Set(['ctrl', 'shift', 'alt']);

export function normalizeKey(name: string): string {
  const key = name.trim().toLowerCase();
  return ALIASES[key] ?? key;
}

/** Parse "ctrl+shift+d" into a key set. Returns null for an empty or malformed combo. */
export function parseCombo(text: string): ReadonlySet<string> | null {
  const parts = text.split('+').map((part) => part.trim());
  if (parts.length === 0 || parts.some((part) => part === '')) return null;
  return new Set(parts.map(normalizeKey));
}

/** Canonical string form: modifiers first in fixed order, then other keys sorted. */
export function formatCombo(keys: Iterable<string>): string {
  const all = [...new Set(keys)];
  const modifiers = ['ctrl', 'shift', 'alt'].filter((m) => all.includes(m));
  const rest = all.filter((k) => !MODIFIERS.has(k)).sort();
  return [...modifiers, ...rest].join('+');
}

export function canonicalCombo(text: string): string | null {
  const keys = parseCombo(text);
  return keys ? formatCombo(keys) : null;
}
