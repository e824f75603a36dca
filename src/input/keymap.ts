import { checkKey, type KeyIndex } from './keypad';

// KeyboardEvent.code -> pad index. Left half of a QWERTY board mirrors the pad grid.
export const DEFAULT_KEYMAP: Readonly<Record<string, KeyIndex>> = {
  Digit1: 0x1, Digit2: 0x2, Digit3: 0x3, Digit4: 0xc,
  KeyQ: 0x4, KeyW: 0x5, KeyE: 0x6, KeyR: 0xd,
  KeyA: 0x7, KeyS: 0x8, KeyD: 0x9, KeyF: 0xe,
  KeyZ: 0xa, KeyX: 0x0, KeyC: 0xb, KeyV: 0xf,
  // Arrows double up on the usual movement keys
  ArrowLeft: 0x7, ArrowRight: 0x9, ArrowUp: 0x5, ArrowDown: 0x8,
};

export function keyIndexFor(code: string, keymap: Readonly<Record<string, KeyIndex>> = DEFAULT_KEYMAP): KeyIndex | undefined {
  return Object.prototype.hasOwnProperty.call(keymap, code) ? keymap[code] : undefined;
}

// Parses "1,A,f" style lists used by the scripts
export function parseKeyList(list: string): KeyIndex[] {
  const out: KeyIndex[] = [];
  for (const part of list.split(',').map(s => s.trim()).filter(Boolean)) {
    if (!/^[0-9a-fA-F]$/.test(part)) throw new Error(`Not a key: ${part}`);
    out.push(checkKey(parseInt(part, 16)));
  }
  return out;
}
