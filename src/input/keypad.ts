import { KEY_COUNT } from '../emulator/types';
import { InvalidKeyError } from '../cpu/errors';

export type KeyIndex = 0x0 | 0x1 | 0x2 | 0x3 | 0x4 | 0x5 | 0x6 | 0x7 | 0x8 | 0x9 | 0xa | 0xb | 0xc | 0xd | 0xe | 0xf;

// Whole-pad snapshot: either 16 booleans in pad order or a sparse map by index
export type KeypadState = readonly boolean[] | Partial<Record<KeyIndex, boolean>>;

export function isKeyIndex(i: number): i is KeyIndex {
  return Number.isInteger(i) && i >= 0 && i < KEY_COUNT;
}

export function checkKey(i: number): KeyIndex {
  if (!isKeyIndex(i)) throw new InvalidKeyError(i);
  return i;
}

// 16-key hex pad, laid out 123C/456D/789E/A0BF on the original hardware
export class Keypad {
  private state = new Uint8Array(KEY_COUNT);

  reset(): void {
    this.state.fill(0);
  }

  set(key: number, pressed: boolean): void {
    this.state[checkKey(key)] = pressed ? 1 : 0;
  }

  isPressed(key: number): boolean {
    return this.state[checkKey(key)] === 1;
  }

  pressed(): KeyIndex[] {
    const out: KeyIndex[] = [];
    for (let i = 0; i < KEY_COUNT; i++) if (this.state[i] && isKeyIndex(i)) out.push(i);
    return out;
  }
}

function isPadArray(state: KeypadState): state is readonly boolean[] {
  return Array.isArray(state);
}

// Normalises a snapshot to [index, pressed] pairs in pad-scan order (0x0 first)
export function keypadEntries(state: KeypadState): [KeyIndex, boolean][] {
  const out: [KeyIndex, boolean][] = [];
  if (isPadArray(state)) {
    if (state.length > KEY_COUNT) throw new InvalidKeyError(state.length - 1);
    state.forEach((pressed, i) => out.push([checkKey(i), pressed]));
    return out;
  }
  for (const [k, pressed] of Object.entries(state)) {
    if (pressed === undefined) continue;
    out.push([checkKey(Number(k)), pressed]);
  }
  return out.sort((a, b) => a[0] - b[0]);
}
