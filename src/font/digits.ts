import font from './digits.json';
import type { Address, Byte } from '../emulator/types';
import { InvalidDigitError } from '../cpu/errors';

// Hex digit glyphs 0..F, 4 pixels wide (high nibble) by 5 rows
export const FONT_BASE: Address = 0x050;
export const GLYPH_HEIGHT: number = font.glyphHeight;

const GLYPHS: readonly (readonly Byte[])[] = font.glyphs;

if (GLYPHS.length !== 16 || GLYPHS.some(g => g.length !== GLYPH_HEIGHT)) {
  throw new Error('digits.json must hold 16 glyphs of 5 rows');
}

// Flattened table as laid out in reserved memory
export const FONT_DATA: Uint8Array = Uint8Array.from(GLYPHS.flat());

function checkDigit(value: number): void {
  if (!Number.isInteger(value) || value < 0 || value > 0xf) throw new InvalidDigitError(value);
}

export function digitGlyph(value: number): readonly Byte[] {
  checkDigit(value);
  return GLYPHS[value];
}

export function digitAddress(value: number): Address {
  checkDigit(value);
  return FONT_BASE + value * GLYPH_HEIGHT;
}
