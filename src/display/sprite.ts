import type { Bounds } from '../emulator/types';

const mod = (v: number, m: number) => ((v % m) + m) % m;

/**
 * XOR-blits an 8-pixel-wide sprite into a row-major bit buffer (one byte per pixel).
 * Rows and columns wrap independently, so a sprite straddling the right edge
 * reappears at x=0 on the same row. Returns true when any set pixel was turned off.
 */
export function drawSprite(
  sprite: ArrayLike<number>,
  x: number,
  y: number,
  bounds: Bounds,
  buffer: Uint8Array,
): boolean {
  const { width, height } = bounds;
  let collided = false;
  for (let r = 0; r < sprite.length; r++) {
    const row = mod(y + r, height);
    const bits = sprite[r] & 0xff;
    for (let c = 0; c < 8; c++) {
      const bit = (bits >> (7 - c)) & 1;
      const col = mod(x + c, width);
      const idx = row * width + col;
      if (buffer[idx] & bit) collided = true;
      buffer[idx] ^= bit;
    }
  }
  return collided;
}
