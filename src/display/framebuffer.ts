import { type Bounds, SCREEN_WIDTH, SCREEN_HEIGHT } from '../emulator/types';
import { drawSprite } from './sprite';

export interface FramebufferView extends Bounds {
  pixel(x: number, y: number): boolean;
  rows(): boolean[][];
  readonly pixels: ArrayLike<number>;
}

// 64x32 monochrome screen. Pixels only change through clear() and draw().
export class Framebuffer implements FramebufferView {
  readonly width: number;
  readonly height: number;
  private readonly buf: Uint8Array;

  constructor(width = SCREEN_WIDTH, height = SCREEN_HEIGHT) {
    this.width = width;
    this.height = height;
    this.buf = new Uint8Array(width * height);
  }

  get pixels(): ArrayLike<number> {
    return this.buf;
  }

  clear(): void {
    this.buf.fill(0);
  }

  draw(sprite: ArrayLike<number>, x: number, y: number): boolean {
    return drawSprite(sprite, x, y, this, this.buf);
  }

  pixel(x: number, y: number): boolean {
    if (x < 0 || y < 0 || x >= this.width || y >= this.height) return false;
    return this.buf[y * this.width + x] !== 0;
  }

  rows(): boolean[][] {
    const out: boolean[][] = [];
    for (let y = 0; y < this.height; y++) {
      const row: boolean[] = [];
      for (let x = 0; x < this.width; x++) row.push(this.buf[y * this.width + x] !== 0);
      out.push(row);
    }
    return out;
  }
}
