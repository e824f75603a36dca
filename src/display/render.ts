import { PNG } from 'pngjs';
import type { FramebufferView } from './framebuffer';

export type RGB = readonly [number, number, number];

export interface RenderOptions {
  scale?: number;
  on?: RGB;
  off?: RGB;
}

export function renderFramebufferRGBA(fb: FramebufferView, opts: RenderOptions = {}): { rgba: Uint8Array; width: number; height: number } {
  const scale = Math.max(1, Math.floor(opts.scale ?? 1));
  const on = opts.on ?? [0xff, 0xff, 0xff];
  const off = opts.off ?? [0x00, 0x00, 0x00];
  const width = fb.width * scale;
  const height = fb.height * scale;
  const rgba = new Uint8Array(width * height * 4);
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const c = fb.pixel(Math.floor(x / scale), Math.floor(y / scale)) ? on : off;
      const o = (y * width + x) * 4;
      rgba[o] = c[0];
      rgba[o + 1] = c[1];
      rgba[o + 2] = c[2];
      rgba[o + 3] = 0xff;
    }
  }
  return { rgba, width, height };
}

export function encodeFramebufferPng(fb: FramebufferView, opts: RenderOptions = {}): Buffer {
  const { rgba, width, height } = renderFramebufferRGBA(fb, opts);
  const png = new PNG({ width, height });
  Buffer.from(rgba.buffer, rgba.byteOffset, rgba.byteLength).copy(png.data);
  return PNG.sync.write(png);
}

export function framebufferToText(fb: FramebufferView, on = '#', off = '.'): string {
  return fb.rows().map(row => row.map(p => (p ? on : off)).join('')).join('\n');
}
