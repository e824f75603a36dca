import type { FramebufferView } from '../display/framebuffer';

// FNV-1a over the pixel plane, one byte per pixel in row-major order
export function framebufferHash(fb: FramebufferView): string {
  const px = fb.pixels;
  let h = 0x811c9dc5;
  for (let i = 0; i < px.length; i++) {
    h ^= px[i] & 0xff;
    h = Math.imul(h, 0x01000193) >>> 0;
  }
  return h.toString(16).padStart(8, '0');
}
