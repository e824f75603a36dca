import { describe, it, expect } from 'vitest';
import { PNG } from 'pngjs';
import { Framebuffer } from '../../src/display/framebuffer';
import { renderFramebufferRGBA, encodeFramebufferPng, framebufferToText } from '../../src/display/render';

function withCorner(): Framebuffer {
  const fb = new Framebuffer();
  fb.draw([0x80], 0, 0);
  return fb;
}

describe('framebuffer rendering', () => {
  it('scales pixels into RGBA', () => {
    const { rgba, width, height } = renderFramebufferRGBA(withCorner(), { scale: 2 });
    expect([width, height]).toEqual([128, 64]);
    expect(Array.from(rgba.subarray(0, 4))).toEqual([255, 255, 255, 255]);
    // (2,0) maps back to screen pixel (1,0), which is off
    expect(Array.from(rgba.subarray(8, 12))).toEqual([0, 0, 0, 255]);
    // (1,1) still belongs to screen pixel (0,0)
    expect(Array.from(rgba.subarray(516, 520))).toEqual([255, 255, 255, 255]);
  });

  it('honours custom colours', () => {
    const { rgba } = renderFramebufferRGBA(withCorner(), { on: [0x33, 0xff, 0x66], off: [0x10, 0x20, 0x30] });
    expect(Array.from(rgba.subarray(0, 8))).toEqual([0x33, 0xff, 0x66, 255, 0x10, 0x20, 0x30, 255]);
  });

  it('encodes a PNG that decodes back to the same pixels', () => {
    const png = PNG.sync.read(encodeFramebufferPng(withCorner()));
    expect([png.width, png.height]).toEqual([64, 32]);
    expect(Array.from(png.data.subarray(0, 8))).toEqual([255, 255, 255, 255, 0, 0, 0, 255]);
  });

  it('renders text rows', () => {
    const lines = framebufferToText(withCorner()).split('\n');
    expect(lines).toHaveLength(32);
    expect(lines[0]).toBe('#' + '.'.repeat(63));
    expect(lines[1]).toBe('.'.repeat(64));
  });
});
