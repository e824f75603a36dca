import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { boot, run } from '../helpers/programKit';
import type { Instruction } from '../../src/cpu/decoder';

// Seeds registers with LoadVx, executes one instruction and returns V0..VF
function exec(ins: Instruction, regs: Record<number, number>): number[] {
  const setup: Instruction[] = Object.entries(regs).map(([i, kk]): Instruction => ({ op: 'LoadVx', x: Number(i), kk }));
  const emu = boot([...setup, ins]);
  run(emu, setup.length + 1);
  return emu.snapshot().V;
}

describe('arithmetic and logic', () => {
  it('Add wraps and sets carry', () => {
    const v = exec({ op: 'Add', x: 1, y: 2 }, { 1: 0xfd, 2: 0x04 });
    expect(v[1]).toBe(0x01);
    expect(v[0xf]).toBe(1);
  });

  it('Add clears VF without overflow', () => {
    const v = exec({ op: 'Add', x: 1, y: 2 }, { 1: 0x10, 2: 0x20, 0xf: 1 });
    expect(v[1]).toBe(0x30);
    expect(v[0xf]).toBe(0);
  });

  it('Sub borrows: VF=0 when Vx < Vy', () => {
    const v = exec({ op: 'Sub', x: 1, y: 2 }, { 1: 0xf0, 2: 0xf1 });
    expect(v[1]).toBe(0xff);
    expect(v[0xf]).toBe(0);
  });

  it('Sub of equal values sets VF (no borrow)', () => {
    const v = exec({ op: 'Sub', x: 1, y: 2 }, { 1: 0x33, 2: 0x33 });
    expect(v[1]).toBe(0);
    expect(v[0xf]).toBe(1);
  });

  it('SubN computes Vy - Vx', () => {
    const v = exec({ op: 'SubN', x: 1, y: 2 }, { 1: 0x05, 2: 0x03 });
    expect(v[1]).toBe(0xfe);
    expect(v[0xf]).toBe(0);
  });

  it('ShiftLeftVx moves bit 7 into VF', () => {
    const v = exec({ op: 'ShiftLeftVx', x: 3 }, { 3: 0b11001111 });
    expect(v[3]).toBe(0b10011110);
    expect(v[0xf]).toBe(1);
  });

  it('ShiftRightVx moves bit 0 into VF', () => {
    const v = exec({ op: 'ShiftRightVx', x: 3 }, { 3: 0b00000101 });
    expect(v[3]).toBe(0b00000010);
    expect(v[0xf]).toBe(1);
  });

  it('flag wins when VF is also the destination', () => {
    const v = exec({ op: 'Add', x: 0xf, y: 1 }, { 0xf: 0xff, 1: 0x01 });
    expect(v[0xf]).toBe(1);
  });

  it('AddVx wraps and leaves VF alone', () => {
    const v = exec({ op: 'AddVx', x: 2, kk: 0x10 }, { 2: 0xf8, 0xf: 0x07 });
    expect(v[2]).toBe(0x08);
    expect(v[0xf]).toBe(0x07);
  });

  it('Set/Or/And/Xor', () => {
    expect(exec({ op: 'Set', x: 0, y: 1 }, { 0: 0x12, 1: 0x34 })[0]).toBe(0x34);
    expect(exec({ op: 'Or', x: 0, y: 1 }, { 0: 0xf0, 1: 0x0f })[0]).toBe(0xff);
    expect(exec({ op: 'And', x: 0, y: 1 }, { 0: 0xf3, 1: 0x3f })[0]).toBe(0x33);
    expect(exec({ op: 'Xor', x: 0, y: 1 }, { 0: 0xff, 1: 0x0f })[0]).toBe(0xf0);
  });
});

describe('Property-based: 8xyN flag semantics', () => {
  const byte = fc.integer({ min: 0, max: 255 });

  it('Add matches (a+b) mod 256 with carry', () => {
    fc.assert(fc.property(byte, byte, (a, b) => {
      const v = exec({ op: 'Add', x: 1, y: 2 }, { 1: a, 2: b });
      expect(v[1]).toBe((a + b) % 256);
      expect(v[0xf]).toBe(a + b >= 256 ? 1 : 0);
    }), { numRuns: 200 });
  });

  it('Sub and SubN report no-borrow in VF', () => {
    fc.assert(fc.property(byte, byte, (a, b) => {
      const sub = exec({ op: 'Sub', x: 1, y: 2 }, { 1: a, 2: b });
      expect(sub[1]).toBe((a - b + 256) % 256);
      expect(sub[0xf]).toBe(a >= b ? 1 : 0);
      const subn = exec({ op: 'SubN', x: 1, y: 2 }, { 1: a, 2: b });
      expect(subn[1]).toBe((b - a + 256) % 256);
      expect(subn[0xf]).toBe(b >= a ? 1 : 0);
    }), { numRuns: 200 });
  });

  it('shifts expose the dropped bit', () => {
    fc.assert(fc.property(byte, (a) => {
      const left = exec({ op: 'ShiftLeftVx', x: 4 }, { 4: a });
      expect(left[4]).toBe((a << 1) & 0xff);
      expect(left[0xf]).toBe(a >> 7);
      const right = exec({ op: 'ShiftRightVx', x: 4 }, { 4: a });
      expect(right[4]).toBe(a >> 1);
      expect(right[0xf]).toBe(a & 1);
    }), { numRuns: 200 });
  });
});
