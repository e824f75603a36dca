import { describe, it, expect } from 'vitest';
import { boot, run, catchError } from '../helpers/programKit';
import { InvalidKeyError } from '../../src/cpu/errors';

describe('timers', () => {
  it('decrement once per tick before dispatch and floor at zero', () => {
    const emu = boot([
      { op: 'LoadVx', x: 0, kk: 5 },
      { op: 'SetDelay', x: 0 },
      { op: 'SetSound', x: 0 },
      { op: 'Jump', nnn: 0x206 },
    ]);
    run(emu, 2);
    expect(emu.snapshot().DT).toBe(5);
    // DT ticks down to 4 before SetSound runs in the same tick
    expect(emu.tick()).toEqual({ waiting: false, buzzing: true });
    expect(emu.snapshot().DT).toBe(4);
    expect(emu.snapshot().ST).toBe(5);
    run(emu, 4);
    expect(emu.snapshot().ST).toBe(1);
    expect(emu.tick().buzzing).toBe(false);
    run(emu, 10);
    expect(emu.snapshot().DT).toBe(0);
    expect(emu.snapshot().ST).toBe(0);
  });

  it('LoadDelay reads the current delay value', () => {
    const emu = boot([
      { op: 'LoadVx', x: 0, kk: 9 },
      { op: 'SetDelay', x: 0 },
      { op: 'LoadDelay', x: 1 },
    ]);
    run(emu, 3);
    expect(emu.snapshot().V[1]).toBe(8);
  });
});

describe('wait for key', () => {
  const program = () => boot([
    { op: 'LoadVx', x: 0, kk: 3 },
    { op: 'SetDelay', x: 0 },
    { op: 'WaitForKey', x: 5 },        // 0x204
    { op: 'LoadVx', x: 6, kk: 0x66 },  // 0x206
  ]);

  it('latches, keeps timers running and resumes on the first press', () => {
    const emu = program();
    run(emu, 3);
    expect(emu.isWaitingForKey()).toBe(true);
    expect(emu.snapshot().PC).toBe(0x206);

    expect(emu.tick()).toEqual({ waiting: true, buzzing: false });
    expect(emu.tick()).toEqual({ waiting: true, buzzing: false });
    expect(emu.snapshot().PC).toBe(0x206);
    expect(emu.snapshot().DT).toBe(0);
    expect(emu.snapshot().V[6]).toBe(0);

    emu.setKey(0xb, true);
    expect(emu.isWaitingForKey()).toBe(false);
    expect(emu.snapshot().V[5]).toBe(0xb);

    expect(emu.tick()).toEqual({ waiting: false, buzzing: false });
    expect(emu.snapshot().V[6]).toBe(0x66);
    expect(emu.snapshot().PC).toBe(0x208);
  });

  it('a key held down before the latch is visible to the pad and still needs a new press', () => {
    const emu = program();
    emu.setKey(3, true);
    run(emu, 3);
    expect(emu.pressedKeys()).toEqual([3]);
    expect(emu.isWaitingForKey()).toBe(true);
    emu.setKey(3, true);
    expect(emu.isWaitingForKey()).toBe(false);
    expect(emu.snapshot().V[5]).toBe(3);
  });

  it('ignores releases while latched', () => {
    const emu = program();
    run(emu, 3);
    emu.setKey(2, false);
    expect(emu.isWaitingForKey()).toBe(true);
  });

  it('only the first press is captured', () => {
    const emu = program();
    run(emu, 3);
    emu.setKey(4, true);
    emu.setKey(9, true);
    expect(emu.snapshot().V[5]).toBe(4);
  });

  it('setKeys resolves simultaneous presses by lowest key index', () => {
    const emu = program();
    run(emu, 3);
    emu.setKeys({ 0xc: true, 0x3: true });
    expect(emu.snapshot().V[5]).toBe(3);
    expect(emu.pressedKeys()).toEqual([3, 0xc]);
  });

  it('setKeys accepts a full pad array', () => {
    const emu = program();
    run(emu, 3);
    const pad = new Array<boolean>(16).fill(false);
    pad[0xe] = true;
    pad[0x7] = true;
    emu.setKeys(pad);
    expect(emu.snapshot().V[5]).toBe(7);
  });
});

describe('keypad instructions', () => {
  it('SkipIfKey / SkipIfNotKey test the key named by Vx', () => {
    const emu = boot([
      { op: 'LoadVx', x: 0, kk: 7 },
      { op: 'SkipIfKey', x: 0 },         // 0x202 -> skips
      { op: 'LoadVx', x: 1, kk: 1 },
      { op: 'SkipIfNotKey', x: 0 },      // 0x206 -> no skip
      { op: 'LoadVx', x: 2, kk: 2 },
    ]);
    emu.setKey(7, true);
    run(emu, 4);
    const s = emu.snapshot();
    expect(s.V[1]).toBe(0);
    expect(s.V[2]).toBe(2);
  });

  it('rejects a key register value above 0xF', () => {
    const emu = boot([
      { op: 'LoadVx', x: 0, kk: 0x10 },
      { op: 'SkipIfKey', x: 0 },
    ]);
    emu.tick();
    const err = catchError(() => emu.tick());
    expect(err).toBeInstanceOf(InvalidKeyError);
    if (err instanceof InvalidKeyError) expect(err.key).toBe(0x10);
  });

  it('setKey validates the index', () => {
    const emu = boot([]);
    expect(() => emu.setKey(16, true)).toThrow(InvalidKeyError);
    expect(() => emu.setKey(-1, false)).toThrow(InvalidKeyError);
    expect(() => emu.setKeys(new Array<boolean>(17).fill(false))).toThrow(InvalidKeyError);
  });
});
