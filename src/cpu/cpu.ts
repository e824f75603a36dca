import {
  type Byte, type Word, type TickStatus, type RandomSource,
  PROGRAM_START, REGISTER_COUNT, STACK_DEPTH,
} from '../emulator/types';
import type { Memory } from '../bus/memory';
import { checkKey, keypadEntries, type Keypad, type KeypadState } from '../input/keypad';
import type { Framebuffer } from '../display/framebuffer';
import { FONT_BASE, FONT_DATA, digitAddress } from '../font/digits';
import { decode, type Instruction, type Reg } from './decoder';
import { formatInstruction } from './disasm';
import { InvalidVRegisterError, StackOverflowError, StackUnderflowError } from './errors';
import { envFlag } from '../utils/env';

export interface CPUState {
  V: Uint8Array;      // V0..VF
  I: Word;            // index register, 12-bit in practice
  PC: Word;
  SP: number;         // 0..16, number of live stack entries
  stack: Uint16Array;
  DT: Byte;           // delay timer
  ST: Byte;           // sound timer
  waiting: boolean;   // Fx0A latch
  waitReg: Reg;       // destination of the latched Fx0A
}

const VF = 0xf;

function initialState(): CPUState {
  return {
    V: new Uint8Array(REGISTER_COUNT),
    I: 0,
    PC: PROGRAM_START,
    SP: 0,
    stack: new Uint16Array(STACK_DEPTH),
    DT: 0,
    ST: 0,
    waiting: false,
    waitReg: 0,
  };
}

export class Chip8CPU {
  state: CPUState = initialState();
  // Opcode and PC of the last fetched instruction, for error reports
  lastOpcode = 0;
  lastPC = 0;

  private readonly traceEnabled = envFlag('CHIP8_TRACE');
  private readonly debugEnabled = envFlag('CHIP8_DEBUG');

  constructor(
    private readonly memory: Memory,
    private readonly keypad: Keypad,
    private readonly screen: Framebuffer,
    private readonly random: RandomSource,
  ) {
    this.reset();
  }

  private dbg(msg: string): void {
    // eslint-disable-next-line no-console
    if (this.debugEnabled) console.log(`[CPU] ${msg}`);
  }

  // Zero everything; the font table is part of the zero state of reserved memory
  reset(): void {
    this.state = initialState();
    this.lastOpcode = 0;
    this.lastPC = 0;
    this.memory.reset();
    this.memory.install(FONT_DATA, FONT_BASE);
    this.keypad.reset();
    this.screen.clear();
  }

  /**
   * One interpreter step: timers first, then (unless latched on Fx0A) fetch,
   * decode and execute a single instruction. Errors propagate with PC already
   * past the fetched bytes.
   */
  tick(): TickStatus {
    const s = this.state;
    if (s.DT > 0) s.DT--;
    if (s.ST > 0) s.ST--;
    if (s.waiting) return { waiting: true, buzzing: s.ST > 0 };

    this.lastPC = s.PC;
    const hi = this.fetchByte();
    const lo = this.fetchByte();
    const opcode = (hi << 8) | lo;
    this.lastOpcode = opcode;

    const ins = decode(opcode);
    if (this.traceEnabled) {
      const pc = this.lastPC.toString(16).toUpperCase().padStart(4, '0');
      const op = opcode.toString(16).toUpperCase().padStart(4, '0');
      // eslint-disable-next-line no-console
      console.log(`[TRACE] 0x${pc} ${op} ${formatInstruction(ins)}`);
    }
    this.execute(ins);
    return { waiting: false, buzzing: s.ST > 0 };
  }

  /**
   * Updates one key. While latched on Fx0A, the first press writes the key
   * index into the destination register and releases the latch.
   */
  setKey(index: number, pressed: boolean): void {
    const key = checkKey(index);
    this.keypad.set(key, pressed);
    if (pressed && this.state.waiting) {
      this.setReg(this.state.waitReg, key);
      this.state.waiting = false;
      this.dbg(`key 0x${key.toString(16)} released Fx0A latch into V${this.state.waitReg.toString(16).toUpperCase()}`);
    }
  }

  // Applies a pad snapshot in scan order, so the lowest pressed index wins a pending Fx0A
  setKeys(state: KeypadState): void {
    const entries = keypadEntries(state);
    for (const [key, pressed] of entries) this.setKey(key, pressed);
  }

  private fetchByte(): Byte {
    const b = this.memory.read8(this.state.PC);
    this.state.PC = (this.state.PC + 1) & 0xffff;
    return b;
  }

  reg(i: number): Byte {
    if (!Number.isInteger(i) || i < 0 || i >= REGISTER_COUNT) throw new InvalidVRegisterError(i);
    return this.state.V[i];
  }

  private setReg(i: number, value: number): void {
    if (!Number.isInteger(i) || i < 0 || i >= REGISTER_COUNT) throw new InvalidVRegisterError(i);
    this.state.V[i] = value & 0xff;
  }

  private push(value: Word): void {
    const s = this.state;
    if (s.SP >= STACK_DEPTH) throw new StackOverflowError();
    s.stack[s.SP++] = value;
  }

  private pop(): Word {
    const s = this.state;
    if (s.SP <= 0) throw new StackUnderflowError();
    return s.stack[--s.SP];
  }

  private skipIf(cond: boolean): void {
    if (cond) this.state.PC = (this.state.PC + 2) & 0xffff;
  }

  private execute(ins: Instruction): void {
    const s = this.state;
    switch (ins.op) {
      case 'Sys':
        // Native machine-code routines are not supported; treated as a no-op
        break;
      case 'ClearScreen':
        this.screen.clear();
        break;
      case 'Return':
        s.PC = this.pop();
        break;
      case 'Jump':
        s.PC = ins.nnn;
        break;
      case 'Call':
        this.push(s.PC);
        s.PC = ins.nnn;
        break;
      case 'SkipVxEqual':
        this.skipIf(this.reg(ins.x) === ins.kk);
        break;
      case 'SkipVxNotEqual':
        this.skipIf(this.reg(ins.x) !== ins.kk);
        break;
      case 'SkipEqual':
        this.skipIf(this.reg(ins.x) === this.reg(ins.y));
        break;
      case 'SkipNotEqual':
        this.skipIf(this.reg(ins.x) !== this.reg(ins.y));
        break;
      case 'LoadVx':
        this.setReg(ins.x, ins.kk);
        break;
      case 'AddVx':
        this.setReg(ins.x, this.reg(ins.x) + ins.kk);
        break;
      case 'Set':
        this.setReg(ins.x, this.reg(ins.y));
        break;
      case 'Or':
        this.setReg(ins.x, this.reg(ins.x) | this.reg(ins.y));
        break;
      case 'And':
        this.setReg(ins.x, this.reg(ins.x) & this.reg(ins.y));
        break;
      case 'Xor':
        this.setReg(ins.x, this.reg(ins.x) ^ this.reg(ins.y));
        break;
      // Flag-producing ops write the result first, VF last
      case 'Add': {
        const sum = this.reg(ins.x) + this.reg(ins.y);
        this.setReg(ins.x, sum);
        this.setReg(VF, sum > 0xff ? 1 : 0);
        break;
      }
      case 'Sub': {
        const a = this.reg(ins.x);
        const b = this.reg(ins.y);
        this.setReg(ins.x, a - b);
        this.setReg(VF, a >= b ? 1 : 0);
        break;
      }
      case 'SubN': {
        const a = this.reg(ins.x);
        const b = this.reg(ins.y);
        this.setReg(ins.x, b - a);
        this.setReg(VF, b >= a ? 1 : 0);
        break;
      }
      case 'ShiftRightVx': {
        const v = this.reg(ins.x);
        this.setReg(ins.x, v >> 1);
        this.setReg(VF, v & 0x01);
        break;
      }
      case 'ShiftLeftVx': {
        const v = this.reg(ins.x);
        this.setReg(ins.x, v << 1);
        this.setReg(VF, (v >> 7) & 0x01);
        break;
      }
      case 'LoadI':
        s.I = ins.nnn;
        break;
      case 'JumpOffset':
        s.PC = (ins.nnn + this.reg(ins.x)) & 0xffff;
        break;
      case 'Rand':
        this.setReg(ins.x, this.random.nextByte() & ins.kk);
        break;
      case 'DrawSprite': {
        const sprite = this.memory.readRange(s.I, ins.n);
        const collided = this.screen.draw(sprite, this.reg(ins.x), this.reg(ins.y));
        this.setReg(VF, collided ? 1 : 0);
        break;
      }
      case 'SkipIfKey':
        this.skipIf(this.keypad.isPressed(this.reg(ins.x)));
        break;
      case 'SkipIfNotKey':
        this.skipIf(!this.keypad.isPressed(this.reg(ins.x)));
        break;
      case 'LoadDelay':
        this.setReg(ins.x, s.DT);
        break;
      case 'WaitForKey':
        this.reg(ins.x);
        s.waiting = true;
        s.waitReg = ins.x;
        this.dbg(`waiting for key into V${ins.x.toString(16).toUpperCase()}`);
        break;
      case 'SetDelay':
        s.DT = this.reg(ins.x);
        break;
      case 'SetSound':
        s.ST = this.reg(ins.x);
        break;
      case 'AddToIndex': {
        const sum = s.I + this.reg(ins.x);
        s.I = sum & 0xfff;
        this.setReg(VF, sum > 0xfff ? 1 : 0);
        break;
      }
      case 'LoadDigit':
        s.I = digitAddress(this.reg(ins.x));
        break;
      case 'LoadBCD': {
        const v = this.reg(ins.x);
        this.memory.checkRange(s.I, 3);
        this.memory.write8(s.I, Math.floor(v / 100));
        this.memory.write8(s.I + 1, Math.floor(v / 10) % 10);
        this.memory.write8(s.I + 2, v % 10);
        break;
      }
      case 'SaveMem':
        this.reg(ins.x);
        this.memory.checkProgramRange(s.I, ins.x + 1);
        for (let i = 0; i <= ins.x; i++) this.memory.write8(s.I + i, this.reg(i));
        break;
      case 'LoadMem':
        this.reg(ins.x);
        this.memory.checkProgramRange(s.I, ins.x + 1);
        for (let i = 0; i <= ins.x; i++) this.setReg(i, this.memory.read8(s.I + i));
        break;
      default: {
        const unreachable: never = ins;
        throw new Error(`Unhandled instruction: ${JSON.stringify(unreachable)}`);
      }
    }
  }
}
