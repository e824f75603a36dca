import type { Byte, Word, Address } from '../emulator/types';
import { InvalidOpcodeError } from './errors';

// Register operand, always 0x0..0xF when produced by decode()
export type Reg = number;

/**
 * The 35 instructions as a closed union. Field names follow the usual operand
 * notation: x/y register nibbles, nnn 12-bit address, kk 8-bit immediate,
 * n 4-bit sprite height.
 */
export type Instruction =
  | { op: 'Sys'; nnn: Address }                   // 0nnn (ignored)
  | { op: 'ClearScreen' }                          // 00E0
  | { op: 'Return' }                               // 00EE
  | { op: 'Jump'; nnn: Address }                  // 1nnn
  | { op: 'Call'; nnn: Address }                  // 2nnn
  | { op: 'SkipVxEqual'; x: Reg; kk: Byte }       // 3xkk
  | { op: 'SkipVxNotEqual'; x: Reg; kk: Byte }    // 4xkk
  | { op: 'SkipEqual'; x: Reg; y: Reg }           // 5xy0
  | { op: 'LoadVx'; x: Reg; kk: Byte }            // 6xkk
  | { op: 'AddVx'; x: Reg; kk: Byte }             // 7xkk
  | { op: 'Set'; x: Reg; y: Reg }                 // 8xy0
  | { op: 'Or'; x: Reg; y: Reg }                  // 8xy1
  | { op: 'And'; x: Reg; y: Reg }                 // 8xy2
  | { op: 'Xor'; x: Reg; y: Reg }                 // 8xy3
  | { op: 'Add'; x: Reg; y: Reg }                 // 8xy4
  | { op: 'Sub'; x: Reg; y: Reg }                 // 8xy5
  | { op: 'ShiftRightVx'; x: Reg }                // 8xy6
  | { op: 'SubN'; x: Reg; y: Reg }                // 8xy7
  | { op: 'ShiftLeftVx'; x: Reg }                 // 8xyE
  | { op: 'SkipNotEqual'; x: Reg; y: Reg }        // 9xy0
  | { op: 'LoadI'; nnn: Address }                 // Annn
  | { op: 'JumpOffset'; x: Reg; nnn: Address }    // Bnnn
  | { op: 'Rand'; x: Reg; kk: Byte }              // Cxkk
  | { op: 'DrawSprite'; x: Reg; y: Reg; n: number } // Dxyn
  | { op: 'SkipIfKey'; x: Reg }                   // Ex9E
  | { op: 'SkipIfNotKey'; x: Reg }                // ExA1
  | { op: 'LoadDelay'; x: Reg }                   // Fx07
  | { op: 'WaitForKey'; x: Reg }                  // Fx0A
  | { op: 'SetDelay'; x: Reg }                    // Fx15
  | { op: 'SetSound'; x: Reg }                    // Fx18
  | { op: 'AddToIndex'; x: Reg }                  // Fx1E
  | { op: 'LoadDigit'; x: Reg }                   // Fx29
  | { op: 'LoadBCD'; x: Reg }                     // Fx33
  | { op: 'SaveMem'; x: Reg }                     // Fx55
  | { op: 'LoadMem'; x: Reg };                    // Fx65

// Pure: never touches machine state. Throws InvalidOpcodeError for anything outside the table.
export function decode(opcode: Word): Instruction {
  if (!Number.isInteger(opcode) || opcode < 0 || opcode > 0xffff) throw new InvalidOpcodeError(opcode);
  const family = (opcode >> 12) & 0xf;
  const x = (opcode >> 8) & 0xf;
  const y = (opcode >> 4) & 0xf;
  const n = opcode & 0xf;
  const kk = opcode & 0xff;
  const nnn = opcode & 0xfff;

  switch (family) {
    case 0x0:
      if (opcode === 0x00e0) return { op: 'ClearScreen' };
      if (opcode === 0x00ee) return { op: 'Return' };
      return { op: 'Sys', nnn };
    case 0x1: return { op: 'Jump', nnn };
    case 0x2: return { op: 'Call', nnn };
    case 0x3: return { op: 'SkipVxEqual', x, kk };
    case 0x4: return { op: 'SkipVxNotEqual', x, kk };
    case 0x5:
      if (n === 0) return { op: 'SkipEqual', x, y };
      break;
    case 0x6: return { op: 'LoadVx', x, kk };
    case 0x7: return { op: 'AddVx', x, kk };
    case 0x8:
      switch (n) {
        case 0x0: return { op: 'Set', x, y };
        case 0x1: return { op: 'Or', x, y };
        case 0x2: return { op: 'And', x, y };
        case 0x3: return { op: 'Xor', x, y };
        case 0x4: return { op: 'Add', x, y };
        case 0x5: return { op: 'Sub', x, y };
        case 0x6: return { op: 'ShiftRightVx', x };
        case 0x7: return { op: 'SubN', x, y };
        case 0xe: return { op: 'ShiftLeftVx', x };
      }
      break;
    case 0x9:
      if (n === 0) return { op: 'SkipNotEqual', x, y };
      break;
    case 0xa: return { op: 'LoadI', nnn };
    case 0xb: return { op: 'JumpOffset', x, nnn };
    case 0xc: return { op: 'Rand', x, kk };
    case 0xd: return { op: 'DrawSprite', x, y, n };
    case 0xe:
      if (kk === 0x9e) return { op: 'SkipIfKey', x };
      if (kk === 0xa1) return { op: 'SkipIfNotKey', x };
      break;
    case 0xf:
      switch (kk) {
        case 0x07: return { op: 'LoadDelay', x };
        case 0x0a: return { op: 'WaitForKey', x };
        case 0x15: return { op: 'SetDelay', x };
        case 0x18: return { op: 'SetSound', x };
        case 0x1e: return { op: 'AddToIndex', x };
        case 0x29: return { op: 'LoadDigit', x };
        case 0x33: return { op: 'LoadBCD', x };
        case 0x55: return { op: 'SaveMem', x };
        case 0x65: return { op: 'LoadMem', x };
      }
      break;
  }
  throw new InvalidOpcodeError(opcode);
}

// Non-throwing variant for listings and fuzzing
export function tryDecode(opcode: Word): Instruction | null {
  try {
    return decode(opcode);
  } catch (e) {
    if (e instanceof InvalidOpcodeError) return null;
    throw e;
  }
}

// Inverse of decode(); used to assemble test programs
export function encode(ins: Instruction): Word {
  const xy = (hi: number, x: Reg, y: Reg, lo: number) => (hi << 12) | ((x & 0xf) << 8) | ((y & 0xf) << 4) | (lo & 0xf);
  const xkk = (hi: number, x: Reg, kk: Byte) => (hi << 12) | ((x & 0xf) << 8) | (kk & 0xff);
  const addr = (hi: number, nnn: Address) => (hi << 12) | (nnn & 0xfff);
  switch (ins.op) {
    case 'Sys': return addr(0x0, ins.nnn);
    case 'ClearScreen': return 0x00e0;
    case 'Return': return 0x00ee;
    case 'Jump': return addr(0x1, ins.nnn);
    case 'Call': return addr(0x2, ins.nnn);
    case 'SkipVxEqual': return xkk(0x3, ins.x, ins.kk);
    case 'SkipVxNotEqual': return xkk(0x4, ins.x, ins.kk);
    case 'SkipEqual': return xy(0x5, ins.x, ins.y, 0x0);
    case 'LoadVx': return xkk(0x6, ins.x, ins.kk);
    case 'AddVx': return xkk(0x7, ins.x, ins.kk);
    case 'Set': return xy(0x8, ins.x, ins.y, 0x0);
    case 'Or': return xy(0x8, ins.x, ins.y, 0x1);
    case 'And': return xy(0x8, ins.x, ins.y, 0x2);
    case 'Xor': return xy(0x8, ins.x, ins.y, 0x3);
    case 'Add': return xy(0x8, ins.x, ins.y, 0x4);
    case 'Sub': return xy(0x8, ins.x, ins.y, 0x5);
    case 'ShiftRightVx': return xy(0x8, ins.x, 0, 0x6);
    case 'SubN': return xy(0x8, ins.x, ins.y, 0x7);
    case 'ShiftLeftVx': return xy(0x8, ins.x, 0, 0xe);
    case 'SkipNotEqual': return xy(0x9, ins.x, ins.y, 0x0);
    case 'LoadI': return addr(0xa, ins.nnn);
    case 'JumpOffset': return addr(0xb, ins.nnn);
    case 'Rand': return xkk(0xc, ins.x, ins.kk);
    case 'DrawSprite': return xy(0xd, ins.x, ins.y, ins.n);
    case 'SkipIfKey': return xkk(0xe, ins.x, 0x9e);
    case 'SkipIfNotKey': return xkk(0xe, ins.x, 0xa1);
    case 'LoadDelay': return xkk(0xf, ins.x, 0x07);
    case 'WaitForKey': return xkk(0xf, ins.x, 0x0a);
    case 'SetDelay': return xkk(0xf, ins.x, 0x15);
    case 'SetSound': return xkk(0xf, ins.x, 0x18);
    case 'AddToIndex': return xkk(0xf, ins.x, 0x1e);
    case 'LoadDigit': return xkk(0xf, ins.x, 0x29);
    case 'LoadBCD': return xkk(0xf, ins.x, 0x33);
    case 'SaveMem': return xkk(0xf, ins.x, 0x55);
    case 'LoadMem': return xkk(0xf, ins.x, 0x65);
  }
}
