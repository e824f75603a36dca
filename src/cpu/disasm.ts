import type { Address, Word } from '../emulator/types';
import { tryDecode, type Instruction } from './decoder';

const h = (v: number, w: number) => '0x' + v.toString(16).toUpperCase().padStart(w, '0');
const v = (r: number) => 'V' + r.toString(16).toUpperCase();

export function formatInstruction(ins: Instruction): string {
  switch (ins.op) {
    case 'Sys': return `SYS ${h(ins.nnn, 3)}`;
    case 'ClearScreen': return 'CLS';
    case 'Return': return 'RET';
    case 'Jump': return `JP ${h(ins.nnn, 3)}`;
    case 'Call': return `CALL ${h(ins.nnn, 3)}`;
    case 'SkipVxEqual': return `SE ${v(ins.x)}, ${h(ins.kk, 2)}`;
    case 'SkipVxNotEqual': return `SNE ${v(ins.x)}, ${h(ins.kk, 2)}`;
    case 'SkipEqual': return `SE ${v(ins.x)}, ${v(ins.y)}`;
    case 'LoadVx': return `LD ${v(ins.x)}, ${h(ins.kk, 2)}`;
    case 'AddVx': return `ADD ${v(ins.x)}, ${h(ins.kk, 2)}`;
    case 'Set': return `LD ${v(ins.x)}, ${v(ins.y)}`;
    case 'Or': return `OR ${v(ins.x)}, ${v(ins.y)}`;
    case 'And': return `AND ${v(ins.x)}, ${v(ins.y)}`;
    case 'Xor': return `XOR ${v(ins.x)}, ${v(ins.y)}`;
    case 'Add': return `ADD ${v(ins.x)}, ${v(ins.y)}`;
    case 'Sub': return `SUB ${v(ins.x)}, ${v(ins.y)}`;
    case 'ShiftRightVx': return `SHR ${v(ins.x)}`;
    case 'SubN': return `SUBN ${v(ins.x)}, ${v(ins.y)}`;
    case 'ShiftLeftVx': return `SHL ${v(ins.x)}`;
    case 'SkipNotEqual': return `SNE ${v(ins.x)}, ${v(ins.y)}`;
    case 'LoadI': return `LD I, ${h(ins.nnn, 3)}`;
    case 'JumpOffset': return `JP ${v(ins.x)}, ${h(ins.nnn, 3)}`;
    case 'Rand': return `RND ${v(ins.x)}, ${h(ins.kk, 2)}`;
    case 'DrawSprite': return `DRW ${v(ins.x)}, ${v(ins.y)}, ${ins.n}`;
    case 'SkipIfKey': return `SKP ${v(ins.x)}`;
    case 'SkipIfNotKey': return `SKNP ${v(ins.x)}`;
    case 'LoadDelay': return `LD ${v(ins.x)}, DT`;
    case 'WaitForKey': return `LD ${v(ins.x)}, K`;
    case 'SetDelay': return `LD DT, ${v(ins.x)}`;
    case 'SetSound': return `LD ST, ${v(ins.x)}`;
    case 'AddToIndex': return `ADD I, ${v(ins.x)}`;
    case 'LoadDigit': return `LD F, ${v(ins.x)}`;
    case 'LoadBCD': return `LD B, ${v(ins.x)}`;
    case 'SaveMem': return `LD [I], ${v(ins.x)}`;
    case 'LoadMem': return `LD ${v(ins.x)}, [I]`;
  }
}

export interface ListingRow {
  address: Address;
  opcode: Word;
  text: string;
}

// Word-aligned listing; a trailing odd byte is shown as DB
export function disassemble(bytes: ArrayLike<number>, origin: Address = 0x200): ListingRow[] {
  const rows: ListingRow[] = [];
  for (let i = 0; i + 1 < bytes.length; i += 2) {
    const opcode = ((bytes[i] & 0xff) << 8) | (bytes[i + 1] & 0xff);
    const ins = tryDecode(opcode);
    rows.push({ address: origin + i, opcode, text: ins ? formatInstruction(ins) : `DW ${h(opcode, 4)}` });
  }
  if (bytes.length % 2 === 1) {
    const last = bytes[bytes.length - 1] & 0xff;
    rows.push({ address: origin + bytes.length - 1, opcode: last, text: `DB ${h(last, 2)}` });
  }
  return rows;
}

export function formatListingRow(row: ListingRow): string {
  const width = row.text.startsWith('DB ') ? 2 : 4;
  return `${h(row.address, 4)}  ${row.opcode.toString(16).toUpperCase().padStart(width, '0')}  ${row.text}`;
}
