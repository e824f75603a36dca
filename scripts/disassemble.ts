import fs from 'fs';
import { disassemble, formatListingRow } from '../src/cpu/disasm';
import { PROGRAM_START } from '../src/emulator/types';
import { parseArgs } from '../src/utils/args';
import { envString } from '../src/utils/env';

const args = parseArgs(process.argv);
const romPath = args.rom ?? envString('CHIP8_ROM');
if (!romPath) {
  console.error('Usage: npm run disasm -- --rom=path/to/game.ch8');
  process.exit(1);
}
const rom = new Uint8Array(fs.readFileSync(romPath));
for (const row of disassemble(rom, PROGRAM_START)) console.log(formatListingRow(row));
