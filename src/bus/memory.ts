import { type Byte, type Word, type Address, MEMORY_SIZE, PROGRAM_START, MAX_ROM_SIZE } from '../emulator/types';
import { InvalidAddressError, MemoryOverflowError } from '../cpu/errors';

// 4KB flat address space. Nothing wraps: every out-of-range access throws.
export class Memory {
  readonly bytes = new Uint8Array(MEMORY_SIZE);

  reset(): void {
    this.bytes.fill(0);
  }

  loadRom(rom: Uint8Array): void {
    if (rom.length > MAX_ROM_SIZE) throw new MemoryOverflowError(rom.length);
    this.bytes.set(rom, PROGRAM_START);
  }

  // Reserved low region (below 0x200); used for the digit font
  install(data: ArrayLike<number>, base: Address): void {
    if (base < 0 || base + data.length > PROGRAM_START) throw new InvalidAddressError(base);
    for (let i = 0; i < data.length; i++) this.bytes[base + i] = data[i] & 0xff;
  }

  read8(addr: Address): Byte {
    this.check(addr);
    return this.bytes[addr];
  }

  // Big-endian, as opcodes are stored
  read16(addr: Address): Word {
    return (this.read8(addr) << 8) | this.read8(addr + 1);
  }

  write8(addr: Address, value: Byte): void {
    this.check(addr);
    this.bytes[addr] = value & 0xff;
  }

  readRange(addr: Address, length: number): Uint8Array {
    this.checkRange(addr, length);
    return this.bytes.slice(addr, addr + length);
  }

  // Throws for the first end of [addr, addr+length) that falls outside memory
  checkRange(addr: Address, length: number): void {
    if (length <= 0) return;
    this.check(addr);
    this.check(addr + length - 1);
  }

  // Program window [0x200, 0x1000): the only region Fx55/Fx65 may touch
  checkProgramRange(addr: Address, length: number): void {
    if (!Number.isInteger(addr) || addr < PROGRAM_START || addr >= MEMORY_SIZE) throw new InvalidAddressError(addr);
    const last = addr + length - 1;
    if (last >= MEMORY_SIZE) throw new InvalidAddressError(last);
  }

  private check(addr: Address): void {
    if (!Number.isInteger(addr) || addr < 0 || addr >= MEMORY_SIZE) throw new InvalidAddressError(addr);
  }
}
