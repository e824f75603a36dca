import { Chip8CPU } from '../cpu/cpu';
import { Memory } from '../bus/memory';
import { Keypad, type KeyIndex, type KeypadState } from '../input/keypad';
import { Framebuffer, type FramebufferView } from '../display/framebuffer';
import { mathRandomSource } from './random';
import type { IEmulator, RandomSource, TickStatus, Address, Byte, Word } from './types';

export interface MachineSnapshot {
  V: Byte[];
  I: Word;
  PC: Word;
  stack: Word[];
  DT: Byte;
  ST: Byte;
  waiting: boolean;
}

// Host-facing boundary: owns every piece of machine state. State only changes
// through loadRom/reset/tick/setKey(s); everything handed out is a copy or a read-only view.
export class Emulator implements IEmulator {
  private readonly memory = new Memory();
  private readonly keypad = new Keypad();
  private readonly screen = new Framebuffer();
  private readonly cpu: Chip8CPU;

  constructor(random: RandomSource = mathRandomSource) {
    this.cpu = new Chip8CPU(this.memory, this.keypad, this.screen, random);
  }

  static fromRom(rom: Uint8Array, random?: RandomSource): Emulator {
    const emu = new Emulator(random);
    emu.reset();
    emu.loadRom(rom);
    return emu;
  }

  reset(): void {
    this.cpu.reset();
  }

  // Copies the ROM to 0x200. Call reset() first when switching programs.
  loadRom(rom: Uint8Array): void {
    this.memory.loadRom(rom);
  }

  tick(): TickStatus {
    return this.cpu.tick();
  }

  setKey(index: number, pressed: boolean): void {
    this.cpu.setKey(index, pressed);
  }

  setKeys(state: KeypadState): void {
    this.cpu.setKeys(state);
  }

  framebuffer(): FramebufferView {
    return this.screen;
  }

  // Bounds-checked copy of [addr, addr+length)
  readMemory(addr: Address, length: number): Uint8Array {
    return this.memory.readRange(addr, length);
  }

  pressedKeys(): KeyIndex[] {
    return this.keypad.pressed();
  }

  // Address of the most recently fetched instruction
  get lastPC(): Word {
    return this.cpu.lastPC;
  }

  isWaitingForKey(): boolean {
    return this.cpu.state.waiting;
  }

  snapshot(): MachineSnapshot {
    const s = this.cpu.state;
    return {
      V: Array.from(s.V),
      I: s.I,
      PC: s.PC,
      stack: Array.from(s.stack.subarray(0, s.SP)),
      DT: s.DT,
      ST: s.ST,
      waiting: s.waiting,
    };
  }
}
