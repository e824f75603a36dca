export type Byte = number; // 0..255
export type Word = number; // 0..65535
export type Address = number; // 0..0xFFF when valid

export const MEMORY_SIZE = 4096;
export const PROGRAM_START = 0x200;
export const MAX_ROM_SIZE = MEMORY_SIZE - PROGRAM_START;
export const STACK_DEPTH = 16;
export const REGISTER_COUNT = 16;
export const KEY_COUNT = 16;
export const SCREEN_WIDTH = 64;
export const SCREEN_HEIGHT = 32;

export interface TickStatus {
  waiting: boolean; // latched on Fx0A, nothing was fetched
  buzzing: boolean; // sound timer still above zero
}

// Injected source of uniformly distributed bytes (Cxkk)
export interface RandomSource {
  nextByte(): Byte;
}

export interface Bounds {
  readonly width: number;
  readonly height: number;
}

export interface IEmulator {
  reset(): void;
  loadRom(rom: Uint8Array): void;
  tick(): TickStatus;
  setKey(index: number, pressed: boolean): void;
}
