const hex = (v: number, width = 4) => '0x' + (v >>> 0).toString(16).toUpperCase().padStart(width, '0');

// Fatal interpreter faults. tick() never recovers from these; the host surfaces them.
export abstract class CPUError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class MemoryOverflowError extends CPUError {
  constructor(public readonly romLength: number) { super(`Memory overflow: ROM of ${romLength} bytes does not fit`); }
}

export class InvalidAddressError extends CPUError {
  constructor(public readonly address: number) { super(`Invalid memory address: ${hex(address)}`); }
}

export class InvalidOpcodeError extends CPUError {
  constructor(public readonly opcode: number) { super(`Invalid opcode: ${hex(opcode)}`); }
}

export class InvalidVRegisterError extends CPUError {
  constructor(public readonly index: number) { super(`Invalid V-Register: ${hex(index, 1)}`); }
}

export class StackOverflowError extends CPUError {
  constructor() { super('Stack overflow'); }
}

export class StackUnderflowError extends CPUError {
  constructor() { super('Stack underflow'); }
}

export class InvalidKeyError extends CPUError {
  constructor(public readonly key: number) { super(`Invalid key: ${hex(key, 2)}`); }
}

export class InvalidDigitError extends CPUError {
  constructor(public readonly value: number) { super(`Invalid digit: ${hex(value, 2)}`); }
}
