import type { Emulator } from './core';
import { CPUError } from '../cpu/errors';

export type CpuErrorMode = 'ignore' | 'throw' | 'record';

export interface SchedulerOptions {
  ticksPerFrame?: number;
  onCpuError?: CpuErrorMode;
  traceEveryTick?: number; // if >0, log machine state every N ticks
}

export interface FrameResult {
  ticks: number;   // ticks actually run this frame
  waiting: boolean;
  buzzing: boolean;
}

// Deterministic driver: no wall clock, a frame is just N ticks.
// A CPU fault stops the frame; with 'record' or 'ignore' later frames do nothing until reset().
export class Scheduler {
  private readonly ticksPerFrame: number;
  private readonly onCpuError: CpuErrorMode;
  private readonly traceEveryTick: number;
  public lastCpuError: CPUError | undefined;
  private tickCount = 0;

  constructor(private emu: Emulator, opts: SchedulerOptions = {}) {
    this.ticksPerFrame = Math.max(1, Math.floor(opts.ticksPerFrame ?? 10));
    this.onCpuError = opts.onCpuError ?? 'record';
    this.traceEveryTick = Math.max(0, Math.floor(opts.traceEveryTick ?? 0));
  }

  get totalTicks(): number {
    return this.tickCount;
  }

  get halted(): boolean {
    return this.lastCpuError !== undefined;
  }

  reset(): void {
    this.emu.reset();
    this.lastCpuError = undefined;
    this.tickCount = 0;
  }

  stepFrame(): FrameResult {
    const result: FrameResult = { ticks: 0, waiting: false, buzzing: false };
    if (this.halted) return result;
    for (let i = 0; i < this.ticksPerFrame; i++) {
      try {
        const status = this.emu.tick();
        result.ticks++;
        result.waiting = status.waiting;
        result.buzzing = status.buzzing;
      } catch (e) {
        if (!(e instanceof CPUError)) throw e;
        this.lastCpuError = e;
        if (this.onCpuError === 'throw') throw e;
        if (this.onCpuError === 'record') {
          const pc = this.emu.lastPC.toString(16).padStart(4, '0');
          // eslint-disable-next-line no-console
          console.error(`[SCHED] ${e.message} at 0x${pc} after ${this.tickCount} ticks`);
        }
        break;
      }
      this.tickCount++;
      if (this.traceEveryTick > 0 && this.tickCount % this.traceEveryTick === 0) {
        const s = this.emu.snapshot();
        const regs = s.V.map(v => v.toString(16).padStart(2, '0')).join(' ');
        // eslint-disable-next-line no-console
        console.log(`[SCHED] t=${this.tickCount} PC=${s.PC.toString(16).padStart(4, '0')} I=${s.I.toString(16).padStart(3, '0')} DT=${s.DT} ST=${s.ST} V=${regs}`);
      }
    }
    return result;
  }

  run(frames: number): FrameResult {
    let last: FrameResult = { ticks: 0, waiting: false, buzzing: false };
    for (let f = 0; f < frames && !this.halted; f++) last = this.stepFrame();
    return last;
  }
}
