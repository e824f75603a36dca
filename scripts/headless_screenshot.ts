import fs from 'fs';
import { Emulator } from '../src/emulator/core';
import { Scheduler, type CpuErrorMode } from '../src/emulator/scheduler';
import { seededRandom, mathRandomSource } from '../src/emulator/random';
import { encodeFramebufferPng, framebufferToText } from '../src/display/render';
import { framebufferHash } from '../src/utils/hash';
import { parseKeyList } from '../src/input/keymap';
import { parseArgs, numberArg } from '../src/utils/args';
import { envNumber, envString } from '../src/utils/env';

function errorMode(v: string | undefined): CpuErrorMode {
  return v === 'throw' || v === 'ignore' ? v : 'record';
}

async function main() {
  const args = parseArgs(process.argv);
  const romPath = args.rom ?? envString('CHIP8_ROM');
  const outPath = args.out ?? 'screenshot.png';
  const frames = numberArg(args.frames, envNumber('CHIP8_FRAMES', 120), 1);
  const ticksPerFrame = numberArg(args.ticksPerFrame, envNumber('CHIP8_TICKS_PER_FRAME', 10), 1);
  const scale = numberArg(args.scale, 8, 1);
  const seedArg = args.seed ?? envString('CHIP8_SEED');
  const keys = args.keys ? parseKeyList(args.keys) : [];
  const ascii = (args.ascii ?? '0') !== '0';

  if (!romPath) {
    console.error('Usage: npm run screenshot -- --rom=path/to/game.ch8 --out=./out.png [--frames=120] [--ticksPerFrame=10] [--scale=8] [--seed=1] [--keys=5,A] [--ascii=1] [--onCpuError=record|throw|ignore]');
    process.exit(1);
  }

  console.log(`[screenshot] ROM: ${romPath}  out: ${outPath}  frames: ${frames}  ticksPerFrame: ${ticksPerFrame}  scale: ${scale}  seed: ${seedArg ?? 'none'}  keys: ${keys.join(',') || 'none'}`);

  const rom = new Uint8Array(fs.readFileSync(romPath));
  const random = seedArg !== undefined ? seededRandom(Number(seedArg)) : mathRandomSource;
  const emu = Emulator.fromRom(rom, random);
  for (const k of keys) emu.setKey(k, true);

  const sched = new Scheduler(emu, { ticksPerFrame, onCpuError: errorMode(args.onCpuError) });
  const last = sched.run(frames);
  if (sched.lastCpuError) console.error(`[screenshot] stopped: ${sched.lastCpuError.message}`);
  console.log(`[screenshot] ticks=${sched.totalTicks} waiting=${last.waiting} buzzing=${last.buzzing}`);

  const fb = emu.framebuffer();
  if (ascii) console.log(framebufferToText(fb));
  await fs.promises.writeFile(outPath, encodeFramebufferPng(fb, { scale }));
  console.log(`Wrote ${outPath} (${fb.width * scale}x${fb.height * scale}) hash=${framebufferHash(fb)}`);
}

main().catch((e) => {
  console.error('[screenshot] Unhandled error:', e);
  process.exit(1);
});
