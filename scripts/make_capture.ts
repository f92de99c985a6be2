#!/usr/bin/env tsx
/*
Writes a synthetic LPC capture in the binary logic analyzer format, handy for
trying out lpc_decode without hardware.

Usage:
  tsx scripts/make_capture.ts --out=demo.bin [--pins=0,1,5,4,3,2]

Traffic: an I/O read of port 0x64, an I/O write to 0x80 (POST code), a firmware
memory read at 0xFFFFFFF0 with SYNC wait states, a memory write aborted in the
address phase, and a memory write that completes.
*/
import fs from 'fs';
import { encodeCapture } from '../src/capture/format';
import { LpcSignalBuilder } from '../src/capture/synth';
import { parseArgs, parsePinList } from '../src/config';
import type { PinMap } from '../src/lpc/types';

function main(): number {
  let outPath: string;
  let pins: PinMap | undefined;
  try {
    const { flags } = parseArgs(process.argv.slice(2), { values: ['out', 'pins'], switches: [] });
    outPath = typeof flags.out === 'string' ? flags.out : '';
    const pinsText = typeof flags.pins === 'string' ? flags.pins : process.env.LPC_PINS;
    pins = pinsText ? parsePinList(pinsText) : undefined;
  } catch (e) {
    console.error(e instanceof Error ? e.message : String(e));
    return 1;
  }
  if (!outPath) {
    console.error('Error: --out=path/to/capture.bin is required');
    return 2;
  }

  const b = new LpcSignalBuilder({ pins })
    .idle(4)
    .ioRead(0x0064, 0x1c)
    .idle(2)
    .ioWrite(0x0080, 0x55)
    .idle(2)
    .memRead(0xfffffff0, 0xea, { syncWaits: 3 })
    .idle(2)
    .start(0x0)
    .nibbles([0x6, 0x0, 0x0, 0x0])
    .abort()
    .idle(2)
    .memWrite(0x000e0000, 0xa5)
    .idle(4);

  const bytes = encodeCapture(b.build());
  fs.writeFileSync(outPath, bytes);
  console.log(`[CAPTURE] wrote ${bytes.length} bytes to ${outPath}`);
  return 0;
}

process.exit(main());
