#!/usr/bin/env tsx
/*
LPC bus decoder for logic analyzer captures (binary export, 9-byte records: u64 sample number + channel byte).

Usage:
  tsx scripts/lpc_decode.ts -i path/to/capture.bin [-v] [--pins=0,1,5,4,3,2] [--debug]
  tsx scripts/lpc_decode.ts --input=path/to/capture.bin [--verbose]

Environment:
  LPC_VERBOSE=1   same as --verbose (print the phase chain of every cycle)
  LPC_PINS=...    same as --pins (bit indices of clk,frame,lad0,lad1,lad2,lad3)
  LPC_DEBUG=1     log unsupported cycles and aborts
*/
import { CaptureReader } from '../src/capture/loader';
import { resolveConfig, type DecodeConfig } from '../src/config';
import { LpcDecoder } from '../src/lpc/decoder';
import { formatCycle } from '../src/lpc/report';
import { runSession } from '../src/lpc/session';

const USAGE = `lpc_decode: Low Pin Count bus protocol decoder
    -i, --input <path/to/capture>
    -v, --verbose  Dumps more information for each cycle like the state transitions encountered
    --pins <clk,frame,lad0,lad1,lad2,lad3>  Channel of each signal (default 0,1,5,4,3,2)
    --debug    Log unsupported cycles and aborts
    -H, --help  Print this text`;

function main(): number {
  let config: DecodeConfig;
  try {
    config = resolveConfig(process.argv.slice(2));
  } catch (e) {
    console.error(e instanceof Error ? e.message : String(e));
    return 1;
  }
  if (config.help) {
    console.log(USAGE);
    return 0;
  }
  if (!config.input) {
    console.error('A filepath to the capture is required!');
    return 1;
  }

  let reader: CaptureReader;
  try {
    reader = CaptureReader.open(config.input);
  } catch (e) {
    console.error(`The file '${config.input}' could not be opened: ${e instanceof Error ? e.message : String(e)}`);
    return 1;
  }

  const decoder = new LpcDecoder({ pins: config.pins, verbose: config.verbose, debug: config.debug });
  const result = runSession(reader, decoder, cycle => console.log(formatCycle(cycle)));
  if (config.debug) {
    const s = decoder.getStats();
    console.log(`[LPC] samples=${result.samples} edges=${s.edges} completed=${s.completed} aborted=${s.aborted} unsupported=${s.unsupported}`);
  }
  if (result.end === 'error') {
    console.error(`[CAPTURE] ${result.error?.message ?? 'read error'}`);
    return 1;
  }
  return 0;
}

process.exit(main());
