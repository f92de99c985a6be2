import { LpcConfigError } from './lpc/errors';
import { resolvePinMap } from './lpc/signals';
import type { PinMap } from './lpc/types';

export type ArgValue = string | boolean;

export interface ParsedArgs {
  flags: Record<string, ArgValue>;
  positional: string[];
}

export interface ArgSpec {
  // Long options taking a value, as --key=value or --key value.
  values: readonly string[];
  switches: readonly string[];
  // Single letter aliases, e.g. { i: 'input' }.
  short?: Readonly<Record<string, string>>;
}

// Values are kept as the raw strings: capture paths may well be all digits.
export function parseArgs(argv: readonly string[], spec: ArgSpec): ParsedArgs {
  const flags: Record<string, ArgValue> = {};
  const positional: string[] = [];
  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    let name: string;
    let inline: string | undefined;
    const long = a.match(/^--([^=]+)(?:=(.*))?$/);
    if (long) {
      name = long[1];
      inline = long[2];
    } else if (/^-[^-]/.test(a)) {
      const alias = spec.short?.[a[1]];
      if (alias === undefined) throw new LpcConfigError(`Unknown option '${a}'`);
      name = alias;
      if (a.length > 2) inline = a.slice(2);
    } else {
      positional.push(a);
      continue;
    }

    if (spec.values.includes(name)) {
      if (inline === undefined) {
        if (i + 1 >= argv.length) throw new LpcConfigError(`Option '${a}' requires a value`);
        inline = argv[++i];
      }
      flags[name] = inline;
    } else if (spec.switches.includes(name)) {
      if (inline !== undefined) throw new LpcConfigError(`Option '${a}' takes no value`);
      flags[name] = true;
    } else {
      throw new LpcConfigError(`Unknown option '${a}'`);
    }
  }
  return { flags, positional };
}

export interface DecodeConfig {
  input: string | null;
  verbose: boolean;
  debug: boolean;
  help: boolean;
  pins: PinMap;
}

// "clk,frame,lad0,lad1,lad2,lad3" as decimal bit indices.
export function parsePinList(text: string): PinMap {
  const parts = text.split(',').map(s => s.trim());
  if (parts.length !== 6 || parts.some(p => !/^\d+$/.test(p))) {
    throw new LpcConfigError(`Expected six comma separated bit indices (clk,frame,lad0,lad1,lad2,lad3), got '${text}'`);
  }
  const [clk, frame, lad0, lad1, lad2, lad3] = parts.map(Number);
  return resolvePinMap({ clk, frame, lad0, lad1, lad2, lad3 });
}

function envFlag(v: string | undefined): boolean {
  return v === '1' || v === 'true';
}

function stringFlag(v: ArgValue | undefined): string | undefined {
  return typeof v === 'string' ? v : undefined;
}

export const DECODE_ARGS: ArgSpec = {
  values: ['input', 'pins'],
  switches: ['verbose', 'debug', 'help'],
  short: { i: 'input', v: 'verbose', H: 'help', h: 'help' },
};

export function resolveConfig(
  argv: readonly string[],
  env: Record<string, string | undefined> = (typeof process !== 'undefined' ? process.env : {})
): DecodeConfig {
  const { flags, positional } = parseArgs(argv, DECODE_ARGS);
  const inputFlag = stringFlag(flags.input);
  const extra = inputFlag === undefined ? positional.slice(1) : positional;
  if (extra.length > 0) throw new LpcConfigError(`Unexpected argument '${extra[0]}'`);
  const pinsText = stringFlag(flags.pins) ?? env.LPC_PINS;
  return {
    input: inputFlag ?? positional[0] ?? null,
    verbose: flags.verbose === true || envFlag(env.LPC_VERBOSE),
    debug: flags.debug === true || envFlag(env.LPC_DEBUG),
    help: flags.help === true,
    pins: pinsText ? parsePinList(pinsText) : resolvePinMap(),
  };
}
