import { LpcConfigError } from './errors';
import type { Byte, Nibble, PinMap } from './types';

// Reference wiring of the logic analyzer probes: CLK on D0, LFRAME# on D1, LAD[3:0] on D2..D5 (reversed).
export const DEFAULT_PIN_MAP: Readonly<PinMap> = Object.freeze({
  clk: 0,
  frame: 1,
  lad0: 5,
  lad1: 4,
  lad2: 3,
  lad3: 2,
});

const PIN_NAMES: (keyof PinMap)[] = ['clk', 'frame', 'lad0', 'lad1', 'lad2', 'lad3'];

export interface SampleSignals {
  clk: boolean;
  frame: boolean; // raw level; LFRAME# is asserted when false
  lad: Nibble;
}

export function resolvePinMap(overrides: Partial<PinMap> = {}): PinMap {
  const pins: PinMap = { ...DEFAULT_PIN_MAP, ...overrides };
  validatePinMap(pins);
  return pins;
}

export function validatePinMap(pins: PinMap): void {
  const seen = new Map<number, keyof PinMap>();
  for (const name of PIN_NAMES) {
    const bit = pins[name];
    if (!Number.isInteger(bit) || bit < 0 || bit > 7) {
      throw new LpcConfigError(`Pin ${name} must be a bit index 0..7, got ${bit}`);
    }
    const other = seen.get(bit);
    if (other !== undefined) {
      throw new LpcConfigError(`Pins ${other} and ${name} both use bit ${bit}`);
    }
    seen.set(bit, name);
  }
}

function bit(sample: Byte, index: number): number {
  return (sample >>> index) & 1;
}

// LAD0 is the least significant bit of the nibble.
export function extractLad(sample: Byte, pins: PinMap): Nibble {
  return bit(sample, pins.lad0)
    | (bit(sample, pins.lad1) << 1)
    | (bit(sample, pins.lad2) << 2)
    | (bit(sample, pins.lad3) << 3);
}

export function extractSignals(sample: Byte, pins: PinMap): SampleSignals {
  return {
    clk: bit(sample, pins.clk) === 1,
    frame: bit(sample, pins.frame) === 1,
    lad: extractLad(sample, pins),
  };
}

// Host and peripherals sample LAD/LFRAME# on the falling clock edge.
export function isFallingEdge(prev: boolean, cur: boolean): boolean {
  return prev && !cur;
}
