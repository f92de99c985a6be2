// Synthesizes logic analyzer samples for LPC bus traffic.
// Every LPC clock becomes two samples: LCLK high, then LCLK low with the same
// LFRAME#/LAD levels, so each clock produces exactly one falling edge.

import { resolvePinMap } from '../lpc/signals';
import type { Byte, Nibble, PinMap, Sample } from '../lpc/types';

export const SYNC_READY = 0x0;
export const SYNC_SHORT_WAIT = 0x5;
export const SYNC_LONG_WAIT = 0x6;

// Cycle type/direction nibble sent on the clock after START.
export const CTD_IO_READ = 0x0;
export const CTD_IO_WRITE = 0x2;
export const CTD_MEM_READ = 0x4;
export const CTD_MEM_WRITE = 0x6;
export const CTD_DMA_READ = 0x8;

export interface CycleShape {
  syncWaits?: number;
  waitNibble?: Nibble;
}

export interface SignalBuilderOptions {
  pins?: Partial<PinMap>;
  startSeq?: bigint;
  seqStep?: bigint;
}

export class LpcSignalBuilder {
  readonly pins: PinMap;
  private seq: bigint;
  private readonly step: bigint;
  private readonly samples: Sample[] = [];

  constructor(opts: SignalBuilderOptions = {}) {
    this.pins = resolvePinMap(opts.pins);
    this.seq = opts.startSeq ?? 0n;
    this.step = opts.seqStep ?? 1n;
  }

  // Sequence number the next sample will get.
  get nextSeq(): bigint {
    return this.seq;
  }

  encode(clk: boolean, frameHigh: boolean, lad: Nibble): Byte {
    const p = this.pins;
    let v = 0;
    if (clk) v |= 1 << p.clk;
    if (frameHigh) v |= 1 << p.frame;
    if (lad & 0x1) v |= 1 << p.lad0;
    if (lad & 0x2) v |= 1 << p.lad1;
    if (lad & 0x4) v |= 1 << p.lad2;
    if (lad & 0x8) v |= 1 << p.lad3;
    return v;
  }

  raw(value: Byte): this {
    this.samples.push({ seq: this.seq, value: value & 0xff });
    this.seq += this.step;
    return this;
  }

  clock(frameAsserted: boolean, lad: Nibble): this {
    this.raw(this.encode(true, !frameAsserted, lad));
    this.raw(this.encode(false, !frameAsserted, lad));
    return this;
  }

  idle(clocks = 1): this {
    for (let i = 0; i < clocks; i++) this.clock(false, 0xf);
    return this;
  }

  start(nibble: Nibble = 0x0): this {
    return this.clock(true, nibble);
  }

  nibbles(values: readonly Nibble[]): this {
    for (const n of values) this.clock(false, n & 0xf);
    return this;
  }

  // Host drives LFRAME# low with LAD=1111 for four clocks.
  abort(): this {
    for (let i = 0; i < 4; i++) this.clock(true, 0xf);
    return this;
  }

  ioRead(address: number, data: Byte, shape: CycleShape = {}): this {
    return this.readCycle(CTD_IO_READ, address, 4, data, shape);
  }

  ioWrite(address: number, data: Byte, shape: CycleShape = {}): this {
    return this.writeCycle(CTD_IO_WRITE, address, 4, data, shape);
  }

  memRead(address: number, data: Byte, shape: CycleShape = {}): this {
    return this.readCycle(CTD_MEM_READ, address, 8, data, shape);
  }

  memWrite(address: number, data: Byte, shape: CycleShape = {}): this {
    return this.writeCycle(CTD_MEM_WRITE, address, 8, data, shape);
  }

  build(): Sample[] {
    return this.samples.slice();
  }

  private writeCycle(ctd: Nibble, address: number, addrNibbles: number, data: Byte, shape: CycleShape): this {
    return this.start(0x0)
      .nibbles([ctd])
      .nibbles(addressNibbles(address, addrNibbles))
      .nibbles(dataNibbles(data))
      .nibbles([0xf, 0xf])
      .sync(shape)
      .nibbles([0xf, 0xf]);
  }

  private readCycle(ctd: Nibble, address: number, addrNibbles: number, data: Byte, shape: CycleShape): this {
    return this.start(0x0)
      .nibbles([ctd])
      .nibbles(addressNibbles(address, addrNibbles))
      .nibbles([0xf, 0xf])
      .sync(shape)
      .nibbles(dataNibbles(data))
      .nibbles([0xf, 0xf]);
  }

  private sync(shape: CycleShape): this {
    const waits = shape.syncWaits ?? 0;
    const wait = shape.waitNibble ?? SYNC_SHORT_WAIT;
    for (let i = 0; i < waits; i++) this.clock(false, wait);
    return this.clock(false, SYNC_READY);
  }
}

// Address goes out most significant nibble first.
export function addressNibbles(address: number, count: number): Nibble[] {
  const out: Nibble[] = [];
  for (let i = count - 1; i >= 0; i--) out.push((address >>> (i * 4)) & 0xf);
  return out;
}

// Data goes out least significant nibble first.
export function dataNibbles(data: Byte): Nibble[] {
  return [data & 0xf, (data >>> 4) & 0xf];
}
