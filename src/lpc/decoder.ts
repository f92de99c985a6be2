// LPC bus cycle decoder.
//
// Fed one logic analyzer sample at a time. On every falling LCLK edge the
// LFRAME# and LAD[3:0] levels are sampled and drive the protocol state machine:
//
//   WaitFrame -> Start -> Address -> Data -> TurnAround -> Sync -> TurnAround   (write)
//   WaitFrame -> Start -> Address -> TurnAround -> Sync -> Data -> TurnAround   (read)
//
// The second TurnAround of a cycle ends it and produces a DecodedCycle. LFRAME#
// asserted in the middle of a cycle aborts it.

import { assertNever, LpcDefectError } from './errors';
import { PhaseHistory } from './phaseHistory';
import { extractSignals, isFallingEdge, resolvePinMap } from './signals';
import type {
  Byte, CycleStatus, CycleType, DecodedCycle, Direction, DWord, Nibble, Phase, PinMap, Sample,
} from './types';

// START nibble values (LAD[3:0] while LFRAME# is asserted).
export const START_TARGET_CYCLE = 0x0;
export const START_ABORT = 0xf;

export const DATA_NIBBLES = 2;
export const TURNAROUND_NIBBLES = 2;

const CYCLE_TYPES: readonly CycleType[] = ['IO', 'Memory', 'DMA', 'Reserved'];

// Cycle type lives in LAD[3:2] of the clock after START, direction in LAD[1].
export function cycleTypeOf(lad: Nibble): CycleType {
  return CYCLE_TYPES[(lad & 0xc) >> 2];
}

export function directionOf(lad: Nibble): Direction {
  return (lad & 0x2) === 0 ? 'Read' : 'Write';
}

export function addressNibblesFor(type: CycleType): number | null {
  switch (type) {
    case 'IO': return 4;
    case 'Memory': return 8;
    case 'DMA':
    case 'Reserved':
      return null;
    default:
      return assertNever(type, 'cycle type');
  }
}

export interface LpcDecoderOptions {
  pins?: Partial<PinMap>;
  // Keep the phase chain of each cycle in DecodedCycle.phases.
  verbose?: boolean;
  // Log unsupported cycles and aborts to the console.
  debug?: boolean;
  onCycle?: (cycle: DecodedCycle) => void;
  onUnsupported?: (message: string) => void;
}

export interface LpcDecoderState {
  phase: Phase;
  history: Phase[];
  cycleSeq: bigint;
  lastClock: boolean;
  lastStartNibble: Nibble;
  cycleType: CycleType;
  direction: Direction;
  address: DWord;
  remainingAddressNibbles: number;
  data: Byte;
  dataNibbleIndex: number;
  dataNibbleCount: number;
  remainingTurnaroundNibbles: number;
}

export interface LpcDecoderStats {
  edges: number;
  completed: number;
  aborted: number;
  unsupported: number;
}

export class LpcDecoder {
  readonly pins: PinMap;
  readonly verbose: boolean;
  private readonly debug: boolean;
  private readonly onCycle?: (cycle: DecodedCycle) => void;
  private readonly onUnsupported?: (message: string) => void;

  private readonly history = new PhaseHistory();
  private cycleSeq = 0n;
  private lastClock = false; // capture starts with a low clock
  private lastStartNibble: Nibble = 0;
  private cycleType: CycleType = 'IO';
  private direction: Direction = 'Read';
  private address: DWord = 0;
  private remainingAddressNibbles = 0;
  private data: Byte = 0;
  private dataNibbleIndex = 0;
  private dataNibbleCount = DATA_NIBBLES;
  private remainingTurnaroundNibbles = 0;

  // Cycle produced by the sample currently being processed.
  private emitted: DecodedCycle | null = null;
  private stats: LpcDecoderStats = { edges: 0, completed: 0, aborted: 0, unsupported: 0 };

  constructor(opts: LpcDecoderOptions = {}) {
    this.pins = resolvePinMap(opts.pins);
    this.verbose = opts.verbose ?? false;
    this.debug = opts.debug ?? (typeof process !== 'undefined' && process.env.LPC_DEBUG === '1');
    this.onCycle = opts.onCycle;
    this.onUnsupported = opts.onUnsupported;
  }

  get phase(): Phase {
    return this.history.current;
  }

  getStats(): LpcDecoderStats {
    return { ...this.stats };
  }

  snapshot(): LpcDecoderState {
    return {
      phase: this.history.current,
      history: this.history.toArray(),
      cycleSeq: this.cycleSeq,
      lastClock: this.lastClock,
      lastStartNibble: this.lastStartNibble,
      cycleType: this.cycleType,
      direction: this.direction,
      address: this.address,
      remainingAddressNibbles: this.remainingAddressNibbles,
      data: this.data,
      dataNibbleIndex: this.dataNibbleIndex,
      dataNibbleCount: this.dataNibbleCount,
      remainingTurnaroundNibbles: this.remainingTurnaroundNibbles,
    };
  }

  // Back to idle, waiting for LFRAME#. The clock level is kept so edge detection stays continuous.
  reset(): void {
    this.history.reset();
    this.address = 0;
    this.remainingAddressNibbles = 0;
    this.data = 0;
    this.dataNibbleIndex = 0;
    this.remainingTurnaroundNibbles = 0;
  }

  // Process one sample. Returns the cycle it completed or aborted, if any.
  feed(seq: bigint, value: Byte): DecodedCycle | null {
    this.emitted = null;
    const { clk, frame, lad } = extractSignals(value & 0xff, this.pins);
    const falling = isFallingEdge(this.lastClock, clk);
    this.lastClock = clk;
    if (!falling) return null;

    this.stats.edges++;
    if (!frame) {
      this.frameAsserted(seq, lad);
    } else {
      this.decodePhase(lad);
    }
    return this.emitted;
  }

  private frameAsserted(seq: bigint, lad: Nibble): void {
    const phase = this.history.current;
    if (phase !== 'WaitFrame' && phase !== 'Start') {
      if (this.debug) {
        // eslint-disable-next-line no-console
        console.log(`[LPC] ${seq}: LFRAME# asserted during ${phase}, aborting cycle started at ${this.cycleSeq}`);
      }
      this.emit('Aborted');
    }
    this.lastStartNibble = lad;
    this.cycleSeq = seq;
    this.reset();
    this.history.push('Start');
  }

  private decodePhase(lad: Nibble): void {
    const phase = this.history.current;
    switch (phase) {
      case 'WaitFrame':
        // No cycle in progress.
        break;
      case 'Start':
        this.decodeStart(lad);
        break;
      case 'Address':
        this.decodeAddress(lad);
        break;
      case 'Data':
        this.decodeData(lad);
        break;
      case 'TurnAround':
        this.decodeTurnAround();
        break;
      case 'Sync':
        this.decodeSync(lad);
        break;
      default:
        assertNever(phase, 'decoder phase');
    }
  }

  private decodeStart(lad: Nibble): void {
    if (this.lastStartNibble === START_TARGET_CYCLE) {
      this.cycleType = cycleTypeOf(lad);
      this.direction = directionOf(lad);
      this.address = 0;
      const nibbles = addressNibblesFor(this.cycleType);
      if (nibbles === null) {
        this.unsupported(`Encountered ILLEGAL/unsupported cycle type: ${this.cycleType} (LAD=0x${lad.toString(16)})`);
        this.reset();
        return;
      }
      this.history.push('Address');
      this.remainingAddressNibbles = nibbles;
    } else if (this.lastStartNibble === START_ABORT) {
      this.reset();
    }
    // Reserved (0x1) and bus master grant (0x2, 0x3) START values are left alone; the cycle stays in Start.
  }

  // Most significant nibble first.
  private decodeAddress(lad: Nibble): void {
    this.remainingAddressNibbles--;
    this.address = (this.address | (lad << (this.remainingAddressNibbles * 4))) >>> 0;
    if (this.remainingAddressNibbles === 0) this.advance();
  }

  // Least significant nibble first.
  private decodeData(lad: Nibble): void {
    this.data = (this.data | (lad << (this.dataNibbleIndex * 4))) & 0xff;
    this.dataNibbleIndex++;
    if (this.dataNibbleIndex === this.dataNibbleCount) this.advance();
  }

  private decodeTurnAround(): void {
    this.remainingTurnaroundNibbles--;
    if (this.remainingTurnaroundNibbles === 0) this.advance();
  }

  // Non-zero SYNC values are wait states.
  private decodeSync(lad: Nibble): void {
    if (lad === 0) this.advance();
  }

  private enterTurnAround(): void {
    this.history.push('TurnAround');
    this.remainingTurnaroundNibbles = TURNAROUND_NIBBLES;
  }

  private enterData(): void {
    this.history.push('Data');
    this.dataNibbleCount = DATA_NIBBLES;
  }

  private advance(): void {
    const phase = this.history.current;
    const write = this.direction === 'Write';
    switch (phase) {
      case 'WaitFrame':
        break;
      case 'Start':
        throw new LpcDefectError('Phase advance requested while still in Start');
      case 'Address':
        // Reads turn the bus around before the peripheral drives data.
        if (write) this.enterData(); else this.enterTurnAround();
        break;
      case 'Data':
        this.enterTurnAround();
        break;
      case 'TurnAround': {
        // The first TAR follows DATA on writes and ADDR on reads; any other TAR is the last one.
        const before = this.history.previous;
        if ((write && before === 'Data') || (!write && before === 'Address')) {
          this.history.push('Sync');
        } else {
          this.emit('Completed');
          this.reset();
        }
        break;
      }
      case 'Sync':
        if (write) this.enterTurnAround(); else this.enterData();
        break;
      default:
        assertNever(phase, 'decoder phase');
    }
  }

  private unsupported(message: string): void {
    this.stats.unsupported++;
    if (this.debug) {
      // eslint-disable-next-line no-console
      console.log(`[LPC] ${this.cycleSeq}: ${message}`);
    }
    this.onUnsupported?.(message);
  }

  private emit(status: CycleStatus): void {
    const cycle: DecodedCycle = {
      seq: this.cycleSeq,
      type: this.cycleType,
      direction: this.direction,
      address: this.address,
      data: this.data,
      status,
      ...(this.verbose ? { phases: this.history.toArray() } : {}),
    };
    if (status === 'Completed') this.stats.completed++;
    else if (status === 'Aborted') this.stats.aborted++;
    this.emitted = cycle;
    this.onCycle?.(cycle);
  }
}

// Decode a whole sample sequence with a fresh decoder.
export function decodeSamples(samples: Iterable<Sample>, opts: LpcDecoderOptions = {}): DecodedCycle[] {
  const decoder = new LpcDecoder(opts);
  const out: DecodedCycle[] = [];
  for (const s of samples) {
    const cycle = decoder.feed(s.seq, s.value);
    if (cycle) out.push(cycle);
  }
  return out;
}
