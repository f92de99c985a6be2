export type Byte = number; // 0..255
export type Nibble = number; // 0..15
export type DWord = number; // 0..0xFFFFFFFF

// Bit positions of the LPC signals inside one captured sample byte.
export interface PinMap {
  clk: number;
  frame: number;
  lad0: number;
  lad1: number;
  lad2: number;
  lad3: number;
}

export type Phase = 'WaitFrame' | 'Start' | 'Address' | 'Data' | 'TurnAround' | 'Sync';

export type CycleType = 'IO' | 'Memory' | 'DMA' | 'Reserved';

export type Direction = 'Read' | 'Write';

export type CycleStatus = 'Completed' | 'Aborted' | 'ProtocolError';

export interface DecodedCycle {
  readonly seq: bigint;
  readonly type: CycleType;
  readonly direction: Direction;
  readonly address: DWord;
  readonly data: Byte;
  readonly status: CycleStatus;
  // Only filled in when the decoder runs verbose.
  readonly phases?: readonly Phase[];
}

export interface Sample {
  seq: bigint;
  value: Byte;
}

export type SampleRead =
  | { kind: 'sample'; sample: Sample }
  | { kind: 'eos' }
  | { kind: 'error'; error: Error };

// Pull-based producer of samples; never rewound.
export interface SampleSource {
  next(): SampleRead;
}
