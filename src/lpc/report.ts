import type { CycleType, DecodedCycle, Direction, Phase } from './types';

const TYPE_LABEL: Record<CycleType, string> = {
  IO: 'I/O',
  Memory: 'Mem',
  DMA: 'DMA',
  Reserved: 'RESERVED',
};

const PHASE_LABEL: Record<Phase, string> = {
  WaitFrame: 'WAIT_LFRAME_ASSERTED',
  Start: 'START',
  Address: 'ADDR',
  Data: 'DATA',
  TurnAround: 'TAR',
  Sync: 'SYNC',
};

// Padded so read and write lines line up.
const DIR_LABEL: Record<Direction, string> = {
  Read: 'Read ',
  Write: 'Write',
};

function hex(v: number, digits: number): string {
  return (v >>> 0).toString(16).padStart(digits, '0');
}

// One report line per cycle, e.g. "1042: I/O Read  0x0064: 0x42".
// When the cycle carries its phase chain it is appended after the data byte.
export function formatCycle(cycle: DecodedCycle): string {
  let line = `${cycle.seq}: ${TYPE_LABEL[cycle.type]} ${DIR_LABEL[cycle.direction]} 0x${hex(cycle.address, 4)}: 0x${hex(cycle.data & 0xff, 2)}`;
  const marker = cycle.status === 'Aborted' ? '<ABORT>' : cycle.status === 'ProtocolError' ? '<ERROR>' : null;
  if (cycle.phases) {
    line += ' ' + cycle.phases.map(p => PHASE_LABEL[p]).join(' -> ');
    if (marker) line += ' -> ' + marker;
  } else if (marker) {
    line += ' ' + marker;
  }
  return line;
}
