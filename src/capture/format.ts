// Binary logic analyzer export (Saleae "binary" digital format, 8 channels):
// a flat run of little-endian records, each a 64-bit sample number followed
// by the byte holding all 8 channel levels.
//
//   +0  u64  sequence number (LE)
//   +8  u8   channel levels, bit n = channel n

import type { Sample } from '../lpc/types';

export const RECORD_BYTES = 9;

export class CaptureFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CaptureFormatError';
  }
}

export function readRecord(bytes: Uint8Array, offset: number): Sample {
  if (offset + RECORD_BYTES > bytes.length) {
    throw new CaptureFormatError(
      `Truncated capture record at offset ${offset}: ${bytes.length - offset} of ${RECORD_BYTES} bytes`
    );
  }
  const view = new DataView(bytes.buffer, bytes.byteOffset + offset, RECORD_BYTES);
  return { seq: view.getBigUint64(0, true), value: view.getUint8(8) };
}

// Yields every whole record, then throws if trailing bytes remain.
export function* parseCapture(bytes: Uint8Array): Generator<Sample> {
  for (let off = 0; off < bytes.length; off += RECORD_BYTES) {
    yield readRecord(bytes, off);
  }
}

export function encodeCapture(samples: Iterable<Sample>): Uint8Array {
  const list = Array.from(samples);
  const out = new Uint8Array(list.length * RECORD_BYTES);
  const view = new DataView(out.buffer);
  list.forEach((s, i) => {
    const off = i * RECORD_BYTES;
    view.setBigUint64(off, BigInt.asUintN(64, s.seq), true);
    view.setUint8(off + 8, s.value & 0xff);
  });
  return out;
}
