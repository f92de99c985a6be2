import { describe, it, expect } from 'vitest';
import { CaptureFormatError, encodeCapture, parseCapture, RECORD_BYTES } from '../../src/capture/format';

describe('Capture record layout', () => {
  it('writes a little-endian u64 sequence number followed by the sample byte', () => {
    const bytes = encodeCapture([{ seq: 0x0102030405060708n, value: 0xab }]);
    expect(Array.from(bytes)).toEqual([0x08, 0x07, 0x06, 0x05, 0x04, 0x03, 0x02, 0x01, 0xab]);
  });

  it('reads back sequence numbers beyond 2^53', () => {
    const samples = [{ seq: 0xfffffffffffffff0n, value: 0x3f }, { seq: 0xfffffffffffffff1n, value: 0x00 }];
    expect(Array.from(parseCapture(encodeCapture(samples)))).toEqual(samples);
  });

  it('parses records from a view into a larger buffer', () => {
    const backing = new Uint8Array(4 + RECORD_BYTES);
    backing.set(encodeCapture([{ seq: 5n, value: 0x21 }]), 4);
    expect(Array.from(parseCapture(backing.subarray(4)))).toEqual([{ seq: 5n, value: 0x21 }]);
  });

  it('throws on a trailing partial record after yielding the whole ones', () => {
    const bytes = new Uint8Array(RECORD_BYTES + 4);
    bytes.set(encodeCapture([{ seq: 1n, value: 0x02 }]));
    const iter = parseCapture(bytes);
    expect(iter.next().value).toEqual({ seq: 1n, value: 0x02 });
    expect(() => iter.next()).toThrow(CaptureFormatError);
  });

  it('names the truncated offset', () => {
    const bytes = new Uint8Array(RECORD_BYTES + 4);
    expect(() => Array.from(parseCapture(bytes))).toThrow('Truncated capture record at offset 9: 4 of 9 bytes');
  });
});
