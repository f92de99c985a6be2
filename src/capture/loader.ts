import fs from 'fs';
import type { SampleRead, SampleSource } from '../lpc/types';
import { CaptureFormatError, readRecord, RECORD_BYTES } from './format';

// Sample source over an in-memory capture. A trailing partial record is
// reported once as an error after all whole records; the reader stays failed.
export class CaptureReader implements SampleSource {
  private offset = 0;
  private failure: Error | null = null;

  constructor(private readonly bytes: Uint8Array) {}

  static open(path: string): CaptureReader {
    const data = fs.readFileSync(path);
    if (data.length === 0) throw new CaptureFormatError(`Capture '${path}' is empty`);
    return new CaptureReader(data);
  }

  get recordCount(): number {
    return Math.floor(this.bytes.length / RECORD_BYTES);
  }

  get position(): number {
    return this.offset;
  }

  next(): SampleRead {
    if (this.failure) return { kind: 'error', error: this.failure };
    if (this.offset >= this.bytes.length) return { kind: 'eos' };
    try {
      const sample = readRecord(this.bytes, this.offset);
      this.offset += RECORD_BYTES;
      return { kind: 'sample', sample };
    } catch (e) {
      if (!(e instanceof CaptureFormatError)) throw e;
      this.failure = e;
      return { kind: 'error', error: e };
    }
  }
}
