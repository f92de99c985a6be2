import { describe, it, expect } from 'vitest';
import { LpcDecoder, decodeSamples } from '../../src/lpc/decoder';
import { CTD_DMA_READ, LpcSignalBuilder } from '../../src/capture/synth';
import type { Sample } from '../../src/lpc/types';

function run(decoder: LpcDecoder, samples: Sample[]) {
  return samples.map(s => decoder.feed(s.seq, s.value)).filter(c => c !== null);
}

describe('LPC decoder: aborts', () => {
  it('an abort START while idle emits nothing and returns to WaitFrame', () => {
    const d = new LpcDecoder({ debug: false });
    const b = new LpcSignalBuilder().idle(2).start(0xf);
    expect(run(d, b.build())).toEqual([]);
    expect(d.phase).toBe('Start');
    const more = new LpcSignalBuilder({ startSeq: b.nextSeq }).idle(1).build();
    expect(run(d, more)).toEqual([]);
    expect(d.phase).toBe('WaitFrame');
  });

  it('the four clock host abort sequence while idle emits nothing', () => {
    const samples = new LpcSignalBuilder().idle(1).abort().idle(3).build();
    expect(decodeSamples(samples, { debug: false })).toEqual([]);
  });

  it('LFRAME# in the address phase emits exactly one Aborted cycle with the partial address', () => {
    const samples = new LpcSignalBuilder()
      .start(0x0)
      .nibbles([0x6, 0x1, 0x2, 0x3])
      .abort()
      .idle(2)
      .build();
    expect(decodeSamples(samples, { debug: false })).toEqual([
      { seq: 1n, type: 'Memory', direction: 'Write', address: 0x12300000, data: 0x00, status: 'Aborted' },
    ]);
  });

  it('an aborted cycle carries its phase chain when verbose', () => {
    const samples = new LpcSignalBuilder().start(0x0).nibbles([0x0, 0x0]).start(0x0).build();
    const [c] = decodeSamples(samples, { verbose: true, debug: false });
    expect(c.status).toBe('Aborted');
    expect(c.phases).toEqual(['WaitFrame', 'Start', 'Address']);
  });

  it('LFRAME# during SYNC aborts a read and the next cycle decodes cleanly', () => {
    const samples = new LpcSignalBuilder()
      .start(0x0)
      .nibbles([0x0, 0x0, 0x0, 0x6, 0x4, 0xf, 0xf, 0x6])
      .ioWrite(0x0080, 0x99)
      .build();
    const cycles = decodeSamples(samples, { debug: false });
    expect(cycles.map(c => [c.status, c.direction, c.address, c.data])).toEqual([
      ['Aborted', 'Read', 0x0064, 0x00],
      ['Completed', 'Write', 0x0080, 0x99],
    ]);
    expect(cycles[1].seq > cycles[0].seq).toBe(true);
  });

  it('keeps the new START state after an abort with accumulators cleared', () => {
    const d = new LpcDecoder({ debug: false });
    run(d, new LpcSignalBuilder().start(0x0).nibbles([0x2, 0xa, 0xb]).start(0x0).build());
    const s = d.snapshot();
    expect(s.history).toEqual(['WaitFrame', 'Start']);
    expect(s.address).toBe(0);
    expect(s.data).toBe(0);
    expect(s.dataNibbleIndex).toBe(0);
    expect(s.remainingAddressNibbles).toBe(0);
    expect(d.getStats().aborted).toBe(1);
  });

  it('LFRAME# held over several START clocks does not abort anything', () => {
    const samples = new LpcSignalBuilder().start(0x0).start(0x0).start(0x0).ioRead(0x0061, 0x20).build();
    const cycles = decodeSamples(samples, { debug: false });
    expect(cycles).toHaveLength(1);
    expect(cycles[0].status).toBe('Completed');
  });
});

describe('LPC decoder: unsupported cycles', () => {
  it('DMA cycles reset to WaitFrame without an event', () => {
    const messages: string[] = [];
    const d = new LpcDecoder({ debug: false, onUnsupported: m => messages.push(m) });
    const cycles = run(d, new LpcSignalBuilder().start(0x0).nibbles([CTD_DMA_READ, 0x1, 0x2]).build());
    expect(cycles).toEqual([]);
    expect(d.phase).toBe('WaitFrame');
    expect(messages).toEqual(['Encountered ILLEGAL/unsupported cycle type: DMA (LAD=0x8)']);
    expect(d.getStats().unsupported).toBe(1);
  });

  it('reserved cycle types are rejected the same way', () => {
    const messages: string[] = [];
    const d = new LpcDecoder({ debug: false, onUnsupported: m => messages.push(m) });
    run(d, new LpcSignalBuilder().start(0x0).nibbles([0xe]).build());
    expect(d.phase).toBe('WaitFrame');
    expect(messages).toEqual(['Encountered ILLEGAL/unsupported cycle type: Reserved (LAD=0xe)']);
  });

  it('decodes normally after an unsupported cycle', () => {
    const samples = new LpcSignalBuilder()
      .start(0x0).nibbles([0xc, 0x0, 0x0])
      .idle(2)
      .memRead(0x000ffff0, 0x90)
      .build();
    const cycles = decodeSamples(samples, { debug: false });
    expect(cycles.map(c => [c.type, c.address, c.data])).toEqual([['Memory', 0x000ffff0, 0x90]]);
  });

  it('bus master grant START values leave the decoder in Start', () => {
    const d = new LpcDecoder({ debug: false });
    run(d, new LpcSignalBuilder().start(0x2).nibbles([0x0, 0x1, 0x2]).build());
    expect(d.phase).toBe('Start');
    expect(d.snapshot().lastStartNibble).toBe(0x2);
  });

  it('a reserved START value is ignored the same way', () => {
    const d = new LpcDecoder({ debug: false });
    run(d, new LpcSignalBuilder().start(0x1).nibbles([0x0, 0x0]).build());
    expect(d.phase).toBe('Start');
    expect(d.getStats().unsupported).toBe(0);
  });

  it('a new START after an ignored START value is not an abort', () => {
    const samples = new LpcSignalBuilder().start(0x3).nibbles([0x5]).ioWrite(0x0070, 0x0a).build();
    const cycles = decodeSamples(samples, { debug: false });
    expect(cycles.map(c => c.status)).toEqual(['Completed']);
  });
});

describe('LPC decoder: reset', () => {
  it('leaves WaitFrame with zeroed accumulators after a completed cycle', () => {
    const d = new LpcDecoder({ debug: false });
    run(d, new LpcSignalBuilder().memWrite(0xdeadbeef, 0xff).build());
    const s = d.snapshot();
    expect(s.phase).toBe('WaitFrame');
    expect(s.history).toEqual(['WaitFrame']);
    expect(s.address).toBe(0);
    expect(s.data).toBe(0);
    expect(s.dataNibbleIndex).toBe(0);
    expect(s.remainingAddressNibbles).toBe(0);
    expect(s.remainingTurnaroundNibbles).toBe(0);
  });

  it('leaves WaitFrame with zeroed accumulators after an unsupported cycle', () => {
    const d = new LpcDecoder({ debug: false });
    run(d, new LpcSignalBuilder().start(0x0).nibbles([0x8]).build());
    const s = d.snapshot();
    expect(s.history).toEqual(['WaitFrame']);
    expect(s.address).toBe(0);
    expect(s.data).toBe(0);
  });

  it('reset() is idempotent', () => {
    const d = new LpcDecoder({ debug: false });
    run(d, new LpcSignalBuilder().start(0x0).nibbles([0x2, 0x1]).build());
    d.reset();
    const once = d.snapshot();
    d.reset();
    expect(d.snapshot()).toEqual(once);
    expect(once.phase).toBe('WaitFrame');
    expect(once.address).toBe(0);
  });
});
