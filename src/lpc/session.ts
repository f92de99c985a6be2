import type { LpcDecoder } from './decoder';
import type { DecodedCycle, Sample, SampleSource } from './types';

export function sourceFromSamples(samples: readonly Sample[]): SampleSource {
  let i = 0;
  return {
    next: () => (i < samples.length ? { kind: 'sample', sample: samples[i++] } : { kind: 'eos' }),
  };
}

export interface SessionResult {
  samples: number;
  cycles: number;
  end: 'eos' | 'error';
  error?: Error;
}

// Pulls samples until the source runs dry or fails. A cycle still in flight
// at that point is dropped, never reported. Decoder defects propagate.
export function runSession(
  source: SampleSource,
  decoder: LpcDecoder,
  sink?: (cycle: DecodedCycle) => void
): SessionResult {
  let samples = 0;
  let cycles = 0;
  for (;;) {
    const r = source.next();
    if (r.kind === 'eos') return { samples, cycles, end: 'eos' };
    if (r.kind === 'error') return { samples, cycles, end: 'error', error: r.error };
    samples++;
    const cycle = decoder.feed(r.sample.seq, r.sample.value);
    if (cycle) {
      cycles++;
      sink?.(cycle);
    }
  }
}
