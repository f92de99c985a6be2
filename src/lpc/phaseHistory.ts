import { LpcDefectError } from './errors';
import type { Phase } from './types';

// WaitFrame plus the longest chain a firmware memory read/write walks:
// START, ADDR, (DATA|TAR), TAR, SYNC, (TAR|DATA), ... at most 8 transitions.
export const PHASE_HISTORY_CAPACITY = 9;

export class PhaseHistory {
  private readonly phases: Phase[] = ['WaitFrame'];

  constructor(private readonly capacity = PHASE_HISTORY_CAPACITY) {
    if (capacity < 2) throw new LpcDefectError(`Phase history capacity too small: ${capacity}`);
  }

  get current(): Phase {
    return this.phases[this.phases.length - 1];
  }

  // Phase entered before the current one, or undefined right after a reset.
  get previous(): Phase | undefined {
    return this.phases.length >= 2 ? this.phases[this.phases.length - 2] : undefined;
  }

  get length(): number {
    return this.phases.length;
  }

  push(phase: Phase): void {
    if (this.phases.length >= this.capacity) {
      throw new LpcDefectError(
        `Phase history overflow entering ${phase}: ${this.phases.join(' -> ')}`
      );
    }
    this.phases.push(phase);
  }

  reset(): void {
    this.phases.length = 0;
    this.phases.push('WaitFrame');
  }

  toArray(): Phase[] {
    return this.phases.slice();
  }
}
