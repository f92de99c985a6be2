// Bad pin map or option value; raised before any sample is decoded.
export class LpcConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'LpcConfigError';
  }
}

// Internal-consistency failure of the decoder (a bug, not a bus condition).
export class LpcDefectError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'LpcDefectError';
  }
}

export function assertNever(value: never, what: string): never {
  throw new LpcDefectError(`Unknown ${what}: ${String(value)}`);
}
