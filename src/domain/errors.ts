export class ConfigurationError extends Error {
  constructor(public readonly problems: readonly string[]) {
    super(`Invalid configuration:\n  - ${problems.join('\n  - ')}`);
    this.name = 'ConfigurationError';
  }
}

export class DataUnavailableError extends Error {
  constructor(
    public readonly symbol: string,
    reason: string,
  ) {
    super(`${symbol}: ${reason}`);
    this.name = 'DataUnavailableError';
  }
}

export class SinkDeliveryError extends Error {
  constructor(
    public readonly target: string,
    reason: string,
  ) {
    super(`Delivery to ${target} failed: ${reason}`);
    this.name = 'SinkDeliveryError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class CycleInProgressError extends Error {
  constructor() {
    super('A pipeline cycle is already running');
    this.name = 'CycleInProgressError';
  }
}

export class CycleAbortedError extends Error {
  constructor(public readonly stage: string) {
    super(`Pipeline cycle aborted before ${stage}`);
    this.name = 'CycleAbortedError';
  }
}

export class InvalidRequestError extends Error {
  constructor(public readonly problems: readonly string[]) {
    super(problems.join('; '));
    this.name = 'InvalidRequestError';
  }
}
