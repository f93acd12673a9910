/**
 * Explicit "no data" marker. Zero is a measurement; this is the absence of one.
 */
export interface Unavailable {
  readonly kind: 'unavailable';
  readonly reason: string;
}

export function unavailable(reason: string): Unavailable {
  return { kind: 'unavailable', reason };
}

export function isUnavailable(value: unknown): value is Unavailable {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    'kind' in value &&
    value.kind === 'unavailable'
  );
}

/** A sub-series fetched for one cycle, or the reason it could not be. */
export type Series<T> = readonly T[] | Unavailable;
