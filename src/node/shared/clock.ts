/**
 * Time source, injectable so tests can pin "now".
 */
export interface Clock {
  /** Milliseconds since epoch */
  now(): number
}

export const systemClock: Clock = {
  now: () => Date.now()
}
