/**
 * Source of timestamps. Injected so tests can control time.
 */
export interface Clock {
  /** Current time as an ISO-8601 string */
  isoNow(): string
}

export const systemClock: Clock = {
  isoNow: () => new Date().toISOString(),
}
