// --------------------------------------------------------------------------
// Clock Interface
// --------------------------------------------------------------------------

/** Injectable clock for testability */
export interface Clock {
  /** Returns current time in milliseconds since epoch */
  now(): number;
}

/** Default clock using Date.now() */
export const REAL_CLOCK: Clock = { now: () => Date.now() };
