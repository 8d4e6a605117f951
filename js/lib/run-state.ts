import type { Counter, Microseconds } from "../types/core.js";

/**
 * Counters and flags shared by all push loops of a run.
 *
 * All access happens on the Node.js event loop, so plain fields are sufficient.
 */
export class RunState {
  constructor(opts: RunState.Options = {}) {
    this.maxInterests = opts.maxInterests;
    this.contentDelay = opts.contentDelay ?? 0;
    this.quiet = opts.quiet ?? false;
  }

  /** Quota of packets across all patterns; unset means nothing is sent. */
  public readonly maxInterests?: Counter;
  public readonly contentDelay: Microseconds;
  public readonly quiet: boolean;

  private nSent = 0;
  private nRegistrationFailures = 0;
  private errorFlag = false;

  public get globalCount(): Counter {
    return this.nSent;
  }

  public get registrationFailures(): Counter {
    return this.nRegistrationFailures;
  }

  public get hasError(): boolean {
    return this.errorFlag;
  }

  public get quotaReached(): boolean {
    return this.maxInterests !== undefined && this.nSent >= this.maxInterests;
  }

  /**
   * Record one successful send.
   * @returns new global count.
   */
  public recordSend(): Counter {
    return ++this.nSent;
  }

  /**
   * Record one registration failure.
   * @returns new failure count.
   */
  public recordRegistrationFailure(): Counter {
    return ++this.nRegistrationFailures;
  }

  /** Set the error flag; it is never cleared. */
  public setError(): void {
    this.errorFlag = true;
  }
}

export namespace RunState {
  export interface Options {
    maxInterests?: Counter;

    /**
     * Delay before every send, in addition to each pattern's ContentDelay.
     * @default 0
     */
    contentDelay?: Microseconds;

    /**
     * Log only one line per sent packet.
     * @default false
     */
    quiet?: boolean;
  }
}
