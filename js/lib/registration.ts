import type { PatternConfig } from "../types/pattern.js";
import { RegistrationError } from "./errors.js";
import type { TrafficLogger } from "./logger.js";
import type { RunState } from "./run-state.js";
import type { Advertisement, Transport } from "./transport.js";

/**
 * Tracks prefix registration outcomes of all patterns.
 *
 * Individual failures are tolerated; when every pattern has failed,
 * the run is marked as failed and onAllFailed is invoked.
 */
export class RegistrationTracker {
  constructor(
      private readonly patterns: readonly PatternConfig[],
      private readonly state: RunState,
      private readonly log: TrafficLogger,
      private readonly onAllFailed: (err: RegistrationError) => void,
  ) {}

  private readonly advertisements: Advertisement[] = [];
  private closed = false;

  /**
   * Register every pattern name with the transport.
   * @returns per pattern, a promise that resolves to whether its registration succeeded.
   */
  public registerAll(transport: Transport): Array<Promise<boolean>> {
    return this.patterns.map(({ name }, id) => {
      this.log.log(`Registering pattern ${id + 1}.`, { timestamp: true });
      const ad = transport.registerName(name);
      this.advertisements.push(ad);
      return ad.registered.then(
        () => true,
        (err: unknown) => {
          this.onFailure(id, err instanceof Error ? err.message : String(err));
          return false;
        },
      );
    });
  }

  /**
   * Handle a registration failure.
   * @param id 0-based pattern index.
   */
  public onFailure(id: number, reason: string): void {
    const pattern = this.patterns[id];
    this.log.log(`Prefix registration failed - PatternType=${id + 1}, Name=${pattern?.name ?? ""}, Reason=${reason}`,
      { timestamp: true, toConsole: true });

    const nFailed = this.state.recordRegistrationFailure();
    if (nFailed !== this.patterns.length || this.closed) {
      return;
    }
    this.state.setError();
    this.log.log("Registration failure.");
    this.onAllFailed(new RegistrationError(`prefix registration failed for all ${nFailed} patterns`));
  }

  /** Withdraw all advertisements. Failures reported afterwards do not stop the run again. */
  public async withdrawAll(): Promise<void> {
    this.closed = true;
    const list = this.advertisements.splice(0);
    await Promise.all(list.map((ad) => ad.withdraw()));
  }
}
