import type { EventEmitter } from "node:events";

import Debug from "debug";
import _throat from "throat";

import type { Counter, ExitCode } from "../types/core.js";
import type { PatternConfig } from "../types/pattern.js";
import { readConfigFile } from "./config-file.js";
import type { ContentSynthesizer } from "./content.js";
import { ConfigError, exitCodeOf } from "./errors.js";
import { stdoutSink, TrafficLogger } from "./logger.js";
import { formatPattern, validatePatterns } from "./pattern.js";
import { type Clock, PushLoop } from "./push-loop.js";
import { RegistrationTracker } from "./registration.js";
import { RunState } from "./run-state.js";
import { logStatistics } from "./stats.js";
import type { DataSigner, Transport } from "./transport.js";

const debug = Debug("ndntraffic:run-controller");

// CommonJS module: its typings describe module.exports.default
const throat = _throat.default;

const TERMINATION_SIGNALS = ["SIGINT", "SIGTERM"] as const;

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Owns a traffic run: loads patterns, registers prefixes, drives push loops,
 * and reports statistics on shutdown.
 */
export class RunController {
  constructor(private readonly opts: RunController.Options) {
    this.state = new RunState(opts);
    this.log = opts.log ?? new TrafficLogger(TrafficLogger.randomInstanceId(), stdoutSink);
    this.signals = opts.signals ?? process;
    this.stopped = new Promise<void>((resolve) => {
      this.resolveStopped = resolve;
    });
  }

  public readonly state: RunState;
  public readonly log: TrafficLogger;
  private readonly signals: EventEmitter;
  private readonly lane: PushLoop.Lane = throat(1);
  private patterns: readonly PatternConfig[] = [];
  private loops: PushLoop[] = [];
  private transport: Promise<Transport | undefined> = Promise.resolve(undefined);
  private tracker?: RegistrationTracker;
  private failure?: unknown;
  private stopping = false;
  private readonly stopped: Promise<void>;
  private resolveStopped: () => void = () => undefined;

  /** Loaded patterns with their send counts. */
  public get statistics(): Array<{ pattern: PatternConfig; localCount: Counter }> {
    return this.patterns.map((pattern, i) => ({ pattern, localCount: this.loops[i]?.localCount ?? 0 }));
  }

  /** First fatal error of the run, if any. */
  public get error(): unknown {
    return this.failure;
  }

  /**
   * Execute the run.
   * @returns process exit status.
   */
  public async run(): Promise<ExitCode> {
    try {
      this.patterns = await this.loadPatterns();
    } catch (err: unknown) {
      if (!(err instanceof ConfigError)) {
        throw err;
      }
      this.log.error(`ERROR: ${err.message}`);
      await this.log.close();
      return err.exitCode;
    }

    this.log.log("Traffic configuration file processing completed.\n", { timestamp: true });
    for (const [i, pattern] of this.patterns.entries()) {
      this.log.log(`Traffic Pattern Type #${i + 1}`);
      this.log.log(formatPattern(pattern));
      this.log.log("");
    }

    if (!this.state.maxInterests) {
      logStatistics(this.log, this.state.globalCount, this.statistics);
      await this.log.close();
      return 0;
    }

    for (const signal of TERMINATION_SIGNALS) {
      this.signals.on(signal, this.onSignal);
    }

    this.transport = this.opts.openTransport().catch((err: unknown) => {
      this.fail(err);
      return undefined;
    });
    const transport = await this.transport;
    if (!transport || this.stopping) {
      return this.waitStopped();
    }

    this.log.log(`We have ${this.patterns.length} traffic patterns.`, { timestamp: true });
    this.tracker = new RegistrationTracker(this.patterns, this.state, this.log, (err) => {
      this.failure ??= err;
      this.stop("Stopping because no prefix could be registered.");
    });
    const registrations = this.tracker.registerAll(transport);

    const ctx: PushLoop.Context = {
      state: this.state,
      transport,
      signer: this.opts.signer,
      log: this.log,
      synthesizer: this.opts.synthesizer,
      lane: this.lane,
      clock: this.opts.clock,
    };
    this.loops = this.patterns.map((pattern, id) => {
      const loop = new PushLoop(id, pattern, ctx);
      loop.on("quota", () => this.stop("Finished data sending."));
      loop.on("error", (err) => this.fail(err));
      loop.on("stopped", () => this.onLoopStopped());
      return loop;
    });
    for (const [id, registered] of registrations.entries()) {
      void registered.then((ok) => this.onRegistered(id, ok));
    }

    return this.waitStopped();
  }

  /**
   * Begin orderly shutdown; later calls have no effect.
   * @param reason logged before shutting down.
   */
  public stop(reason: string): void {
    if (this.stopping) {
      return;
    }
    this.stopping = true;
    this.log.log(reason);
    void this.doShutdown().catch((err: unknown) => {
      this.state.setError();
      this.failure ??= err;
      process.stderr.write(`ERROR: ${describe(err)}\n`);
    }).finally(() => this.resolveStopped());
  }

  private async loadPatterns(): Promise<PatternConfig[]> {
    const { config } = this.opts;
    const patterns = typeof config === "string" ? await readConfigFile(config, this.log) : [...config];
    const errors = validatePatterns(patterns);
    if (errors.length > 0) {
      for (const err of errors) {
        this.log.error(`ERROR: ${err.message}`);
      }
      throw new ConfigError("Traffic configuration provided is not proper", { cause: errors[0] });
    }
    return patterns;
  }

  private async waitStopped(): Promise<ExitCode> {
    await this.stopped;
    return this.state.hasError ? exitCodeOf(this.failure) : 0;
  }

  private readonly onSignal = (signal: string): void => {
    if (!this.state.quotaReached) {
      this.log.log(`Received ${signal} before the quota was reached.`);
      this.state.setError();
    }
    this.stop(`Received ${signal}, stopping.`);
  };

  private fail(err: unknown): void {
    this.failure ??= err;
    this.state.setError();
    this.log.error(`ERROR: ${describe(err)}`);
    this.stop("Stopping after a fatal error.");
  }

  /** Start a loop once its prefix is registered; a loop whose registration failed never sends. */
  private onRegistered(id: number, ok: boolean): void {
    const loop = this.loops[id];
    if (!loop || this.stopping) {
      return;
    }
    if (!ok) {
      loop.stop();
      return;
    }
    this.log.log(`Starting data push for pattern ${loop.patternType}.`, { timestamp: true });
    loop.start();
  }

  private onLoopStopped(): void {
    if (this.stopping || !this.loops.every((loop) => loop.state === "stopped")) {
      return;
    }
    this.stop("All push loops finished.");
  }

  private async doShutdown(): Promise<void> {
    for (const signal of TERMINATION_SIGNALS) {
      this.signals.off(signal, this.onSignal);
    }
    for (const loop of this.loops) {
      loop.stop();
    }
    debug("waiting for the emission in progress");
    await this.lane(async () => undefined);

    try {
      await this.tracker?.withdrawAll();
    } catch (err: unknown) {
      this.log.error(`ERROR: withdrawing advertisements: ${describe(err)}`);
    }

    logStatistics(this.log, this.state.globalCount, this.statistics);

    try {
      const transport = await this.transport;
      await transport?.close();
    } catch (err: unknown) {
      this.log.error(`ERROR: closing transport: ${describe(err)}`);
    }
    await this.log.close();
  }
}

export namespace RunController {
  export interface Options extends RunState.Options {
    /** Configuration file name, or patterns already parsed. */
    config: string | readonly PatternConfig[];

    /** Connect to the network; invoked only when there is something to send. */
    openTransport: () => Promise<Transport>;

    signer: DataSigner;

    /**
     * Logger.
     * @default standard output
     */
    log?: TrafficLogger;

    /**
     * Source of SIGINT and SIGTERM.
     * @default process
     */
    signals?: EventEmitter;

    synthesizer?: ContentSynthesizer;
    clock?: Clock;
  }
}
