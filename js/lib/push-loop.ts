import { EventEmitter } from "node:events";

import { Data } from "@ndn/packet";
import Debug from "debug";
import delay from "delay";
import type { StrictEventEmitter } from "strict-event-emitter-types";
import _throat from "throat";

import type { Counter, Microseconds } from "../types/core.js";
import type { PatternConfig } from "../types/pattern.js";
import { ContentSynthesizer } from "./content.js";
import type { TrafficLogger } from "./logger.js";
import type { RunState } from "./run-state.js";
import type { DataSigner, Transport } from "./transport.js";

const debug = Debug("ndntraffic:push-loop");

// CommonJS module: its typings describe module.exports.default
const throat = _throat.default;

/** Current time in microseconds. */
export type Clock = () => Microseconds;

const systemClock: Clock = () => Date.now() * 1000;

interface Events {
  tick: (deadline: Microseconds) => void;
  sent: (globalId: Counter, localId: Counter) => void;
  quota: () => void;
  error: (err: unknown) => void;
  stopped: () => void;
}

type Emitter = StrictEventEmitter<EventEmitter, Events>;

/**
 * Repeating emitter of one traffic pattern.
 *
 * Ticks follow fixed phase: the n-th deadline is start + n * generationInterval,
 * regardless of how long each send takes.
 */
export class PushLoop extends EventEmitter implements Emitter {
  /**
   * Constructor.
   * @param id 0-based pattern index.
   */
  constructor(public readonly id: number, public readonly pattern: PatternConfig, ctx: PushLoop.Context) {
    super();
    this.ctx = ctx;
    this.clock = ctx.clock ?? systemClock;
    this.synthesizer = ctx.synthesizer ?? new ContentSynthesizer();
    this.lane = ctx.lane ?? throat(1);
  }

  private readonly ctx: PushLoop.Context;
  private readonly clock: Clock;
  private readonly synthesizer: ContentSynthesizer;
  private readonly lane: PushLoop.Lane;
  private timer?: NodeJS.Timeout;
  private nSent = 0;
  private deadline = 0;
  private currentState: PushLoop.State = "idle";

  public get state(): PushLoop.State {
    return this.currentState;
  }

  /** Number of packets sent for this pattern. */
  public get localCount(): Counter {
    return this.nSent;
  }

  /** 1-based pattern number shown in logs. */
  public get patternType(): number {
    return this.id + 1;
  }

  private get interval(): Microseconds {
    return this.pattern.generationInterval ?? 0;
  }

  /** Arm the first tick, one interval from now. */
  public start(): void {
    if (this.currentState !== "idle") {
      return;
    }
    this.ctx.log.log(`Starting push loop for pattern ${this.patternType}.`);
    this.deadline = this.clock() + this.interval;
    this.arm();
  }

  /** Cancel further ticks. An emission already in progress still completes. */
  public stop(): void {
    if (this.currentState === "stopped") {
      return;
    }
    clearTimeout(this.timer);
    this.timer = undefined;
    this.currentState = "stopped";
    debug("pattern %d stopped after %d packets", this.patternType, this.nSent);
    this.emit("stopped");
  }

  private arm(): void {
    const wait = Math.max(0, this.deadline - this.clock()) / 1000;
    this.currentState = "armed";
    this.timer = setTimeout(this.onTimer, wait);
  }

  private readonly onTimer = (): void => {
    this.timer = undefined;
    this.currentState = "firing";
    this.emit("tick", this.deadline);
    void this.lane(() => this.fire()).then(
      (sent) => this.afterFire(sent),
      (err: unknown) => this.emit("error", err),
    );
  };

  private afterFire(sent: boolean): void {
    if (sent && this.ctx.state.quotaReached) {
      this.emit("quota");
    }
    if (this.currentState === "stopped") {
      return;
    }
    if (this.interval === 0) {
      this.stop();
      return;
    }
    this.deadline += this.interval;
    this.arm();
  }

  /**
   * Synthesize, sign, and send one packet.
   * @returns whether a packet was sent.
   */
  private async fire(): Promise<boolean> {
    const { state, transport, signer, log } = this.ctx;
    const { name, freshnessPeriod, contentType, contentDelay = 0, signingInfo } = this.pattern;
    if (this.currentState === "stopped" || state.quotaReached) {
      return false;
    }

    const data = new Data(name);
    if (freshnessPeriod !== undefined) {
      data.freshnessPeriod = freshnessPeriod;
    }
    if (contentType !== undefined) {
      data.contentType = contentType;
    }
    data.content = this.synthesizer.synthesize(this.pattern, this.nSent);
    await signer.sign(data, signingInfo);

    if (!state.quiet) {
      log.log(`Send Data          - PatternType=${this.patternType}, GlobalID=${state.globalCount + 1}, ` +
        `LocalID=${this.nSent + 1}, Name=${name}`, { timestamp: true });
    }

    if (contentDelay > 0) {
      await delay(contentDelay / 1000);
    }
    if (state.contentDelay > 0) {
      await delay(state.contentDelay / 1000);
    }

    await transport.send(data);
    const localId = ++this.nSent;
    const globalId = state.recordSend();

    if (state.quiet) {
      log.log(`Successfully Sent Data          - GlobalID=${globalId}, LocalID=${localId}, Name=${name}`,
        { timestamp: true });
    } else {
      log.log(`Successfully Sent Data          - PatternType=${this.patternType}, GlobalID=${globalId}, ` +
        `LocalID=${localId}, Name=${name}`, { timestamp: true });
    }
    this.emit("sent", globalId, localId);
    return true;
  }
}

export namespace PushLoop {
  export type State = "idle" | "armed" | "firing" | "stopped";

  /** Runs jobs one at a time, such as `throat(1)`. */
  export type Lane = <T>(job: () => Promise<T>) => Promise<T>;

  /** Collaborators shared by the push loops of a run. */
  export interface Context {
    state: RunState;
    transport: Transport;
    signer: DataSigner;
    log: TrafficLogger;

    /** Payload builder; a fresh ContentSynthesizer when omitted. */
    synthesizer?: ContentSynthesizer;

    /**
     * Serializes emissions across loops.
     * Each loop gets its own lane when omitted.
     */
    lane?: Lane;

    /** @default Date.now() in microseconds */
    clock?: Clock;
  }
}
