import type { Data } from "@ndn/packet";

import type { PatternConfig, SigningInfo } from "../types/pattern.js";
import type { RandomSource } from "./content.js";
import { MemorySink, TrafficLogger } from "./logger.js";
import type { Advertisement, DataSigner, Transport } from "./transport.js";

/** In-memory Transport that records registrations and sent packets. */
export class MemoryTransport implements Transport {
  public readonly registered: string[] = [];
  public readonly withdrawn: string[] = [];
  public readonly sent: Data[] = [];
  public closed = false;

  /** Return a reason to make registration of a name fail. */
  public refuse?: (name: string) => string | undefined;

  /** Settle registrations after this many milliseconds instead of right away. */
  public registrationDelay?: number;

  /** Make every send reject. */
  public sendError?: Error;

  public registerName(name: string): Advertisement {
    this.registered.push(name);
    const reason = this.refuse?.(name);
    const registered = new Promise<void>((resolve, reject) => {
      const settle = () => reason === undefined ? resolve() : reject(new Error(reason));
      if (this.registrationDelay === undefined) {
        settle();
      } else {
        setTimeout(settle, this.registrationDelay);
      }
    });
    return {
      registered,
      withdraw: async () => {
        this.withdrawn.push(name);
      },
    };
  }

  public async send(data: Data): Promise<void> {
    if (this.sendError) {
      throw this.sendError;
    }
    this.sent.push(data);
  }

  public async close(): Promise<void> {
    this.closed = true;
  }
}

/** DataSigner that only records what it was asked to sign. */
export class RecordingSigner implements DataSigner {
  public readonly calls: Array<{ name: string; info: SigningInfo }> = [];

  public async sign(data: Data, info: SigningInfo): Promise<void> {
    this.calls.push({ name: data.name.toString(), info });
  }
}

/** RandomSource that fills with a constant byte. */
export function fixedRandom(byte = 0xAA): RandomSource {
  return (size) => new Uint8Array(size).fill(byte);
}

export function makePattern(fields: Partial<PatternConfig> & Pick<PatternConfig, "name">): PatternConfig {
  return {
    content: "",
    signingInfo: { type: "default" },
    ...fields,
  };
}

export function makeLogger(): { log: TrafficLogger; sink: MemorySink } {
  const sink = new MemorySink();
  return { log: new TrafficLogger("test", sink), sink };
}

/** Strip the timestamp prefix from log lines. */
export function untimed(lines: readonly string[]): string[] {
  return lines.map((line) => line.replace(/^\d+\.\d{6} - /, ""));
}

/** Let pending promise callbacks run; requires setImmediate to be left unfaked. */
export function flush(): Promise<void> {
  return new Promise<void>((resolve) => setImmediate(resolve));
}

/** Timer APIs faked by scheduling tests. */
export const fakedTimers = ["setTimeout", "clearTimeout", "Date"] as const;
