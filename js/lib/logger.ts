import { once } from "node:events";
import * as fs from "node:fs";
import * as path from "node:path";

import Debug from "debug";
import loglevel from "loglevel";

import { ConfigError } from "./errors.js";

const debug = Debug("ndntraffic:logger");

/** Destination of log lines. */
export interface LogSink {
  write(line: string): void;
  close(): Promise<void>;
}

/** Write lines to standard output. */
export const stdoutSink: LogSink = {
  write(line) {
    process.stdout.write(`${line}\n`);
  },
  async close() {
    // stdout is never closed
  },
};

/** Append lines to a file. */
export class FileSink implements LogSink {
  /** Open a file for appending; rejects when it cannot be created. */
  public static async open(filename: string): Promise<FileSink> {
    const sink = new FileSink(filename);
    await once(sink.stream, "open");
    return sink;
  }

  private constructor(public readonly filename: string) {
    this.stream = fs.createWriteStream(filename, { flags: "a" });
    this.stream.on("error", (err) => {
      debug("%s: %s", filename, err.message);
      this.failure ??= err;
    });
  }

  private readonly stream: fs.WriteStream;
  private failure?: Error;

  public write(line: string): void {
    if (!this.failure) {
      this.stream.write(`${line}\n`);
    }
  }

  /** Flush and close; rejects with the first write error. */
  public async close(): Promise<void> {
    if (!this.stream.closed) {
      await new Promise<void>((resolve) => this.stream.end(() => resolve()));
    }
    if (this.failure) {
      throw this.failure;
    }
  }
}

/** Keep lines in memory. */
export class MemorySink implements LogSink {
  public readonly lines: string[] = [];

  public write(line: string): void {
    this.lines.push(line);
  }

  public async close(): Promise<void> {
    // nothing to flush
  }
}

/** Unix timestamp in seconds with microsecond precision. */
export function formatTimestamp(epochMillis = performance.timeOrigin + performance.now()): string {
  return (epochMillis / 1000).toFixed(6);
}

/**
 * Line-oriented logger of a traffic run.
 *
 * Every line goes to the main sink. Lines marked `toConsole` are echoed to the
 * console sink when the main sink is a file.
 */
export class TrafficLogger {
  constructor(public readonly instanceId: string, sink: LogSink, echo?: LogSink) {
    this.sink = sink;
    this.echo = echo;
    this.ll = loglevel.getLogger(Symbol(`ndntraffic-push:${instanceId}`));
    const { sink: main, echo: secondary } = this;
    this.ll.methodFactory = (methodName) => (...message: unknown[]) => {
      const line = message.join(" ");
      main.write(line);
      if (secondary && methodName !== "info") {
        secondary.write(line);
      }
    };
    this.ll.setLevel("info", false);
  }

  private readonly sink: LogSink;
  private readonly echo?: LogSink;
  private readonly ll: loglevel.Logger;

  /** Write a line. */
  public log(line: string, { timestamp = false, toConsole = false }: TrafficLogger.LineOptions = {}): void {
    if (timestamp) {
      line = `${formatTimestamp()} - ${line}`;
    }
    if (toConsole) {
      this.ll.warn(line);
    } else {
      this.ll.info(line);
    }
  }

  /** Write a timestamped console-visible error line. */
  public error(line: string): void {
    this.ll.error(`${formatTimestamp()} - ${line}`);
  }

  /** Flush and close sinks. */
  public async close(): Promise<void> {
    await this.sink.close();
    await this.echo?.close();
  }
}

export namespace TrafficLogger {
  export interface LineOptions {
    /** Prefix the line with the current Unix time. */
    timestamp?: boolean;

    /** Show the line on the console even when logging to a file. */
    toConsole?: boolean;
  }

  /** Random decimal identifier of a run, used as the log file basename. */
  export function randomInstanceId(): string {
    const [n = 0] = globalThis.crypto.getRandomValues(new Uint32Array(1));
    return `${n}`;
  }

  /**
   * Open a logger for a run.
   * @param instanceId log file basename.
   * @param logFolder when set, lines are written to `<logFolder>/<instanceId>.log`.
   */
  export async function open(instanceId: string, logFolder?: string): Promise<TrafficLogger> {
    if (!logFolder) {
      return new TrafficLogger(instanceId, stdoutSink);
    }
    const filename = path.join(logFolder, `${instanceId}.log`);
    debug("logging to %s", filename);
    let sink: FileSink;
    try {
      sink = await FileSink.open(filename);
    } catch (err: unknown) {
      throw new ConfigError(`Unable to open log file: ${filename}`, { cause: err });
    }
    return new TrafficLogger(instanceId, sink, stdoutSink);
  }
}
