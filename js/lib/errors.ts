import type { ExitCode } from "../types/core.js";

/** Base class of errors that terminate a traffic run. */
export abstract class TrafficError extends Error {
  public abstract readonly exitCode: ExitCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Configuration file is missing, malformed, or describes an invalid pattern. */
export class ConfigError extends TrafficError {
  public readonly exitCode = 2;
}

/** Command line argument is invalid. */
export class ArgumentError extends TrafficError {
  public readonly exitCode = 2;
}

/** Prefix registration of one pattern failed. */
export class RegistrationError extends TrafficError {
  public readonly exitCode = 1;
}

/** Signing key or identity is unavailable. */
export class SigningError extends TrafficError {
  public readonly exitCode = 1;
}

/** Packet transmission failed. */
export class TransportError extends TrafficError {
  public readonly exitCode = 1;
}

/** Determine the exit status for an error thrown during a run. */
export function exitCodeOf(err: unknown): ExitCode {
  return err instanceof TrafficError ? err.exitCode : 1;
}
