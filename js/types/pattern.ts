import type { Microseconds, Milliseconds, Name, Uint } from "./core.js";

/**
 * Signing policy of a traffic pattern.
 *
 * Parsed from strings such as `id:/A`, `key:/A/KEY/k1`, `cert:/A/KEY/k1/self/v1`.
 * An empty string selects the default identity.
 */
export type SigningInfo = SigningInfo.Default | SigningInfo.Digest | SigningInfo.Named;

export namespace SigningInfo {
  export interface Default {
    type: "default";
  }

  /** SHA-256 digest, written as `id:/localhost/identity/digest-sha256`. */
  export interface Digest {
    type: "digest";
  }

  export interface Named {
    type: "identity" | "key" | "cert";
    name: Name;
  }
}

/**
 * Traffic pattern definition, one block of the configuration file.
 * Fields left unset are `undefined`.
 */
export interface PatternConfig {
  readonly name: Name;

  /** Extra wait before each send of this pattern. */
  readonly contentDelay?: Microseconds;

  /**
   * Time between two emissions.
   * Zero fires a single packet immediately.
   */
  readonly generationInterval?: Microseconds;

  readonly freshnessPeriod?: Milliseconds;

  /**
   * @maximum 4294967295
   */
  readonly contentType?: Uint;

  /** Payload size when content is synthesized. */
  readonly contentLength?: Uint;

  /**
   * Literal payload; overrides contentLength when non-empty.
   * @default ""
   */
  readonly content: string;

  readonly signingInfo: SigningInfo;
}

/** Recognized configuration keys. */
export type PatternKey =
  | "Name"
  | "ContentDelay"
  | "GenerationInterval"
  | "FreshnessPeriod"
  | "ContentType"
  | "ContentBytes"
  | "Content"
  | "SigningInfo";
