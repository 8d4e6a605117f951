import type { Data } from "@ndn/packet";

import type { SigningInfo } from "../types/pattern.js";

/** Prefix advertisement held on behalf of one pattern. */
export interface Advertisement {
  /** Settles when registration completes; rejects with the failure reason. */
  readonly registered: Promise<void>;

  /** Remove the advertisement; safe to call more than once. */
  withdraw(): Promise<void>;
}

/** Network side of a traffic run. */
export interface Transport {
  /**
   * Advertise a name prefix.
   * Registration proceeds in the background; its outcome is reported through `registered`.
   */
  registerName(name: string): Advertisement;

  /**
   * Transmit a signed Data packet.
   * @throws TransportError
   */
  send(data: Data): Promise<void>;

  /** Release network resources. */
  close(): Promise<void>;
}

/** Signing side of a traffic run. */
export interface DataSigner {
  /**
   * Sign a Data packet in place.
   * @throws SigningError if the key or identity is unavailable.
   */
  sign(data: Data, info: SigningInfo): Promise<void>;
}
