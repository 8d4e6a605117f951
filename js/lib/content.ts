import type { PatternConfig } from "../types/pattern.js";

/** Source of uniformly random bytes. */
export type RandomSource = (size: number) => Uint8Array;

// getRandomValues accepts at most 65536 bytes per call
const RANDOM_CHUNK = 65536;

export const cryptoRandom: RandomSource = (size) => {
  const b = new Uint8Array(size);
  for (let offset = 0; offset < size; offset += RANDOM_CHUNK) {
    globalThis.crypto.getRandomValues(b.subarray(offset, Math.min(offset + RANDOM_CHUNK, size)));
  }
  return b;
};

const utf8 = new TextEncoder();

/** Deterministic start of a synthesized payload. */
export function contentHeader(name: string, seqNum: number): string {
  return `${name}/seq=${seqNum}&%_`;
}

/** Build payloads for traffic patterns. */
export class ContentSynthesizer {
  constructor(private readonly random: RandomSource = cryptoRandom) {}

  /**
   * Build the payload of one packet.
   *
   * A non-empty literal content is returned as is.
   * Otherwise, when contentLength is positive, the payload is the header followed by
   * random filler up to contentLength; a header longer than contentLength is kept whole.
   */
  public synthesize(pattern: PatternConfig, seqNum: number): Uint8Array {
    if (pattern.content !== "") {
      return utf8.encode(pattern.content);
    }

    const { contentLength = 0 } = pattern;
    if (contentLength <= 0) {
      return new Uint8Array();
    }

    const header = utf8.encode(contentHeader(pattern.name, seqNum));
    const fillLength = Math.max(0, contentLength - header.length);
    const payload = new Uint8Array(header.length + fillLength);
    payload.set(header, 0);
    payload.set(this.random(fillLength), header.length);
    return payload;
  }
}
