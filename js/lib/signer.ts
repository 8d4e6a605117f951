import type { KeyChain } from "@ndn/keychain";
import { type Data, digestSigning, Name, type Signer } from "@ndn/packet";

import type { SigningInfo } from "../types/pattern.js";
import { SigningError } from "./errors.js";
import { formatSigningInfo } from "./signing-info.js";
import type { DataSigner } from "./transport.js";

/**
 * Sign Data packets with keys from a KeyChain.
 *
 * Identity, key, and certificate names are resolved through KeyChain.getSigner.
 * The default policy and the digest policy use SHA-256 digest signing.
 */
export class KeyChainSigner implements DataSigner {
  constructor(private readonly keyChain?: KeyChain) {}

  private readonly cache = new Map<string, Promise<Signer>>();

  public async sign(data: Data, info: SigningInfo): Promise<void> {
    const signer = await this.resolve(info);
    try {
      await signer.sign(data);
    } catch (err: unknown) {
      throw new SigningError(`cannot sign ${data.name}: ${err instanceof Error ? err.message : String(err)}`,
        { cause: err });
    }
  }

  private resolve(info: SigningInfo): Promise<Signer> {
    const key = formatSigningInfo(info);
    let signer = this.cache.get(key);
    if (!signer) {
      signer = this.lookup(info);
      this.cache.set(key, signer);
    }
    return signer;
  }

  private async lookup(info: SigningInfo): Promise<Signer> {
    if (info.type === "default" || info.type === "digest") {
      return digestSigning;
    }
    if (!this.keyChain) {
      throw new SigningError(`no KeyChain to resolve ${formatSigningInfo(info)}`);
    }
    try {
      return await this.keyChain.getSigner(new Name(info.name));
    } catch (err: unknown) {
      throw new SigningError(`signer unavailable for ${formatSigningInfo(info)}`, { cause: err });
    }
  }
}
