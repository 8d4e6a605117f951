import { generateSigningKey, KeyChain } from "@ndn/keychain";
import { Data, SigType } from "@ndn/packet";
import { describe, expect, it, vi } from "vitest";

import { SigningError } from "./errors.js";
import { KeyChainSigner } from "./signer.js";

describe("KeyChainSigner", () => {
  it("uses digest signing by default", async () => {
    const signer = new KeyChainSigner();
    const data = new Data("/a");
    await signer.sign(data, { type: "default" });
    expect(data.sigInfo.type).toBe(SigType.Sha256);

    const data2 = new Data("/b");
    await signer.sign(data2, { type: "digest" });
    expect(data2.sigInfo.type).toBe(SigType.Sha256);
  });

  it("signs with a key from the KeyChain", async () => {
    const keyChain = KeyChain.createTemp();
    const [pvt] = await generateSigningKey(keyChain, "/test-identity");
    const getSigner = vi.spyOn(keyChain, "getSigner");
    const signer = new KeyChainSigner(keyChain);
    const info = { type: "key", name: pvt.name.toString() } as const;

    const data = new Data("/a");
    await signer.sign(data, info);
    expect(data.sigInfo.type).toBe(SigType.Sha256WithEcdsa);
    await signer.sign(new Data("/b"), info);
    expect(getSigner).toHaveBeenCalledTimes(1);
  });

  it("rejects named policies without a KeyChain", async () => {
    const signer = new KeyChainSigner();
    await expect(signer.sign(new Data("/a"), { type: "identity", name: "/A" })).rejects.toThrow(SigningError);
  });

  it("rejects unknown keys", async () => {
    const signer = new KeyChainSigner(KeyChain.createTemp());
    await expect(signer.sign(new Data("/a"), { type: "key", name: "/nobody/KEY/k1" })).rejects.toThrow(SigningError);
  });
});
