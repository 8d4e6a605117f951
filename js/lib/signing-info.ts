import type { SigningInfo } from "../types/pattern.js";
import { ConfigError } from "./errors.js";

const DIGEST_SHA256_IDENTITY = "/localhost/identity/digest-sha256";

const prefixes = {
  "id:": "identity",
  "key:": "key",
  "cert:": "cert",
} as const;

/** Parse a SigningInfo string. */
export function parseSigningInfo(input: string): SigningInfo {
  if (input === "") {
    return { type: "default" };
  }

  for (const [prefix, type] of Object.entries(prefixes)) {
    if (!input.startsWith(prefix)) {
      continue;
    }
    const name = input.slice(prefix.length);
    if (!name.startsWith("/")) {
      throw new ConfigError(`invalid SigningInfo ${input}: name must start with '/'`);
    }
    if (type === "identity" && name === DIGEST_SHA256_IDENTITY) {
      return { type: "digest" };
    }
    return { type, name };
  }
  throw new ConfigError(`invalid SigningInfo ${input}: unrecognized signer type`);
}

/** Print a SigningInfo in the form accepted by {@link parseSigningInfo}. */
export function formatSigningInfo(info: SigningInfo): string {
  switch (info.type) {
    case "default":
      return "";
    case "digest":
      return `id:${DIGEST_SHA256_IDENTITY}`;
    case "identity":
      return `id:${info.name}`;
    case "key":
    case "cert":
      return `${info.type}:${info.name}`;
  }
}
