import { ArgumentError } from "./errors.js";

/** Settings read from the environment. */
export interface TrafficEnv {
  /** Log file folder; unset means standard output. */
  logFolder?: string;

  /** Forwarder GraphQL server URI. */
  gqlserver: string;

  /** Forwarder UDP endpoint. */
  forwarder: string;

  /** KeyChain locator; unset means an in-memory KeyChain. */
  keyChain?: string;
}

function nonEmpty(value: string | undefined): string | undefined {
  return value === undefined || value === "" ? undefined : value;
}

/**
 * Read settings from environment variables.
 * @throws ArgumentError if NDNTG_GQLSERVER is not a URI.
 */
export function readEnv(env: NodeJS.ProcessEnv = process.env): TrafficEnv {
  const gqlserver = nonEmpty(env.NDNTG_GQLSERVER) ?? "http://127.0.0.1:3030/";
  if (!URL.canParse(gqlserver)) {
    throw new ArgumentError(`NDNTG_GQLSERVER is not a URI: ${gqlserver}`);
  }
  return {
    logFolder: nonEmpty(env.NDN_TRAFFIC_LOGFOLDER),
    gqlserver,
    forwarder: nonEmpty(env.NDNTG_FW_UDP) ?? "127.0.0.1:6363",
    keyChain: nonEmpty(env.NDNTG_KEYCHAIN),
  };
}
