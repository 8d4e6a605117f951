#!/usr/bin/env node

import "dotenv/config";

import { KeyChain } from "@ndn/keychain";
import yargs from "yargs";
import { hideBin } from "yargs/helpers";

import { readEnv } from "../lib/env.js";
import { ArgumentError, exitCodeOf } from "../lib/errors.js";
import { GqlTransport } from "../lib/gql-transport.js";
import { TrafficLogger } from "../lib/logger.js";
import { RunController } from "../lib/run-controller.js";
import { KeyChainSigner } from "../lib/signer.js";

function checkUint(key: string, value: number | undefined): void {
  if (value !== undefined && !(Number.isSafeInteger(value) && value >= 0)) {
    throw new ArgumentError(`--${key} must be a non-negative integer`);
  }
}

async function main(): Promise<number> {
  const argv = await yargs(hideBin(process.argv))
    .scriptName("ndntraffic-push")
    .usage("$0 [options] <config-file>\n\nGenerate Data traffic as described by a traffic configuration file.")
    .option("count", {
      alias: "c",
      type: "number",
      desc: "total number of Data packets to send",
    })
    .option("delay", {
      alias: "d",
      type: "number",
      default: 0,
      desc: "wait time before each Data is sent, in microseconds",
    })
    .option("quiet", {
      alias: "q",
      type: "boolean",
      default: false,
      desc: "turn off per-packet logging",
    })
    .check(({ count, delay, _ }) => {
      checkUint("count", count);
      checkUint("delay", delay);
      if (_.length !== 1) {
        throw new ArgumentError("exactly one traffic configuration file must be specified");
      }
      return true;
    })
    .fail((msg, err, y) => {
      process.stderr.write(`ERROR: ${msg ?? err.message}\n\n`);
      y.showHelp();
      process.exit(2);
    })
    .help()
    .alias("help", "h")
    .strictOptions()
    .parseAsync();

  const env = readEnv();
  const keyChain = env.keyChain ? KeyChain.open(env.keyChain) : KeyChain.createTemp();
  const log = await TrafficLogger.open(TrafficLogger.randomInstanceId(), env.logFolder);
  const ctrl = new RunController({
    config: String(argv._[0]),
    maxInterests: argv.count,
    contentDelay: argv.delay,
    quiet: argv.quiet,
    log,
    signer: new KeyChainSigner(keyChain),
    openTransport: () => GqlTransport.connect(env),
  });
  return ctrl.run();
}

main()
  .then((code) => process.exit(code))
  .catch((err: unknown) => {
    process.stderr.write(`${err}\n`);
    process.exit(exitCodeOf(err));
  });
