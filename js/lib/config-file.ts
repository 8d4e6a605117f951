import { readFile } from "node:fs/promises";

import type { PatternConfig, PatternKey } from "../types/pattern.js";
import { ConfigError } from "./errors.js";
import type { TrafficLogger } from "./logger.js";
import { parseSigningInfo } from "./signing-info.js";

type Draft = { -readonly [K in keyof PatternConfig]: PatternConfig[K] };

function parseUint(key: PatternKey, value: string): number {
  const n = /^\d+$/.test(value) ? Number.parseInt(value, 10) : Number.NaN;
  if (!Number.isSafeInteger(n)) {
    throw new ConfigError(`invalid value for ${key}: ${value}`);
  }
  return n;
}

const setters: Record<PatternKey, (draft: Draft, value: string) => void> = {
  Name(draft, value) {
    draft.name = value;
  },
  ContentDelay(draft, value) {
    draft.contentDelay = parseUint("ContentDelay", value);
  },
  GenerationInterval(draft, value) {
    draft.generationInterval = parseUint("GenerationInterval", value);
  },
  FreshnessPeriod(draft, value) {
    draft.freshnessPeriod = parseUint("FreshnessPeriod", value);
  },
  ContentType(draft, value) {
    draft.contentType = parseUint("ContentType", value);
  },
  ContentBytes(draft, value) {
    draft.contentLength = parseUint("ContentBytes", value);
  },
  Content(draft, value) {
    draft.content = value;
  },
  SigningInfo(draft, value) {
    draft.signingInfo = parseSigningInfo(value);
  },
};

function isPatternKey(key: string): key is PatternKey {
  return Object.hasOwn(setters, key);
}

function makeDraft(): Draft {
  return {
    name: "",
    content: "",
    signingInfo: { type: "default" },
  };
}

/**
 * Parse traffic configuration text.
 *
 * Consecutive lines starting with a letter form one pattern block.
 * Any other line (blank, comment, `**` separator) ends the block.
 * @throws ConfigError on malformed lines or values.
 */
export function parseConfig(text: string, log?: TrafficLogger): PatternConfig[] {
  const patterns: PatternConfig[] = [];
  let draft: Draft | undefined;

  for (const [i, line] of text.split(/\r?\n/).entries()) {
    const lineNumber = i + 1;
    if (!/^[a-z]/i.test(line)) {
      if (draft) {
        patterns.push(Object.freeze(draft));
        draft = undefined;
      }
      continue;
    }

    const m = /^([^=]+)=(.+)$/.exec(line);
    if (!m) {
      throw new ConfigError(`Line ${lineNumber} - Invalid syntax: ${line}`);
    }
    const [, key, value] = m;
    draft ??= makeDraft();
    if (!isPatternKey(key)) {
      log?.log(`Line ${lineNumber} - Ignoring unknown parameter: ${key}`, { toConsole: true });
      continue;
    }
    try {
      setters[key](draft, value);
    } catch (err: unknown) {
      throw new ConfigError(`Line ${lineNumber} - ${err instanceof Error ? err.message : String(err)}`, { cause: err });
    }
  }

  if (draft) {
    patterns.push(Object.freeze(draft));
  }
  return patterns;
}

/**
 * Read and parse a traffic configuration file.
 * @throws ConfigError if the file cannot be read or parsed.
 */
export async function readConfigFile(filename: string, log?: TrafficLogger): Promise<PatternConfig[]> {
  let text: string;
  try {
    text = await readFile(filename, "utf8");
  } catch (err: unknown) {
    throw new ConfigError(`Unable to open traffic configuration file: ${filename}`, { cause: err });
  }

  log?.log(`Reading traffic configuration file: ${filename}`, { timestamp: true, toConsole: true });
  const patterns = parseConfig(text, log);
  log?.log(`Finished reading traffic configuration file: ${filename}`, { timestamp: true, toConsole: true });
  return patterns;
}
