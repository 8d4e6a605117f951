import type { PatternConfig } from "../types/pattern.js";
import { ConfigError } from "./errors.js";
import { formatSigningInfo } from "./signing-info.js";

const UINT32_MAX = 0xFFFFFFFF;

/**
 * Check a pattern for semantic errors.
 * @param index 0-based position in the configuration file.
 */
export function validatePattern(pattern: PatternConfig, index: number): ConfigError[] {
  const where = `Traffic Pattern Type #${index + 1}`;
  const errors: ConfigError[] = [];
  if (pattern.name === "") {
    errors.push(new ConfigError(`${where} - Name is missing`));
  }
  if (pattern.generationInterval === undefined) {
    errors.push(new ConfigError(`${where} - GenerationInterval is missing`));
  }
  if (pattern.contentType !== undefined && pattern.contentType > UINT32_MAX) {
    errors.push(new ConfigError(`${where} - ContentType exceeds ${UINT32_MAX}`));
  }
  return errors;
}

/** Check a pattern list; an empty list is an error. */
export function validatePatterns(patterns: readonly PatternConfig[]): ConfigError[] {
  if (patterns.length === 0) {
    return [new ConfigError("No traffic patterns were specified")];
  }
  return patterns.flatMap((pattern, i) => validatePattern(pattern, i));
}

/** Describe a pattern on one line, listing fields that are set. */
export function formatPattern(pattern: PatternConfig): string {
  const fields: string[] = [];
  if (pattern.name !== "") {
    fields.push(`Name=${pattern.name}`);
  }
  if (pattern.contentDelay !== undefined) {
    fields.push(`ContentDelay=${pattern.contentDelay}`);
  }
  if (pattern.generationInterval !== undefined) {
    fields.push(`GenerationInterval=${pattern.generationInterval}`);
  }
  if (pattern.freshnessPeriod !== undefined) {
    fields.push(`FreshnessPeriod=${pattern.freshnessPeriod}`);
  }
  if (pattern.contentType !== undefined) {
    fields.push(`ContentType=${pattern.contentType}`);
  }
  if (pattern.contentLength !== undefined) {
    fields.push(`ContentBytes=${pattern.contentLength}`);
  }
  if (pattern.content !== "") {
    fields.push(`Content=${pattern.content}`);
  }
  fields.push(`SigningInfo=${formatSigningInfo(pattern.signingInfo)}`);
  return fields.join(", ");
}
