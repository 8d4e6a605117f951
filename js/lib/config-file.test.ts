import { mkdtemp, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";

import { describe, expect, it } from "vitest";

import { parseConfig, readConfigFile } from "./config-file.js";
import { ConfigError } from "./errors.js";
import { makeLogger, untimed } from "./test-fixture.js";

const sample = [
  "# two patterns",
  "Name=/example/A",
  "GenerationInterval=1000",
  "FreshnessPeriod=4000",
  "ContentBytes=20",
  "ContentType=0",
  "SigningInfo=key:/A/KEY/k1",
  "**",
  "Name=/example/B",
  "ContentDelay=500",
  "GenerationInterval=0",
  "Content=hello=world",
  "Color=blue",
  "",
].join("\n");

describe("parseConfig", () => {
  it("parses pattern blocks", () => {
    const { log, sink } = makeLogger();
    const patterns = parseConfig(sample, log);
    expect(patterns).toEqual([
      {
        name: "/example/A",
        generationInterval: 1000,
        freshnessPeriod: 4000,
        contentLength: 20,
        contentType: 0,
        content: "",
        signingInfo: { type: "key", name: "/A/KEY/k1" },
      },
      {
        name: "/example/B",
        contentDelay: 500,
        generationInterval: 0,
        content: "hello=world",
        signingInfo: { type: "default" },
      },
    ]);
    expect(Object.isFrozen(patterns[0])).toBe(true);
    expect(sink.lines).toEqual(["Line 13 - Ignoring unknown parameter: Color"]);
  });

  it("accepts CRLF line endings and a missing final newline", () => {
    expect(parseConfig("Name=/a\r\nGenerationInterval=1")).toEqual([
      { name: "/a", generationInterval: 1, content: "", signingInfo: { type: "default" } },
    ]);
  });

  it("ignores unknown keys that contain non-letters", () => {
    const { log, sink } = makeLogger();
    expect(parseConfig("Name=/a\nGenerationInterval=1000\nPayload_Size=10\nX-Rate=2\n", log)).toEqual([
      { name: "/a", generationInterval: 1000, content: "", signingInfo: { type: "default" } },
    ]);
    expect(sink.lines).toEqual([
      "Line 3 - Ignoring unknown parameter: Payload_Size",
      "Line 4 - Ignoring unknown parameter: X-Rate",
    ]);
  });

  it("rejects malformed lines", () => {
    expect(() => parseConfig("Name=/a\nGenerationInterval 1000\n")).toThrow(
      new ConfigError("Line 2 - Invalid syntax: GenerationInterval 1000"));
    expect(() => parseConfig("Name=\n")).toThrow("Line 1 - Invalid syntax: Name=");
  });

  it.each(["-5", "1.5", "0x10", "1e3"])("rejects numeric value %s", (value) => {
    expect(() => parseConfig(`Name=/a\nGenerationInterval=${value}\n`)).toThrow(
      `Line 2 - invalid value for GenerationInterval: ${value}`);
  });

  it("rejects bad SigningInfo", () => {
    expect(() => parseConfig("Name=/a\nSigningInfo=foo\n")).toThrow(ConfigError);
  });

  it("returns no patterns for empty text", () => {
    expect(parseConfig("# nothing\n\n")).toEqual([]);
  });
});

describe("readConfigFile", () => {
  it("reads a file", async () => {
    const dir = await mkdtemp(path.join(tmpdir(), "ndntraffic-"));
    const filename = path.join(dir, "push.conf");
    await writeFile(filename, sample);
    const { log, sink } = makeLogger();
    const patterns = await readConfigFile(filename, log);
    expect(patterns.map(({ name }) => name)).toEqual(["/example/A", "/example/B"]);
    expect(untimed(sink.lines)).toEqual([
      `Reading traffic configuration file: ${filename}`,
      "Line 13 - Ignoring unknown parameter: Color",
      `Finished reading traffic configuration file: ${filename}`,
    ]);
  });

  it("rejects a missing file", async () => {
    const filename = path.join(tmpdir(), "ndntraffic-missing", "push.conf");
    await expect(readConfigFile(filename)).rejects.toThrow(
      `Unable to open traffic configuration file: ${filename}`);
  });
});
