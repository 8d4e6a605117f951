import * as dgram from "node:dgram";
import { once } from "node:events";

import { Data, digestSigning } from "@ndn/packet";
import { Decoder } from "@ndn/tlv";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import type { SocketFaceLocator } from "../types/iface.js";
import type { FwControl } from "./control.js";
import { TransportError } from "./errors.js";
import { GqlTransport, splitHostPort } from "./gql-transport.js";

function makeControl() {
  return {
    createFace: vi.fn(async (locator: SocketFaceLocator) => `face:${locator.scheme}`),
    insertFibEntry: vi.fn(async (name: string, nexthops: readonly string[]) => `fib:${name}:${nexthops.join(",")}`),
    del: vi.fn(async (id: string) => id !== ""),
  } satisfies FwControl;
}

describe("splitHostPort", () => {
  it("splits IPv4 and IPv6 endpoints", () => {
    expect(splitHostPort("127.0.0.1:6363")).toEqual(["127.0.0.1", 6363]);
    expect(splitHostPort("[::1]:6363")).toEqual(["::1", 6363]);
  });

  it.each(["127.0.0.1", "127.0.0.1:0", "127.0.0.1:70000", ":6363"])("rejects %s", (input) => {
    expect(() => splitHostPort(input)).toThrow(TransportError);
  });
});

describe("GqlTransport", () => {
  let forwarder: dgram.Socket;
  let endpoint: string;

  beforeEach(async () => {
    forwarder = dgram.createSocket("udp4");
    forwarder.bind(0, "127.0.0.1");
    await once(forwarder, "listening");
    endpoint = `127.0.0.1:${forwarder.address().port}`;
  });

  afterEach(() => {
    forwarder.close();
  });

  it("creates a face toward its socket", async () => {
    const control = makeControl();
    const transport = await GqlTransport.connect({ gqlserver: "http://127.0.0.1:3030/", forwarder: endpoint, control });
    expect(transport.faceId).toBe("face:udp");
    expect(control.createFace).toHaveBeenCalledWith({
      scheme: "udp",
      local: endpoint,
      remote: expect.stringMatching(/^127\.0\.0\.1:\d+$/),
    });

    await transport.close();
    expect(control.del).toHaveBeenCalledWith("face:udp");
  });

  it("sends Data packets as datagrams", async () => {
    const transport = await GqlTransport.connect({ gqlserver: "http://127.0.0.1:3030/", forwarder: endpoint, control: makeControl() });
    const data = new Data("/a/b");
    data.content = new TextEncoder().encode("hello");
    await digestSigning.sign(data);

    const received = once(forwarder, "message");
    await transport.send(data);
    const [msg] = await received;
    expect(msg).toBeInstanceOf(Buffer);
    const decoded = new Decoder(msg).decode(Data);
    expect(decoded.name.equals(data.name)).toBe(true);
    expect(new TextDecoder().decode(decoded.content)).toBe("hello");
    await transport.close();
  });

  it("registers and withdraws FIB entries", async () => {
    const control = makeControl();
    const transport = await GqlTransport.connect({ gqlserver: "http://127.0.0.1:3030/", forwarder: endpoint, control });
    const ad = transport.registerName("/a");
    await expect(ad.registered).resolves.toBeUndefined();
    await ad.withdraw();
    await ad.withdraw();
    expect(control.insertFibEntry).toHaveBeenCalledWith("/a", ["face:udp"]);
    expect(control.del).toHaveBeenCalledTimes(1);
    expect(control.del).toHaveBeenCalledWith("fib:/a:face:udp");
    await transport.close();
  });

  it("reports registration failures", async () => {
    const control = makeControl();
    control.insertFibEntry.mockRejectedValueOnce(new Error("no such face"));
    const transport = await GqlTransport.connect({ gqlserver: "http://127.0.0.1:3030/", forwarder: endpoint, control });
    const ad = transport.registerName("/a");
    await expect(ad.registered).rejects.toThrow("no such face");
    await ad.withdraw();
    expect(control.del).not.toHaveBeenCalled();
    await transport.close();
  });

  it("rejects when createFace fails", async () => {
    const control = makeControl();
    control.createFace.mockRejectedValueOnce(new Error("face limit"));
    await expect(GqlTransport.connect({ gqlserver: "http://127.0.0.1:3030/", forwarder: endpoint, control }))
      .rejects.toThrow(new TransportError("createFace failed: face limit"));
  });
});
