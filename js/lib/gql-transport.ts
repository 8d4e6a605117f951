import * as dgram from "node:dgram";
import { once } from "node:events";

import type { Data } from "@ndn/packet";
import { Encoder } from "@ndn/tlv";
import Debug from "debug";

import { type FwControl, GqlFwControl } from "./control.js";
import { TransportError } from "./errors.js";
import type { Advertisement, Transport } from "./transport.js";

const debug = Debug("ndntraffic:gql-transport");

/** Split "host:port" or "[v6]:port". */
export function splitHostPort(input: string): [host: string, port: number] {
  const m = /^(?:\[([^\]]+)\]|([^:]+)):(\d+)$/.exec(input);
  const port = Number.parseInt(m?.[3] ?? "", 10);
  const host = m?.[1] ?? m?.[2];
  if (!host || !(port > 0 && port <= 0xFFFF)) {
    throw new TransportError(`invalid endpoint ${input}`);
  }
  return [host, port];
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Transport through a forwarder controlled over GraphQL.
 *
 * A UDP face is created toward a local socket; Data packets are written to the forwarder
 * over that socket, and prefixes are advertised as FIB entries pointing to the face.
 */
export class GqlTransport implements Transport {
  /** Open a socket and create the face. */
  public static async connect(opts: GqlTransport.Options): Promise<GqlTransport> {
    const control = opts.control ?? new GqlFwControl(opts.gqlserver);
    const [host, port] = splitHostPort(opts.forwarder);
    const socket = dgram.createSocket(host.includes(":") ? "udp6" : "udp4");
    try {
      socket.bind({ port: 0, address: host.includes(":") ? "::1" : "127.0.0.1" });
      await once(socket, "listening");
    } catch (err: unknown) {
      socket.close();
      throw new TransportError(`cannot bind UDP socket: ${describe(err)}`, { cause: err });
    }

    const { address, port: localPort } = socket.address();
    const remote = address.includes(":") ? `[${address}]:${localPort}` : `${address}:${localPort}`;
    let faceId: string;
    try {
      faceId = await control.createFace({ scheme: "udp", local: opts.forwarder, remote });
    } catch (err: unknown) {
      socket.close();
      throw new TransportError(`createFace failed: ${describe(err)}`, { cause: err });
    }
    debug("face %s created for %s", faceId, remote);
    return new GqlTransport(control, socket, host, port, faceId);
  }

  private constructor(
      private readonly control: FwControl,
      private readonly socket: dgram.Socket,
      private readonly host: string,
      private readonly port: number,
      public readonly faceId: string,
  ) {}

  public registerName(name: string): Advertisement {
    const inserted = this.control.insertFibEntry(name, [this.faceId]);
    let withdrawn = false;
    return {
      registered: inserted.then((id) => {
        debug("FIB entry %s inserted for %s", id, name);
      }),
      withdraw: async () => {
        // a failed insertion is reported through `registered` and leaves nothing to delete
        const id = await inserted.then((id): string | undefined => id, () => undefined);
        if (id === undefined || withdrawn) {
          return;
        }
        withdrawn = true;
        await this.control.del(id);
      },
    };
  }

  public send(data: Data): Promise<void> {
    const wire = Encoder.encode(data);
    return new Promise<void>((resolve, reject) => {
      this.socket.send(wire, this.port, this.host, (err) => {
        if (err) {
          reject(new TransportError(`cannot send ${data.name}: ${err.message}`, { cause: err }));
        } else {
          resolve();
        }
      });
    });
  }

  public async close(): Promise<void> {
    try {
      await this.control.del(this.faceId);
    } finally {
      this.socket.close();
    }
  }
}

export namespace GqlTransport {
  export interface Options {
    /** Forwarder GraphQL server URI. */
    gqlserver: string;

    /** Forwarder UDP endpoint, "host:port". */
    forwarder: string;

    /** Management client; a GqlFwControl on gqlserver when omitted. */
    control?: FwControl;
  }
}
