/**
 * Socket face locator, as accepted by the forwarder's createFace mutation.
 */
export interface SocketFaceLocator {
  scheme: "udp" | "tcp" | "unix";

  /** Forwarder side endpoint. */
  local?: string;

  /** Application side endpoint. */
  remote: string;

  /**
   * @minimum 960
   * @maximum 65000
   */
  mtu?: number;
}
