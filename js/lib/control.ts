import type { SocketFaceLocator } from "../types/iface.js";
import { gql, GqlClient } from "./gqlclient.js";

/** Forwarder management operations used by a traffic run. */
export interface FwControl {
  /** Create a face; resolves to its ID. */
  createFace(locator: SocketFaceLocator): Promise<string>;

  /** Insert a FIB entry; resolves to its ID. */
  insertFibEntry(name: string, nexthops: readonly string[]): Promise<string>;

  /** Delete a face or FIB entry. */
  del(id: string): Promise<boolean>;
}

/** FwControl over the forwarder's GraphQL API. */
export class GqlFwControl implements FwControl {
  constructor(gqlserver: string | URL) {
    this.c = new GqlClient(gqlserver);
  }

  protected readonly c: GqlClient;

  public async createFace(locator: SocketFaceLocator): Promise<string> {
    const { createFace: { id } } = await this.c.request<{ createFace: { id: string } }>(gql`
      mutation createFace($locator: JSON!) {
        createFace(locator: $locator) {
          id
        }
      }
    `, { locator });
    return id;
  }

  public async insertFibEntry(name: string, nexthops: readonly string[]): Promise<string> {
    const { insertFibEntry: { id } } = await this.c.request<{ insertFibEntry: { id: string } }>(gql`
      mutation insertFibEntry($name: Name!, $nexthops: [ID!]!) {
        insertFibEntry(name: $name, nexthops: $nexthops) {
          id
        }
      }
    `, { name, nexthops });
    return id;
  }

  public del(id: string): Promise<boolean> {
    return this.c.del(id);
  }
}
