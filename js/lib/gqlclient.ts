import { gql, GraphQLClient } from "graphql-request";

export { gql };

/** GraphQL client of the forwarder management API. */
export class GqlClient {
  /**
   * Constructor.
   * @param uri forwarder GraphQL server URI.
   */
  constructor(uri: string | URL) {
    this.uri = new URL(uri).toString();
    this.client = new GraphQLClient(this.uri);
  }

  public readonly uri: string;
  private readonly client: GraphQLClient;

  /** Run a query or mutation. */
  public request<T>(query: string, vars: GqlClient.Variables = {}): Promise<T> {
    return this.client.request<T>(query, vars);
  }

  /** Run the delete mutation. */
  public async del(id: string): Promise<boolean> {
    const { delete: deleted } = await this.request<{ delete: boolean }>(gql`
      mutation delete($id: ID!) {
        delete(id: $id)
      }
    `, { id });
    return deleted;
  }
}

export namespace GqlClient {
  export type Variables = Record<string, unknown>;
}
