import { RequestError, type Octokit } from "octokit";
import type { z } from "zod";
import { GraphQLEnvelopeSchema } from "@profile-readme/shared";
import { ApiError, TransportError } from "./errors.js";

export type GraphQLVariables = Record<string, string | number | boolean | null>;

export interface GraphQLRequest {
  query: string;
  variables: GraphQLVariables;
}

export interface TransportResponse {
  status: number;
  body: unknown;
}

/** Sends one GraphQL POST and reports the raw status and decoded body. */
export type GraphQLTransport = (request: GraphQLRequest) => Promise<TransportResponse>;

/** Render a response body for an error message. */
function describeBody(body: unknown): string {
  if (typeof body === "string") return body;
  return JSON.stringify(body) ?? String(body);
}

/**
 * Transport backed by Octokit's request layer. HTTP failures surface as
 * RequestError; they are folded back into a status/body pair so the client
 * decides what counts as an error. A RequestError without a response means
 * fetch itself failed, and Octokit's placeholder status 500 is not reported.
 */
export function octokitTransport(octokit: Octokit): GraphQLTransport {
  return async ({ query, variables }) => {
    try {
      const response = await octokit.request("POST /graphql", { query, variables });
      return { status: response.status, body: response.data };
    } catch (err) {
      if (err instanceof RequestError) {
        if (err.response === undefined) {
          throw new TransportError(null, err.message);
        }
        return { status: err.status, body: err.response.data };
      }
      throw err;
    }
  };
}

/** Minimal GraphQL client: one request per call, no retries, no caching. */
export class GraphQLClient {
  private readonly transport: GraphQLTransport;

  constructor(transport: GraphQLTransport) {
    this.transport = transport;
  }

  /**
   * Run a query and validate its `data` against `schema`.
   * Throws TransportError on a non-2xx status and ApiError when the
   * response carries `errors` or does not match the expected shape.
   */
  async execute<S extends z.ZodTypeAny>(
    query: string,
    variables: GraphQLVariables,
    schema: S
  ): Promise<z.infer<S>> {
    const response = await this.transport({ query, variables });

    if (response.status < 200 || response.status >= 300) {
      throw new TransportError(response.status, describeBody(response.body));
    }

    const envelope = GraphQLEnvelopeSchema.safeParse(response.body);
    if (!envelope.success) {
      throw new ApiError(
        `GraphQL API returned a malformed response: ${describeBody(response.body)}`
      );
    }

    const { data, errors } = envelope.data;
    if (errors) {
      throw new ApiError(`GraphQL API returned errors: ${JSON.stringify(errors)}`, errors);
    }
    if (!data) {
      throw new ApiError("GraphQL API returned no data");
    }

    const parsed = schema.safeParse(data);
    if (!parsed.success) {
      throw new ApiError(
        `GraphQL response did not match the expected shape: ${parsed.error.message}`
      );
    }
    return parsed.data;
  }
}
