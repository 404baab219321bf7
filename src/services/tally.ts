import axios, { AxiosInstance } from "axios";
import { errorMessage } from "./ingestion/utils";

export const DEFAULT_TALLY_API_URL = "https://api.tally.xyz/query";

export interface TallyHttpOptions {
  apiKey: string;
  baseURL?: string;
  timeout?: number;
}

export interface GraphQLRequestBody {
  query: string;
  variables: Record<string, unknown>;
}

export interface GraphQLHttpResponse {
  status: number;
  body: unknown;
}

/**
 * Sends one GraphQL POST. Resolves for every HTTP status; rejects with a
 * TransportError only when no response was received.
 */
export type GraphQLTransport = (body: GraphQLRequestBody) => Promise<GraphQLHttpResponse>;

export type TransportFailureKind = "timeout" | "connection";

export class TransportError extends Error {
  constructor(
    readonly kind: TransportFailureKind,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "TransportError";
  }
}

const TIMEOUT_CODES = new Set(["ECONNABORTED", "ETIMEDOUT", "ERR_CANCELED"]);

export const createTallyHttpClient = (options: TallyHttpOptions): AxiosInstance => {
  const headers: Record<string, string> = {
    Accept: "application/json",
    "Content-Type": "application/json",
    "Api-Key": options.apiKey,
    "User-Agent": "dao-voting-matrix",
  };

  const baseURL = options.baseURL || DEFAULT_TALLY_API_URL;
  const timeout = options.timeout ?? 30000;

  // Status codes are classified by the client, not by axios
  return axios.create({ baseURL, headers, timeout, validateStatus: () => true });
};

function toTransportError(error: unknown): TransportError {
  if (axios.isAxiosError(error)) {
    const kind: TransportFailureKind =
      error.code && TIMEOUT_CODES.has(error.code) ? "timeout" : "connection";
    return new TransportError(kind, error.message, { cause: error });
  }
  return new TransportError("connection", errorMessage(error), { cause: error });
}

export const createAxiosTransport =
  (http: AxiosInstance): GraphQLTransport =>
  async (body) => {
    try {
      const response = await http.post<unknown>("", body);
      return { status: response.status, body: response.data };
    } catch (error) {
      throw toTransportError(error);
    }
  };
