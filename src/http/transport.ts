import axios, { type AxiosInstance } from "axios";
import { NetworkError } from "../core/errors";

export interface HttpRequest {
  url: string;
  headers: Readonly<Record<string, string>>;
  timeoutMs: number;
}

export interface HttpResponse {
  status: number;
  body: Buffer;
}

/** Resolves with any status; rejects with NetworkError only when no response arrived. */
export type HttpTransport = (request: HttpRequest) => Promise<HttpResponse>;

const TIMEOUT_CODES = new Set(["ECONNABORTED", "ETIMEDOUT"]);

export function createHttpClient(): AxiosInstance {
  return axios.create({
    responseType: "arraybuffer",
    maxRedirects: 5,
    validateStatus: () => true,
  });
}

export function createAxiosTransport(client: AxiosInstance = createHttpClient()): HttpTransport {
  return async ({ url, headers, timeoutMs }) => {
    try {
      const response = await client.get<ArrayBuffer>(url, {
        headers: { ...headers },
        timeout: timeoutMs,
      });
      return { status: response.status, body: Buffer.from(response.data) };
    } catch (error) {
      if (axios.isAxiosError(error)) {
        if (error.code && TIMEOUT_CODES.has(error.code)) {
          throw new NetworkError(`Request timed out after ${timeoutMs}ms: ${url}`, "TIMEOUT");
        }
        throw new NetworkError(`Request failed: ${error.message}`, "CONNECTION");
      }
      throw error;
    }
  };
}
