import { request as httpRequest } from "node:http";
import { request as httpsRequest } from "node:https";
import { URL } from "node:url";

export interface HttpRequestOptions {
  readonly headers?: Record<string, string | number | undefined>;
  readonly timeoutMs?: number;
}

export interface HttpResponse {
  readonly statusCode: number;
  readonly body: string;
  readonly headers: Record<string, string | string[] | undefined>;
}

export interface HttpClient {
  get(url: string, options?: HttpRequestOptions): Promise<HttpResponse>;
}

export interface HttpClientOptions {
  /** Applied when a request does not set its own timeout. */
  readonly defaultTimeoutMs?: number;
  readonly userAgent?: string;
}

export class HttpTimeoutError extends Error {
  public constructor(url: string, timeoutMs: number) {
    super(`GET ${url} timed out after ${timeoutMs}ms`);
    this.name = "HttpTimeoutError";
  }
}

const DEFAULT_USER_AGENT = "backtest-lab/0.1";

/**
 * Thin GET-only client over node:http(s) so sources can be exercised with a fake in tests.
 * Rejects on socket errors and timeouts; non-2xx statuses resolve normally.
 */
export const createHttpClient = (clientOptions: HttpClientOptions = {}): HttpClient => {
  const userAgent = clientOptions.userAgent ?? DEFAULT_USER_AGENT;

  return {
    get: (url, options = {}) => {
      const target = new URL(url);
      const requestFactory = target.protocol === "http:" ? httpRequest : httpsRequest;
      const timeoutMs = options.timeoutMs ?? clientOptions.defaultTimeoutMs;

      return new Promise<HttpResponse>((resolve, reject) => {
        const req = requestFactory(
          {
            method: "GET",
            hostname: target.hostname,
            path: `${target.pathname}${target.search}`,
            port: target.port || undefined,
            headers: { "User-Agent": userAgent, ...options.headers },
          },
          (res) => {
            const chunks: Buffer[] = [];
            res.on("data", (chunk: Buffer) => {
              chunks.push(chunk);
            });
            res.on("error", (error) => reject(error));
            res.on("end", () => {
              resolve({
                statusCode: res.statusCode ?? 0,
                body: Buffer.concat(chunks).toString("utf-8"),
                headers: res.headers,
              });
            });
          },
        );

        req.on("error", (error) => reject(error));

        if (timeoutMs !== undefined && timeoutMs > 0) {
          req.setTimeout(timeoutMs, () => {
            req.destroy(new HttpTimeoutError(url, timeoutMs));
          });
        }

        req.end();
      });
    },
  };
};
