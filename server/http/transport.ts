import http from "http";
import https from "https";
import { ConnectivityError } from "../errors";

export type HttpMethod = "GET" | "POST" | "PUT" | "DELETE";

export interface TransportRequest {
  method: HttpMethod;
  url: string;
  headers?: Record<string, string>;
  body?: string | Buffer;
  connectTimeoutMs: number;
  timeoutMs: number;
}

export interface TransportResponse {
  status: number;
  body: string;
}

export function isSuccessStatus(status: number): boolean {
  return status >= 200 && status < 300;
}

/**
 * Issue one HTTP request. Resolves with any HTTP status; rejects with
 * ConnectivityError when the connection is refused or either timeout fires.
 */
export function sendRequest(request: TransportRequest): Promise<TransportResponse> {
  return new Promise((resolve, reject) => {
    let url: URL;
    try {
      url = new URL(request.url);
    } catch {
      reject(new ConnectivityError(request.url, "invalid URL"));
      return;
    }
    const isHttps = url.protocol === "https:";
    const transport = isHttps ? https : http;

    const headers: Record<string, string | number> = { ...request.headers };
    if (request.body !== undefined) {
      headers["Content-Length"] = Buffer.byteLength(request.body);
    }

    const options: http.RequestOptions = {
      hostname: url.hostname,
      port: url.port || (isHttps ? 443 : 80),
      path: `${url.pathname}${url.search}`,
      method: request.method,
      headers,
    };

    let settled = false;
    const fail = (detail: string) => {
      if (settled) return;
      settled = true;
      clearTimeout(connectTimer);
      clearTimeout(totalTimer);
      req.destroy();
      reject(new ConnectivityError(request.url, detail));
    };

    const req = transport.request(options, (res) => {
      const chunks: Buffer[] = [];
      res.on("data", (chunk: Buffer) => chunks.push(chunk));
      res.on("end", () => {
        if (settled) return;
        settled = true;
        clearTimeout(connectTimer);
        clearTimeout(totalTimer);
        resolve({
          status: res.statusCode ?? 0,
          body: Buffer.concat(chunks).toString("utf-8"),
        });
      });
      res.on("error", (err) => fail(err.message));
    });

    const connectTimer = setTimeout(
      () => fail(`connect timed out after ${request.connectTimeoutMs}ms`),
      request.connectTimeoutMs,
    );
    const totalTimer = setTimeout(
      () => fail(`request timed out after ${request.timeoutMs}ms`),
      request.timeoutMs,
    );

    req.on("socket", (socket) => {
      if (!socket.connecting) {
        clearTimeout(connectTimer);
        return;
      }
      socket.once("connect", () => clearTimeout(connectTimer));
    });

    req.on("error", (err) => fail(err.message));

    if (request.body !== undefined) {
      req.write(request.body);
    }
    req.end();
  });
}
