import { describe, it, expect, afterEach } from "vitest";
import http from "http";
import { ConnectivityError } from "../errors";
import { sendRequest } from "../http/transport";

let server: http.Server | undefined;

function listen(handler: http.RequestListener): Promise<string> {
  return new Promise((resolve) => {
    const s = http.createServer(handler);
    server = s;
    s.listen(0, "127.0.0.1", () => {
      const address = s.address();
      const port = typeof address === "object" && address ? address.port : 0;
      resolve(`http://127.0.0.1:${port}`);
    });
  });
}

afterEach(async () => {
  const s = server;
  server = undefined;
  if (!s) return;
  s.closeAllConnections();
  await new Promise<void>((resolve) => s.close(() => resolve()));
});

describe("sendRequest", () => {
  it("returns status and body for any HTTP status", async () => {
    let received = { method: "", url: "", contentType: "", body: "" };
    const base = await listen((req, res) => {
      const chunks: Buffer[] = [];
      req.on("data", (c: Buffer) => chunks.push(c));
      req.on("end", () => {
        received = {
          method: req.method ?? "",
          url: req.url ?? "",
          contentType: req.headers["content-type"] ?? "",
          body: Buffer.concat(chunks).toString("utf-8"),
        };
        res.writeHead(409, { "Content-Type": "text/plain" });
        res.end("still referenced");
      });
    });

    const res = await sendRequest({
      method: "POST",
      url: `${base}/fhir/Encounter/e1/$expunge?x=1`,
      headers: { "Content-Type": "application/fhir+json" },
      body: "{\"resourceType\":\"Parameters\"}",
      connectTimeoutMs: 1000,
      timeoutMs: 2000,
    });

    expect(res).toEqual({ status: 409, body: "still referenced" });
    expect(received).toEqual({
      method: "POST",
      url: "/fhir/Encounter/e1/$expunge?x=1",
      contentType: "application/fhir+json",
      body: "{\"resourceType\":\"Parameters\"}",
    });
  });

  it("fails with a connectivity error when the total timeout elapses", async () => {
    const base = await listen(() => {
      // never answers
    });

    const err = await sendRequest({
      method: "GET",
      url: `${base}/slow`,
      connectTimeoutMs: 1000,
      timeoutMs: 100,
    }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ConnectivityError);
    expect(err).toMatchObject({ status: 0, url: `${base}/slow` });
    expect(err instanceof Error ? err.message : "").toContain("request timed out after 100ms");
  });

  it("fails with a connectivity error when the connection is refused", async () => {
    const base = await listen((_req, res) => res.end());
    const s = server;
    server = undefined;
    if (s) await new Promise<void>((resolve) => s.close(() => resolve()));

    await expect(
      sendRequest({ method: "GET", url: `${base}/gone`, connectTimeoutMs: 1000, timeoutMs: 2000 }),
    ).rejects.toBeInstanceOf(ConnectivityError);
  });
});
