// IMPORTANT:
// Environment variables must be loaded here (process entrypoint).
// Tooling (drizzle-kit) loads dotenv separately.
// Do NOT move dotenv loading into db.ts or services.
import dotenv from "dotenv";
dotenv.config();

import express, { type Request, type Response, type NextFunction } from "express";
import { createServer } from "http";
import { getPort } from "./config";
import { closeDb } from "./db";
import { log, logError } from "./logger";
import { registerRoutes } from "./routes";

const app = express();
const httpServer = createServer(app);

app.use(express.json());
app.use(express.urlencoded({ extended: false }));

app.use((req, res, next) => {
  const start = Date.now();
  const path = req.path;
  let capturedJsonResponse: unknown = undefined;

  const originalResJson = res.json;
  res.json = function (bodyJson) {
    capturedJsonResponse = bodyJson;
    return originalResJson.call(res, bodyJson);
  };

  res.on("finish", () => {
    const duration = Date.now() - start;
    if (path.startsWith("/api")) {
      let logLine = `${req.method} ${path} ${res.statusCode} in ${duration}ms`;
      if (capturedJsonResponse !== undefined) {
        logLine += ` :: ${JSON.stringify(capturedJsonResponse)}`;
      }
      if (logLine.length > 240) {
        logLine = logLine.slice(0, 239) + "…";
      }

      log(logLine, "express");
    }
  });

  next();
});

(async () => {
  await registerRoutes(httpServer, app);

  app.use((err: unknown, _req: Request, res: Response, next: NextFunction) => {
    const status = typeof err === "object" && err !== null && "statusCode" in err && typeof err.statusCode === "number"
      ? err.statusCode
      : 500;
    const message = err instanceof Error ? err.message : "Internal Server Error";

    logError(`Internal Server Error: ${message}`, "express");

    if (res.headersSent) {
      return next(err);
    }

    return res.status(status).json({ message });
  });

  const port = getPort();
  httpServer.listen({ port, host: "0.0.0.0" }, () => {
    log(`serving on port ${port}`, "express");
  });

  const shutdown = () => {
    httpServer.close();
    closeDb().catch((err) => logError(`Failed to close database pool: ${err instanceof Error ? err.message : err}`));
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
})().catch((err) => {
  logError(`Startup failed: ${err instanceof Error ? err.message : String(err)}`, "express");
  process.exit(1);
});
