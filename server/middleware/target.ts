import type { Request, Response, NextFunction } from "express";
import { resolveTargetContext } from "../config";
import { ConfigurationError } from "../errors";
import type { TargetContext } from "../target";

declare global {
  namespace Express {
    interface Request {
      targetContext: TargetContext;
    }
  }
}

/**
 * Resolves the x-target-host header (or SERVER_HOST) into the connection
 * parameters every store call of the request is scoped by.
 */
export function targetResolution(req: Request, res: Response, next: NextFunction) {
  const header = req.headers["x-target-host"];
  const host = typeof header === "string" && header.trim() ? header : undefined;
  try {
    req.targetContext = resolveTargetContext({ serverHost: host });
    next();
  } catch (err) {
    if (err instanceof ConfigurationError) {
      return res.status(err.statusCode).json({ message: err.message, code: err.code });
    }
    next(err);
  }
}
