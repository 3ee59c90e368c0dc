import { Request, Response, NextFunction, RequestHandler } from "express";
import type { Logger } from "../utils/logger";
import { tokensMatch } from "../utils/token";

/** Guards the operator push routes with the `x-admin-key` header. */
export function adminAuth(adminKey: string, logger: Logger = console): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const received = req.headers["x-admin-key"];

    if (typeof received !== "string" || !tokensMatch(received, adminKey)) {
      logger.warn('[AdminAuth] Unauthorized access attempt');
      res.status(401).json({ error: "Unauthorized" });
      return;
    }

    next();
  };
}
