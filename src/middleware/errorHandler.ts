import { Request, Response, NextFunction, ErrorRequestHandler } from "express";
import { HttpError, PushDeliveryError } from "../utils/errors";
import type { Logger } from "../utils/logger";

// 204 and 304 carry no body.
const EMPTY_STATUSES = new Set([204, 304]);

export function errorHandler(logger: Logger = console): ErrorRequestHandler {
  return (err: unknown, req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(err);
      return;
    }

    if (err instanceof HttpError) {
      if (EMPTY_STATUSES.has(err.status)) {
        res.status(err.status).end();
      } else {
        res.status(err.status).json({ error: err.message });
      }
      return;
    }

    // body-parser rejects malformed JSON with a SyntaxError
    if (err instanceof SyntaxError) {
      res.status(400).json({ error: "Malformed request body" });
      return;
    }

    if (err instanceof PushDeliveryError) {
      logger.warn(`[Wallet] ${err.message}`);
      res.status(502).json({ error: err.message, failed: err.failures.length });
      return;
    }

    logger.error(`[Wallet] ${req.method} ${req.path} failed:`, err);
    res.status(500).json({ error: "Internal Server Error" });
  };
}
