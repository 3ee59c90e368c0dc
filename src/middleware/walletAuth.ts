import { Request, Response, NextFunction, RequestHandler } from "express";
import type { ArtifactService } from "../services/artifact.service";
import type { Logger } from "../utils/logger";
import { tokenFromAuthorization, tokensMatch } from "../utils/token";

/**
 * Wallet authenticates per artifact with `Authorization: ApplePass <token>`
 * (or `AppleOrder <token>`), the token embedded in the bundle. Unknown artifacts
 * fall through so the handler can answer 404.
 */
export function walletAuth(
  scheme: string,
  artifacts: ArtifactService,
  logger: Logger = console,
): RequestHandler {
  return async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { typeIdentifier, artifactId } = req.params;
      const artifact = await artifacts.find(typeIdentifier, artifactId);
      if (!artifact) {
        next();
        return;
      }

      const token = tokenFromAuthorization(req.headers.authorization, scheme);
      if (!token || !tokensMatch(token, artifact.authenticationToken)) {
        logger.warn(`[WalletAuth] Rejected ${req.method} ${req.path}: bad ${scheme} token`);
        res.status(401).json({ error: "Unauthorized" });
        return;
      }

      next();
    } catch (error) {
      next(error);
    }
  };
}
