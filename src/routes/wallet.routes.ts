import { Router, RequestHandler } from 'express';
import type { WalletController } from '../controllers/wallet.controller';

export interface WalletRoutesOptions {
  /** Artifact-scoped Authorization check. */
  auth: RequestHandler;
  /** Guards the push routes; without it they are not mounted. */
  pushRoutesMiddleware?: RequestHandler;
}

// Wallet Web Service endpoints, mounted at /api/passes or /api/orders
export function walletRoutes(controller: WalletController, options: WalletRoutesOptions): Router {
  const router = Router();
  const segment = controller.descriptor.routeSegment;
  const { auth, pushRoutesMiddleware } = options;

  // 1. Which artifacts changed for this device
  router.get('/v1/devices/:deviceIdentifier/registrations/:typeIdentifier', controller.changedArtifacts);

  // 2. Error logging
  router.post('/v1/log', controller.logError);

  // 3. Personalization (passes only)
  if (controller.descriptor.supportsPersonalization) {
    router.post(`/v1/${segment}/:typeIdentifier/:artifactId/personalize`, controller.personalize);
  }

  // 4. Register / unregister a device
  router.post('/v1/devices/:deviceIdentifier/registrations/:typeIdentifier/:artifactId', auth, controller.registerDevice);
  router.delete('/v1/devices/:deviceIdentifier/registrations/:typeIdentifier/:artifactId', auth, controller.unregisterDevice);

  // 5. Latest bundle
  router.get(`/v1/${segment}/:typeIdentifier/:artifactId`, auth, controller.latestVersion);

  // 6. Operator push routes
  if (pushRoutesMiddleware) {
    router.post('/v1/push/:typeIdentifier/:artifactId', pushRoutesMiddleware, controller.pushUpdates);
    router.get('/v1/push/:typeIdentifier/:artifactId', pushRoutesMiddleware, controller.pushTokens);
  }

  return router;
}
