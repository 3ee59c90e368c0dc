import type { Router, RequestHandler } from 'express';
import type { DataSource } from 'typeorm';
import type { ApnsEnvironment } from '../config';
import { WalletController } from '../controllers/wallet.controller';
import type { Artifact } from '../entities/Artifact';
import { walletAuth } from '../middleware/walletAuth';
import { walletRoutes } from '../routes/wallet.routes';
import type { WalletDelegate } from '../wallet/delegate';
import type { FamilyDescriptor } from '../wallet/families';
import type { Logger } from '../utils/logger';
import { ApnsClient, PushTransport } from './apns.service';
import { ArtifactService } from './artifact.service';
import { BundleService } from './bundle.service';
import { ErrorLogService } from './error-log.service';
import { PushDispatcher } from './push.service';
import { RegistrationService } from './registration.service';
import { SignatureService, Signer, SigningFiles } from './signature.service';

export interface WalletServiceOptions {
  descriptor: FamilyDescriptor;
  dataSource: DataSource;
  delegate: WalletDelegate;
  /** Pass / order type identifiers this service answers for; others are 404. */
  typeIdentifiers: string[];
  signing: SigningFiles;
  /** Defaults to an APNs client authenticated with the signing certificate. */
  pushTransport?: PushTransport;
  apnsEnvironment?: ApnsEnvironment;
  /** Defaults to the CMS or openssl signer, chosen by whether the key has a password. */
  signer?: Signer;
  /** Guards the push routes; they are only mounted when this is given. */
  pushRoutesMiddleware?: RequestHandler;
  logger?: Logger;
}

/**
 * Everything needed to serve one artifact family. Construction fails when the
 * signing key or certificates are missing.
 */
export class WalletService {
  readonly descriptor: FamilyDescriptor;
  readonly registrations: RegistrationService;
  /** Lifecycle hooks for the host's storage layer. */
  readonly hooks: ArtifactService;
  readonly bundles: BundleService;
  readonly push: PushDispatcher;
  readonly signatures: SignatureService;
  readonly errorLogs: ErrorLogService;
  readonly controller: WalletController;

  constructor(private readonly options: WalletServiceOptions) {
    SignatureService.assertSigningFiles(options.signing);

    const { descriptor, dataSource, delegate, logger } = options;
    this.descriptor = descriptor;

    const transport =
      options.pushTransport ??
      ApnsClient.fromSigningFiles(options.signing, options.apnsEnvironment ?? 'production', logger);

    this.registrations = new RegistrationService(dataSource, descriptor.family);
    this.push = new PushDispatcher(this.registrations, transport, logger);
    this.hooks = new ArtifactService(dataSource, descriptor.family, this.push);
    this.signatures = new SignatureService(options.signing, delegate, options.signer);
    this.bundles = new BundleService(descriptor, delegate, this.signatures);
    this.errorLogs = new ErrorLogService(dataSource, descriptor.family);

    this.controller = new WalletController({
      descriptor,
      typeIdentifiers: options.typeIdentifiers,
      artifacts: this.hooks,
      registrations: this.registrations,
      bundles: this.bundles,
      push: this.push,
      signatures: this.signatures,
      errorLogs: this.errorLogs,
      logger,
    });
  }

  generateBundle(artifact: Artifact): Promise<Buffer> {
    return this.bundles.generateBundle(artifact);
  }

  /** Passes only: up to 10 passes in one .pkpasses archive. */
  async generateBundleOfPasses(artifacts: Artifact[]): Promise<Buffer> {
    if (this.descriptor.family !== 'pass') {
      throw new Error('Bundles of several artifacts are only supported for passes');
    }
    return this.bundles.generateBundleOfPasses(artifacts);
  }

  sendPushNotifications(artifact: Artifact): Promise<void> {
    return this.push.sendPushNotifications(artifact);
  }

  sendPushNotificationsForId(typeIdentifier: string, artifactId: string): Promise<void> {
    return this.push.sendPushNotificationsForId(typeIdentifier, artifactId);
  }

  router(): Router {
    return walletRoutes(this.controller, {
      auth: walletAuth(this.descriptor.authorizationScheme, this.hooks, this.options.logger),
      pushRoutesMiddleware: this.options.pushRoutesMiddleware,
    });
  }
}
