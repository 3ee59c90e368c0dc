import { Request, Response, NextFunction } from "express";
import type { Artifact } from "../entities/Artifact";
import type { ArtifactService } from "../services/artifact.service";
import type { BundleService } from "../services/bundle.service";
import type { ErrorLogService } from "../services/error-log.service";
import type { PushDispatcher } from "../services/push.service";
import type { RegistrationService } from "../services/registration.service";
import type { SignatureService } from "../services/signature.service";
import { ChangedArtifactsDTO, ErrorLogDTO, PersonalizationDictionaryDTO, RegistrationDTO } from "../wallet/dto";
import type { FamilyDescriptor } from "../wallet/families";
import { HttpError } from "../utils/errors";
import { isUuid } from "../utils/ids";
import type { Logger } from "../utils/logger";

export interface WalletControllerDeps {
  descriptor: FamilyDescriptor;
  typeIdentifiers: string[];
  artifacts: ArtifactService;
  registrations: RegistrationService;
  bundles: BundleService;
  push: PushDispatcher;
  signatures: SignatureService;
  errorLogs: ErrorLogService;
  logger?: Logger;
}

/** Epoch seconds, as Wallet sends them in queries and If-Modified-Since. */
const toEpochSeconds = (date: Date) => date.getTime() / 1000;
const fromEpochSeconds = (seconds: number) => new Date(Math.round(seconds * 1000));

/**
 * The Wallet web service protocol for one family (passes or orders). Handlers
 * are arrow properties so they can be handed to the router directly.
 */
export class WalletController {
  private readonly logger: Logger;

  constructor(private readonly deps: WalletControllerDeps) {
    this.logger = deps.logger ?? console;
  }

  get descriptor(): FamilyDescriptor {
    return this.deps.descriptor;
  }

  private assertKnownType(typeIdentifier: string): void {
    if (!this.deps.typeIdentifiers.includes(typeIdentifier)) {
      throw new HttpError(404, `Unknown type identifier ${typeIdentifier}`);
    }
  }

  private async requireArtifact(typeIdentifier: string, artifactId: string): Promise<Artifact> {
    this.assertKnownType(typeIdentifier);
    // find() answers null for ids that are not UUIDs
    const artifact = await this.deps.artifacts.find(typeIdentifier, artifactId);
    if (!artifact) {
      throw new HttpError(404, `No ${this.descriptor.family} ${artifactId}`);
    }
    return artifact;
  }

  // POST /v1/devices/:deviceIdentifier/registrations/:typeIdentifier/:artifactId
  registerDevice = async (req: Request, res: Response, next: NextFunction) => {
    try {
      this.logger.debug("[WalletController] Called registerDevice");
      const { deviceIdentifier, typeIdentifier, artifactId } = req.params;

      const body = RegistrationDTO.safeParse(req.body);
      if (!body.success) {
        throw new HttpError(400, "Expected a pushToken");
      }

      const artifact = await this.requireArtifact(typeIdentifier, artifactId);
      const device = await this.deps.registrations.findOrCreateDevice(deviceIdentifier, body.data.pushToken);
      const outcome = await this.deps.registrations.createIfAbsent(device, artifact);

      // Wallet expects 200 when the registration already existed
      res.sendStatus(outcome === "created" ? 201 : 200);
    } catch (error) {
      next(error);
    }
  };

  // DELETE /v1/devices/:deviceIdentifier/registrations/:typeIdentifier/:artifactId
  unregisterDevice = async (req: Request, res: Response, next: NextFunction) => {
    try {
      this.logger.debug("[WalletController] Called unregisterDevice");
      const { deviceIdentifier, typeIdentifier, artifactId } = req.params;
      this.assertKnownType(typeIdentifier);
      if (!isUuid(artifactId)) {
        throw new HttpError(404, "No such registration");
      }

      const registration = await this.deps.registrations.registrationFor(deviceIdentifier, typeIdentifier, artifactId);
      if (!registration) {
        throw new HttpError(404, "No such registration");
      }
      await this.deps.registrations.delete(registration);
      res.sendStatus(200);
    } catch (error) {
      next(error);
    }
  };

  // GET /v1/devices/:deviceIdentifier/registrations/:typeIdentifier
  changedArtifacts = async (req: Request, res: Response, next: NextFunction) => {
    try {
      this.logger.debug("[WalletController] Called changedArtifacts");
      const { deviceIdentifier, typeIdentifier } = req.params;
      this.assertKnownType(typeIdentifier);

      const rawSince = req.query[this.descriptor.updatedSinceQuery];
      const since = typeof rawSince === "string" && rawSince.trim() !== "" ? Number(rawSince) : NaN;
      const modifiedSince = Number.isFinite(since) ? fromEpochSeconds(since) : undefined;

      const registrations = await this.deps.registrations.registrationsFor(
        deviceIdentifier,
        typeIdentifier,
        modifiedSince,
      );
      if (registrations.length === 0) {
        throw new HttpError(204);
      }

      let maxDate = 0;
      const identifiers: string[] = [];
      for (const { artifact } of registrations) {
        identifiers.push(artifact.id);
        maxDate = Math.max(maxDate, artifact.updatedAt.getTime());
      }

      const body: ChangedArtifactsDTO = { lastUpdated: String(toEpochSeconds(new Date(maxDate))) };
      body[this.descriptor.identifiersKey] = identifiers;
      res.status(200).json(body);
    } catch (error) {
      next(error);
    }
  };

  // GET /v1/{passes|orders}/:typeIdentifier/:artifactId
  latestVersion = async (req: Request, res: Response, next: NextFunction) => {
    try {
      this.logger.debug("[WalletController] Called latestVersion");
      const { typeIdentifier, artifactId } = req.params;

      const header = Number(req.header("If-Modified-Since"));
      const ifModifiedSince = Number.isFinite(header) ? header : 0;

      const artifact = await this.requireArtifact(typeIdentifier, artifactId);
      if (!(ifModifiedSince < toEpochSeconds(artifact.updatedAt))) {
        throw new HttpError(304);
      }

      const bundle = await this.deps.bundles.generateBundle(artifact);
      // res.end rather than res.send: express would re-evaluate If-Modified-Since as an HTTP date
      res.status(200);
      res.set({
        "Content-Type": this.descriptor.mimeType,
        "Content-Length": String(bundle.length),
        "Content-Transfer-Encoding": "binary",
        "Last-Modified": artifact.updatedAt.toUTCString(),
      });
      res.end(bundle);
    } catch (error) {
      next(error);
    }
  };

  // POST /v1/log
  logError = async (req: Request, res: Response, next: NextFunction) => {
    try {
      this.logger.debug("[WalletController] Called logError");
      const body = ErrorLogDTO.safeParse(req.body);
      if (!body.success || body.data.logs.length === 0) {
        throw new HttpError(400, "Expected a non-empty logs array");
      }

      await this.deps.errorLogs.record(body.data.logs);
      res.sendStatus(200);
    } catch (error) {
      next(error);
    }
  };

  // POST /v1/passes/:typeIdentifier/:artifactId/personalize
  personalize = async (req: Request, res: Response, next: NextFunction) => {
    try {
      this.logger.debug("[WalletController] Called personalize");
      const { typeIdentifier, artifactId } = req.params;
      const artifact = await this.requireArtifact(typeIdentifier, artifactId);

      const body = PersonalizationDictionaryDTO.safeParse(req.body);
      if (!body.success) {
        throw new HttpError(400, "Malformed personalization dictionary");
      }
      const { personalizationToken, requiredPersonalizationInfo: info } = body.data;

      await this.deps.artifacts.personalize(artifact, {
        fullName: info.fullName,
        givenName: info.givenName,
        familyName: info.familyName,
        emailAddress: info.emailAddress,
        postalCode: info.postalCode,
        isoCountryCode: info.ISOCountryCode,
        phoneNumber: info.phoneNumber,
      });

      const signature = await this.deps.signatures.signToken(personalizationToken);
      res.status(200);
      res.set({
        "Content-Type": "application/octet-stream",
        "Content-Length": String(signature.length),
        "Content-Transfer-Encoding": "binary",
      });
      res.end(signature);
    } catch (error) {
      next(error);
    }
  };

  // POST /v1/push/:typeIdentifier/:artifactId
  pushUpdates = async (req: Request, res: Response, next: NextFunction) => {
    try {
      this.logger.debug("[WalletController] Called pushUpdates");
      const { typeIdentifier, artifactId } = req.params;
      const artifact = await this.requireArtifact(typeIdentifier, artifactId);

      await this.deps.push.sendPushNotifications(artifact);
      res.sendStatus(204);
    } catch (error) {
      next(error);
    }
  };

  // GET /v1/push/:typeIdentifier/:artifactId
  pushTokens = async (req: Request, res: Response, next: NextFunction) => {
    try {
      this.logger.debug("[WalletController] Called pushTokens");
      const { typeIdentifier, artifactId } = req.params;
      const artifact = await this.requireArtifact(typeIdentifier, artifactId);

      res.status(200).json(await this.deps.registrations.pushTokensFor(typeIdentifier, artifact.id));
    } catch (error) {
      next(error);
    }
  };
}
