import crypto from "crypto";
import { DataSource, Repository } from "typeorm";
import { Artifact } from "../entities/Artifact";
import { UserPersonalization } from "../entities/UserPersonalization";
import type { ArtifactFamily } from "../wallet/families";
import { isUuid } from "../utils/ids";
import type { PushDispatcher } from "./push.service";

export type PersonalizationInfo = Partial<
  Pick<
    UserPersonalization,
    "fullName" | "givenName" | "familyName" | "emailAddress" | "postalCode" | "isoCountryCode" | "phoneNumber"
  >
>;

/**
 * Artifact rows plus the hooks the host calls after writing its own domain
 * record: `created` once, `updated` on every change.
 */
export class ArtifactService {
  private readonly artifacts: Repository<Artifact>;

  constructor(
    private readonly dataSource: DataSource,
    private readonly family: ArtifactFamily,
    private readonly push: PushDispatcher,
  ) {
    this.artifacts = dataSource.getRepository(Artifact);
  }

  static generateAuthenticationToken(): string {
    return crypto.randomBytes(12).toString("base64");
  }

  async created(typeIdentifier: string): Promise<Artifact> {
    return this.artifacts.save(
      this.artifacts.create({
        family: this.family,
        typeIdentifier,
        authenticationToken: ArtifactService.generateAuthenticationToken(),
        updatedAt: new Date(),
      }),
    );
  }

  /** Marks the artifact as changed and tells every registered device to fetch it again. */
  async updated(artifact: Artifact): Promise<Artifact> {
    artifact.updatedAt = new Date();
    const saved = await this.artifacts.save(artifact);
    await this.push.sendPushNotifications(saved);
    return saved;
  }

  async find(typeIdentifier: string, id: string): Promise<Artifact | null> {
    if (!isUuid(id)) return null;
    return this.artifacts.findOne({
      where: { id, typeIdentifier, family: this.family },
      relations: ["userPersonalization"],
    });
  }

  async findById(id: string): Promise<Artifact | null> {
    if (!isUuid(id)) return null;
    return this.artifacts.findOne({ where: { id, family: this.family }, relations: ["userPersonalization"] });
  }

  /** Stores what Wallet collected for a personalizable pass and links it to the pass. */
  async personalize(artifact: Artifact, info: PersonalizationInfo): Promise<Artifact> {
    return this.dataSource.transaction(async (manager) => {
      const personalization = await manager.save(
        manager.create(UserPersonalization, {
          fullName: info.fullName ?? null,
          givenName: info.givenName ?? null,
          familyName: info.familyName ?? null,
          emailAddress: info.emailAddress ?? null,
          postalCode: info.postalCode ?? null,
          isoCountryCode: info.isoCountryCode ?? null,
          phoneNumber: info.phoneNumber ?? null,
        }),
      );
      artifact.userPersonalization = personalization;
      artifact.updatedAt = new Date();
      return manager.save(artifact);
    });
  }
}
