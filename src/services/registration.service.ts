import { DataSource, QueryFailedError, Repository } from "typeorm";
import { Artifact } from "../entities/Artifact";
import { Device } from "../entities/Device";
import { Registration } from "../entities/Registration";
import type { ArtifactFamily } from "../wallet/families";

export type RegistrationOutcome = "created" | "exists";

/**
 * Device ↔ artifact bindings for one family. Every query joins the device and
 * the artifact and loads both onto the returned registrations.
 */
export class RegistrationService {
  private readonly registrations: Repository<Registration>;
  private readonly devices: Repository<Device>;

  constructor(private readonly dataSource: DataSource, private readonly family: ArtifactFamily) {
    this.registrations = dataSource.getRepository(Registration);
    this.devices = dataSource.getRepository(Device);
  }

  private query() {
    return this.registrations
      .createQueryBuilder("registration")
      .innerJoinAndSelect("registration.device", "device")
      .innerJoinAndSelect("registration.artifact", "artifact")
      .where("artifact.family = :family", { family: this.family });
  }

  /** Registrations of a device for a type, optionally only artifacts updated after `modifiedSince`. */
  async registrationsFor(
    deviceLibraryIdentifier: string,
    typeIdentifier: string,
    modifiedSince?: Date,
  ): Promise<Registration[]> {
    const query = this.query()
      .andWhere("device.libraryIdentifier = :deviceLibraryIdentifier", { deviceLibraryIdentifier })
      .andWhere("artifact.typeIdentifier = :typeIdentifier", { typeIdentifier });
    if (modifiedSince) {
      query.andWhere("artifact.updatedAt > :modifiedSince", { modifiedSince: this.toColumnValue(modifiedSince) });
    }
    return query.getMany();
  }

  // Drivers store datetimes differently (sqlite keeps strings), so convert the
  // bound value the same way the column itself is written.
  private toColumnValue(date: Date): unknown {
    const column = this.dataSource.getMetadata(Artifact).findColumnWithPropertyName("updatedAt");
    return column ? this.dataSource.driver.preparePersistentValue(date, column) : date;
  }

  async registrationFor(
    deviceLibraryIdentifier: string,
    typeIdentifier: string,
    artifactId: string,
  ): Promise<Registration | null> {
    return this.query()
      .andWhere("device.libraryIdentifier = :deviceLibraryIdentifier", { deviceLibraryIdentifier })
      .andWhere("artifact.typeIdentifier = :typeIdentifier", { typeIdentifier })
      .andWhere("artifact.id = :artifactId", { artifactId })
      .getOne();
  }

  async registrationsForArtifact(typeIdentifier: string, artifactId: string): Promise<Registration[]> {
    return this.query()
      .andWhere("artifact.typeIdentifier = :typeIdentifier", { typeIdentifier })
      .andWhere("artifact.id = :artifactId", { artifactId })
      .getMany();
  }

  async pushTokensFor(typeIdentifier: string, artifactId: string): Promise<string[]> {
    const registrations = await this.registrationsForArtifact(typeIdentifier, artifactId);
    return registrations.map((r) => r.device.pushToken);
  }

  /** A device row is reused only when both the library identifier and the push token match. */
  async findOrCreateDevice(libraryIdentifier: string, pushToken: string): Promise<Device> {
    const existing = await this.devices.findOne({
      where: { family: this.family, libraryIdentifier, pushToken },
    });
    if (existing) return existing;

    return this.devices.save(this.devices.create({ family: this.family, libraryIdentifier, pushToken }));
  }

  /**
   * Query-then-insert. Two concurrent calls for the same pair can both pass the
   * check; the unique (device, artifact) constraint rejects the second insert,
   * which is then answered as "exists" like any other repeat.
   */
  async createIfAbsent(device: Device, artifact: Artifact): Promise<RegistrationOutcome> {
    if (await this.findPair(device, artifact)) {
      return "exists";
    }

    try {
      await this.registrations.save(this.registrations.create({ device, artifact }));
    } catch (error) {
      if (error instanceof QueryFailedError && (await this.findPair(device, artifact))) {
        return "exists";
      }
      throw error;
    }
    return "created";
  }

  private findPair(device: Device, artifact: Artifact): Promise<Registration | null> {
    return this.query()
      .andWhere("artifact.typeIdentifier = :typeIdentifier", { typeIdentifier: artifact.typeIdentifier })
      .andWhere("artifact.id = :artifactId", { artifactId: artifact.id })
      .andWhere("device.id = :deviceId", { deviceId: device.id })
      .getOne();
  }

  async delete(registration: Registration): Promise<void> {
    await this.registrations.delete({ id: registration.id });
  }

  /** Drops a device whose push token APNs rejected, along with all of its registrations. */
  async deleteDeviceAndRegistration(device: Device, registration: Registration): Promise<void> {
    await this.dataSource.transaction(async (manager) => {
      await manager.delete(Registration, { id: registration.id });
      await manager
        .createQueryBuilder()
        .delete()
        .from(Registration)
        .where("deviceId = :deviceId", { deviceId: device.id })
        .execute();
      await manager.delete(Device, { id: device.id });
    });
  }
}
