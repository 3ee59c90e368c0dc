import type { Artifact } from '../entities/Artifact';
import { ApnsError, PushDeliveryError, PushFailure } from '../utils/errors';
import type { Logger } from '../utils/logger';
import type { PushTransport } from './apns.service';
import type { RegistrationService } from './registration.service';

/** APNs reasons after which the token will never work again. */
export const INVALID_TOKEN_REASONS: ReadonlySet<string> = new Set(['BadDeviceToken', 'Unregistered']);

export class PushDispatcher {
  constructor(
    private readonly registrations: RegistrationService,
    private readonly transport: PushTransport,
    private readonly logger: Logger = console,
  ) {}

  async sendPushNotifications(artifact: Artifact): Promise<void> {
    await this.sendPushNotificationsForId(artifact.typeIdentifier, artifact.id);
  }

  /**
   * One background push per registered device, sent in order. A rejected token
   * removes its device; any other failure is collected and reported once all
   * devices have been tried.
   */
  async sendPushNotificationsForId(typeIdentifier: string, artifactId: string): Promise<void> {
    const registrations = await this.registrations.registrationsForArtifact(typeIdentifier, artifactId);
    const failures: PushFailure[] = [];

    for (const registration of registrations) {
      const deviceToken = registration.device.pushToken;
      try {
        await this.transport.sendBackgroundNotification({ topic: typeIdentifier, deviceToken });
      } catch (e) {
        if (e instanceof ApnsError && INVALID_TOKEN_REASONS.has(e.reason)) {
          this.logger.info(`[Push] ${e.reason} for device ${registration.device.id}, removing it`);
          await this.registrations.deleteDeviceAndRegistration(registration.device, registration);
          continue;
        }
        this.logger.warn(`[Push] Delivery to device ${registration.device.id} failed:`, e);
        failures.push({ deviceToken, error: e });
      }
    }

    if (failures.length > 0) {
      throw new PushDeliveryError(failures);
    }
  }
}
