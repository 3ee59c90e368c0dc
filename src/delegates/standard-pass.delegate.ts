import type { Artifact } from '../entities/Artifact';
import type { PersonalizationJson, WalletDelegate } from '../wallet/delegate';

export interface StandardPassOptions {
  templateDirectory: string;
  webServiceURL: string;
  teamIdentifier: string;
  organizationName: string;
  description?: string;
  /** When set, every pass is personalizable and asks for these fields. */
  personalization?: PersonalizationJson;
}

/**
 * Minimal pass.json: enough for Wallet to install the pass and talk to this
 * service. Hosts with real pass content supply their own delegate.
 */
export class StandardPassDelegate implements WalletDelegate {
  constructor(private readonly options: StandardPassOptions) {}

  async template(): Promise<string> {
    return this.options.templateDirectory;
  }

  async encode(artifact: Artifact): Promise<Record<string, unknown>> {
    return {
      formatVersion: 1,
      passTypeIdentifier: artifact.typeIdentifier,
      serialNumber: artifact.id,
      authenticationToken: artifact.authenticationToken,
      webServiceURL: this.options.webServiceURL,
      teamIdentifier: this.options.teamIdentifier,
      organizationName: this.options.organizationName,
      description: this.options.description ?? this.options.organizationName,
      generic: {},
    };
  }

  async encodePersonalization(artifact: Artifact): Promise<PersonalizationJson | null> {
    // already personalized passes are not offered the signup again
    if (!this.options.personalization || artifact.userPersonalization) {
      return null;
    }
    return this.options.personalization;
  }
}
