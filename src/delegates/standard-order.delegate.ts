import type { Artifact } from '../entities/Artifact';
import type { WalletDelegate } from '../wallet/delegate';

export interface StandardOrderOptions {
  templateDirectory: string;
  webServiceURL: string;
  merchantIdentifier: string;
  organizationName: string;
  orderManagementURL?: string;
}

export class StandardOrderDelegate implements WalletDelegate {
  constructor(private readonly options: StandardOrderOptions) {}

  async template(): Promise<string> {
    return this.options.templateDirectory;
  }

  async encode(artifact: Artifact): Promise<Record<string, unknown>> {
    return {
      schemaVersion: 1,
      orderTypeIdentifier: artifact.typeIdentifier,
      orderIdentifier: artifact.id,
      authenticationToken: artifact.authenticationToken,
      webServiceURL: this.options.webServiceURL,
      createdAt: artifact.createdAt.toISOString(),
      updatedAt: artifact.updatedAt.toISOString(),
      status: 'open',
      merchant: {
        merchantIdentifier: this.options.merchantIdentifier,
        displayName: this.options.organizationName,
        url: this.options.orderManagementURL ?? this.options.webServiceURL,
      },
      orderManagementURL: this.options.orderManagementURL ?? this.options.webServiceURL,
    };
  }
}
