export type ArtifactFamily = 'pass' | 'order';

export type ManifestDigest = 'sha1' | 'sha256';

/**
 * Everything that differs between passes and orders. The pipeline and the
 * protocol handler are written once and read these values.
 */
export interface FamilyDescriptor {
  family: ArtifactFamily;
  /** Wallet requires SHA-1 manifests for passes and SHA-256 for orders. */
  digest: ManifestDigest;
  primaryJson: 'pass.json' | 'order.json';
  mimeType: string;
  /** Path segment under /api, e.g. /api/passes/v1. */
  routeSegment: 'passes' | 'orders';
  /** Query parameter Wallet sends when polling for changes. */
  updatedSinceQuery: 'passesUpdatedSince' | 'ordersModifiedSince';
  /** Key of the identifier list in the change-polling response. */
  identifiersKey: 'serialNumbers' | 'orderIdentifiers';
  authorizationScheme: 'ApplePass' | 'AppleOrder';
  bundleExtension: 'pkpass' | 'order';
  supportsPersonalization: boolean;
}

export const PASS_FAMILY: FamilyDescriptor = {
  family: 'pass',
  digest: 'sha1',
  primaryJson: 'pass.json',
  mimeType: 'application/vnd.apple.pkpass',
  routeSegment: 'passes',
  updatedSinceQuery: 'passesUpdatedSince',
  identifiersKey: 'serialNumbers',
  authorizationScheme: 'ApplePass',
  bundleExtension: 'pkpass',
  supportsPersonalization: true,
};

export const ORDER_FAMILY: FamilyDescriptor = {
  family: 'order',
  digest: 'sha256',
  primaryJson: 'order.json',
  mimeType: 'application/vnd.apple.order',
  routeSegment: 'orders',
  updatedSinceQuery: 'ordersModifiedSince',
  identifiersKey: 'orderIdentifiers',
  authorizationScheme: 'AppleOrder',
  bundleExtension: 'order',
  supportsPersonalization: false,
};

export const MANIFEST_FILE = 'manifest.json';
export const SIGNATURE_FILE = 'signature';
export const PERSONALIZATION_FILE = 'personalization.json';
