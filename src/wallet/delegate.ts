import type { Artifact } from '../entities/Artifact';

export type PersonalizationField =
  | 'PKPassPersonalizationFieldName'
  | 'PKPassPersonalizationFieldPostalCode'
  | 'PKPassPersonalizationFieldEmailAddress'
  | 'PKPassPersonalizationFieldPhoneNumber';

/** Contents of personalization.json. */
export interface PersonalizationJson {
  requiredPersonalizationFields: PersonalizationField[];
  description: string;
  termsAndConditions?: string;
}

/**
 * Supplied by the host application. The wallet service calls it while building
 * a bundle; it never stores domain data itself.
 */
export interface WalletDelegate {
  /**
   * Directory holding the images and localizations for the bundle. It must not
   * contain manifest.json, signature, or the primary pass.json / order.json.
   */
  template(artifact: Artifact): Promise<string>;

  /** The full pass.json / order.json document for this artifact. */
  encode(artifact: Artifact): Promise<Record<string, unknown>>;

  /** Passes only. Returning null leaves personalization.json out of the bundle. */
  encodePersonalization?(artifact: Artifact): Promise<PersonalizationJson | null>;

  /**
   * Custom S/MIME signing. Write a detached DER signature of manifest.json to
   * `<root>/signature` and resolve true; resolve false to use the built-in signers.
   */
  generateSignatureFile?(root: string): Promise<boolean>;
}
