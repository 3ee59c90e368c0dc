/**
 * Protocol outcome carried up to the error middleware. 204 and 304 are
 * success-path signals and are sent without a body.
 */
export class HttpError extends Error {
  constructor(public readonly status: number, message?: string) {
    super(message ?? `HTTP ${status}`);
    this.name = 'HttpError';
  }
}

export type WalletErrorCode =
  | 'TEMPLATE_NOT_DIRECTORY'
  | 'INVALID_BUNDLE_COUNT'
  | 'OPENSSL_BINARY_MISSING'
  | 'PEM_PRIVATE_KEY_MISSING'
  | 'PEM_CERTIFICATE_MISSING'
  | 'WWDR_CERTIFICATE_MISSING'
  | 'SIGNING_FAILED'
  | 'PUSH_DELIVERY_FAILED';

export class WalletError extends Error {
  constructor(message: string, public readonly code: WalletErrorCode) {
    super(message);
    this.name = 'WalletError';
  }
}

export class TemplateNotDirectoryError extends WalletError {
  constructor(templatePath: string) {
    super(`Template path is not a directory: ${templatePath}`, 'TEMPLATE_NOT_DIRECTORY');
    this.name = 'TemplateNotDirectoryError';
  }
}

export class InvalidBundleCountError extends WalletError {
  constructor(count: number) {
    super(`A bundle must contain between 2 and 10 passes, got ${count}`, 'INVALID_BUNDLE_COUNT');
    this.name = 'InvalidBundleCountError';
  }
}

export class OpensslBinaryMissingError extends WalletError {
  constructor(binaryPath: string) {
    super(`OpenSSL binary not found at ${binaryPath}`, 'OPENSSL_BINARY_MISSING');
    this.name = 'OpensslBinaryMissingError';
  }
}

export class PemPrivateKeyMissingError extends WalletError {
  constructor(keyPath: string) {
    super(`PEM private key not found at ${keyPath}`, 'PEM_PRIVATE_KEY_MISSING');
    this.name = 'PemPrivateKeyMissingError';
  }
}

export class PemCertificateMissingError extends WalletError {
  constructor(certPath: string) {
    super(`PEM certificate not found at ${certPath}`, 'PEM_CERTIFICATE_MISSING');
    this.name = 'PemCertificateMissingError';
  }
}

export class WwdrCertificateMissingError extends WalletError {
  constructor(certPath: string) {
    super(`WWDR certificate not found at ${certPath}`, 'WWDR_CERTIFICATE_MISSING');
    this.name = 'WwdrCertificateMissingError';
  }
}

export class SigningError extends WalletError {
  constructor(message: string, public readonly cause?: unknown) {
    super(message, 'SIGNING_FAILED');
    this.name = 'SigningError';
  }
}

export interface PushFailure {
  deviceToken: string;
  error: unknown;
}

/** Raised once every registration has been attempted, listing the pushes that failed. */
export class PushDeliveryError extends WalletError {
  constructor(public readonly failures: PushFailure[]) {
    super(`${failures.length} push notification(s) failed`, 'PUSH_DELIVERY_FAILED');
    this.name = 'PushDeliveryError';
  }
}

/** Failure reported by APNs for a single notification. */
export class ApnsError extends Error {
  constructor(public readonly reason: string, public readonly status?: number) {
    super(`APNs rejected notification: ${reason}${status ? ` (${status})` : ''}`);
    this.name = 'ApnsError';
  }
}
