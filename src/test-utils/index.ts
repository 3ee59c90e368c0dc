import fs from 'fs';
import os from 'os';
import path from 'path';
import * as forge from 'node-forge';
import { DataSource } from 'typeorm';
import { walletEntities } from '../entities';
import type { BackgroundNotification, PushTransport } from '../services/apns.service';
import type { SigningFiles } from '../services/signature.service';
import type { Logger } from '../utils/logger';

const noop = () => undefined;
export const silentLogger: Logger = { debug: noop, info: noop, warn: noop, error: noop };

export const TEMPLATES = path.resolve(__dirname, '../../templates');

/** In-process database with the wallet schema. */
export async function createTestDataSource(): Promise<DataSource> {
  const dataSource = new DataSource({
    type: 'sqljs',
    entities: walletEntities,
    synchronize: true,
    logging: false,
  });
  return dataSource.initialize();
}

export function makeTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'wallet-test-'));
}

function createCertificate(
  commonName: string,
  keys: forge.pki.rsa.KeyPair,
  issuer: { commonName: string; privateKey: forge.pki.rsa.PrivateKey },
  serialNumber: string,
): forge.pki.Certificate {
  const certificate = forge.pki.createCertificate();
  certificate.publicKey = keys.publicKey;
  certificate.serialNumber = serialNumber;
  certificate.validity.notBefore = new Date(Date.now() - 60_000);
  certificate.validity.notAfter = new Date(Date.now() + 365 * 24 * 3600_000);
  certificate.setSubject([{ name: 'commonName', value: commonName }]);
  certificate.setIssuer([{ name: 'commonName', value: issuer.commonName }]);
  certificate.sign(issuer.privateKey, forge.md.sha256.create());
  return certificate;
}

export interface TestCertificates {
  wwdrPem: string;
  certificatePem: string;
  privateKeyPem: string;
}

/** A throwaway CA standing in for WWDR and a signer certificate issued by it. */
export function generateTestCertificates(): TestCertificates {
  const caKeys = forge.pki.rsa.generateKeyPair(1024);
  const signerKeys = forge.pki.rsa.generateKeyPair(1024);
  const wwdr = createCertificate('Test WWDR', caKeys, { commonName: 'Test WWDR', privateKey: caKeys.privateKey }, '01');
  const certificate = createCertificate(
    'Pass Type ID: pass.com.example.test',
    signerKeys,
    { commonName: 'Test WWDR', privateKey: caKeys.privateKey },
    '02',
  );
  return {
    wwdrPem: forge.pki.certificateToPem(wwdr),
    certificatePem: forge.pki.certificateToPem(certificate),
    privateKeyPem: forge.pki.privateKeyToPem(signerKeys.privateKey),
  };
}

/** Writes the certificates into `dir` under the default file names. */
export function writeSigningFiles(
  dir: string,
  certificates: TestCertificates,
  overrides: Partial<SigningFiles> = {},
): SigningFiles {
  fs.writeFileSync(path.join(dir, 'WWDR.pem'), certificates.wwdrPem);
  fs.writeFileSync(path.join(dir, 'certificate.pem'), certificates.certificatePem);
  fs.writeFileSync(path.join(dir, 'key.pem'), certificates.privateKeyPem);
  return {
    signingFilesDirectory: dir,
    wwdrCertificate: 'WWDR.pem',
    pemCertificate: 'certificate.pem',
    pemPrivateKey: 'key.pem',
    sslBinary: path.join(dir, 'no-openssl'),
    ...overrides,
  };
}

/** Records every notification; tokens listed in `failures` are rejected with the given error. */
export class FakePushTransport implements PushTransport {
  readonly sent: BackgroundNotification[] = [];

  constructor(public failures: Map<string, Error> = new Map()) {}

  async sendBackgroundNotification(notification: BackgroundNotification): Promise<void> {
    this.sent.push(notification);
    const failure = this.failures.get(notification.deviceToken);
    if (failure) {
      throw failure;
    }
  }
}
