import { execFile } from 'child_process';
import fs from 'fs';
import path from 'path';
import { promisify } from 'util';
import * as forge from 'node-forge';
import { MANIFEST_FILE, SIGNATURE_FILE } from '../wallet/families';
import type { WalletDelegate } from '../wallet/delegate';
import { withTempDirectory } from '../utils/fs';
import {
  OpensslBinaryMissingError,
  PemCertificateMissingError,
  PemPrivateKeyMissingError,
  SigningError,
  WwdrCertificateMissingError,
} from '../utils/errors';

const execFileAsync = promisify(execFile);

export interface SigningFiles {
  /** Directory holding the three PEM files below. */
  signingFilesDirectory: string;
  wwdrCertificate: string;
  pemCertificate: string;
  pemPrivateKey: string;
  pemPrivateKeyPassword?: string;
  /** Path of the openssl executable, only used for encrypted keys. */
  sslBinary: string;
}

export interface Signer {
  /**
   * Writes a detached DER signature of `payload` to `outputPath`. `inputPath`
   * is where the same bytes already sit on disk.
   */
  sign(payload: Buffer, inputPath: string, outputPath: string): Promise<void>;
}

/** In-process PKCS#7 signing. Works only with unencrypted private keys. */
export class CmsSigner implements Signer {
  constructor(private readonly files: SigningFiles) {}

  async sign(payload: Buffer, _inputPath: string, outputPath: string): Promise<void> {
    const dir = this.files.signingFilesDirectory;
    const [wwdrPem, certificatePem, privateKeyPem] = await Promise.all([
      fs.promises.readFile(path.join(dir, this.files.wwdrCertificate), 'utf8'),
      fs.promises.readFile(path.join(dir, this.files.pemCertificate), 'utf8'),
      fs.promises.readFile(path.join(dir, this.files.pemPrivateKey), 'utf8'),
    ]);
    const signature = CmsSigner.createDetachedSignature(payload, { wwdrPem, certificatePem, privateKeyPem });
    await fs.promises.writeFile(outputPath, signature);
  }

  static createDetachedSignature(
    payload: Buffer,
    pems: { wwdrPem: string; certificatePem: string; privateKeyPem: string },
  ): Buffer {
    const wwdr = forge.pki.certificateFromPem(pems.wwdrPem);
    const certificate = forge.pki.certificateFromPem(pems.certificatePem);
    const privateKey = forge.pki.privateKeyFromPem(pems.privateKeyPem);

    const p7 = forge.pkcs7.createSignedData();
    p7.content = forge.util.createBuffer(payload.toString('binary'));
    p7.addCertificate(certificate);
    p7.addCertificate(wwdr);
    p7.addSigner({
      key: privateKey,
      certificate,
      digestAlgorithm: forge.pki.oids.sha256,
      authenticatedAttributes: [
        { type: forge.pki.oids.contentType, value: forge.pki.oids.data },
        { type: forge.pki.oids.messageDigest },
        // forge fills in the current time when no value is given
        { type: forge.pki.oids.signingTime },
      ],
    });
    p7.sign({ detached: true });

    return Buffer.from(forge.asn1.toDer(p7.toAsn1()).getBytes(), 'binary');
  }
}

/** Shells out to `openssl smime` so that password-protected keys can be used. */
export class OpensslSigner implements Signer {
  constructor(private readonly files: SigningFiles) {}

  async sign(_payload: Buffer, inputPath: string, outputPath: string): Promise<void> {
    const binary = this.files.sslBinary;
    if (!fs.existsSync(binary)) {
      throw new OpensslBinaryMissingError(binary);
    }

    try {
      await execFileAsync(binary, this.arguments(inputPath, outputPath), {
        cwd: this.files.signingFilesDirectory,
      });
    } catch (e) {
      throw new SigningError(`openssl smime failed for ${inputPath}`, e);
    }
  }

  arguments(inputPath: string, outputPath: string): string[] {
    return [
      'smime', '-binary', '-sign',
      '-certfile', this.files.wwdrCertificate,
      '-signer', this.files.pemCertificate,
      '-inkey', this.files.pemPrivateKey,
      '-in', inputPath,
      '-out', outputPath,
      '-outform', 'DER',
      '-passin', `pass:${this.files.pemPrivateKeyPassword ?? ''}`,
    ];
  }
}

export class SignatureService {
  private readonly signer: Signer;

  constructor(
    files: SigningFiles,
    private readonly delegate: Pick<WalletDelegate, 'generateSignatureFile'>,
    signer?: Signer,
  ) {
    this.signer = signer ?? SignatureService.signerFor(files);
  }

  static signerFor(files: SigningFiles): Signer {
    return files.pemPrivateKeyPassword !== undefined ? new OpensslSigner(files) : new CmsSigner(files);
  }

  /**
   * Startup check: the key, the certificate and the WWDR certificate must all
   * exist, and so must the openssl binary when the key has a password.
   */
  static assertSigningFiles(files: SigningFiles): void {
    const resolve = (name: string) => path.resolve(files.signingFilesDirectory, name);
    if (!fs.existsSync(resolve(files.pemPrivateKey))) {
      throw new PemPrivateKeyMissingError(resolve(files.pemPrivateKey));
    }
    if (!fs.existsSync(resolve(files.pemCertificate))) {
      throw new PemCertificateMissingError(resolve(files.pemCertificate));
    }
    if (!fs.existsSync(resolve(files.wwdrCertificate))) {
      throw new WwdrCertificateMissingError(resolve(files.wwdrCertificate));
    }
    if (files.pemPrivateKeyPassword !== undefined && !fs.existsSync(files.sslBinary)) {
      throw new OpensslBinaryMissingError(files.sslBinary);
    }
  }

  /** Writes `<root>/signature` for the manifest, unless the delegate already did. */
  async generateSignatureFile(manifest: Buffer, root: string): Promise<void> {
    if (this.delegate.generateSignatureFile && (await this.delegate.generateSignatureFile(root))) {
      return;
    }
    await this.signer.sign(manifest, path.join(root, MANIFEST_FILE), path.join(root, SIGNATURE_FILE));
  }

  /** Detached signature over a personalization token. */
  async signToken(token: string): Promise<Buffer> {
    return withTempDirectory(async (dir) => {
      const payload = Buffer.from(token, 'utf8');
      const tokenPath = path.join(dir, 'personalizationToken');
      const signaturePath = path.join(dir, SIGNATURE_FILE);
      await fs.promises.writeFile(tokenPath, payload);
      await this.signer.sign(payload, tokenPath, signaturePath);
      return fs.promises.readFile(signaturePath);
    });
  }
}
