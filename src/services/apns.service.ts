import * as http2 from 'http2';
import fs from 'fs';
import path from 'path';
import { randomUUID } from 'crypto';
import jwt from 'jsonwebtoken';
import type { ApnsEnvironment } from '../config';
import { ApnsError } from '../utils/errors';
import type { Logger } from '../utils/logger';
import type { SigningFiles } from './signature.service';

export interface BackgroundNotification {
  /** The pass or order type identifier. */
  topic: string;
  deviceToken: string;
}

export interface PushTransport {
  /** Resolves once APNs accepted the notification, rejects with ApnsError otherwise. */
  sendBackgroundNotification(notification: BackgroundNotification): Promise<void>;
}

export interface ApnsTokenAuth {
  keyId: string;
  teamId: string;
  privateKey: string;
}

export interface ApnsCertificateAuth {
  cert: string;
  key: string;
  passphrase?: string;
}

export interface ApnsOptions {
  environment: ApnsEnvironment;
  /** Overrides the APNs origin derived from `environment`. */
  origin?: string;
  token?: ApnsTokenAuth;
  certificate?: ApnsCertificateAuth;
}

const ORIGINS: Record<ApnsEnvironment, string> = {
  production: 'https://api.push.apple.com:443',
  development: 'https://api.sandbox.push.apple.com:443',
};

// APNs refuses provider tokens older than an hour.
const TOKEN_TTL_MS = 50 * 60_000;

export class ApnsClient implements PushTransport {
  private cachedJwt?: { token: string; issuedAt: number };

  constructor(private readonly options: ApnsOptions, private readonly logger: Logger = console) {}

  /** Certificate-based client using the same certificate and key that sign bundles. */
  static fromSigningFiles(files: SigningFiles, environment: ApnsEnvironment, logger?: Logger): ApnsClient {
    const read = (name: string) => fs.readFileSync(path.join(files.signingFilesDirectory, name), 'utf8');
    return new ApnsClient(
      {
        environment,
        certificate: {
          cert: read(files.pemCertificate),
          key: read(files.pemPrivateKey),
          passphrase: files.pemPrivateKeyPassword,
        },
      },
      logger,
    );
  }

  private get origin(): string {
    return this.options.origin ?? ORIGINS[this.options.environment];
  }

  private getJwt(auth: ApnsTokenAuth): string {
    const now = Date.now();
    if (this.cachedJwt && now - this.cachedJwt.issuedAt < TOKEN_TTL_MS) {
      return this.cachedJwt.token;
    }
    const token = jwt.sign(
      { iss: auth.teamId, iat: Math.floor(now / 1000) },
      auth.privateKey,
      { algorithm: 'ES256', header: { alg: 'ES256', kid: auth.keyId } },
    );
    this.cachedJwt = { token, issuedAt: now };
    return token;
  }

  async sendBackgroundNotification({ topic, deviceToken }: BackgroundNotification): Promise<void> {
    const certificate = this.options.certificate;
    const client = http2.connect(this.origin, certificate ? { ...certificate } : {});

    const headers: http2.OutgoingHttpHeaders = {
      ':method': 'POST',
      ':path': `/3/device/${deviceToken}`,
      'apns-topic': topic,
      'apns-push-type': 'background',
      'apns-priority': '5',
      // deliver now or drop, never store and collapse
      'apns-expiration': '0',
      'apns-id': randomUUID(),
    };
    if (this.options.token) {
      headers['authorization'] = `bearer ${this.getJwt(this.options.token)}`;
    }

    return new Promise<void>((resolve, reject) => {
      client.on('error', (err) => {
        client.close();
        this.logger.warn('[APNs] Session error:', err);
        reject(err);
      });

      const req = client.request(headers);

      let respBody = '';
      let status: number | undefined;

      req.setEncoding('utf8');
      req.on('response', (responseHeaders) => {
        status = Number(responseHeaders[':status']);
      });

      req.on('data', (chunk: string) => {
        respBody += chunk;
      });

      req.on('end', () => {
        client.close();
        if (status === 200) {
          resolve();
        } else {
          reject(new ApnsError(ApnsClient.parseReason(respBody, status), status));
        }
      });

      req.on('error', (err) => {
        client.close();
        this.logger.warn('[APNs] Push error:', err);
        reject(err);
      });

      req.end(JSON.stringify({ aps: { 'content-available': 1 } }));
    });
  }

  static parseReason(body: string, status?: number): string {
    const fallback = body || `HTTP ${status ?? 'unknown'}`;
    let parsed: unknown;
    try {
      parsed = JSON.parse(body);
    } catch {
      return fallback;
    }
    if (parsed && typeof parsed === 'object' && 'reason' in parsed && typeof parsed.reason === 'string') {
      return parsed.reason;
    }
    return fallback;
  }
}
