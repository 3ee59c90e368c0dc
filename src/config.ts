import dotenv from 'dotenv';
dotenv.config();

const list = (value?: string): string[] =>
  (value || '').split(',').map((s) => s.trim()).filter(Boolean);

export type ApnsEnvironment = 'production' | 'development';

const apnsEnvironment = (value?: string): ApnsEnvironment =>
  value === 'development' ? 'development' : 'production';

export const config = {
  port: parseInt(process.env.PORT || '3000'),
  databaseUrl: process.env.DATABASE_URL || '',
  database: {
    host: process.env.DB_HOST || 'localhost',
    port: parseInt(process.env.DB_PORT || '5432'),
    username: process.env.DB_USERNAME || 'postgres',
    password: process.env.DB_PASSWORD || 'postgres',
    database: process.env.DB_NAME || 'wallet',
    ssl: (process.env.DB_SSL || '').toLowerCase() === 'true',
    sslRejectUnauthorized: (process.env.DB_SSL_REJECT_UNAUTHORIZED || '').toLowerCase() === 'true',
  },
  wallet: {
    signingFilesDirectory: process.env.WALLET_SIGNING_DIR || './certs',
    wwdrCertificate: process.env.WALLET_WWDR_CERT || 'WWDR.pem',
    pemCertificate: process.env.WALLET_PEM_CERT || 'certificate.pem',
    pemPrivateKey: process.env.WALLET_PEM_KEY || 'key.pem',
    // Encrypted keys are signed through the openssl binary below.
    pemPrivateKeyPassword: process.env.WALLET_PEM_KEY_PASSWORD || undefined,
    sslBinary: process.env.WALLET_SSL_BINARY || '/usr/bin/openssl',
    webServiceURL: process.env.WALLET_WEB_SERVICE_URL || 'http://localhost:3000/api/passes/',
    orderWebServiceURL: process.env.WALLET_ORDER_WEB_SERVICE_URL || 'http://localhost:3000/api/orders/',
    teamIdentifier: process.env.APPLE_TEAM_ID || '',
    organizationName: process.env.WALLET_ORGANIZATION_NAME || 'Wallet',
    merchantIdentifier: process.env.APPLE_MERCHANT_ID || '',
    passTypeIdentifiers: list(process.env.APPLE_PASS_TYPE_IDS),
    orderTypeIdentifiers: list(process.env.APPLE_ORDER_TYPE_IDS),
    passTemplateDirectory: process.env.WALLET_PASS_TEMPLATE_DIR || './templates/pass',
    orderTemplateDirectory: process.env.WALLET_ORDER_TEMPLATE_DIR || './templates/order',
  },
  apns: {
    environment: apnsEnvironment(process.env.APNS_ENVIRONMENT),
    // Token auth is used when all three are present, otherwise the signing certificate.
    keyId: process.env.APNS_KEY_ID || '',
    teamId: process.env.APNS_TEAM_ID || '',
    privateKey: (process.env.APNS_PRIVATE_KEY || '').replace(/\\n/g, '\n'),
  },
  security: {
    adminKey: process.env.ADMIN_KEY || '',
  },
};
