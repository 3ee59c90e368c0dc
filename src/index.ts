import "reflect-metadata";
import { config } from './config';
import { createApp } from './app';
import { AppDataSource } from './data-source';
import { StandardOrderDelegate } from './delegates/standard-order.delegate';
import { StandardPassDelegate } from './delegates/standard-pass.delegate';
import { adminAuth } from './middleware/adminAuth';
import { ApnsClient, PushTransport } from './services/apns.service';
import { SigningFiles } from './services/signature.service';
import { WalletService } from './services/wallet.service';
import { ORDER_FAMILY, PASS_FAMILY } from './wallet/families';

const signing: SigningFiles = {
  signingFilesDirectory: config.wallet.signingFilesDirectory,
  wwdrCertificate: config.wallet.wwdrCertificate,
  pemCertificate: config.wallet.pemCertificate,
  pemPrivateKey: config.wallet.pemPrivateKey,
  pemPrivateKeyPassword: config.wallet.pemPrivateKeyPassword,
  sslBinary: config.wallet.sslBinary,
};

// Token auth when an APNs key is configured, otherwise the signing certificate.
function pushTransport(): PushTransport | undefined {
  const { keyId, teamId, privateKey, environment } = config.apns;
  if (!keyId || !teamId || !privateKey) {
    return undefined;
  }
  return new ApnsClient({ environment, token: { keyId, teamId, privateKey } });
}

async function start() {
  try {
    await AppDataSource.initialize();
    console.log('Data Source has been initialized!');
  } catch (err) {
    console.error('Error during Data Source initialization.', err);
    process.exit(1);
  }

  const pushRoutesMiddleware = config.security.adminKey ? adminAuth(config.security.adminKey) : undefined;
  const shared = {
    dataSource: AppDataSource,
    signing,
    pushTransport: pushTransport(),
    apnsEnvironment: config.apns.environment,
    pushRoutesMiddleware,
  };

  const passes = config.wallet.passTypeIdentifiers.length > 0
    ? new WalletService({
        ...shared,
        descriptor: PASS_FAMILY,
        typeIdentifiers: config.wallet.passTypeIdentifiers,
        delegate: new StandardPassDelegate({
          templateDirectory: config.wallet.passTemplateDirectory,
          webServiceURL: config.wallet.webServiceURL,
          teamIdentifier: config.wallet.teamIdentifier,
          organizationName: config.wallet.organizationName,
        }),
      })
    : undefined;

  const orders = config.wallet.orderTypeIdentifiers.length > 0
    ? new WalletService({
        ...shared,
        descriptor: ORDER_FAMILY,
        typeIdentifiers: config.wallet.orderTypeIdentifiers,
        delegate: new StandardOrderDelegate({
          templateDirectory: config.wallet.orderTemplateDirectory,
          webServiceURL: config.wallet.orderWebServiceURL,
          merchantIdentifier: config.wallet.merchantIdentifier,
          organizationName: config.wallet.organizationName,
        }),
      })
    : undefined;

  if (!passes && !orders) {
    console.warn('No pass or order type identifiers configured; only /health is served.');
  }
  if (!pushRoutesMiddleware) {
    console.log('ADMIN_KEY not set, push routes are disabled.');
  }

  const app = createApp({ passes, orders });
  app.listen(config.port, () => {
    console.log(`Server running on port ${config.port}`);
  });
}

start().catch((err) => {
  console.error('Failed to start server:', err);
  process.exit(1);
});
