import fs from 'fs';
import path from 'path';
import { Express } from 'express';
import JSZip from 'jszip';
import request from 'supertest';
import { DataSource } from 'typeorm';
import { createApp } from '../app';
import { StandardOrderDelegate } from '../delegates/standard-order.delegate';
import { StandardPassDelegate } from '../delegates/standard-pass.delegate';
import { Artifact } from '../entities/Artifact';
import { ErrorLog } from '../entities/ErrorLog';
import { adminAuth } from '../middleware/adminAuth';
import type { SigningFiles } from '../services/signature.service';
import { WalletService } from '../services/wallet.service';
import {
  createTestDataSource,
  FakePushTransport,
  generateTestCertificates,
  makeTempDir,
  silentLogger,
  TEMPLATES,
  writeSigningFiles,
} from '../test-utils';
import { ORDER_FAMILY, PASS_FAMILY } from '../wallet/families';

const PASS_TYPE = 'pass.com.example.test';
const ORDER_TYPE = 'order.com.example.test';
const ADMIN_KEY = 'test-admin-key';

async function entryText(archive: Buffer, name: string): Promise<string> {
  const file = (await JSZip.loadAsync(archive)).file(name);
  if (!file) {
    throw new Error(`${name} missing from archive`);
  }
  return file.async('string');
}

const epochSeconds = (artifact: Artifact) => String(artifact.updatedAt.getTime() / 1000);

describe('Wallet web service routes', () => {
  let signingDir: string;
  let signing: SigningFiles;
  let dataSource: DataSource;
  let transport: FakePushTransport;
  let passes: WalletService;
  let orders: WalletService;
  let app: Express;

  beforeAll(() => {
    signingDir = makeTempDir();
    signing = writeSigningFiles(signingDir, generateTestCertificates());
  });

  afterAll(() => {
    fs.rmSync(signingDir, { recursive: true, force: true });
  });

  beforeEach(async () => {
    dataSource = await createTestDataSource();
    transport = new FakePushTransport();
    const common = {
      dataSource,
      signing,
      pushTransport: transport,
      pushRoutesMiddleware: adminAuth(ADMIN_KEY, silentLogger),
      logger: silentLogger,
    };
    passes = new WalletService({
      ...common,
      descriptor: PASS_FAMILY,
      typeIdentifiers: [PASS_TYPE],
      delegate: new StandardPassDelegate({
        templateDirectory: path.join(TEMPLATES, 'pass'),
        webServiceURL: 'https://wallet.example.com/api/passes/',
        teamIdentifier: 'TEAM123',
        organizationName: 'Example',
        personalization: {
          requiredPersonalizationFields: ['PKPassPersonalizationFieldName'],
          description: 'Join the rewards program',
        },
      }),
    });
    orders = new WalletService({
      ...common,
      descriptor: ORDER_FAMILY,
      typeIdentifiers: [ORDER_TYPE],
      delegate: new StandardOrderDelegate({
        templateDirectory: path.join(TEMPLATES, 'order'),
        webServiceURL: 'https://wallet.example.com/api/orders/',
        merchantIdentifier: 'merchant.com.example',
        organizationName: 'Example',
      }),
    });
    app = createApp({ passes, orders, requestLogging: false, logger: silentLogger });
  });

  afterEach(async () => {
    await dataSource.destroy();
  });

  const registrationPath = (artifact: Artifact, device = 'device-1') =>
    `/api/passes/v1/devices/${device}/registrations/${PASS_TYPE}/${artifact.id}`;

  async function registerPass(artifact: Artifact, device = 'device-1', pushToken = 'token-1') {
    await request(app)
      .post(registrationPath(artifact, device))
      .set('Authorization', `ApplePass ${artifact.authenticationToken}`)
      .send({ pushToken })
      .expect(201);
  }

  it('answers the health check', async () => {
    const res = await request(app).get('/health').expect(200);
    expect(res.body).toEqual({ status: 'ok', version: '0.1.0' });
  });

  describe('device registration', () => {
    it('creates a registration once and answers 200 on repeats', async () => {
      const pass = await passes.hooks.created(PASS_TYPE);

      await registerPass(pass);
      await request(app)
        .post(registrationPath(pass))
        .set('Authorization', `ApplePass ${pass.authenticationToken}`)
        .send({ pushToken: 'token-1' })
        .expect(200);

      expect(await passes.registrations.registrationsFor('device-1', PASS_TYPE)).toHaveLength(1);
    });

    it('rejects a missing or wrong token before touching storage', async () => {
      const pass = await passes.hooks.created(PASS_TYPE);

      await request(app).post(registrationPath(pass)).send({ pushToken: 'token-1' }).expect(401);
      const res = await request(app)
        .post(registrationPath(pass))
        .set('Authorization', 'ApplePass wrong-token')
        .send({ pushToken: 'token-1' })
        .expect(401);
      await request(app)
        .post(registrationPath(pass))
        .set('Authorization', `AppleOrder ${pass.authenticationToken}`)
        .send({ pushToken: 'token-1' })
        .expect(401);

      expect(res.body).toEqual({ error: 'Unauthorized' });
      expect(await passes.registrations.registrationsFor('device-1', PASS_TYPE)).toEqual([]);
    });

    it('answers 400 without a push token', async () => {
      const pass = await passes.hooks.created(PASS_TYPE);

      await request(app)
        .post(registrationPath(pass))
        .set('Authorization', `ApplePass ${pass.authenticationToken}`)
        .send({})
        .expect(400);
    });

    it('answers 404 for unknown artifacts, malformed ids and unknown types', async () => {
      await request(app)
        .post(`/api/passes/v1/devices/device-1/registrations/${PASS_TYPE}/00000000-0000-4000-8000-000000000000`)
        .set('Authorization', 'ApplePass anything')
        .send({ pushToken: 'token-1' })
        .expect(404);
      await request(app)
        .post(`/api/passes/v1/devices/device-1/registrations/${PASS_TYPE}/not-a-uuid`)
        .send({ pushToken: 'token-1' })
        .expect(404);

      const pass = await passes.hooks.created(PASS_TYPE);
      await request(app)
        .post(`/api/passes/v1/devices/device-1/registrations/pass.com.example.other/${pass.id}`)
        .set('Authorization', `ApplePass ${pass.authenticationToken}`)
        .send({ pushToken: 'token-1' })
        .expect(404);
    });

    it('unregisters a device and answers 404 the second time', async () => {
      const pass = await passes.hooks.created(PASS_TYPE);
      await registerPass(pass);

      await request(app).delete(registrationPath(pass)).expect(401);
      await request(app)
        .delete(registrationPath(pass))
        .set('Authorization', `ApplePass ${pass.authenticationToken}`)
        .expect(200);
      await request(app)
        .delete(registrationPath(pass))
        .set('Authorization', `ApplePass ${pass.authenticationToken}`)
        .expect(404);

      expect(await passes.registrations.registrationsFor('device-1', PASS_TYPE)).toEqual([]);
    });
  });

  describe('change polling', () => {
    it('lists registered passes with the latest update time', async () => {
      const first = await passes.hooks.created(PASS_TYPE);
      const second = await passes.hooks.created(PASS_TYPE);
      await registerPass(first);
      await registerPass(second);
      const latest = first.updatedAt > second.updatedAt ? first : second;

      const res = await request(app).get(`/api/passes/v1/devices/device-1/registrations/${PASS_TYPE}`).expect(200);

      expect(res.body.lastUpdated).toBe(epochSeconds(latest));
      expect([...res.body.serialNumbers].sort()).toEqual([first.id, second.id].sort());
    });

    it('answers 204 when nothing changed since the last poll', async () => {
      const pass = await passes.hooks.created(PASS_TYPE);
      await registerPass(pass);

      const first = await request(app).get(`/api/passes/v1/devices/device-1/registrations/${PASS_TYPE}`).expect(200);
      const res = await request(app)
        .get(`/api/passes/v1/devices/device-1/registrations/${PASS_TYPE}`)
        .query({ passesUpdatedSince: first.body.lastUpdated })
        .expect(204);

      expect(res.text).toBe('');
    });

    it('reports a pass again after it is updated', async () => {
      const pass = await passes.hooks.created(PASS_TYPE);
      await registerPass(pass);
      pass.updatedAt = new Date('2024-01-01T00:00:00.000Z');
      await dataSource.getRepository(Artifact).save(pass);
      const since = String(Date.parse('2024-01-02T00:00:00.000Z') / 1000);

      await request(app)
        .get(`/api/passes/v1/devices/device-1/registrations/${PASS_TYPE}`)
        .query({ passesUpdatedSince: since })
        .expect(204);

      const updated = await passes.hooks.updated(pass);
      const res = await request(app)
        .get(`/api/passes/v1/devices/device-1/registrations/${PASS_TYPE}`)
        .query({ passesUpdatedSince: since })
        .expect(200);

      expect(res.body).toEqual({ lastUpdated: epochSeconds(updated), serialNumbers: [pass.id] });
      expect(transport.sent).toEqual([{ topic: PASS_TYPE, deviceToken: 'token-1' }]);
    });

    it('answers 204 for a device without registrations', async () => {
      await request(app).get(`/api/passes/v1/devices/unknown/registrations/${PASS_TYPE}`).expect(204);
    });

    it('answers 404 for a type the service does not serve', async () => {
      const res = await request(app)
        .get('/api/passes/v1/devices/device-1/registrations/pass.com.example.other')
        .expect(404);
      expect(res.body).toEqual({ error: 'Unknown type identifier pass.com.example.other' });
    });
  });

  describe('latest version', () => {
    const passPath = (artifact: Artifact) => `/api/passes/v1/passes/${PASS_TYPE}/${artifact.id}`;

    it('returns the signed bundle with Last-Modified', async () => {
      const pass = await passes.hooks.created(PASS_TYPE);

      const res = await request(app)
        .get(passPath(pass))
        .set('Authorization', `ApplePass ${pass.authenticationToken}`)
        .responseType('blob')
        .expect(200);

      expect(res.headers['content-type']).toBe('application/vnd.apple.pkpass');
      expect(res.headers['last-modified']).toBe(pass.updatedAt.toUTCString());
      expect(JSON.parse(await entryText(res.body, 'pass.json'))).toEqual({
        formatVersion: 1,
        passTypeIdentifier: PASS_TYPE,
        serialNumber: pass.id,
        authenticationToken: pass.authenticationToken,
        webServiceURL: 'https://wallet.example.com/api/passes/',
        teamIdentifier: 'TEAM123',
        organizationName: 'Example',
        description: 'Example',
        generic: {},
      });
      const manifest = JSON.parse(await entryText(res.body, 'manifest.json'));
      expect(Object.keys(manifest).sort()).toEqual([
        'en.lproj/pass.strings',
        'icon.png',
        'logo.png',
        'pass.json',
        'personalization.json',
      ]);
    });

    it('answers 304 unless the pass changed after If-Modified-Since', async () => {
      const pass = await passes.hooks.created(PASS_TYPE);
      const auth = `ApplePass ${pass.authenticationToken}`;

      await request(app).get(passPath(pass)).set('Authorization', auth).set('If-Modified-Since', epochSeconds(pass)).expect(304);
      await request(app)
        .get(passPath(pass))
        .set('Authorization', auth)
        .set('If-Modified-Since', String(pass.updatedAt.getTime() / 1000 - 1))
        .expect(200);
      // not a number: treated as never fetched
      await request(app)
        .get(passPath(pass))
        .set('Authorization', auth)
        .set('If-Modified-Since', 'Wed, 21 Oct 2015 07:28:00 GMT')
        .expect(200);
    });

    it('requires the pass token', async () => {
      const pass = await passes.hooks.created(PASS_TYPE);

      await request(app).get(passPath(pass)).expect(401);
    });
  });

  describe('error log', () => {
    it('stores one entry per line, in order', async () => {
      await request(app).post('/api/passes/v1/log').send({ logs: ['first', 'second'] }).expect(200);
      await request(app).post('/api/passes/v1/log').send({ logs: ['third'] }).expect(200);

      const logs = await dataSource.getRepository(ErrorLog).find({ order: { id: 'ASC' } });
      expect(logs.map((l) => l.message)).toEqual(['first', 'second', 'third']);
      expect(logs.every((l) => l.family === 'pass')).toBe(true);
    });

    it('rejects empty and malformed batches without storing anything', async () => {
      await request(app).post('/api/passes/v1/log').send({ logs: [] }).expect(400);
      await request(app).post('/api/passes/v1/log').send({ logs: 'one line' }).expect(400);
      await request(app).post('/api/passes/v1/log').set('Content-Type', 'application/json').send('{"logs":').expect(400);

      expect(await dataSource.getRepository(ErrorLog).count()).toBe(0);
    });
  });

  describe('personalization', () => {
    it('stores the details and returns a signature over the token', async () => {
      const pass = await passes.hooks.created(PASS_TYPE);

      const res = await request(app)
        .post(`/api/passes/v1/passes/${PASS_TYPE}/${pass.id}/personalize`)
        .send({
          personalizationToken: 'personalization-token',
          requiredPersonalizationInfo: { fullName: 'Jane Doe', ISOCountryCode: 'US' },
        })
        .responseType('blob')
        .expect(200);

      expect(res.headers['content-type']).toBe('application/octet-stream');
      expect(Buffer.isBuffer(res.body)).toBe(true);
      expect(res.body.length).toBeGreaterThan(0);

      const stored = await passes.hooks.find(PASS_TYPE, pass.id);
      expect(stored?.userPersonalization).toMatchObject({ fullName: 'Jane Doe', isoCountryCode: 'US' });

      const bundle = await request(app)
        .get(`/api/passes/v1/passes/${PASS_TYPE}/${pass.id}`)
        .set('Authorization', `ApplePass ${pass.authenticationToken}`)
        .responseType('blob')
        .expect(200);
      expect((await JSZip.loadAsync(bundle.body)).file('personalization.json')).toBeNull();
    });

    it('answers 400 for a malformed dictionary', async () => {
      const pass = await passes.hooks.created(PASS_TYPE);

      await request(app)
        .post(`/api/passes/v1/passes/${PASS_TYPE}/${pass.id}/personalize`)
        .send({ requiredPersonalizationInfo: {} })
        .expect(400);
    });
  });

  describe('push routes', () => {
    const pushPath = (artifact: Artifact) => `/api/passes/v1/push/${PASS_TYPE}/${artifact.id}`;

    it('require the admin key', async () => {
      const pass = await passes.hooks.created(PASS_TYPE);

      await request(app).post(pushPath(pass)).expect(401);
      await request(app).get(pushPath(pass)).set('x-admin-key', 'wrong-key').expect(401);
      expect(transport.sent).toEqual([]);
    });

    it('push to every registered device and list their tokens', async () => {
      const pass = await passes.hooks.created(PASS_TYPE);
      await registerPass(pass, 'device-1', 'token-1');
      await registerPass(pass, 'device-2', 'token-2');

      await request(app).post(pushPath(pass)).set('x-admin-key', ADMIN_KEY).expect(204);
      const res = await request(app).get(pushPath(pass)).set('x-admin-key', ADMIN_KEY).expect(200);

      expect(transport.sent.map((n) => n.deviceToken).sort()).toEqual(['token-1', 'token-2']);
      expect([...res.body].sort()).toEqual(['token-1', 'token-2']);
    });

    it('answer 502 when deliveries fail', async () => {
      const pass = await passes.hooks.created(PASS_TYPE);
      await registerPass(pass);
      transport.failures.set('token-1', new Error('connection reset'));

      const res = await request(app).post(pushPath(pass)).set('x-admin-key', ADMIN_KEY).expect(502);

      expect(res.body).toEqual({ error: '1 push notification(s) failed', failed: 1 });
    });

    it('answer 404 for unknown artifacts', async () => {
      await request(app)
        .post(`/api/passes/v1/push/${PASS_TYPE}/00000000-0000-4000-8000-000000000000`)
        .set('x-admin-key', ADMIN_KEY)
        .expect(404);
    });

    it('are not mounted without a guard', async () => {
      const unguarded = new WalletService({
        dataSource,
        signing,
        pushTransport: transport,
        logger: silentLogger,
        descriptor: PASS_FAMILY,
        typeIdentifiers: [PASS_TYPE],
        delegate: new StandardPassDelegate({
          templateDirectory: path.join(TEMPLATES, 'pass'),
          webServiceURL: 'https://wallet.example.com/api/passes/',
          teamIdentifier: 'TEAM123',
          organizationName: 'Example',
        }),
      });
      const bare = createApp({ passes: unguarded, requestLogging: false, logger: silentLogger });
      const pass = await unguarded.hooks.created(PASS_TYPE);

      await request(bare).post(pushPath(pass)).expect(404);
      expect(transport.sent).toEqual([]);
    });
  });

  describe('orders', () => {
    const orderRegistrationPath = (artifact: Artifact) =>
      `/api/orders/v1/devices/device-1/registrations/${ORDER_TYPE}/${artifact.id}`;

    it('registers with the AppleOrder scheme and reports order identifiers', async () => {
      const order = await orders.hooks.created(ORDER_TYPE);

      await request(app)
        .post(orderRegistrationPath(order))
        .set('Authorization', `ApplePass ${order.authenticationToken}`)
        .send({ pushToken: 'token-1' })
        .expect(401);
      await request(app)
        .post(orderRegistrationPath(order))
        .set('Authorization', `AppleOrder ${order.authenticationToken}`)
        .send({ pushToken: 'token-1' })
        .expect(201);

      const res = await request(app)
        .get(`/api/orders/v1/devices/device-1/registrations/${ORDER_TYPE}`)
        .query({ ordersModifiedSince: '0' })
        .expect(200);
      expect(res.body).toEqual({ lastUpdated: epochSeconds(order), orderIdentifiers: [order.id] });
    });

    it('serves order bundles', async () => {
      const order = await orders.hooks.created(ORDER_TYPE);

      const res = await request(app)
        .get(`/api/orders/v1/orders/${ORDER_TYPE}/${order.id}`)
        .set('Authorization', `AppleOrder ${order.authenticationToken}`)
        .responseType('blob')
        .expect(200);

      expect(res.headers['content-type']).toBe('application/vnd.apple.order');
      expect(JSON.parse(await entryText(res.body, 'order.json'))).toMatchObject({
        orderTypeIdentifier: ORDER_TYPE,
        orderIdentifier: order.id,
        authenticationToken: order.authenticationToken,
      });
      const manifest: Record<string, string> = JSON.parse(await entryText(res.body, 'manifest.json'));
      expect(manifest['order.json']).toHaveLength(64);
    });

    it('keep passes and orders apart', async () => {
      const pass = await passes.hooks.created(PASS_TYPE);

      await request(app)
        .get(`/api/orders/v1/orders/${PASS_TYPE}/${pass.id}`)
        .set('Authorization', `AppleOrder ${pass.authenticationToken}`)
        .expect(404);
      await request(app)
        .post(`/api/orders/v1/orders/${ORDER_TYPE}/${pass.id}/personalize`)
        .send({ personalizationToken: 'personalization-token', requiredPersonalizationInfo: {} })
        .expect(404);
    });
  });
});
