import crypto from 'crypto';
import fs from 'fs';
import path from 'path';
import { MANIFEST_FILE, ManifestDigest } from '../wallet/families';
import { listFiles } from '../utils/fs';

export type Manifest = Record<string, string>;

export class ManifestService {
  /**
   * Hashes every file under `root` and writes manifest.json next to them.
   * Returns the bytes that were written, which are what gets signed.
   */
  static async generateManifest(root: string, digest: ManifestDigest): Promise<Buffer> {
    const manifest = await ManifestService.computeManifest(root, digest);
    const data = Buffer.from(JSON.stringify(manifest), 'utf8');
    await fs.promises.writeFile(path.join(root, MANIFEST_FILE), data);
    return data;
  }

  static async computeManifest(root: string, digest: ManifestDigest): Promise<Manifest> {
    const files = (await listFiles(root)).sort();
    const manifest: Manifest = {};
    for (const relativePath of files) {
      const data = await fs.promises.readFile(path.join(root, relativePath));
      manifest[relativePath] = ManifestService.hash(data, digest);
    }
    return manifest;
  }

  static hash(data: Buffer, digest: ManifestDigest): string {
    return crypto.createHash(digest).update(data).digest('hex');
  }
}
