import fs from 'fs';
import path from 'path';
import JSZip from 'jszip';
import type { Artifact } from '../entities/Artifact';
import type { WalletDelegate } from '../wallet/delegate';
import {
  FamilyDescriptor,
  MANIFEST_FILE,
  PERSONALIZATION_FILE,
  SIGNATURE_FILE,
} from '../wallet/families';
import { InvalidBundleCountError, TemplateNotDirectoryError } from '../utils/errors';
import { isDirectory, listFiles, withTempDirectory } from '../utils/fs';
import { ManifestService } from './manifest.service';
import { SignatureService } from './signature.service';

export const MIN_BUNDLE_SIZE = 2;
export const MAX_BUNDLE_SIZE = 10;

export class BundleService {
  constructor(
    private readonly descriptor: FamilyDescriptor,
    private readonly delegate: WalletDelegate,
    private readonly signatures: SignatureService,
  ) {}

  /** Builds the signed .pkpass / .order archive for one artifact. */
  async generateBundle(artifact: Artifact): Promise<Buffer> {
    const templateDirectory = path.resolve(await this.delegate.template(artifact));
    if (!(await isDirectory(templateDirectory))) {
      throw new TemplateNotDirectoryError(templateDirectory);
    }
    const files = await fs.promises.readdir(templateDirectory);

    return withTempDirectory(async (tmp) => {
      const root = path.join(tmp, 'bundle');
      await fs.promises.cp(templateDirectory, root, { recursive: true });

      const encoded = await this.delegate.encode(artifact);
      await fs.promises.writeFile(path.join(root, this.descriptor.primaryJson), JSON.stringify(encoded));

      if (this.descriptor.supportsPersonalization && this.delegate.encodePersonalization) {
        const personalization = await this.delegate.encodePersonalization(artifact);
        if (personalization) {
          await fs.promises.writeFile(path.join(root, PERSONALIZATION_FILE), JSON.stringify(personalization));
          files.push(PERSONALIZATION_FILE);
        }
      }

      const manifest = await ManifestService.generateManifest(root, this.descriptor.digest);
      await this.signatures.generateSignatureFile(manifest, root);

      files.push(this.descriptor.primaryJson, MANIFEST_FILE, SIGNATURE_FILE);
      return BundleService.zip(root, files);
    });
  }

  /**
   * Bundle of passes (.pkpasses), which lets Safari add several passes at once.
   * Wallet accepts between 2 and 10 passes per bundle.
   */
  async generateBundleOfPasses(artifacts: Artifact[]): Promise<Buffer> {
    if (artifacts.length < MIN_BUNDLE_SIZE || artifacts.length > MAX_BUNDLE_SIZE) {
      throw new InvalidBundleCountError(artifacts.length);
    }

    return withTempDirectory(async (root) => {
      const files: string[] = [];
      for (const [i, artifact] of artifacts.entries()) {
        const name = `${this.descriptor.family}${i}.${this.descriptor.bundleExtension}`;
        await fs.promises.writeFile(path.join(root, name), await this.generateBundle(artifact));
        files.push(name);
      }
      return BundleService.zip(root, files);
    });
  }

  /** Zips the named entries of `root`; directories are added with their contents. */
  static async zip(root: string, entries: string[]): Promise<Buffer> {
    const zip = new JSZip();
    for (const entry of entries) {
      const absolute = path.join(root, entry);
      const relativeFiles = (await isDirectory(absolute))
        ? (await listFiles(absolute)).map((file) => `${entry}/${file}`)
        : [entry];
      for (const file of relativeFiles) {
        zip.file(file, await fs.promises.readFile(path.join(root, file)));
      }
    }
    return zip.generateAsync({ type: 'nodebuffer', compression: 'DEFLATE' });
  }
}
