import fs from 'fs';
import os from 'os';
import path from 'path';

/** Relative paths (with `/` separators) of every regular file below `root`. */
export async function listFiles(root: string, prefix = ''): Promise<string[]> {
  const entries = await fs.promises.readdir(path.join(root, prefix), { withFileTypes: true });
  const files: string[] = [];
  for (const entry of entries) {
    const relative = prefix ? `${prefix}/${entry.name}` : entry.name;
    if (entry.isDirectory()) {
      files.push(...(await listFiles(root, relative)));
    } else if (entry.isFile()) {
      files.push(relative);
    }
  }
  return files;
}

export async function isDirectory(target: string): Promise<boolean> {
  try {
    return (await fs.promises.stat(target)).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Runs `work` inside a fresh, uniquely named directory under the OS temp dir
 * and removes it afterwards, whether `work` resolves or throws.
 */
export async function withTempDirectory<T>(work: (dir: string) => Promise<T>): Promise<T> {
  const dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'wallet-'));
  try {
    return await work(dir);
  } finally {
    await fs.promises.rm(dir, { recursive: true, force: true });
  }
}
