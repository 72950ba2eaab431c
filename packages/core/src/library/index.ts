import * as path from 'path';
import * as fs from 'fs/promises';
import * as os from 'os';
import { Manifest } from '../db';
import { errorCode } from '../errors';
import defaultCategories from './default-categories.json';

export const VAULT_DIR_NAME = 'vault';
export const CATEGORIZED_DIR_NAME = 'categorized';
export const TMP_DIR_NAME = '.pdfshelf_tmp';
export const MANIFEST_FILE_NAME = 'manifest.sqlite3';
export const CATEGORIES_FILE_NAME = 'categories.json';

export function defaultLibraryPath(): string {
  return path.join(os.homedir(), 'PDF_Library');
}

/**
 * On-disk layout of one library. Everything the passes write lives under `root`.
 */
export class Library {
  readonly root: string;

  constructor(root: string) {
    this.root = path.resolve(root);
  }

  get vaultDir(): string {
    return path.join(this.root, VAULT_DIR_NAME);
  }

  get categorizedDir(): string {
    return path.join(this.root, CATEGORIZED_DIR_NAME);
  }

  get tmpDir(): string {
    return path.join(this.root, TMP_DIR_NAME);
  }

  get dbPath(): string {
    return path.join(this.root, MANIFEST_FILE_NAME);
  }

  get categoriesConfigPath(): string {
    return path.join(this.root, CATEGORIES_FILE_NAME);
  }

  /**
   * Creates the directories, seeds an editable categories.json and applies manifest migrations.
   * Safe to call on an already initialized library.
   */
  async ensureInitialized(): Promise<void> {
    for (const dir of [this.root, this.vaultDir, this.categorizedDir, this.tmpDir]) {
      await fs.mkdir(dir, { recursive: true });
    }

    try {
      await fs.writeFile(this.categoriesConfigPath, JSON.stringify(defaultCategories, null, 2) + '\n', {
        encoding: 'utf-8',
        flag: 'wx',
      });
      console.log(`[Library] Wrote default categories to ${this.categoriesConfigPath}`);
    } catch (error) {
      if (errorCode(error) !== 'EEXIST') {
        throw error;
      }
    }

    const manifest = this.openManifest();
    manifest.close();
  }

  /**
   * Vault location for a digest, fanned out by its first four hex characters.
   */
  vaultPathForDigest(digest: string): string {
    return path.join(this.vaultDir, digest.slice(0, 2), digest.slice(2, 4), `${digest}.pdf`);
  }

  openManifest(): Manifest {
    return new Manifest(this.dbPath);
  }
}
