import { glob } from 'glob';
import fs from 'fs-extra';
import * as path from 'path';
import type { FontArchive } from '../types/font';

const FONT_EXTENSION = '.jhf';

export async function findFontFiles(directory: string): Promise<string[]> {
  try {
    const files = await glob(`*${FONT_EXTENSION}`, { cwd: directory, nodir: true });
    return files.sort();
  } catch (error) {
    throw new Error(`Error finding font files: ${error}`);
  }
}

export async function readFontFile(fontPath: string): Promise<string[]> {
  try {
    const content = await fs.readFile(fontPath, 'utf8');
    return content.split(/\r?\n/);
  } catch (error) {
    throw new Error(`Error reading font file: ${error}`);
  }
}

export interface DirectoryFontArchiveOptions {
  /** Listed first when present. */
  defaultFont?: string;
}

/**
 * Serves the `.jhf` files of one directory, named after the file without its
 * extension. Names differing only in case are kept once.
 */
export class DirectoryFontArchive implements FontArchive {
  private files?: Map<string, string>;

  constructor(
    private readonly directory: string,
    private readonly options: DirectoryFontArchiveOptions = {}
  ) {}

  async list(): Promise<string[]> {
    const files = await this.scan();
    return [...files.keys()];
  }

  async read(name: string): Promise<Uint8Array> {
    const files = await this.scan();
    const file = files.get(name);
    if (!file) {
      throw new Error(`Font resource ${name} is not in ${this.directory}`);
    }
    return fs.readFile(path.join(this.directory, file));
  }

  private async scan(): Promise<Map<string, string>> {
    if (this.files) {
      return this.files;
    }

    const byFoldedName = new Map<string, string>();
    for (const file of await findFontFiles(this.directory)) {
      const folded = file.toLowerCase();
      if (byFoldedName.has(folded)) {
        console.warn(`⚠️  Warning: ${file} differs from another font only in letter case, skipped`);
        continue;
      }
      byFoldedName.set(folded, file);
    }

    const names = [...byFoldedName.values()].map((file) => ({ name: path.basename(file, FONT_EXTENSION), file }));
    const defaultFont = this.options.defaultFont?.toLowerCase();
    const defaultIndex = names.findIndex(({ name }) => name.toLowerCase() === defaultFont);
    if (defaultIndex > 0) {
      names.unshift(...names.splice(defaultIndex, 1));
    }

    this.files = new Map(names.map(({ name, file }) => [name, file]));
    return this.files;
  }
}
