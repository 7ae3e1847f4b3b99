import * as path from 'path';
import type { ServerConfig } from '../config';
import { DirectoryFontArchive, readFontFile } from './file-handler';
import { FontCatalog } from './font-catalog';
import { HersheyFont } from './hershey-font';

export interface FontSource {
  /** Catalog name; the catalog default when omitted. */
  font?: string;
  /** Path of a `.jhf` file, takes precedence over `font`. */
  fontFile?: string;
  /** Catalog directory; the configured fonts directory when omitted. */
  directory?: string;
}

export interface LoadedFont {
  name: string;
  font: HersheyFont;
}

/**
 * Hands out catalogs and loads fresh fonts from them, so concurrent requests
 * never share a mutable font. Only the configured directory keeps its catalog;
 * any other directory gets a new one per call.
 */
export class FontResolver {
  private readonly fontsDir: string;
  private readonly configured: FontCatalog;

  constructor(private readonly config: ServerConfig) {
    this.fontsDir = path.resolve(config.fontsDir);
    this.configured = this.createCatalog(this.fontsDir);
  }

  catalog(directory?: string): FontCatalog {
    const resolved = directory === undefined ? this.fontsDir : path.resolve(directory);
    return resolved === this.fontsDir ? this.configured : this.createCatalog(resolved);
  }

  private createCatalog(directory: string): FontCatalog {
    return new FontCatalog(new DirectoryFontArchive(directory, { defaultFont: this.config.defaultFont }));
  }

  async load({ font: name, fontFile, directory }: FontSource): Promise<LoadedFont> {
    const font = new HersheyFont();

    if (fontFile) {
      font.load(await readFontFile(fontFile));
      return { name: path.basename(fontFile, path.extname(fontFile)), font };
    }

    const loadedName = await this.catalog(directory).load(font, name);
    return { name: loadedName, font };
  }
}
