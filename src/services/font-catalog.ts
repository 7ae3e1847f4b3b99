import { FontNotFoundError } from '../errors';
import type { FontArchive, LoadOptions } from '../types/font';
import type { HersheyFont } from './hershey-font';

export function decodeFontLines(data: Uint8Array): string[] {
  return Buffer.from(data).toString('utf8').split(/\r?\n/);
}

/**
 * Named fonts available from an archive. The first name is the default font.
 */
export class FontCatalog {
  private names?: Promise<string[]>;

  constructor(private readonly archive: FontArchive) {}

  async listNames(): Promise<string[]> {
    if (!this.names) {
      this.names = this.archive.list().catch((error: unknown) => {
        this.names = undefined;
        throw error;
      });
    }
    return [...(await this.names)];
  }

  async defaultName(): Promise<string | undefined> {
    const [first] = await this.listNames();
    return first;
  }

  /**
   * Loads `name`, or the default font when it is empty, into `font` and
   * returns the name that was loaded.
   */
  async load(font: HersheyFont, name = '', options?: LoadOptions): Promise<string> {
    const fontName = name || (await this.defaultName());
    if (!fontName || !(await this.listNames()).includes(fontName)) {
      throw new FontNotFoundError(name);
    }

    const data = await this.archive.read(fontName);
    font.load(decodeFontLines(data), options);
    return fontName;
  }
}
