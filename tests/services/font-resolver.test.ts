import { describe, expect, it } from 'vitest';
import type { ServerConfig } from '../../src/config';
import { FontResolver } from '../../src/services/font-resolver';
import { FIXTURE_FONTS_DIR } from '../fixtures/glyphs';

const config: ServerConfig = { fontsDir: FIXTURE_FONTS_DIR, defaultFont: 'mini', defaultSize: 32 };

describe('FontResolver', () => {
  it('should reuse the catalog of the configured directory', () => {
    const resolver = new FontResolver(config);

    expect(resolver.catalog()).toBe(resolver.catalog());
    expect(resolver.catalog(`${FIXTURE_FONTS_DIR}/`)).toBe(resolver.catalog());
  });

  it('should not keep catalogs of other directories', () => {
    const resolver = new FontResolver(config);
    const other = `${FIXTURE_FONTS_DIR}/..`;

    expect(resolver.catalog(other)).not.toBe(resolver.catalog(other));
    expect(resolver.catalog(other)).not.toBe(resolver.catalog());
  });

  it('should load a fresh font on every call', async () => {
    const resolver = new FontResolver(config);
    const first = await resolver.load({});
    const second = await resolver.load({});

    expect(first.name).toBe('mini');
    expect(first.font).not.toBe(second.font);
    expect(first.font.size).toBe(2);
  });
});
