import { describe, it, expect } from 'vitest';
import { ConfigSchema, DEFAULT_EXCLUDES } from './schema';

describe('ConfigSchema', () => {
  it('fills every section with defaults', () => {
    const config = ConfigSchema.parse({});
    expect(config).toEqual({
      configVersion: 1,
      categories: { mode: 'extend', strict: false, fallback: 'misc', definitions: {} },
      scan: { exclude: DEFAULT_EXCLUDES },
      export: { concurrency: 10, layout: 'mirror' },
      archive: { enabled: false, compressionLevel: 6, bufferSizeKb: 256, keepDirectory: true },
    });
  });

  it('keeps category definitions in the order they were written', () => {
    const config = ConfigSchema.parse({
      categories: { definitions: { scans: ['.pdf'], documents: ['.pdf', '.txt'] } },
    });
    expect(Object.keys(config.categories.definitions)).toEqual(['scans', 'documents']);
  });

  it('accepts category definitions written as a list', () => {
    const config = ConfigSchema.parse({
      categories: { definitions: [{ name: 'scans', extensions: ['.pdf'] }] },
    });
    expect(config.categories.definitions).toEqual([{ name: 'scans', extensions: ['.pdf'] }]);
  });

  it('rejects a listed category without a name', () => {
    const result = ConfigSchema.safeParse({
      categories: { definitions: [{ name: '', extensions: ['.pdf'] }] },
    });
    expect(result.success).toBe(false);
  });

  it('rejects a concurrency below one', () => {
    const result = ConfigSchema.safeParse({ export: { concurrency: 0 } });
    expect(result.success).toBe(false);
  });

  it('rejects a compression level above nine', () => {
    const result = ConfigSchema.safeParse({ archive: { compressionLevel: 10 } });
    expect(result.success).toBe(false);
  });

  it('rejects an unknown layout', () => {
    const result = ConfigSchema.safeParse({ export: { layout: 'by-date' } });
    expect(result.success).toBe(false);
  });
});
