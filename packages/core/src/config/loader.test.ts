import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { ConfigLoader } from './loader';
import fs from 'fs';
import path from 'path';
import os from 'os';
import yaml from 'js-yaml';
import { ConfigError, DEFAULT_EXCLUDES } from '@drivesort/shared';

vi.mock('fs');
vi.mock('os');

describe('ConfigLoader', () => {
  const mockHome = '/mock/home';
  const userConfigPath = path.join(mockHome, '.config', 'drivesort', 'config.yaml');
  const env = {};

  beforeEach(() => {
    vi.resetAllMocks();
    vi.mocked(os.homedir).mockReturnValue(mockHome);
    vi.mocked(fs.existsSync).mockReturnValue(false);
    vi.mocked(fs.readFileSync).mockReturnValue('');
  });

  afterEach(() => {
    vi.clearAllMocks();
  });

  describe('userConfigPath', () => {
    it('prefers XDG_CONFIG_HOME', () => {
      expect(ConfigLoader.userConfigPath({ XDG_CONFIG_HOME: '/xdg' })).toBe(
        path.join('/xdg', 'drivesort', 'config.yaml'),
      );
      expect(ConfigLoader.userConfigPath({})).toBe(userConfigPath);
    });
  });

  describe('load', () => {
    it('should load default config when no files exist', () => {
      const config = ConfigLoader.load({ env });

      expect(config).toEqual({
        configVersion: 1,
        categories: { mode: 'extend', strict: false, fallback: 'misc', definitions: {} },
        scan: { exclude: DEFAULT_EXCLUDES },
        export: { concurrency: 10, layout: 'mirror' },
        archive: { enabled: false, compressionLevel: 6, bufferSizeKb: 256, keepDirectory: true },
      });
    });

    it('should load user config', () => {
      vi.mocked(fs.existsSync).mockImplementation((p) => p === userConfigPath);
      vi.mocked(fs.readFileSync).mockImplementation((p) => {
        if (p === userConfigPath) return yaml.dump({ export: { concurrency: 4 } });
        return '';
      });

      const config = ConfigLoader.load({ env });
      expect(config.export).toEqual({ concurrency: 4, layout: 'mirror' });
    });

    it('should respect precedence: flags > explicit > user', () => {
      vi.mocked(fs.existsSync).mockImplementation(
        (p) => p === userConfigPath || p === '/explicit/config.yaml',
      );
      vi.mocked(fs.readFileSync).mockImplementation((p) => {
        if (p === userConfigPath) {
          return yaml.dump({
            export: { concurrency: 2, layout: 'flat' },
            archive: { compressionLevel: 1 },
          });
        }
        if (p === '/explicit/config.yaml') {
          return yaml.dump({ export: { concurrency: 3 }, archive: { compressionLevel: 2 } });
        }
        return '';
      });

      const config = ConfigLoader.load({
        env,
        configPath: '/explicit/config.yaml',
        flags: { export: { concurrency: 4 } },
      });

      expect(config.export).toEqual({ concurrency: 4, layout: 'flat' });
      expect(config.archive.compressionLevel).toBe(2);
    });

    it('merges category definitions across files and replaces exclude lists', () => {
      vi.mocked(fs.existsSync).mockReturnValue(true);
      vi.mocked(fs.readFileSync).mockImplementation((p) => {
        if (p === userConfigPath) {
          return yaml.dump({
            categories: { definitions: { scans: ['.tif'] } },
            scan: { exclude: ['tmp'] },
          });
        }
        return yaml.dump({
          categories: { definitions: { cad: ['.dwg'] } },
          scan: { exclude: ['cache/'] },
        });
      });

      const config = ConfigLoader.load({ env, configPath: '/explicit/config.yaml' });

      expect(config.categories.definitions).toEqual({ scans: ['.tif'], cad: ['.dwg'] });
      expect(Object.keys(config.categories.definitions)).toEqual(['scans', 'cad']);
      expect(config.scan.exclude).toEqual(['cache/']);
    });

    it('treats an empty file as no config', () => {
      vi.mocked(fs.existsSync).mockReturnValue(true);
      vi.mocked(fs.readFileSync).mockReturnValue('');

      expect(ConfigLoader.load({ env, configPath: '/empty.yaml' }).configVersion).toBe(1);
    });

    it('should fail if explicit config file is missing', () => {
      expect(() => ConfigLoader.load({ env, configPath: '/missing.yaml' })).toThrow(
        /Config file not found/,
      );
    });

    it('should fail on invalid YAML', () => {
      vi.mocked(fs.existsSync).mockReturnValue(true);
      vi.mocked(fs.readFileSync).mockReturnValue('invalid: yaml: :');

      expect(() => ConfigLoader.load({ env, configPath: '/invalid.yaml' })).toThrow(
        /Error parsing YAML file/,
      );
    });

    it('should fail when a file holds a list instead of a mapping', () => {
      vi.mocked(fs.existsSync).mockReturnValue(true);
      vi.mocked(fs.readFileSync).mockReturnValue('- a\n- b\n');

      expect(() => ConfigLoader.load({ env, configPath: '/list.yaml' })).toThrow(ConfigError);
    });

    it('should fail on schema validation', () => {
      vi.mocked(fs.existsSync).mockReturnValue(true);
      vi.mocked(fs.readFileSync).mockReturnValue(yaml.dump({ export: { concurrency: 0 } }));

      expect(() => ConfigLoader.load({ env, configPath: '/config.yaml' })).toThrow(
        /Configuration validation failed:\n- export\.concurrency:/,
      );
    });
  });

  describe('mergeConfigs', () => {
    it('merges nested mappings and skips undefined values', () => {
      const merged = ConfigLoader.mergeConfigs(
        { archive: { enabled: false, compressionLevel: 6 }, scan: { exclude: ['a'] } },
        { archive: { enabled: true }, scan: { exclude: ['b'] }, export: undefined },
      );

      expect(merged).toEqual({
        archive: { enabled: true, compressionLevel: 6 },
        scan: { exclude: ['b'] },
      });
    });
  });
});
