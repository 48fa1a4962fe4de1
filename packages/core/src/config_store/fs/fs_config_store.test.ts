/**
 * FsConfigStore Unit Tests
 *
 * Runs against real temp directories.
 */

import { mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import * as os from 'os';
import * as path from 'path';

import { ConfigValidationError } from '../config_store.errors';
import { FsConfigStore, createConfigManager } from './fs_config_store';

describe('FsConfigStore', () => {
  let projectRoot: string;

  beforeEach(() => {
    projectRoot = mkdtempSync(path.join(os.tmpdir(), 'atelier-config-'));
  });

  afterEach(() => {
    rmSync(projectRoot, { recursive: true, force: true });
  });

  function writeProjectFile(name: string, content: string): void {
    writeFileSync(path.join(projectRoot, name), content, 'utf-8');
  }

  describe('loadConfig (EARS-A)', () => {
    it('[EARS-A1] WHEN a YAML config exists, THE SYSTEM SHALL return the parsed configuration', async () => {
      writeProjectFile(
        'atelier.config.yml',
        ['state:', '  persistentKeys: [theme, layout]', 'registry:', '  discoveryPaths: [components]', 'logLevel: debug', ''].join('\n')
      );

      const config = await new FsConfigStore(projectRoot).loadConfig();

      expect(config).toEqual({
        state: { persistentKeys: ['theme', 'layout'] },
        registry: { discoveryPaths: ['components'] },
        logLevel: 'debug',
      });
    });

    it('[EARS-A2] WHEN no config file exists, THE SYSTEM SHALL return null', async () => {
      await expect(new FsConfigStore(projectRoot).loadConfig()).resolves.toBeNull();
    });

    it('[EARS-A3] WHEN the config file is empty, THE SYSTEM SHALL return an empty configuration', async () => {
      writeProjectFile('atelier.config.yml', '');

      await expect(new FsConfigStore(projectRoot).loadConfig()).resolves.toEqual({});
    });

    it('[EARS-A4] WHEN only a JSON config exists, THE SYSTEM SHALL read it', async () => {
      writeProjectFile('atelier.config.json', JSON.stringify({ eventBus: { debug: true } }));

      const store = new FsConfigStore(projectRoot);

      expect(store.getConfigPath()).toBe(path.join(projectRoot, 'atelier.config.json'));
      await expect(store.loadConfig()).resolves.toEqual({ eventBus: { debug: true } });
    });

    it('[EARS-A5] WHEN the config violates the schema, THE SYSTEM SHALL throw ConfigValidationError with details', async () => {
      writeProjectFile('atelier.config.yml', 'logLevel: loud\n');

      const error = await new FsConfigStore(projectRoot).loadConfig().catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(ConfigValidationError);
      if (error instanceof ConfigValidationError) {
        expect(error.details).toEqual(['/logLevel: must be equal to one of the allowed values']);
        expect(error.filePath).toBe(path.join(projectRoot, 'atelier.config.yml'));
      }
    });

    it('[EARS-A6] WHEN the config cannot be parsed, THE SYSTEM SHALL throw ConfigValidationError', async () => {
      writeProjectFile('atelier.config.yml', 'eventBus: [unclosed\n');

      await expect(new FsConfigStore(projectRoot).loadConfig()).rejects.toThrow(ConfigValidationError);
      await expect(new FsConfigStore(projectRoot).loadConfig()).rejects.toThrow(/^Cannot parse /);
    });
  });

  describe('saveConfig (EARS-B)', () => {
    it('[EARS-B1] WHEN a config is saved without an existing file, THE SYSTEM SHALL write YAML that loads back equal', async () => {
      const store = new FsConfigStore(projectRoot);

      await store.saveConfig({ state: { persistentKeys: ['theme'] }, logLevel: 'warn' });

      expect(readFileSync(path.join(projectRoot, 'atelier.config.yml'), 'utf-8')).toBe(
        'state:\n  persistentKeys:\n    - theme\nlogLevel: warn\n'
      );
      await expect(store.loadConfig()).resolves.toEqual({ state: { persistentKeys: ['theme'] }, logLevel: 'warn' });
    });

    it('[EARS-B2] WHEN the project uses a JSON config, THE SYSTEM SHALL keep writing JSON', async () => {
      writeProjectFile('atelier.config.json', '{}');
      const store = new FsConfigStore(projectRoot);

      await store.saveConfig({ eventBus: { maxHistorySize: 10 } });

      expect(JSON.parse(readFileSync(path.join(projectRoot, 'atelier.config.json'), 'utf-8'))).toEqual({
        eventBus: { maxHistorySize: 10 },
      });
    });
  });

  describe('findProjectRoot (EARS-C)', () => {
    it('[EARS-C1] WHEN started below a configured project, THE SYSTEM SHALL return the directory holding the config', () => {
      writeProjectFile('atelier.config.yml', '');
      const nested = path.join(projectRoot, 'src', 'views');
      mkdirSync(nested, { recursive: true });

      expect(FsConfigStore.findProjectRoot(nested)).toBe(projectRoot);
    });

    it('[EARS-C2] WHEN createConfigManager is given a root, THE SYSTEM SHALL read that project', async () => {
      writeProjectFile('atelier.config.yml', 'logLevel: error\n');

      await expect(createConfigManager(projectRoot).getLogLevel()).resolves.toBe('error');
    });
  });
});
