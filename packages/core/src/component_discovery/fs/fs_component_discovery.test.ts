/**
 * FsComponentDiscovery Tests
 *
 * Scans the fixture tree under __fixtures__/discovery.
 */

import * as path from 'path';

import { ComponentRegistry } from '../../component_registry/component_registry';
import { EventBus } from '../../event_bus/event_bus';
import type { AtelierEvent, ErrorOccurredEvent } from '../../event_bus/types';
import { StateManager } from '../../state_manager/state_manager';
import { DEFAULT_DISCOVERY_INCLUDE, FsComponentDiscovery, defaultDiscoveryInclude } from './fs_component_discovery';

const FIXTURES = path.join(__dirname, '..', '__fixtures__', 'discovery');

function isErrorOccurred(event: AtelierEvent): event is ErrorOccurredEvent {
  return event.type === 'error.occurred';
}

describe('FsComponentDiscovery', () => {
  let bus: EventBus;
  let registry: ComponentRegistry;
  let discovery: FsComponentDiscovery;

  beforeEach(() => {
    jest.resetModules();
    bus = new EventBus();
    registry = new ComponentRegistry(bus, new StateManager(bus));
    discovery = new FsComponentDiscovery(registry, bus);
  });

  describe('Scanning (EARS-A)', () => {
    it('[EARS-A1] WHEN a root is scanned, THE SYSTEM SHALL register every annotated class with parents first', async () => {
      const ids = await discovery.discover(FIXTURES);

      expect(ids).toEqual(['wordCounter', 'workspace', 'outline']);
      expect(registry.getComponentParent('outline')).toBe('workspace');
      expect(registry.getComponent('workspace')?.description).toBe('Main window layout');
      expect(registry.getComponent('wordCounter')?.scope).toBe('transient');
      expect(registry.getComponentConfig('wordCounter')).toEqual({ countPunctuation: false });
    });

    it('[EARS-A2] WHEN a module is a test file or has an invalid annotation, THE SYSTEM SHALL not register it', async () => {
      await discovery.discover(FIXTURES);

      expect(registry.getComponent('specOnly')).toBeNull();
      expect(registry.getComponent('statusBar')).toBeNull();
      expect(registry.getAllComponents().size).toBe(3);
    });

    it('[EARS-A3] WHEN a module fails to load, THE SYSTEM SHALL report error.occurred and keep scanning', async () => {
      const ids = await discovery.discover(FIXTURES);

      const brokenPath = path.join(FIXTURES, 'broken_module.ts');
      expect(ids).toHaveLength(3);
      expect(bus.getHistory().filter(isErrorOccurred).map((event) => event.payload)).toEqual([
        {
          errorType: 'DiscoveryError',
          errorMessage: `Failed to load module ${brokenPath}: fixture module failed to load`,
          context: brokenPath,
        },
      ]);
    });

    it('[EARS-A4] WHEN the root does not exist, THE SYSTEM SHALL skip it', async () => {
      await expect(discovery.discover(path.join(FIXTURES, 'missing'))).resolves.toEqual([]);
    });

    it('[EARS-A5] WHEN extra exclude globs are given, THE SYSTEM SHALL not load the matching modules', async () => {
      discovery = new FsComponentDiscovery(registry, bus, { exclude: ['**/nested/**', '**/broken_module.ts'] });

      await expect(discovery.discover(FIXTURES)).resolves.toEqual(['workspace']);
      expect(bus.getHistory().filter(isErrorOccurred)).toEqual([]);
    });

    it('[EARS-A6] WHEN a discovered component is created, THE SYSTEM SHALL resolve its declared dependencies', async () => {
      await discovery.discover(FIXTURES);

      expect(registry.createInstance('outline')).not.toBeNull();
      expect(registry.getComponentState('outline')).toBe('initialized');
      expect(registry.getComponentState('wordCounter')).toBe('initialized');
    });
  });

  describe('Discovery paths (EARS-B)', () => {
    it('[EARS-B1] WHEN paths are added and removed, THE SYSTEM SHALL keep each resolved path once', () => {
      discovery.addDiscoveryPath(FIXTURES);
      discovery.addDiscoveryPath(path.join(FIXTURES, 'nested', '..'));

      expect(discovery.getDiscoveryPaths()).toEqual([FIXTURES]);
      expect(discovery.removeDiscoveryPath(FIXTURES)).toBe(true);
      expect(discovery.removeDiscoveryPath(FIXTURES)).toBe(false);
      expect(discovery.getDiscoveryPaths()).toEqual([]);
    });

    it('[EARS-B2] WHEN no root is given, THE SYSTEM SHALL scan every known path', async () => {
      discovery.addDiscoveryPath(path.join(FIXTURES, 'nested'));

      await expect(discovery.discover()).resolves.toEqual(['outline', 'wordCounter']);
      expect(registry.getComponentParent('outline')).toBeNull();
    });
  });

  describe('Default include globs (EARS-C)', () => {
    it('[EARS-C1] WHEN running from compiled JavaScript, THE SYSTEM SHALL only scan .js modules', () => {
      expect(defaultDiscoveryInclude('/opt/atelier/dist/component_discovery/fs/fs_component_discovery.js')).toEqual([
        '**/*.js',
      ]);
    });

    it('[EARS-C2] WHEN running from TypeScript sources, THE SYSTEM SHALL scan .ts and .js modules', () => {
      expect(defaultDiscoveryInclude('/work/src/component_discovery/fs/fs_component_discovery.ts')).toEqual([
        '**/*.ts',
        '**/*.js',
      ]);
      expect(DEFAULT_DISCOVERY_INCLUDE).toEqual(['**/*.ts', '**/*.js']);
    });
  });
});
