/**
 * bootstrapFramework Tests
 *
 * Builds a project in a temp directory and discovers components from the
 * shared discovery fixtures.
 */

import { mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import * as os from 'os';
import * as path from 'path';

import { MemoryConfigStore } from '../../config_store/memory/memory_config_store';
import { bootstrapFramework } from './bootstrap';

const NESTED_FIXTURES = path.resolve(__dirname, '../../component_discovery/__fixtures__/discovery/nested');

describe('bootstrapFramework', () => {
  let projectRoot: string;

  beforeEach(() => {
    projectRoot = mkdtempSync(path.join(os.tmpdir(), 'atelier-bootstrap-'));
  });

  afterEach(() => {
    rmSync(projectRoot, { recursive: true, force: true });
  });

  it('[EARS-A1] WHEN the project has a config, THE SYSTEM SHALL restore persistent state and discover components', async () => {
    writeFileSync(
      path.join(projectRoot, 'atelier.config.yml'),
      [
        'state:',
        '  persistencePath: ui/state.json',
        '  persistentKeys: [theme]',
        'registry:',
        `  discoveryPaths: [${JSON.stringify(NESTED_FIXTURES)}]`,
        '',
      ].join('\n'),
      'utf-8'
    );
    mkdirSync(path.join(projectRoot, 'ui'));
    writeFileSync(path.join(projectRoot, 'ui', 'state.json'), JSON.stringify({ theme: 'dark' }), 'utf-8');

    const framework = await bootstrapFramework({ projectRoot });

    expect(framework.stateManager.get('theme')).toBe('dark');
    expect(framework.stateManager.canUndo()).toBe(false);
    expect(framework.discovery.getDiscoveryPaths()).toEqual([NESTED_FIXTURES]);
    expect([...framework.registry.getAllComponents().keys()]).toEqual(['outline', 'wordCounter']);

    framework.dispose();
  });

  it('[EARS-A2] WHEN a persistent key changes, THE SYSTEM SHALL write it to the configured state file', async () => {
    writeFileSync(path.join(projectRoot, 'atelier.config.yml'), 'state:\n  persistentKeys: [theme]\n', 'utf-8');

    const framework = await bootstrapFramework({ projectRoot });
    framework.stateManager.set('theme', 'light');
    framework.stateManager.set('cursor', 4);

    const written: unknown = JSON.parse(readFileSync(path.join(projectRoot, '.atelier', 'state.json'), 'utf-8'));
    expect(written).toEqual({ theme: 'light' });

    framework.dispose();
  });

  it('[EARS-A3] WHEN a config store is given and discovery is skipped, THE SYSTEM SHALL use defaults and register nothing', async () => {
    const configStore = new MemoryConfigStore({ registry: { discoveryPaths: ['components'] } });

    const framework = await bootstrapFramework({ projectRoot, configStore, skipDiscovery: true });

    expect(framework.discovery.getDiscoveryPaths()).toEqual([path.join(projectRoot, 'components')]);
    expect(framework.registry.getAllComponents().size).toBe(0);
    expect(framework.stateManager.keys()).toEqual([]);

    framework.dispose();
  });
});
