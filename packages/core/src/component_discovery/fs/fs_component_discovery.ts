/**
 * FsComponentDiscovery - Filesystem-based ComponentDiscovery implementation
 *
 * Uses fast-glob to find modules under each root and loads them with a
 * dynamic import. Test files, declaration files and node_modules are never
 * loaded. `.ts` modules need a TypeScript loader in the running process.
 *
 * @module component_discovery/fs/fs_component_discovery
 */

import fg from 'fast-glob';
import * as fs from 'fs/promises';
import * as path from 'path';

import type { ComponentRegistry } from '../../component_registry/component_registry';
import type { EventBus } from '../../event_bus/event_bus';
import { createLogger } from '../../logger';
import { isFileNotFound } from '../../utils/errors';
import type { Logger } from '../../logger';
import { collectAnnotatedClasses, registerDiscovered } from '../component_discovery';
import type { ComponentDiscovery, DiscoveredComponent } from '../component_discovery';
import { DiscoveryError } from '../component_discovery.errors';

/**
 * TypeScript modules are only loadable when this file itself runs from its
 * sources (ts-jest, tsx); the compiled build scans JavaScript alone.
 */
export function defaultDiscoveryInclude(moduleFile: string): string[] {
  return path.extname(moduleFile) === '.ts' ? ['**/*.ts', '**/*.js'] : ['**/*.js'];
}

export const DEFAULT_DISCOVERY_INCLUDE = defaultDiscoveryInclude(__filename);

export const DEFAULT_DISCOVERY_EXCLUDE = ['**/*.d.ts', '**/*.test.*', '**/*.spec.*', '**/node_modules/**'];

export type FsComponentDiscoveryOptions = {
  /** Globs added to the default include patterns */
  include?: string[];
  /** Globs added to the default exclude patterns */
  exclude?: string[];
};

/**
 * @example
 * ```typescript
 * const discovery = new FsComponentDiscovery(registry, eventBus);
 * discovery.addDiscoveryPath('/path/to/project/components');
 * const ids = await discovery.discover();
 * ```
 */
export class FsComponentDiscovery implements ComponentDiscovery {
  private readonly logger: Logger;
  private readonly roots: string[] = [];
  private readonly include: string[];
  private readonly exclude: string[];

  constructor(
    private readonly registry: ComponentRegistry,
    private readonly eventBus: EventBus,
    options: FsComponentDiscoveryOptions = {}
  ) {
    this.logger = createLogger('[ComponentDiscovery] ');
    this.include = [...DEFAULT_DISCOVERY_INCLUDE, ...(options.include ?? [])];
    this.exclude = [...DEFAULT_DISCOVERY_EXCLUDE, ...(options.exclude ?? [])];
  }

  addDiscoveryPath(rootPath: string): void {
    const resolved = path.resolve(rootPath);
    if (!this.roots.includes(resolved)) {
      this.roots.push(resolved);
    }
  }

  removeDiscoveryPath(rootPath: string): boolean {
    const index = this.roots.indexOf(path.resolve(rootPath));
    if (index === -1) {
      return false;
    }
    this.roots.splice(index, 1);
    return true;
  }

  getDiscoveryPaths(): string[] {
    return [...this.roots];
  }

  async discover(rootPath?: string): Promise<string[]> {
    const roots = rootPath === undefined ? this.getDiscoveryPaths() : [path.resolve(rootPath)];
    const discovered: DiscoveredComponent[] = [];

    for (const root of roots) {
      if (!(await this.isDirectory(root))) {
        this.logger.warn(`Discovery path does not exist: ${root}`);
        continue;
      }

      const files = await fg(this.include, {
        cwd: root,
        ignore: this.exclude,
        absolute: true,
        onlyFiles: true,
      });

      for (const file of files.sort()) {
        const moduleExports = await this.loadModule(file);
        if (moduleExports !== null) {
          discovered.push(...collectAnnotatedClasses(moduleExports, file));
        }
      }
    }

    const ids = registerDiscovered(this.registry, discovered);
    this.logger.info(`Discovered ${ids.length} component(s) in ${roots.length} path(s)`);
    return ids;
  }

  private async isDirectory(candidate: string): Promise<boolean> {
    try {
      return (await fs.stat(candidate)).isDirectory();
    } catch (error) {
      if (isFileNotFound(error)) {
        return false;
      }
      throw error;
    }
  }

  private async loadModule(modulePath: string): Promise<unknown> {
    try {
      const loaded: unknown = await import(modulePath);
      return loaded;
    } catch (error) {
      const failure = new DiscoveryError(modulePath, error);
      this.logger.error(failure.message);
      this.eventBus.emitErrorOccurred(failure.name, failure.message, modulePath);
      return null;
    }
  }
}
