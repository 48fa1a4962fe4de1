/**
 * MemoryComponentDiscovery - In-memory implementation of ComponentDiscovery
 *
 * Scans a table of module path -> module exports instead of the filesystem.
 * A module belongs to a root when its path equals the root or lies below it.
 */

import type { ComponentRegistry } from '../../component_registry/component_registry';
import { collectAnnotatedClasses, registerDiscovered } from '../component_discovery';
import type { ComponentDiscovery, DiscoveredComponent } from '../component_discovery';

function normalizeRoot(rootPath: string): string {
  return rootPath.length > 1 && rootPath.endsWith('/') ? rootPath.slice(0, -1) : rootPath;
}

function isWithin(modulePath: string, root: string): boolean {
  return modulePath === root || modulePath.startsWith(root.endsWith('/') ? root : `${root}/`);
}

/**
 * @example
 * ```typescript
 * const discovery = new MemoryComponentDiscovery(registry);
 * discovery.setModule('/app/components/outline.ts', { OutlinePanel });
 * discovery.addDiscoveryPath('/app/components');
 * await discovery.discover(); // ['outline']
 * ```
 */
export class MemoryComponentDiscovery implements ComponentDiscovery {
  private readonly roots: string[] = [];
  private modules = new Map<string, unknown>();

  constructor(
    private readonly registry: ComponentRegistry,
    modules: Record<string, unknown> = {}
  ) {
    for (const [modulePath, moduleExports] of Object.entries(modules)) {
      this.modules.set(modulePath, moduleExports);
    }
  }

  addDiscoveryPath(rootPath: string): void {
    const root = normalizeRoot(rootPath);
    if (!this.roots.includes(root)) {
      this.roots.push(root);
    }
  }

  removeDiscoveryPath(rootPath: string): boolean {
    const index = this.roots.indexOf(normalizeRoot(rootPath));
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
    const roots = rootPath === undefined ? this.getDiscoveryPaths() : [normalizeRoot(rootPath)];
    const discovered: DiscoveredComponent[] = [];

    for (const root of roots) {
      const modulePaths = [...this.modules.keys()].filter((modulePath) => isWithin(modulePath, root)).sort();
      for (const modulePath of modulePaths) {
        discovered.push(...collectAnnotatedClasses(this.modules.get(modulePath), modulePath));
      }
    }

    return registerDiscovered(this.registry, discovered);
  }

  // ==================== Test Helper Methods ====================

  /**
   * Adds or replaces the exports of one module
   */
  setModule(modulePath: string, moduleExports: unknown): void {
    this.modules.set(modulePath, moduleExports);
  }

  getModulePaths(): string[] {
    return [...this.modules.keys()].sort();
  }

  clear(): void {
    this.modules = new Map();
    this.roots.length = 0;
  }
}
