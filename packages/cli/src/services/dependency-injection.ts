import * as path from 'path';
import type { Framework } from '@atelier/core';
import { FsConfigStore, bootstrapFramework } from '@atelier/core/fs';

export type FrameworkRequest = {
  /** Project root; defaults to the nearest directory holding a config file, else the cwd */
  root?: string;
  skipDiscovery?: boolean;
};

/**
 * Source of framework instances for commands. Tests pass their own.
 */
export interface FrameworkProvider {
  getFramework(request?: FrameworkRequest): Promise<Framework.Framework>;
}

/**
 * Dependency Injection Service for the atelier CLI
 *
 * Boots the framework from the project directory on disk.
 */
export class DependencyInjectionService implements FrameworkProvider {
  private static instance: DependencyInjectionService | null = null;

  private constructor() { }

  /**
   * Singleton pattern to ensure single instance across CLI
   */
  static getInstance(): DependencyInjectionService {
    if (!DependencyInjectionService.instance) {
      DependencyInjectionService.instance = new DependencyInjectionService();
    }
    return DependencyInjectionService.instance;
  }

  /**
   * Reset singleton (for testing)
   */
  static reset(): void {
    DependencyInjectionService.instance = null;
  }

  resolveProjectRoot(root?: string): string {
    if (root) {
      return path.resolve(root);
    }
    return FsConfigStore.findProjectRoot() ?? process.cwd();
  }

  async getFramework(request: FrameworkRequest = {}): Promise<Framework.Framework> {
    return bootstrapFramework({
      projectRoot: this.resolveProjectRoot(request.root),
      skipDiscovery: request.skipDiscovery ?? false,
    });
  }
}
