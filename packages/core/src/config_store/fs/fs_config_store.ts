/**
 * FsConfigStore - Filesystem implementation of ConfigStore
 *
 * Reads the configuration file at the project root (YAML or JSON), validates
 * it against the config schema and writes it back in the same format.
 * Also provides static utility methods for project root detection.
 */

import { existsSync, promises as fs } from 'fs';
import * as yaml from 'js-yaml';
import * as path from 'path';

import { ConfigManager } from '../../config_manager/config_manager';
import type { AtelierConfig } from '../../config_manager/config_manager.types';
import { SchemaValidationCache, Schemas, describeSchemaErrors } from '../../schemas/schema_cache';
import type { ConfigStore } from '../config_store';
import { ConfigValidationError } from '../config_store.errors';
import { errorMessage, isFileNotFound } from '../../utils/errors';

/** Looked up in this order; the first existing file wins */
export const CONFIG_FILE_NAMES = ['atelier.config.yml', 'atelier.config.yaml', 'atelier.config.json'];

/**
 * @example
 * ```typescript
 * const store = new FsConfigStore('/path/to/project');
 * const config = await store.loadConfig();
 * if (config) {
 *   console.log(config.registry?.discoveryPaths);
 * }
 * ```
 */
export class FsConfigStore implements ConfigStore {
  private readonly projectRoot: string;

  constructor(projectRootPath: string) {
    this.projectRoot = path.resolve(projectRootPath);
  }

  /**
   * Path of the configuration file in use: the first existing candidate,
   * else the default YAML location.
   */
  getConfigPath(): string {
    const candidates = CONFIG_FILE_NAMES.map((name) => path.join(this.projectRoot, name));
    return candidates.find((candidate) => existsSync(candidate)) ?? path.join(this.projectRoot, 'atelier.config.yml');
  }

  /**
   * [EARS-A1] Returns the parsed configuration for valid files
   * [EARS-A2] Returns null when no configuration file exists
   * [EARS-A3] Throws ConfigValidationError for unparsable or invalid files
   */
  async loadConfig(): Promise<AtelierConfig | null> {
    const configPath = this.getConfigPath();

    let content: string;
    try {
      content = await fs.readFile(configPath, 'utf-8');
    } catch (error) {
      if (isFileNotFound(error)) {
        return null;
      }
      throw error;
    }

    let parsed: unknown;
    try {
      parsed = configPath.endsWith('.json') ? JSON.parse(content) : yaml.load(content);
    } catch (error) {
      const reason = errorMessage(error);
      throw new ConfigValidationError(`Cannot parse ${configPath}: ${reason}`, configPath, [reason]);
    }

    // An empty YAML document means "all defaults"
    const config = parsed ?? {};
    const validate = SchemaValidationCache.getValidator<AtelierConfig>(Schemas.AtelierConfig);
    if (!validate(config)) {
      const details = describeSchemaErrors(validate.errors);
      throw new ConfigValidationError(`Invalid configuration in ${configPath}: ${details.join('; ')}`, configPath, details);
    }

    return config;
  }

  /**
   * Writes the configuration in the format of the file in use.
   */
  async saveConfig(config: AtelierConfig): Promise<void> {
    const configPath = this.getConfigPath();
    const content = configPath.endsWith('.json') ? `${JSON.stringify(config, null, 2)}\n` : yaml.dump(config, { skipInvalid: true });
    await fs.writeFile(configPath, content, 'utf-8');
  }

  // ==================== Static Utility Methods ====================

  /**
   * Finds the project root by searching upwards for a configuration file.
   *
   * @param startPath - Starting path (default: process.cwd())
   * @returns Absolute path to project root, or null if not found
   */
  static findProjectRoot(startPath: string = process.cwd()): string | null {
    let currentPath = path.resolve(startPath);

    for (;;) {
      if (CONFIG_FILE_NAMES.some((name) => existsSync(path.join(currentPath, name)))) {
        return currentPath;
      }
      const parentPath = path.dirname(currentPath);
      if (parentPath === currentPath) {
        return null;
      }
      currentPath = parentPath;
    }
  }
}

/**
 * Create a ConfigManager with FsConfigStore backend.
 * Auto-detects project root if not provided.
 */
export function createConfigManager(projectRoot?: string): ConfigManager {
  const resolvedRoot = projectRoot || FsConfigStore.findProjectRoot() || process.cwd();
  return new ConfigManager(new FsConfigStore(resolvedRoot));
}
