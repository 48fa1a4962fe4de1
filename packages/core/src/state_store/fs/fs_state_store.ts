/**
 * FsStateSnapshotStore - Filesystem implementation of StateSnapshotStore
 *
 * Persists the snapshot as pretty-printed UTF-8 JSON.
 */

import * as fs from 'fs';
import * as path from 'path';
import type { StateSnapshotStore } from '../state_store';
import { StatePersistenceError } from '../state_store.errors';
import { SchemaValidationCache, Schemas, describeSchemaErrors } from '../../schemas';
import { errorMessage, isFileNotFound } from '../../utils/errors';
import type { JsonObject } from '../../utils/json';

/**
 * @example
 * ```typescript
 * const store = new FsStateSnapshotStore('/path/to/project/.atelier/state.json');
 * store.save({ theme: 'dark' });
 * store.load(); // { theme: 'dark' }
 * ```
 */
export class FsStateSnapshotStore implements StateSnapshotStore {
  private readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = path.resolve(filePath);
  }

  /**
   * [EARS-A1] Returns the parsed snapshot for a valid file
   * [EARS-A2] Returns null when the file does not exist
   * [EARS-A3] Throws READ_ERROR for unreadable files or invalid JSON
   * [EARS-A4] Throws INVALID_SNAPSHOT when the content is not a JSON object
   */
  load(): JsonObject | null {
    let content: string;
    try {
      content = fs.readFileSync(this.filePath, 'utf-8');
    } catch (error) {
      if (isFileNotFound(error)) {
        return null;
      }
      throw new StatePersistenceError(
        `Failed to read state from ${this.filePath}: ${errorMessage(error)}`,
        'READ_ERROR',
        this.filePath
      );
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      throw new StatePersistenceError(
        `Invalid JSON in ${this.filePath}: ${errorMessage(error)}`,
        'READ_ERROR',
        this.filePath
      );
    }

    const validate = SchemaValidationCache.getValidator<JsonObject>(Schemas.StateSnapshot);
    if (!validate(parsed)) {
      throw new StatePersistenceError(
        `Invalid state snapshot in ${this.filePath}: ${describeSchemaErrors(validate.errors).join('; ')}`,
        'INVALID_SNAPSHOT',
        this.filePath
      );
    }
    return parsed;
  }

  /**
   * [EARS-B1] Creates missing parent directories
   * [EARS-B2] Writes the snapshot with 2-space indentation
   * [EARS-B3] Throws WRITE_ERROR when the file cannot be written
   */
  save(snapshot: JsonObject): void {
    try {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
      fs.writeFileSync(this.filePath, JSON.stringify(snapshot, null, 2), 'utf-8');
    } catch (error) {
      throw new StatePersistenceError(
        `Failed to write state to ${this.filePath}: ${errorMessage(error)}`,
        'WRITE_ERROR',
        this.filePath
      );
    }
  }

  location(): string {
    return this.filePath;
  }
}
