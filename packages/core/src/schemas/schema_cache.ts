import Ajv from "ajv";
import type { ErrorObject, SchemaObject, ValidateFunction } from "ajv";

import configSchema from "./atelier_config_schema.json";
import componentAnnotationSchema from "./component_annotation_schema.json";
import stateSnapshotSchema from "./state_snapshot_schema.json";

export type IdentifiedSchema = SchemaObject & { $id: string };

export const Schemas = {
  AtelierConfig: configSchema,
  ComponentAnnotation: componentAnnotationSchema,
  StateSnapshot: stateSnapshotSchema,
} satisfies Record<string, IdentifiedSchema>;

/**
 * Shared cache of compiled validators. Schemas are compiled once per `$id`;
 * later lookups return the same function.
 */
export class SchemaValidationCache {
  private static ajv: Ajv | null = null;
  private static compiled = new Set<string>();

  /**
   * Gets or compiles the validator of a schema.
   * @param schema Schema object carrying a unique `$id`
   */
  static getValidator<T>(schema: IdentifiedSchema): ValidateFunction<T> {
    const ajv = this.getAjv();
    const cached = ajv.getSchema<T>(schema.$id);
    if (cached) {
      return cached;
    }

    const validator = ajv.compile<T>(schema);
    this.compiled.add(schema.$id);
    return validator;
  }

  /**
   * Clears the cache (useful for testing or schema updates).
   */
  static clearCache(): void {
    this.ajv = null;
    this.compiled.clear();
  }

  static getCacheStats(): { cachedSchemas: number; schemasLoaded: string[] } {
    return {
      cachedSchemas: this.compiled.size,
      schemasLoaded: Array.from(this.compiled),
    };
  }

  private static getAjv(): Ajv {
    if (!this.ajv) {
      this.ajv = new Ajv({ allErrors: true });
    }
    return this.ajv;
  }
}

/**
 * Flattens ajv errors into `<path>: <message>` lines.
 */
export function describeSchemaErrors(errors: ErrorObject[] | null | undefined): string[] {
  return (errors ?? []).map((error) => `${error.instancePath || "/"}: ${error.message ?? "is invalid"}`);
}
