export { SchemaValidationCache, Schemas, describeSchemaErrors } from "./schema_cache";
export type { IdentifiedSchema } from "./schema_cache";
