export { SchemaValidationCache, formatSchemaErrors } from "./schema_cache";
