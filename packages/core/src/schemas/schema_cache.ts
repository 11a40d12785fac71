import Ajv from "ajv";
import type { ErrorObject, ValidateFunction } from "ajv";
import addFormats from "ajv-formats";
import type { FieldError } from "../errors";

/**
 * Cache of compiled validators, keyed by schema name, so each schema is compiled once.
 */
export class SchemaValidationCache {
  private static validators = new Map<string, ValidateFunction>();
  private static ajv: Ajv | null = null;

  private static getAjv(): Ajv {
    if (!this.ajv) {
      this.ajv = new Ajv({ allErrors: true, verbose: true });
      addFormats(this.ajv);
    }
    return this.ajv;
  }

  /**
   * Gets or compiles the validator for a schema object.
   * @param name Cache key, usually the schema's $id
   */
  static getValidator<T>(name: string, schema: object): ValidateFunction<T> {
    let validator = this.validators.get(name);
    if (!validator) {
      validator = this.getAjv().compile<T>(schema);
      this.validators.set(name, validator);
    }
    return validator as ValidateFunction<T>;
  }
}

/**
 * Converts ajv errors into field errors, using "root" for top-level failures.
 */
export function formatSchemaErrors(errors: ErrorObject[] | null | undefined): FieldError[] {
  return (errors ?? []).map((error) => ({
    field: error.instancePath || "root",
    message: error.message || "Validation failed",
    value: error.data,
  }));
}
