import Ajv from "ajv";
import type { ErrorObject, Schema, ValidateFunction } from "ajv";
import addFormats from "ajv-formats";

/**
 * Single validation error in a flat, reportable shape.
 */
export interface SchemaValidationIssue {
  field: string;
  message: string;
  value: unknown;
}

/**
 * Cache of compiled validators keyed by schema name, to avoid
 * recompiling the same schema for every catalog, config or assessment file.
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
   * Gets or compiles the validator registered under `name`.
   */
  static getValidator<T>(name: string, schema: Schema): ValidateFunction<T> {
    const cached = this.validators.get(name);
    if (cached) {
      return cached as ValidateFunction<T>;
    }
    const validator = this.getAjv().compile<T>(schema);
    this.validators.set(name, validator);
    return validator;
  }

  /**
   * Clears the cache (useful for testing or schema updates).
   */
  static clearCache(): void {
    this.validators.clear();
    this.ajv = null;
  }

  static getCacheStats(): { cachedSchemas: number; schemasLoaded: string[] } {
    return {
      cachedSchemas: this.validators.size,
      schemasLoaded: Array.from(this.validators.keys()),
    };
  }
}

/**
 * Flattens AJV errors into field/message pairs.
 * Missing required properties are reported under the missing field name.
 */
export function formatValidationErrors(
  errors: ErrorObject[] | null | undefined
): SchemaValidationIssue[] {
  if (!errors) return [];
  return errors.map((error) => {
    const missing: unknown = error.params["missingProperty"];
    const base = error.instancePath || "";
    const field = typeof missing === "string"
      ? `${base}/${missing}`
      : base || "root";
    return {
      field,
      message: error.message || "Validation failed",
      value: error.data,
    };
  });
}
