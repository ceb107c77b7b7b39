import AjvModule from 'ajv';
import type { ErrorObject, ValidateFunction } from 'ajv';
import addFormatsModule from 'ajv-formats';
import logger from './logger.js';
import { dataKeyFor } from './apps.js';
import { isRecord } from './json-extract.js';
import { FileSchemaStore } from './schema-store.js';
import type { SchemaStore } from './schema-store.js';

// Both packages are CommonJS with a `default` export property.
const Ajv = AjvModule.default;
const addFormats = addFormatsModule.default;

export interface ValidationResult {
  is_valid: boolean;
  app_name: string;
  entry_count: number;
  errors: string[];
  warnings: string[];
  total_errors: number;
  critical_errors: number;
}

export interface ValidationSummary {
  valid_apps: string[];
  invalid_apps: string[];
  validation_rate: number;
}

export interface AggregateValidationResult {
  overall_valid: boolean;
  total_apps: number;
  total_errors: number;
  critical_errors: number;
  app_results: Record<string, ValidationResult>;
  summary: ValidationSummary;
}

export interface EntryValidationResult {
  is_valid: boolean;
  errors: string[];
}

export type SchemaInfo =
  | {
      app_name: string;
      schema_title: string;
      schema_version: string;
      required_fields: string[];
      optional_fields: string[];
    }
  | { app_name: string; error: string };

const CRITICAL_PATTERNS = ['required', 'type', 'format', 'additionalproperties'];

export function isCriticalError(message: string): boolean {
  const lower = message.toLowerCase();
  return CRITICAL_PATTERNS.some((p) => lower.includes(p));
}

export function formatValidationError(appName: string, error: ErrorObject): string {
  const path = error.instancePath || '/';
  return `Validation error in ${appName}: ${path} ${error.message ?? 'is invalid'} (${error.keyword})`;
}

function countEntries(appName: string, payload: Record<string, unknown>): number {
  const records = payload[dataKeyFor(appName)];
  return Array.isArray(records) ? records.length : 0;
}

export interface SchemaValidatorOptions {
  schemaStore?: SchemaStore;
  /** When false, JSON Schema `format` keywords are not checked. */
  strictValidation?: boolean;
}

/**
 * Validates app payloads against their JSON Schemas. Ajv stops at the first
 * violation, so each validate() call reports at most one error.
 */
export class SchemaValidator {
  private readonly store: SchemaStore;
  private readonly ajv: InstanceType<typeof Ajv>;
  private readonly compiled = new Map<string, ValidateFunction>();
  private readonly compiledItems = new Map<string, ValidateFunction>();

  constructor(options: SchemaValidatorOptions = {}) {
    this.store = options.schemaStore ?? new FileSchemaStore();
    const strict = options.strictValidation ?? true;
    this.ajv = new Ajv({ allErrors: false, strict: false, validateFormats: strict });
    if (strict) {
      addFormats(this.ajv);
    }
  }

  private compile(appName: string): ValidateFunction {
    const cached = this.compiled.get(appName);
    if (cached) return cached;
    const fn = this.ajv.compile(this.store.load(appName));
    this.compiled.set(appName, fn);
    return fn;
  }

  private compileItem(appName: string): ValidateFunction | null {
    const cached = this.compiledItems.get(appName);
    if (cached) return cached;

    const schema = this.store.load(appName);
    const properties = isRecord(schema.properties) ? schema.properties : {};
    const arrayDef = properties[dataKeyFor(appName)];
    if (!isRecord(arrayDef) || !isRecord(arrayDef.items)) return null;

    const fn = this.ajv.compile(arrayDef.items);
    this.compiledItems.set(appName, fn);
    return fn;
  }

  validate(appName: string, payload: Record<string, unknown>): ValidationResult {
    const entryCount = countEntries(appName, payload);
    let validateFn: ValidateFunction;
    try {
      validateFn = this.compile(appName);
    } catch (err) {
      const message = `Unexpected validation error in ${appName}: ${err instanceof Error ? err.message : String(err)}`;
      logger.error({ app: appName }, message);
      return {
        is_valid: false,
        app_name: appName,
        entry_count: entryCount,
        errors: [message],
        warnings: [],
        total_errors: 1,
        critical_errors: 1,
      };
    }

    if (validateFn(payload)) {
      logger.info({ app: appName, entryCount }, 'Validation passed');
      return {
        is_valid: true,
        app_name: appName,
        entry_count: entryCount,
        errors: [],
        warnings: [],
        total_errors: 0,
        critical_errors: 0,
      };
    }

    const first = validateFn.errors?.[0];
    const message = first
      ? formatValidationError(appName, first)
      : `Validation error in ${appName}: payload rejected`;
    // The instance path names fields such as `type`, so only message and keyword count.
    const critical = first ? isCriticalError(`${first.message ?? ''} (${first.keyword})`) : false;
    logger.warn({ app: appName }, message);
    return {
      is_valid: false,
      app_name: appName,
      entry_count: entryCount,
      errors: [message],
      warnings: [],
      total_errors: 1,
      critical_errors: critical ? 1 : 0,
    };
  }

  /** Validates every non-empty payload and aggregates the results. */
  validateAll(generated: Record<string, Record<string, unknown>>): AggregateValidationResult {
    const appResults: Record<string, ValidationResult> = {};
    let totalErrors = 0;
    let criticalErrors = 0;

    for (const [appName, payload] of Object.entries(generated)) {
      if (Object.keys(payload).length === 0) continue;
      const result = this.validate(appName, payload);
      appResults[appName] = result;
      totalErrors += result.total_errors;
      criticalErrors += result.critical_errors;
    }

    const results = Object.values(appResults);
    const validApps = results.filter((r) => r.is_valid).map((r) => r.app_name);
    const invalidApps = results.filter((r) => !r.is_valid).map((r) => r.app_name);

    return {
      overall_valid: criticalErrors === 0,
      total_apps: results.length,
      total_errors: totalErrors,
      critical_errors: criticalErrors,
      app_results: appResults,
      summary: {
        valid_apps: validApps,
        invalid_apps: invalidApps,
        validation_rate: results.length > 0 ? validApps.length / results.length : 0,
      },
    };
  }

  validateEntry(appName: string, entry: unknown): EntryValidationResult {
    let validateFn: ValidateFunction | null;
    try {
      validateFn = this.compileItem(appName);
    } catch (err) {
      return { is_valid: false, errors: [`Validation error: ${err instanceof Error ? err.message : String(err)}`] };
    }
    if (!validateFn) {
      return { is_valid: false, errors: [`No item schema for ${appName}`] };
    }
    if (validateFn(entry)) {
      return { is_valid: true, errors: [] };
    }
    return {
      is_valid: false,
      errors: (validateFn.errors ?? []).map((e) => formatValidationError(appName, e)),
    };
  }

  getSchemaInfo(appName: string): SchemaInfo {
    try {
      const schema = this.store.load(appName);
      const required: string[] = [];
      const optional: string[] = [];
      const properties = isRecord(schema.properties) ? schema.properties : {};

      for (const [propName, propDef] of Object.entries(properties)) {
        if (!isRecord(propDef) || !isRecord(propDef.items) || !isRecord(propDef.items.properties)) continue;
        const itemRequired = Array.isArray(propDef.items.required)
          ? propDef.items.required.filter((f): f is string => typeof f === 'string')
          : [];
        required.push(...itemRequired.map((field) => `${propName}.${field}`));
        for (const field of Object.keys(propDef.items.properties)) {
          if (!itemRequired.includes(field)) optional.push(`${propName}.${field}`);
        }
      }

      return {
        app_name: appName,
        schema_title: typeof schema.title === 'string' ? schema.title : 'Unknown',
        schema_version: typeof schema.$schema === 'string' ? schema.$schema : 'Unknown',
        required_fields: required,
        optional_fields: optional,
      };
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger.error({ app: appName, error: message }, 'Failed to read schema info');
      return { app_name: appName, error: message };
    }
  }

  getAvailableSchemas(): string[] {
    return this.store.list();
  }
}
