import { existsSync, readdirSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { isRecord } from './json-extract.js';

/** Repo-level `schemas/` directory, resolved the same from src/ and dist/. */
export const DEFAULT_SCHEMA_DIR = fileURLToPath(new URL('../../schemas/', import.meta.url));

export type JsonSchemaDocument = Record<string, unknown>;

/** Where per-app JSON Schema documents come from. */
export interface SchemaStore {
  has(appName: string): boolean;
  load(appName: string): JsonSchemaDocument;
  list(): string[];
  /** Human-readable location of an app's schema, for issue messages. */
  describe(appName: string): string;
}

export class FileSchemaStore implements SchemaStore {
  readonly directory: string;

  constructor(directory: string = DEFAULT_SCHEMA_DIR) {
    this.directory = directory;
  }

  describe(appName: string): string {
    return join(this.directory, `${appName}.json`);
  }

  has(appName: string): boolean {
    return existsSync(this.describe(appName));
  }

  load(appName: string): JsonSchemaDocument {
    const schemaPath = this.describe(appName);
    if (!existsSync(schemaPath)) {
      throw new Error(`Schema file not found: ${schemaPath}`);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(readFileSync(schemaPath, 'utf-8'));
    } catch (err) {
      throw new Error(
        `Invalid JSON in schema file ${schemaPath}: ${err instanceof Error ? err.message : String(err)}`,
      );
    }
    if (!isRecord(parsed)) {
      throw new Error(`Schema file ${schemaPath} does not contain a JSON object`);
    }
    return parsed;
  }

  list(): string[] {
    if (!existsSync(this.directory)) return [];
    return readdirSync(this.directory)
      .filter((f) => f.endsWith('.json'))
      .map((f) => f.slice(0, -'.json'.length))
      .sort();
  }
}

/** In-memory store keyed by app name. */
export class MemorySchemaStore implements SchemaStore {
  private readonly schemas: Map<string, JsonSchemaDocument>;

  constructor(schemas: Record<string, JsonSchemaDocument>) {
    this.schemas = new Map(Object.entries(schemas));
  }

  describe(appName: string): string {
    return `memory:${appName}`;
  }

  has(appName: string): boolean {
    return this.schemas.has(appName);
  }

  load(appName: string): JsonSchemaDocument {
    const schema = this.schemas.get(appName);
    if (!schema) throw new Error(`Schema not found: ${this.describe(appName)}`);
    return schema;
  }

  list(): string[] {
    return [...this.schemas.keys()].sort();
  }
}
