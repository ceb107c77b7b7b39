import { z } from 'zod';
import { APP_NAMES } from './apps.js';
import { ConfigurationError } from './errors.js';
import { PROVIDER_NAMES, DEFAULT_MODELS, API_KEY_ENV, apiKeyFromEnv, defaultProviderName } from './llm.js';
import type { ProviderName } from './llm.js';
import { FileSchemaStore } from './schema-store.js';
import type { SchemaStore } from './schema-store.js';
import { generatorRegistry } from '../generators/index.js';

export const DEFAULT_DATA_VOLUME: Record<string, number> = {
  contacts: 15,
  calendar: 20,
  sms: 30,
  emails: 25,
  reminders: 18,
  notes: 12,
  wallet: 8,
  alarms: 10,
};

const HIGH_VOLUME_THRESHOLD = 1000;
const DAY_MS = 24 * 60 * 60 * 1000;

export const GenerationConfigInputSchema = z.object({
  provider: z.enum(PROVIDER_NAMES).optional(),
  model: z.string().min(1).optional(),
  api_key: z.string().optional(),
  temperature: z.number().min(0).max(2).default(0.7),
  max_tokens: z.number().int().positive().default(4000),
  start_date: z.coerce.date().default(() => new Date('2024-01-01T00:00:00.000Z')),
  end_date: z.coerce.date().default(() => new Date('2024-05-31T00:00:00.000Z')),
  data_volume: z.record(z.number().int().nonnegative()).default(DEFAULT_DATA_VOLUME),
  enabled_apps: z.array(z.string().min(1)).default([...APP_NAMES]),
  strict_validation: z.boolean().default(true),
  max_validation_errors: z.number().int().nonnegative().default(10),
  enable_reflection: z.boolean().default(true),
  min_quality_score: z.number().min(0).max(10).default(6),
  use_fallback: z.boolean().default(true),
  max_regeneration_attempts: z.number().int().nonnegative().default(3),
  seed: z.number().int().optional(),
  output_directory: z.string().min(1).default(() => process.env.OUTPUT_DIR ?? './output'),
  create_summary_report: z.boolean().default(true),
  include_metadata: z.boolean().default(true),
}).strict();

export type GenerationConfigInput = z.input<typeof GenerationConfigInputSchema>;

export interface GenerationConfig {
  readonly provider: ProviderName;
  readonly model: string;
  readonly api_key: string;
  readonly temperature: number;
  readonly max_tokens: number;
  readonly start_date: Date;
  readonly end_date: Date;
  readonly data_volume: Readonly<Record<string, number>>;
  readonly enabled_apps: readonly string[];
  readonly strict_validation: boolean;
  readonly max_validation_errors: number;
  readonly enable_reflection: boolean;
  readonly min_quality_score: number;
  readonly use_fallback: boolean;
  readonly max_regeneration_attempts: number;
  readonly seed?: number;
  readonly output_directory: string;
  readonly create_summary_report: boolean;
  readonly include_metadata: boolean;
}

export interface ConfigDependencies {
  schemaStore?: SchemaStore;
  /** Defaults to the generator registry. */
  isRegisteredApp?: (appName: string) => boolean;
}

/**
 * Builds an immutable GenerationConfig. Every hard failure is collected and
 * raised together as one ConfigurationError.
 */
export function createConfig(
  input: GenerationConfigInput = {},
  deps: ConfigDependencies = {},
): GenerationConfig {
  const parsed = GenerationConfigInputSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigurationError(
      'Invalid configuration',
      parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`),
    );
  }

  const values = parsed.data;
  const schemaStore = deps.schemaStore ?? new FileSchemaStore();
  const isRegisteredApp = deps.isRegisteredApp ?? ((app: string) => generatorRegistry.has(app));
  const provider = values.provider ?? defaultProviderName();
  const apiKey = values.api_key?.trim() ? values.api_key : apiKeyFromEnv(provider);
  const issues: string[] = [];

  if (values.start_date.getTime() >= values.end_date.getTime()) {
    issues.push('start_date must be before end_date');
  }

  const unknownApps = values.enabled_apps.filter((app) => !isRegisteredApp(app));
  if (unknownApps.length > 0) {
    issues.push(`Invalid apps specified: ${unknownApps.join(', ')}`);
  }

  for (const app of values.enabled_apps) {
    if (unknownApps.includes(app)) continue;
    if (!(app in values.data_volume)) {
      issues.push(`No data volume specified for enabled app: ${app}`);
    }
    if (!schemaStore.has(app)) {
      issues.push(`Schema file missing for ${app}: ${schemaStore.describe(app)}`);
    }
  }

  if (!apiKey) {
    issues.push(`API key must be provided via api_key or ${API_KEY_ENV[provider]}`);
  }

  if (issues.length > 0 || !apiKey) {
    throw new ConfigurationError('Invalid configuration', issues);
  }

  const config: GenerationConfig = {
    provider,
    model: values.model ?? DEFAULT_MODELS[provider],
    api_key: apiKey,
    temperature: values.temperature,
    max_tokens: values.max_tokens,
    start_date: values.start_date,
    end_date: values.end_date,
    data_volume: Object.freeze({ ...values.data_volume }),
    enabled_apps: Object.freeze([...new Set(values.enabled_apps)]),
    strict_validation: values.strict_validation,
    max_validation_errors: values.max_validation_errors,
    enable_reflection: values.enable_reflection,
    min_quality_score: values.min_quality_score,
    use_fallback: values.use_fallback,
    max_regeneration_attempts: values.max_regeneration_attempts,
    ...(values.seed !== undefined && { seed: values.seed }),
    output_directory: values.output_directory,
    create_summary_report: values.create_summary_report,
    include_metadata: values.include_metadata,
  };
  return Object.freeze(config);
}

/**
 * Non-fatal review of a configuration. Returns human-readable issues; an
 * empty list means nothing looks off.
 */
export function validateConfiguration(
  config: GenerationConfig,
  schemaStore: SchemaStore = new FileSchemaStore(),
): string[] {
  const issues: string[] = [];

  if (!config.api_key.trim()) {
    issues.push('API key is required');
  }
  if (config.start_date.getTime() >= config.end_date.getTime()) {
    issues.push('Start date must be before end date');
  }

  for (const [app, count] of Object.entries(config.data_volume)) {
    if (count < 0) {
      issues.push(`Data volume for ${app} cannot be negative`);
    }
    if (count > HIGH_VOLUME_THRESHOLD) {
      issues.push(`Data volume for ${app} is very high (${count}), consider reducing`);
    }
  }

  for (const app of config.enabled_apps) {
    if (!(app in config.data_volume)) {
      issues.push(`No data volume specified for enabled app: ${app}`);
    }
  }
  for (const app of config.enabled_apps) {
    if (!schemaStore.has(app)) {
      issues.push(`Schema file missing for ${app}: ${schemaStore.describe(app)}`);
    }
  }

  return issues;
}

export function appDataCount(config: GenerationConfig, appName: string): number {
  return config.data_volume[appName] ?? 0;
}

export function enabledAppsWithData(config: GenerationConfig): string[] {
  return config.enabled_apps.filter((app) => appDataCount(config, app) > 0);
}

export function timeRangeDays(config: GenerationConfig): number {
  return Math.floor((config.end_date.getTime() - config.start_date.getTime()) / DAY_MS);
}

/** Serializable view with the API key redacted. */
export function configToJSON(config: GenerationConfig): Record<string, unknown> {
  return {
    ...config,
    api_key: '[REDACTED]',
    start_date: config.start_date.toISOString(),
    end_date: config.end_date.toISOString(),
    data_volume: { ...config.data_volume },
    enabled_apps: [...config.enabled_apps],
  };
}
