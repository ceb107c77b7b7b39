/**
 * PersonaAgent: caller-facing entry point. Validates inputs, owns one
 * workflow per configuration, and turns unexpected failures into a
 * `success: false` RunResult.
 */

import { createConfig, timeRangeDays, validateConfiguration } from '../lib/config.js';
import type { GenerationConfig, GenerationConfigInput } from '../lib/config.js';
import logger from '../lib/logger.js';
import { FileSchemaStore } from '../lib/schema-store.js';
import { LLM_MIN_INTERVAL_MS } from '../lib/llm.js';
import { RequestThrottle } from '../lib/throttle.js';
import { failureResult, PersonaWorkflow } from './workflow.js';
import type { PersonaWorkflowOptions, WorkflowStep } from './workflow.js';
import type { RunResult, UserProfile } from './types.js';

export interface ConfigInfo {
  provider: string;
  model: string;
  enabled_apps: string[];
  data_volume: Record<string, number>;
  time_range: { start: string; end: string; days: number };
  output_directory: string;
  validation_settings: { strict_validation: boolean; max_validation_errors: number };
}

/** Throws on a non-object or empty profile and on empty or non-string events. */
export function validateInputs(profile: unknown, events: unknown): asserts events is string[] {
  if (typeof profile !== 'object' || profile === null || Array.isArray(profile)) {
    throw new Error('user_profile must be an object');
  }
  if (Object.keys(profile).length === 0) {
    throw new Error('user_profile cannot be empty');
  }
  if (!Array.isArray(events)) {
    throw new Error('events must be a list');
  }
  if (events.length === 0) {
    throw new Error('events list cannot be empty');
  }
  events.forEach((event: unknown, i) => {
    if (typeof event !== 'string') {
      throw new Error(`Event ${i} must be a string`);
    }
    if (!event.trim()) {
      throw new Error(`Event ${i} cannot be empty`);
    }
  });
}

export class PersonaAgent {
  readonly config: GenerationConfig;
  private readonly workflow: PersonaWorkflow;
  private readonly options: PersonaWorkflowOptions;

  /**
   * Accepts a built config or raw input for `createConfig`. A
   * ConfigurationError from `createConfig` propagates.
   */
  constructor(config: GenerationConfig | GenerationConfigInput = {}, options: PersonaWorkflowOptions = {}) {
    this.config = isGenerationConfig(config)
      ? config
      : createConfig(config, { schemaStore: options.schemaStore });
    this.options = {
      ...options,
      throttle: options.throttle ?? new RequestThrottle({ minIntervalMs: LLM_MIN_INTERVAL_MS }),
    };
    this.workflow = new PersonaWorkflow(this.config, this.options);

    const issues = this.validateConfiguration();
    if (issues.length > 0) {
      logger.warn({ issues }, 'Configuration issues found');
    }
  }

  async generate(profile: UserProfile, events: string[]): Promise<RunResult> {
    validateInputs(profile, events);
    logger.info({ events: events.length }, 'Starting persona data generation');

    try {
      const result = await this.workflow.run(profile, events);
      if (result.success) {
        logger.info({ outputPath: result.output_path }, 'Generation completed');
      } else {
        logger.error({ error: result.error }, 'Generation failed');
      }
      return result;
    } catch (err) {
      logger.error({ err }, 'Unexpected error during generation');
      return failureResult(err);
    }
  }

  /** Step-by-step variant of generate(); inputs are validated before the first step. */
  stream(profile: UserProfile, events: string[]): AsyncGenerator<WorkflowStep, RunResult, void> {
    validateInputs(profile, events);
    return this.workflow.stream(profile, events);
  }

  getConfigInfo(): ConfigInfo {
    return {
      provider: this.config.provider,
      model: this.config.model,
      enabled_apps: [...this.config.enabled_apps],
      data_volume: { ...this.config.data_volume },
      time_range: {
        start: this.config.start_date.toISOString(),
        end: this.config.end_date.toISOString(),
        days: timeRangeDays(this.config),
      },
      output_directory: this.config.output_directory,
      validation_settings: {
        strict_validation: this.config.strict_validation,
        max_validation_errors: this.config.max_validation_errors,
      },
    };
  }

  validateConfiguration(): string[] {
    return validateConfiguration(this.config, this.options.schemaStore ?? new FileSchemaStore());
  }
}

function isGenerationConfig(value: GenerationConfig | GenerationConfigInput): value is GenerationConfig {
  return Object.isFrozen(value) && typeof value.api_key === 'string' && value.start_date instanceof Date;
}
