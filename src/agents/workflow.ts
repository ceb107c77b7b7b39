/**
 * PersonaWorkflow
 *
 * Fixed node graph:
 *   analyze_profile → generate_data → validate_data
 *     → (regenerate: generate_data | continue: reflect_quality)
 *     → package_output → done
 *
 * `run()` and `stream()` drive the same transition function; `run()` simply
 * drains the stream.
 */

import { randomUUID } from 'node:crypto';
import type { GenerationConfig } from '../lib/config.js';
import { errorMessage } from '../lib/errors.js';
import { createProvider } from '../lib/llm.js';
import { createRunLogger } from '../lib/logger.js';
import { ModelClient } from '../lib/model-client.js';
import type { TextGenerator } from '../lib/model-client.js';
import { FileOutputPackager } from '../lib/output-manager.js';
import type { OutputPackager } from '../lib/output-manager.js';
import type { SchemaStore } from '../lib/schema-store.js';
import type { RequestThrottle } from '../lib/throttle.js';
import { SchemaValidator } from '../lib/validation.js';
import type { WorkflowNodeKey, WorkflowStage } from '../lib/workflow-nodes.js';
import { GeneratorFactory, generatorRegistry } from '../generators/index.js';
import type { GeneratorRegistry } from '../generators/index.js';
import { WORKFLOW_NODES } from './nodes.js';
import type { NodeDependencies } from './nodes.js';
import type { RunResult, RunState, UserProfile } from './types.js';

export interface WorkflowStep {
  node: WorkflowNodeKey;
  next: WorkflowStage;
  state: Readonly<RunState>;
}

export interface PersonaWorkflowOptions {
  /** Replaces the provider-backed client, e.g. with a stub in tests. */
  model?: TextGenerator;
  throttle?: RequestThrottle;
  schemaStore?: SchemaStore;
  packager?: OutputPackager;
  registry?: GeneratorRegistry;
}

export type RegenerationDecision = 'regenerate' | 'continue';

/**
 * Regenerate while attempts remain and any app has a critical error or the
 * total error count exceeds the configured ceiling.
 */
export function shouldRegenerate(state: RunState): RegenerationDecision {
  const { config } = state;
  if (state.regeneration_attempts >= config.max_regeneration_attempts) {
    return 'continue';
  }
  const results = Object.values(state.validation_results);
  if (results.some((r) => r.critical_errors > 0)) {
    return 'regenerate';
  }
  const totalErrors = results.reduce((sum, r) => sum + r.total_errors, 0);
  return totalErrors > config.max_validation_errors ? 'regenerate' : 'continue';
}

/** Next stage after `stage` completes. Pure: the caller applies side effects of the edge. */
export function nextStage(stage: WorkflowStage, state: RunState): WorkflowNodeKey | 'done' {
  switch (stage) {
    case 'init': return 'analyze_profile';
    case 'analyze_profile': return 'generate_data';
    case 'generate_data': return 'validate_data';
    case 'validate_data':
      return shouldRegenerate(state) === 'regenerate' ? 'generate_data' : 'reflect_quality';
    case 'reflect_quality': return 'package_output';
    case 'package_output': return 'done';
    case 'done': return 'done';
  }
}

export function failureResult(error: unknown): RunResult {
  const message = errorMessage(error);
  return {
    success: false,
    error: message,
    output_path: '',
    generated_data: {},
    validation_results: {},
    reflection_results: {},
    errors: [message],
  };
}

export class PersonaWorkflow {
  private readonly config: GenerationConfig;
  private readonly options: PersonaWorkflowOptions;
  private readonly validator: SchemaValidator;
  private readonly model: TextGenerator;

  constructor(config: GenerationConfig, options: PersonaWorkflowOptions = {}) {
    this.config = config;
    this.options = options;
    this.validator = new SchemaValidator({
      schemaStore: options.schemaStore,
      strictValidation: config.strict_validation,
    });
    this.model = options.model ?? new ModelClient({
      provider: createProvider(config.provider, config.api_key),
      model: config.model,
      throttle: options.throttle,
    });
  }

  async run(profile: UserProfile, events: string[]): Promise<RunResult> {
    const steps = this.stream(profile, events);
    let step = await steps.next();
    while (!step.done) {
      step = await steps.next();
    }
    return step.value;
  }

  async *stream(profile: UserProfile, events: string[]): AsyncGenerator<WorkflowStep, RunResult, void> {
    const state = this.createInitialState(profile, events);
    const log = createRunLogger(state.run_id);
    log.info({ apps: this.config.enabled_apps }, 'Starting persona data generation workflow');

    const deps: NodeDependencies = {
      model: this.model,
      generators: new GeneratorFactory(
        { config: this.config, model: this.model, logger: log },
        this.options.registry ?? generatorRegistry,
      ),
      validator: this.validator,
      packager: this.options.packager ?? new FileOutputPackager(this.config, { logger: log }),
      logger: log,
    };

    let stage = nextStage('init', state);
    try {
      while (stage !== 'done') {
        const node = stage;
        await WORKFLOW_NODES[node](state, deps);

        const next = nextStage(node, state);
        if (node === 'validate_data' && next === 'generate_data') {
          state.regeneration_attempts += 1;
          log.warn(
            { attempt: state.regeneration_attempts, max: this.config.max_regeneration_attempts },
            'Validation failed, regenerating failed apps',
          );
        }
        yield { node, next, state };
        stage = next;
      }
    } catch (err) {
      log.error({ err }, 'Workflow failed');
      return failureResult(err);
    }

    state.current_step = 'done';
    log.info({ outputPath: state.output_path, errors: state.errors.length }, 'Workflow completed');
    return {
      success: true,
      output_path: state.output_path,
      generated_data: state.generated_data,
      validation_results: state.validation_results,
      reflection_results: state.reflection_results ?? {},
      errors: state.errors,
    };
  }

  private createInitialState(profile: UserProfile, events: string[]): RunState {
    return {
      run_id: randomUUID(),
      config: this.config,
      user_profile: profile,
      events,
      analysis: null,
      generated_data: {},
      validation_results: {},
      reflection_results: null,
      errors: [],
      current_step: 'init',
      output_path: '',
      regeneration_attempts: 0,
    };
  }
}
