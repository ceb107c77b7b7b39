/**
 * Workflow nodes. Each node reads and mutates the run's RunState, catches its
 * own failures, and leaves a safe default behind so later stages still run.
 */

import { dataKeyFor } from '../lib/apps.js';
import { appDataCount } from '../lib/config.js';
import { errorMessage } from '../lib/errors.js';
import type { Logger } from '../lib/logger.js';
import type { TextGenerator } from '../lib/model-client.js';
import type { OutputPackager } from '../lib/output-manager.js';
import type { SchemaValidator } from '../lib/validation.js';
import { stageLabel } from '../lib/workflow-nodes.js';
import type { WorkflowNodeKey } from '../lib/workflow-nodes.js';
import type { GeneratorFactory } from '../generators/registry.js';
import { analysisStub, runProfileAnalyzer } from './profile-analyzer.js';
import { failedReflection, runQualityReflector, skippedReflection } from './quality-reflector.js';
import type { AppPayload, RunState } from './types.js';

export interface NodeDependencies {
  model: TextGenerator;
  generators: GeneratorFactory;
  validator: SchemaValidator;
  packager: OutputPackager;
  logger: Logger;
}

export type WorkflowNode = (state: RunState, deps: NodeDependencies) => Promise<void>;

function recordStageFailure(state: RunState, deps: NodeDependencies, stage: WorkflowNodeKey, err: unknown): string {
  const message = `${stageLabel(stage)} failed: ${errorMessage(err)}`;
  deps.logger.error({ err, stage }, message);
  state.errors.push(message);
  return message;
}

// ─── Profile analysis ────────────────────────────────────────────────

export const analyzeProfileNode: WorkflowNode = async (state, deps) => {
  state.current_step = 'analyze_profile';
  deps.logger.info('Starting profile analysis');
  try {
    state.analysis = await runProfileAnalyzer(
      { profile: state.user_profile, events: state.events, config: state.config },
      deps.model,
    );
  } catch (err) {
    recordStageFailure(state, deps, 'analyze_profile', err);
    state.analysis = analysisStub();
  }
};

// ─── Data generation ─────────────────────────────────────────────────

/**
 * Apps to (re)generate. A regeneration pass only covers apps whose last
 * validation failed; every other app keeps its payload.
 */
export function appsToGenerate(state: RunState): string[] {
  if (state.regeneration_attempts === 0) {
    return [...state.config.enabled_apps];
  }
  return state.config.enabled_apps.filter((app) => state.validation_results[app]?.is_valid === false);
}

export const generateDataNode: WorkflowNode = async (state, deps) => {
  state.current_step = 'generate_data';
  const apps = appsToGenerate(state);
  deps.logger.info({ apps, attempt: state.regeneration_attempts }, 'Starting data generation');

  try {
    const analysis = state.analysis ?? analysisStub();
    const generated: Record<string, AppPayload> = { ...state.generated_data };

    for (const appName of apps) {
      const count = appDataCount(state.config, appName);
      if (count === 0) {
        deps.logger.info({ app: appName }, 'Skipping generation (data volume is 0)');
        generated[appName] = {};
        continue;
      }

      try {
        const generator = deps.generators.getGenerator(appName);
        const payload = await generator.generate({
          profile: state.user_profile,
          events: state.events,
          analysis,
          count,
        });
        generated[appName] = payload;
        deps.logger.info(
          { app: appName, entries: payload[dataKeyFor(appName)]?.length ?? 0 },
          'App data generated',
        );
      } catch (err) {
        const message = `Failed to generate ${appName} data: ${errorMessage(err)}`;
        deps.logger.error({ err, app: appName }, message);
        state.errors.push(message);
        generated[appName] = {};
      }
    }

    state.generated_data = generated;
  } catch (err) {
    recordStageFailure(state, deps, 'generate_data', err);
    state.generated_data = {};
  }
};

// ─── Validation ──────────────────────────────────────────────────────

export const validateDataNode: WorkflowNode = async (state, deps) => {
  state.current_step = 'validate_data';
  deps.logger.info('Starting data validation');

  try {
    const results: RunState['validation_results'] = {};
    for (const [appName, payload] of Object.entries(state.generated_data)) {
      if (appDataCount(state.config, appName) === 0) continue;
      if (Object.keys(payload).length === 0) continue;
      results[appName] = deps.validator.validate(appName, payload);
    }
    state.validation_results = results;
  } catch (err) {
    recordStageFailure(state, deps, 'validate_data', err);
    state.validation_results = {};
  }
};

// ─── Quality reflection ──────────────────────────────────────────────

export const reflectQualityNode: WorkflowNode = async (state, deps) => {
  state.current_step = 'reflect_quality';

  if (!state.config.enable_reflection) {
    deps.logger.info('Skipping quality reflection (disabled)');
    state.reflection_results = skippedReflection();
    return;
  }

  deps.logger.info('Starting quality reflection');
  try {
    state.reflection_results = await runQualityReflector(
      {
        generated_data: state.generated_data,
        analysis: state.analysis,
        profile: state.user_profile,
        events: state.events,
        config: state.config,
      },
      deps.model,
    );
  } catch (err) {
    state.reflection_results = failedReflection(recordStageFailure(state, deps, 'reflect_quality', err));
  }
};

// ─── Output packaging ────────────────────────────────────────────────

export const packageOutputNode: WorkflowNode = async (state, deps) => {
  state.current_step = 'package_output';
  deps.logger.info('Starting output packaging');

  try {
    state.output_path = await deps.packager.save({
      generated_data: state.generated_data,
      validation_results: state.validation_results,
      reflection_results: state.reflection_results,
      user_profile: state.user_profile,
      events: state.events,
      analysis: state.analysis,
    });
  } catch (err) {
    recordStageFailure(state, deps, 'package_output', err);
    state.output_path = '';
  }
};

export const WORKFLOW_NODES: Record<WorkflowNodeKey, WorkflowNode> = {
  analyze_profile: analyzeProfileNode,
  generate_data: generateDataNode,
  validate_data: validateDataNode,
  reflect_quality: reflectQualityNode,
  package_output: packageOutputNode,
};
