/**
 * Shared type definitions for the persona generation pipeline.
 *
 * Every stage reads from and writes to one RunState owned by a single run.
 */

import type { GenerationConfig } from '../lib/config.js';
import type { ValidationResult } from '../lib/validation.js';
import type { WorkflowStage } from '../lib/workflow-nodes.js';

export type { ValidationResult };

/** Free-form profile supplied by the caller (occupation, age, lifestyle, ...). */
export type UserProfile = Record<string, unknown>;

export type JsonRecord = Record<string, unknown>;

/** `{ [data_key]: records }`, or `{}` for an app with nothing to generate. */
export type AppPayload = Record<string, JsonRecord[]>;

// ─── Profile analysis ────────────────────────────────────────────────

export interface UserIdentity {
  first_name: string;
  middle_name: string | null;
  last_name: string;
  gender: string;
}

export interface AnalysisRecord {
  user_identity: UserIdentity;
  user_characteristics: Record<string, unknown>;
  event_analysis: Record<string, unknown>;
  app_usage_patterns: Record<string, unknown>;
  data_relationships: Record<string, unknown>;
}

// ─── Quality reflection ──────────────────────────────────────────────

export type OverallQuality = 'excellent' | 'good' | 'fair' | 'poor' | 'unknown' | 'skipped';

export interface ReflectionResult {
  overall_quality: OverallQuality;
  realism_score: number;
  diversity_score: number;
  coherence_score: number;
  strengths: string[];
  weaknesses: string[];
  recommendations: string[];
  critical_issues: string[];
  cross_app_consistency?: string;
  temporal_consistency?: string;
  character_consistency?: string;
  meets_quality_bar?: boolean;
}

// ─── Run state ───────────────────────────────────────────────────────

export interface RunState {
  run_id: string;
  config: GenerationConfig;
  user_profile: UserProfile;
  events: string[];
  analysis: AnalysisRecord | null;
  generated_data: Record<string, AppPayload>;
  validation_results: Record<string, ValidationResult>;
  reflection_results: ReflectionResult | null;
  errors: string[];
  current_step: WorkflowStage;
  output_path: string;
  regeneration_attempts: number;
}

export interface RunResult {
  success: boolean;
  output_path: string;
  generated_data: Record<string, AppPayload>;
  validation_results: Record<string, ValidationResult>;
  reflection_results: ReflectionResult | Record<string, never>;
  errors: string[];
  error?: string;
}
