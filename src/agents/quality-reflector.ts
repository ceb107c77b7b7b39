/**
 * Quality Reflector
 *
 * Second model pass over the finished run: scores realism, diversity and
 * coherence on 1-10 and lists strengths, weaknesses and critical issues.
 * Only a summary of record counts is sent, never the records themselves.
 */

import { dataKeyFor } from '../lib/apps.js';
import { extractJsonObject } from '../lib/json-extract.js';
import type { GenerationConfig } from '../lib/config.js';
import type { TextGenerator } from '../lib/model-client.js';
import type {
  AnalysisRecord,
  AppPayload,
  OverallQuality,
  ReflectionResult,
  UserProfile,
} from './types.js';

export interface QualityReflectorInput {
  generated_data: Record<string, AppPayload>;
  analysis: AnalysisRecord | null;
  profile: UserProfile;
  events: string[];
  config: GenerationConfig;
}

const QUALITY_LABELS: readonly OverallQuality[] = ['excellent', 'good', 'fair', 'poor'];

export function skippedReflection(): ReflectionResult {
  return {
    overall_quality: 'skipped',
    realism_score: 0,
    diversity_score: 0,
    coherence_score: 0,
    strengths: [],
    weaknesses: [],
    recommendations: [],
    critical_issues: [],
  };
}

export function failedReflection(message: string): ReflectionResult {
  return {
    overall_quality: 'unknown',
    realism_score: 0,
    diversity_score: 0,
    coherence_score: 0,
    strengths: [],
    weaknesses: [],
    recommendations: [],
    critical_issues: [message],
    meets_quality_bar: false,
  };
}

/** Record counts per app for apps with a positive volume and at least one record. */
export function summarizeGeneratedData(
  generated: Record<string, AppPayload>,
  config: GenerationConfig,
): Record<string, number> {
  const summary: Record<string, number> = {};
  for (const [appName, payload] of Object.entries(generated)) {
    if ((config.data_volume[appName] ?? 0) <= 0) continue;
    const records = payload[dataKeyFor(appName)];
    if (Array.isArray(records) && records.length > 0) {
      summary[appName] = records.length;
    }
  }
  return summary;
}

function buildReflectionPrompt(input: QualityReflectorInput, summary: Record<string, number>): string {
  return `
Evaluate the quality and realism of the generated phone app data.

USER PROFILE: ${JSON.stringify(input.profile, null, 2)}
EVENTS: ${JSON.stringify(input.events)}
ANALYSIS: ${JSON.stringify(input.analysis ?? {}, null, 2)}
DATA SUMMARY: ${JSON.stringify(summary, null, 2)}

Please provide a comprehensive quality assessment in JSON format:
{
    "overall_quality": "excellent|good|fair|poor",
    "realism_score": 1-10,
    "diversity_score": 1-10,
    "coherence_score": 1-10,
    "strengths": ["list of strong points"],
    "weaknesses": ["list of areas for improvement"],
    "cross_app_consistency": "assessment of data relationships across apps",
    "temporal_consistency": "assessment of timeline coherence",
    "character_consistency": "how well data matches the user profile",
    "recommendations": ["suggestions for improvement"],
    "critical_issues": ["serious problems that need addressing"]
}

Focus on whether the data feels authentic and whether it tells a coherent story about this person's digital life.
`;
}

/**
 * Run the reflector. Returns the skipped result without a model call when no
 * app produced records. Model-call failures propagate to the caller.
 */
export async function runQualityReflector(
  input: QualityReflectorInput,
  model: TextGenerator,
): Promise<ReflectionResult> {
  const summary = summarizeGeneratedData(input.generated_data, input.config);
  if (Object.keys(summary).length === 0) {
    return skippedReflection();
  }

  const response = await model.generate(buildReflectionPrompt(input, summary), {
    temperature: 0.2,
    maxTokens: 1500,
  });

  const parsed = extractJsonObject(response);
  if (!parsed) {
    return withQualityBar({
      overall_quality: 'unknown',
      realism_score: 5,
      diversity_score: 5,
      coherence_score: 5,
      strengths: [],
      weaknesses: ['Unable to parse reflection'],
      recommendations: [],
      critical_issues: [],
    }, input.config.min_quality_score);
  }

  return withQualityBar(normalizeReflection(parsed), input.config.min_quality_score);
}

// ─── Normalization helpers ───────────────────────────────────────────

export function normalizeReflection(raw: Record<string, unknown>): ReflectionResult {
  const quality = String(raw.overall_quality ?? '').toLowerCase();
  const result: ReflectionResult = {
    overall_quality: QUALITY_LABELS.find((q) => q === quality) ?? 'unknown',
    realism_score: normalizeScore(raw.realism_score),
    diversity_score: normalizeScore(raw.diversity_score),
    coherence_score: normalizeScore(raw.coherence_score),
    strengths: normalizeList(raw.strengths),
    weaknesses: normalizeList(raw.weaknesses),
    recommendations: normalizeList(raw.recommendations),
    critical_issues: normalizeList(raw.critical_issues),
  };
  for (const key of ['cross_app_consistency', 'temporal_consistency', 'character_consistency'] as const) {
    const value = raw[key];
    if (typeof value === 'string' && value.trim()) result[key] = value.trim();
  }
  return result;
}

/** Bar is met when the mean of the three scores reaches the configured minimum. */
export function withQualityBar(result: ReflectionResult, minQualityScore: number): ReflectionResult {
  const mean = (result.realism_score + result.diversity_score + result.coherence_score) / 3;
  return { ...result, meets_quality_bar: mean >= minQualityScore };
}

function normalizeScore(value: unknown): number {
  return Math.round(clamp(Number(value ?? 5), 1, 10));
}

function normalizeList(raw: unknown): string[] {
  if (!Array.isArray(raw)) return [];
  return raw.map((item) => (typeof item === 'string' ? item.trim() : '')).filter(Boolean);
}

function clamp(value: number, min: number, max: number): number {
  if (isNaN(value)) return min;
  return Math.max(min, Math.min(max, value));
}
