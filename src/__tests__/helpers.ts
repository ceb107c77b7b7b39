import { vi } from 'vitest';
import type { Mock } from 'vitest';
import { createConfig } from '../lib/config.js';
import type { GenerationConfig, GenerationConfigInput } from '../lib/config.js';
import type { GenerateOptions, TextGenerator } from '../lib/model-client.js';
import type { AnalysisRecord } from '../agents/types.js';

export const WINDOW_START = new Date('2024-01-01T00:00:00.000Z');
export const WINDOW_END = new Date('2024-05-31T00:00:00.000Z');

export function makeConfig(overrides: GenerationConfigInput = {}): GenerationConfig {
  return createConfig({
    provider: 'openai',
    model: 'test-model',
    api_key: 'test-key',
    start_date: WINDOW_START,
    end_date: WINDOW_END,
    seed: 42,
    ...overrides,
  });
}

export type StubModel = TextGenerator & {
  generate: Mock<(prompt: string, options: GenerateOptions) => Promise<string>>;
};

/** Model stub routed by prompt text; anything unmatched rejects with `model down`. */
export function routedModel(routes: Array<[string, string]> = []): StubModel {
  const generate = vi.fn(async (prompt: string, _options: GenerateOptions): Promise<string> => {
    const match = routes.find(([marker]) => prompt.includes(marker));
    if (!match) throw new Error('model down');
    return match[1];
  });
  return { generate };
}

export function failingModel(): StubModel {
  return routedModel();
}

export function makeAnalysis(overrides: Partial<AnalysisRecord> = {}): AnalysisRecord {
  return {
    user_identity: { first_name: 'Jordan', middle_name: null, last_name: 'Lee', gender: 'female' },
    user_characteristics: { lifestyle: 'busy professional' },
    event_analysis: { event_types: ['work'] },
    app_usage_patterns: {},
    data_relationships: {},
    ...overrides,
  };
}

export const ANALYZER_MARKER = 'Analyze the following user profile';
export const REFLECTOR_MARKER = 'Evaluate the quality and realism';

export const GOOD_REFLECTION = JSON.stringify({
  overall_quality: 'good',
  realism_score: 8,
  diversity_score: 7,
  coherence_score: 8,
  strengths: ['Consistent timeline'],
  weaknesses: [],
  recommendations: [],
  critical_issues: [],
});
