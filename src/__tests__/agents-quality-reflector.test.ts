import { describe, it, expect } from 'vitest';
import {
  normalizeReflection,
  runQualityReflector,
  skippedReflection,
  summarizeGeneratedData,
  withQualityBar,
} from '../agents/quality-reflector.js';
import type { AppPayload } from '../agents/types.js';
import { failingModel, makeAnalysis, makeConfig, routedModel } from './helpers.js';

const GENERATED: Record<string, AppPayload> = {
  contacts: { contacts: [{ id: 'c1' }, { id: 'c2' }] },
  notes: { notes: [{ id: 'n1' }] },
  alarms: {},
};

function input(generated: Record<string, AppPayload> = GENERATED, overrides = {}) {
  return {
    generated_data: generated,
    analysis: makeAnalysis(),
    profile: { occupation: 'Chef' },
    events: ['Restaurant opening'],
    config: makeConfig({ data_volume: { contacts: 2, notes: 1, calendar: 0, sms: 0, emails: 0, reminders: 0, wallet: 0, alarms: 0 }, ...overrides }),
  };
}

describe('summarizeGeneratedData', () => {
  it('counts records for apps with volume and data', () => {
    const config = makeConfig({ data_volume: { contacts: 2, notes: 0, calendar: 0, sms: 0, emails: 0, reminders: 0, wallet: 0, alarms: 0 } });
    expect(summarizeGeneratedData(GENERATED, config)).toEqual({ contacts: 2 });
  });
});

describe('runQualityReflector', () => {
  it('skips the model call when nothing was generated', async () => {
    const model = failingModel();
    const result = await runQualityReflector(input({ contacts: {}, notes: { notes: [] } }), model);

    expect(result).toEqual(skippedReflection());
    expect(model.generate).not.toHaveBeenCalled();
  });

  it('scores the run and applies the quality bar', async () => {
    const model = routedModel([['Evaluate the quality', JSON.stringify({
      overall_quality: 'Good',
      realism_score: 15,
      diversity_score: 0,
      coherence_score: '7',
      strengths: ['Believable contacts', 42],
      weaknesses: 'none',
      recommendations: [],
      critical_issues: [],
      temporal_consistency: 'Timeline holds together',
    })]]);

    const result = await runQualityReflector(input(), model);

    expect(result).toEqual({
      overall_quality: 'good',
      realism_score: 10,
      diversity_score: 1,
      coherence_score: 7,
      strengths: ['Believable contacts'],
      weaknesses: [],
      recommendations: [],
      critical_issues: [],
      temporal_consistency: 'Timeline holds together',
      meets_quality_bar: true,
    });
    const [prompt, options] = model.generate.mock.calls[0];
    expect(options).toEqual({ temperature: 0.2, maxTokens: 1500 });
    expect(prompt).toContain('"contacts": 2');
    expect(prompt).toContain('"notes": 1');
    expect(prompt).not.toContain('"alarms"');
  });

  it('returns middling scores when the response cannot be parsed', async () => {
    const model = routedModel([['Evaluate', 'The data looks fine overall.']]);
    const result = await runQualityReflector(input(), model);

    expect(result).toEqual({
      overall_quality: 'unknown',
      realism_score: 5,
      diversity_score: 5,
      coherence_score: 5,
      strengths: [],
      weaknesses: ['Unable to parse reflection'],
      recommendations: [],
      critical_issues: [],
      meets_quality_bar: false,
    });
  });

  it('lets model failures propagate', async () => {
    await expect(runQualityReflector(input(), failingModel())).rejects.toThrow('model down');
  });
});

describe('normalizeReflection', () => {
  it('maps unknown labels to unknown and defaults missing scores to 5', () => {
    const result = normalizeReflection({ overall_quality: 'stellar' });
    expect(result.overall_quality).toBe('unknown');
    expect([result.realism_score, result.diversity_score, result.coherence_score]).toEqual([5, 5, 5]);
  });

  it('treats non-numeric scores as the minimum', () => {
    expect(normalizeReflection({ realism_score: 'high' }).realism_score).toBe(1);
  });
});

describe('withQualityBar', () => {
  it('compares the mean score against the minimum', () => {
    const base = normalizeReflection({ realism_score: 6, diversity_score: 6, coherence_score: 5 });
    expect(withQualityBar(base, 6).meets_quality_bar).toBe(false);
    expect(withQualityBar(base, 5.5).meets_quality_bar).toBe(true);
  });
});
