import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { PersonaAgent, validateInputs } from '../agents/persona-agent.js';
import { ConfigurationError } from '../lib/errors.js';
import { CONTACT_RELATIONSHIPS } from '../generators/contacts.js';
import { REFLECTOR_MARKER, failingModel } from './helpers.js';
import type { StubModel } from './helpers.js';

let root: string;

beforeEach(async () => {
  root = await mkdtemp(path.join(tmpdir(), 'persona-agent-'));
});

afterEach(async () => {
  await rm(root, { recursive: true, force: true });
});

function contactsOnlyAgent(model: StubModel = failingModel()) {
  return new PersonaAgent(
    {
      provider: 'openai',
      api_key: 'test-key',
      enabled_apps: ['contacts'],
      data_volume: { contacts: 5 },
      start_date: new Date('2024-01-01T00:00:00.000Z'),
      end_date: new Date('2024-05-31T00:00:00.000Z'),
      output_directory: root,
      seed: 11,
    },
    { model },
  );
}

const INVALID_INPUTS: Array<[unknown, unknown, string]> = [
  [null, ['a'], 'user_profile must be an object'],
  [['x'], ['a'], 'user_profile must be an object'],
  [{}, ['a'], 'user_profile cannot be empty'],
  [{ age: 30 }, 'a', 'events must be a list'],
  [{ age: 30 }, [], 'events list cannot be empty'],
  [{ age: 30 }, ['ok', 3], 'Event 1 must be a string'],
  [{ age: 30 }, ['ok', '   '], 'Event 1 cannot be empty'],
];

describe('validateInputs', () => {
  it.each(INVALID_INPUTS)('rejects %j / %j', (profile, events, message) => {
    expect(() => validateInputs(profile, events)).toThrow(message);
  });

  it('accepts a profile and events', () => {
    expect(() => validateInputs({ age: 30 }, ['Moved house'])).not.toThrow();
  });
});

describe('PersonaAgent', () => {
  it('rejects unknown apps at construction', () => {
    let caught: unknown;
    try {
      new PersonaAgent({ api_key: 'test-key', enabled_apps: ['fax'] });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ConfigurationError);
    expect(caught).toHaveProperty('issues', ['Invalid apps specified: fax']);
  });

  it('describes its configuration', () => {
    const info = contactsOnlyAgent().getConfigInfo();

    expect(info).toMatchObject({
      provider: 'openai',
      enabled_apps: ['contacts'],
      data_volume: { contacts: 5 },
      output_directory: root,
      time_range: { start: '2024-01-01T00:00:00.000Z', end: '2024-05-31T00:00:00.000Z', days: 151 },
      validation_settings: { strict_validation: true, max_validation_errors: 10 },
    });
  });

  it('generates, validates and packages a run end to end with the model down', async () => {
    const model = failingModel();
    const result = await contactsOnlyAgent(model).generate(
      { occupation: 'Librarian', age: 47 },
      ['Book fair in April'],
    );

    expect(result.success).toBe(true);
    expect(result.errors).toEqual([
      'Profile analysis failed: model down',
      'Quality reflection failed: model down',
    ]);
    expect(result.validation_results.contacts.is_valid).toBe(true);
    expect(path.dirname(result.output_path)).toBe(root);

    const contacts = JSON.parse(await readFile(path.join(result.output_path, 'contacts.json'), 'utf-8'));
    expect(contacts.contacts).toHaveLength(5);
    const relationships: unknown[] = result.generated_data.contacts.contacts.map((c) => c.relationship);
    expect(relationships.every((r) => CONTACT_RELATIONSHIPS.some((known) => known === r))).toBe(true);

    const reflectionCalls = model.generate.mock.calls.filter(([prompt]) => prompt.includes(REFLECTOR_MARKER));
    expect(reflectionCalls).toHaveLength(1);

    const metadata = JSON.parse(await readFile(path.join(result.output_path, 'metadata.json'), 'utf-8'));
    expect(metadata.generation_info.config.api_key).toBe('[REDACTED]');

    const summary = (await readFile(path.join(result.output_path, 'SUMMARY.md'), 'utf-8')).split('\n');
    expect(summary).toContain('| Contacts | 5 |');
    expect(summary).toContain('- **Contacts:** ✅ Passed');
  });

  it('validates inputs before streaming', () => {
    expect(() => contactsOnlyAgent().stream({}, ['x'])).toThrow('user_profile cannot be empty');
  });
});
