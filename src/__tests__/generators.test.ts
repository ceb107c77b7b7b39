import { describe, it, expect } from 'vitest';
import { APP_NAMES, dataKeyFor } from '../lib/apps.js';
import { SchemaValidator } from '../lib/validation.js';
import { ContactsGenerator, GeneratorFactory, GeneratorRegistry, generatorRegistry } from '../generators/index.js';
import type { JsonRecord } from '../agents/types.js';
import { failingModel, makeAnalysis, makeConfig, routedModel, WINDOW_END, WINDOW_START } from './helpers.js';

const TIMESTAMP_FIELDS = new Set([
  'created_date', 'modified_date', 'start_datetime', 'end_datetime', 'timestamp', 'due_date',
  'completion_date', 'last_modified', 'last_triggered', 'next_trigger',
]);

/** Every generator-stamped timestamp anywhere inside a record. */
function collectTimestamps(value: unknown, out: string[] = []): string[] {
  if (Array.isArray(value)) {
    value.forEach((item) => collectTimestamps(item, out));
  } else if (typeof value === 'object' && value !== null) {
    for (const [key, child] of Object.entries(value)) {
      if (TIMESTAMP_FIELDS.has(key) && typeof child === 'string') out.push(child);
      else collectTimestamps(child, out);
    }
  }
  return out;
}

const PROFILE = { occupation: 'Software Engineer', age: 29, lifestyle: 'active and social' };
const EVENTS = ['Weekly team standup', 'Sister visiting in March'];

function request(count: number) {
  return { profile: PROFILE, events: EVENTS, analysis: makeAnalysis(), count };
}

function idFieldFor(app: string): string {
  return app === 'sms' ? 'conversation_id' : 'id';
}

describe.each(APP_NAMES)('%s fallback synthesis', (app) => {
  const config = makeConfig();
  const factory = new GeneratorFactory({ config, model: failingModel() });

  it('returns exactly the requested number of records with unique ids', async () => {
    const payload = await factory.getGenerator(app).generate(request(12));
    const records = payload[dataKeyFor(app)];

    expect(records).toHaveLength(12);
    const ids = records.map((r) => r[idFieldFor(app)]);
    expect(ids.every((id) => typeof id === 'string' && id.length > 0)).toBe(true);
    expect(new Set(ids).size).toBe(12);
  });

  it('keeps every stamped timestamp inside the window', async () => {
    const payload = await factory.getGenerator(app).generate(request(15));
    const stamps = collectTimestamps(payload[dataKeyFor(app)]);

    expect(stamps.length).toBeGreaterThan(0);
    for (const stamp of stamps) {
      const time = new Date(stamp).getTime();
      expect(time).toBeGreaterThanOrEqual(WINDOW_START.getTime());
      expect(time).toBeLessThanOrEqual(WINDOW_END.getTime());
    }
  });

  it('produces records that pass the bundled schema', async () => {
    const payload = await factory.getGenerator(app).generate(request(20));
    const result = new SchemaValidator().validate(app, payload);
    expect(result.errors).toEqual([]);
    expect(result.is_valid).toBe(true);
  });

  it('is deterministic for a fixed seed', async () => {
    const other = new GeneratorFactory({ config, model: failingModel() });
    const first = await factory.getGenerator(app).generate(request(5));
    const second = await other.getGenerator(app).generate(request(5));
    expect(second).toEqual(first);
  });
});

describe('BaseGenerator', () => {
  it('returns an empty collection for a zero count without calling the model', async () => {
    const model = failingModel();
    const generator = new ContactsGenerator({ config: makeConfig(), model });

    expect(await generator.generate(request(0))).toEqual({ contacts: [] });
    expect(model.generate).not.toHaveBeenCalled();
  });

  it('returns nothing when the model fails and fallback is disabled', async () => {
    const generator = new ContactsGenerator({ config: makeConfig({ use_fallback: false }), model: failingModel() });
    expect(await generator.generate(request(4))).toEqual({ contacts: [] });
  });

  it('passes the configured sampling options to the model', async () => {
    const model = failingModel();
    const generator = new ContactsGenerator({ config: makeConfig({ temperature: 0.4, max_tokens: 1234 }), model });
    await generator.generate(request(1));

    expect(model.generate).toHaveBeenCalledTimes(1);
    expect(model.generate.mock.calls[0][1]).toEqual({ temperature: 0.4, maxTokens: 1234 });
    expect(model.generate.mock.calls[0][0]).toContain('Generate 1 realistic contacts entries');
  });

  it('keeps parsed records, tops up the shortfall, and repairs ids', async () => {
    const response = JSON.stringify({
      contacts: [
        { id: 'c1', first_name: 'Ana', last_name: 'Diaz', created_date: '' },
        { id: 'c1', first_name: 'Ben', last_name: 'Okafor' },
        'not a record',
      ],
    });
    const generator = new ContactsGenerator({
      config: makeConfig(),
      model: routedModel([['contacts', `Sure!\n\`\`\`json\n${response}\n\`\`\``]]),
    });

    const { contacts } = await generator.generate(request(4));

    expect(contacts).toHaveLength(4);
    expect(contacts[0].id).toBe('c1');
    expect(contacts[0].first_name).toBe('Ana');
    expect(contacts[1].first_name).toBe('Ben');
    expect(contacts[1].id).toMatch(/^contact_[a-z0-9]{8}_3$/);
    expect(new Set(contacts.map((c: JsonRecord) => c.id)).size).toBe(4);

    const backfilled = new Date(String(contacts[0].created_date)).getTime();
    expect(backfilled).toBeGreaterThanOrEqual(WINDOW_START.getTime());
    expect(backfilled).toBeLessThanOrEqual(WINDOW_END.getTime());
  });

  it('truncates an oversized model response to the requested count', async () => {
    const response = JSON.stringify({
      notes: Array.from({ length: 6 }, (_, i) => ({ id: `n${i}`, title: `Note ${i}` })),
    });
    const factory = new GeneratorFactory({ config: makeConfig(), model: routedModel([['notes', response]]) });
    const { notes } = await factory.getGenerator('notes').generate(request(3));

    expect(notes.map((n) => n.id)).toEqual(['n0', 'n1', 'n2']);
  });

  it('numbers SMS messages after their conversation', async () => {
    const factory = new GeneratorFactory({ config: makeConfig(), model: failingModel() });
    const { conversations } = await factory.getGenerator('sms').generate(request(3));

    for (const conversation of conversations) {
      const messages = conversation.messages;
      if (!Array.isArray(messages)) throw new Error('messages missing');
      messages.forEach((message: JsonRecord, i: number) => {
        expect(message.id).toBe(`${String(conversation.conversation_id)}_msg_${i + 1}`);
      });
    }
  });

  it('addresses fallback email from the analyzed identity', async () => {
    const factory = new GeneratorFactory({ config: makeConfig(), model: failingModel() });
    const { emails } = await factory.getGenerator('emails').generate(request(6));
    expect(emails.every((e) => e.account === 'jordan.lee@example.com')).toBe(true);
  });
});

describe('GeneratorRegistry and GeneratorFactory', () => {
  it('registers every built-in app', () => {
    expect(generatorRegistry.list()).toEqual([...APP_NAMES]);
    expect(generatorRegistry.describe()).toContainEqual({ app_name: 'wallet', data_key: 'passes' });
  });

  it('caches one generator per app', () => {
    const factory = new GeneratorFactory({ config: makeConfig(), model: failingModel() });
    expect(factory.getGenerator('notes')).toBe(factory.getGenerator('notes'));
  });

  it('throws for an app without a generator', () => {
    const factory = new GeneratorFactory({ config: makeConfig(), model: failingModel() }, new GeneratorRegistry());
    expect(() => factory.getGenerator('contacts')).toThrow('No generator available for app: contacts');
  });

  it('rejects duplicate registration unless replacing', () => {
    const registry = new GeneratorRegistry();
    registry.register('contacts', ContactsGenerator);
    expect(() => registry.register('contacts', ContactsGenerator)).toThrow('Generator already registered: contacts');

    const factory = new GeneratorFactory({ config: makeConfig(), model: failingModel() }, registry);
    const before = factory.getGenerator('contacts');
    factory.registerGenerator('contacts', ContactsGenerator);
    expect(factory.getGenerator('contacts')).not.toBe(before);
    expect(registry.size).toBe(1);
  });
});
