import { describe, it, expect } from 'vitest';
import { dataKeyFor } from '../lib/apps.js';
import { isRecord } from '../lib/json-extract.js';
import { CONTACT_RELATIONSHIPS } from '../generators/contacts.js';
import { GeneratorFactory } from '../generators/index.js';
import type { JsonRecord } from '../agents/types.js';
import { failingModel, makeAnalysis, makeConfig } from './helpers.js';

const HOUR_MS = 60 * 60 * 1000;
const BATCH = 60;

const factory = new GeneratorFactory({ config: makeConfig(), model: failingModel() });

async function batch(app: string): Promise<JsonRecord[]> {
  const payload = await factory.getGenerator(app).generate({
    profile: { occupation: 'Product Manager', age: 33 },
    events: ['Quarterly planning offsite'],
    analysis: makeAnalysis(),
    count: BATCH,
  });
  return payload[dataKeyFor(app)];
}

function list(value: unknown): unknown[] {
  return Array.isArray(value) ? value : [];
}

function records(value: unknown): JsonRecord[] {
  return list(value).filter(isRecord);
}

function time(value: unknown): number {
  return new Date(String(value)).getTime();
}

describe('calendar fallback', () => {
  it('keeps timing and attendees within each category', async () => {
    const events = await batch('calendar');
    const durations: Record<string, number[]> = {
      work: [0.5, 1, 1.5, 2],
      social: [2, 3, 4],
      personal: [0.5, 1, 1.5],
      health: [0.5, 1, 1.5],
      family: [0.5, 1, 1.5],
    };

    for (const event of events) {
      const category = String(event.category);
      const start = new Date(String(event.start_datetime));
      const hours = (time(event.end_datetime) - start.getTime()) / HOUR_MS;
      const attendees = list(event.attendees);

      expect(durations[category]).toContain(hours);
      if (category === 'work') {
        expect(start.getUTCHours()).toBeGreaterThanOrEqual(9);
        expect(start.getUTCHours()).toBeLessThanOrEqual(17);
        expect(attendees.length).toBeGreaterThanOrEqual(2);
        expect(attendees.length).toBeLessThanOrEqual(6);
      } else if (category === 'social') {
        expect(attendees.length).toBeGreaterThanOrEqual(1);
        expect(attendees.length).toBeLessThanOrEqual(4);
      } else {
        expect(attendees).toEqual([]);
      }
    }
  });
});

describe('sms fallback', () => {
  it('sizes group and individual conversations', async () => {
    const conversations = await batch('sms');

    for (const conversation of conversations) {
      const participants = list(conversation.participants);
      const messages = records(conversation.messages);
      const group = messages.some((m) => isRecord(m.group_info) && m.group_info.is_group === true);

      if (group) {
        expect(participants.length).toBeGreaterThanOrEqual(3);
        expect(participants.length).toBeLessThanOrEqual(6);
        expect(messages.length).toBeGreaterThanOrEqual(5);
        expect(messages.length).toBeLessThanOrEqual(20);
      } else {
        expect(participants).toHaveLength(1);
        expect(messages.length).toBeGreaterThanOrEqual(3);
        expect(messages.length).toBeLessThanOrEqual(15);
      }
    }
  });

  it('sends every message after the previous one', async () => {
    const conversations = await batch('sms');

    for (const conversation of conversations) {
      const times = records(conversation.messages).map((m) => time(m.timestamp));
      for (let i = 1; i < times.length; i++) {
        expect(times[i]).toBeGreaterThan(times[i - 1]);
      }
    }
  });
});

describe('wallet fallback', () => {
  it('encodes a six-digit pass number in the barcode', async () => {
    for (const pass of await batch('wallet')) {
      expect(isRecord(pass.barcode) ? pass.barcode.message : undefined).toMatch(/^PASS\d{6}$/);
    }
  });
});

describe('contacts fallback', () => {
  it('uses known relationships and gives work phones only to colleagues', async () => {
    for (const contact of await batch('contacts')) {
      expect(CONTACT_RELATIONSHIPS).toContain(contact.relationship);
      const labels = records(contact.phone_numbers).map((p) => p.label);
      expect(labels[0]).toBe('mobile');
      if (contact.relationship !== 'colleague') {
        expect(labels).not.toContain('work');
      }
    }
  });
});

describe('notes fallback', () => {
  it('only turns shopping notes into checklists', async () => {
    for (const note of await batch('notes')) {
      const checklist: JsonRecord = isRecord(note.checklist) ? note.checklist : {};
      expect(checklist.is_checklist).toBe(note.category === 'shopping');
      expect(list(checklist.items).length > 0).toBe(note.category === 'shopping');
    }
  });
});

describe('reminders fallback', () => {
  it('dates completion only for completed reminders, after creation', async () => {
    for (const reminder of await batch('reminders')) {
      if (reminder.completed === true) {
        expect(time(reminder.completion_date)).toBeGreaterThanOrEqual(time(reminder.created_date));
      } else {
        expect(reminder).not.toHaveProperty('completion_date');
      }
    }
  });
});
