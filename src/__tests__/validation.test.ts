import { describe, it, expect } from 'vitest';
import { isCriticalError, SchemaValidator } from '../lib/validation.js';
import { MemorySchemaStore } from '../lib/schema-store.js';

function contact(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    id: 'contact_1',
    first_name: 'Sam',
    last_name: 'Rivera',
    relationship: 'friend',
    created_date: '2024-02-10T09:30:00.000Z',
    ...overrides,
  };
}

describe('SchemaValidator.validate', () => {
  const validator = new SchemaValidator();

  it('accepts a conforming payload', () => {
    const result = validator.validate('contacts', { contacts: [contact(), contact({ id: 'contact_2' })] });
    expect(result).toEqual({
      is_valid: true,
      app_name: 'contacts',
      entry_count: 2,
      errors: [],
      warnings: [],
      total_errors: 0,
      critical_errors: 0,
    });
  });

  it('reports a missing required field as critical', () => {
    const { first_name: _omit, ...partial } = contact();
    const result = validator.validate('contacts', { contacts: [partial] });

    expect(result.is_valid).toBe(false);
    expect(result.entry_count).toBe(1);
    expect(result.errors).toEqual([
      "Validation error in contacts: /contacts/0 must have required property 'first_name' (required)",
    ]);
    expect(result.total_errors).toBe(1);
    expect(result.critical_errors).toBe(1);
  });

  it('reports a bad timestamp format as critical', () => {
    const result = validator.validate('contacts', { contacts: [contact({ created_date: 'last tuesday' })] });
    expect(result.errors).toEqual([
      'Validation error in contacts: /contacts/0/created_date must match format "date-time" (format)',
    ]);
    expect(result.critical_errors).toBe(1);
  });

  it('reports unexpected top-level keys at the root path', () => {
    const result = validator.validate('contacts', { contacts: [contact()], extra: true });
    expect(result.errors).toEqual([
      'Validation error in contacts: / must NOT have additional properties (additionalProperties)',
    ]);
    expect(result.critical_errors).toBe(1);
  });

  it('counts an enum mismatch without marking it critical', () => {
    const result = validator.validate('contacts', { contacts: [contact({ relationship: 'nemesis' })] });
    expect(result.errors).toEqual([
      'Validation error in contacts: /contacts/0/relationship must be equal to one of the allowed values (enum)',
    ]);
    expect(result.total_errors).toBe(1);
    expect(result.critical_errors).toBe(0);
  });

  it('ignores field names in the path when classifying', () => {
    const pass = {
      id: 'pass_1',
      type: 'gift_card',
      organization_name: 'Corner Cafe',
      pass_name: 'Loyalty Card',
    };
    const result = validator.validate('wallet', { passes: [pass] });

    expect(result.errors).toEqual([
      'Validation error in wallet: /passes/0/type must be equal to one of the allowed values (enum)',
    ]);
    expect(result.critical_errors).toBe(0);
  });

  it('marks a wrong value type as critical through its keyword', () => {
    const result = validator.validate('contacts', { contacts: [contact({ first_name: 42 })] });
    expect(result.errors).toEqual([
      'Validation error in contacts: /contacts/0/first_name must be string (type)',
    ]);
    expect(result.critical_errors).toBe(1);
  });

  it('skips format checks when strict validation is off', () => {
    const lenient = new SchemaValidator({ strictValidation: false });
    const result = lenient.validate('contacts', { contacts: [contact({ created_date: 'last tuesday' })] });
    expect(result.is_valid).toBe(true);
  });

  it('turns a missing schema into a critical error instead of throwing', () => {
    const result = new SchemaValidator({ schemaStore: new MemorySchemaStore({}) })
      .validate('fax', { fax: [{ id: 'f1' }] });

    expect(result.is_valid).toBe(false);
    expect(result.entry_count).toBe(1);
    expect(result.errors).toEqual(['Unexpected validation error in fax: Schema not found: memory:fax']);
    expect(result.critical_errors).toBe(1);
  });
});

describe('SchemaValidator.validateAll', () => {
  it('aggregates results and skips empty payloads', () => {
    const validator = new SchemaValidator();
    const result = validator.validateAll({
      contacts: { contacts: [contact()] },
      notes: { notes: [{ id: 'n1', title: 'Ideas' }] },
      alarms: {},
    });

    expect(result.total_apps).toBe(2);
    expect(result.overall_valid).toBe(false);
    expect(result.critical_errors).toBe(1);
    expect(result.summary).toEqual({ valid_apps: ['contacts'], invalid_apps: ['notes'], validation_rate: 0.5 });
    expect(result.app_results.alarms).toBeUndefined();
  });
});

describe('SchemaValidator item helpers', () => {
  const validator = new SchemaValidator();

  it('validates a single entry against the item schema', () => {
    expect(validator.validateEntry('contacts', contact())).toEqual({ is_valid: true, errors: [] });

    const result = validator.validateEntry('contacts', { id: 'x', first_name: 'A' });
    expect(result.is_valid).toBe(false);
    expect(result.errors).toEqual([
      "Validation error in contacts: / must have required property 'last_name' (required)",
    ]);
  });

  it('describes required and optional item fields', () => {
    const info = validator.getSchemaInfo('contacts');
    if ('error' in info) throw new Error(info.error);

    expect(info.schema_title).toBe('Contacts');
    expect(info.schema_version).toBe('http://json-schema.org/draft-07/schema#');
    expect(info.required_fields).toEqual(['contacts.id', 'contacts.first_name', 'contacts.last_name']);
    expect(info.optional_fields[0]).toBe('contacts.display_name');
    expect(info.optional_fields).toContain('contacts.created_date');
  });

  it('returns an error entry for an unknown schema', () => {
    const info = validator.getSchemaInfo('fax');
    expect('error' in info).toBe(true);
  });

  it('lists every bundled schema', () => {
    expect(validator.getAvailableSchemas()).toEqual([
      'alarms', 'calendar', 'contacts', 'emails', 'notes', 'reminders', 'sms', 'wallet',
    ]);
  });
});

describe('isCriticalError', () => {
  it('matches structural keywords case-insensitively', () => {
    expect(isCriticalError('must have REQUIRED property')).toBe(true);
    expect(isCriticalError('must NOT have additionalProperties')).toBe(true);
    expect(isCriticalError('must be <= 10 (maximum)')).toBe(false);
  });
});
