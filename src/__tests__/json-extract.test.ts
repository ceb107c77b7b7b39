import { describe, it, expect } from 'vitest';
import { extractJsonObject, isRecord } from '../lib/json-extract.js';

describe('extractJsonObject', () => {
  it('parses a bare object', () => {
    expect(extractJsonObject('{"contacts": []}')).toEqual({ contacts: [] });
  });

  it('strips markdown fences and surrounding prose', () => {
    const text = 'Here you go:\n```json\n{"notes": [{"id": "n1"}]}\n```\nLet me know!';
    expect(extractJsonObject(text)).toEqual({ notes: [{ id: 'n1' }] });
  });

  it('returns null when there is no object', () => {
    expect(extractJsonObject('I could not do that.')).toBeNull();
    expect(extractJsonObject('')).toBeNull();
    expect(extractJsonObject('} backwards {')).toBeNull();
  });

  it('returns null for malformed JSON', () => {
    expect(extractJsonObject('{"contacts": [}')).toBeNull();
  });
});

describe('isRecord', () => {
  it('accepts plain objects only', () => {
    expect(isRecord({})).toBe(true);
    expect(isRecord([])).toBe(false);
    expect(isRecord(null)).toBe(false);
    expect(isRecord('x')).toBe(false);
  });
});
