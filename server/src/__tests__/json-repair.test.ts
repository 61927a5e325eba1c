import { describe, it, expect } from 'vitest';
import { repairJSON } from '../lib/json-repair.js';

describe('repairJSON', () => {
  it('parses valid JSON without modification', () => {
    expect(repairJSON('{"message": "hi", "count": 2}')).toEqual({ message: 'hi', count: 2 });
  });

  it('strips markdown json fences before parsing', () => {
    expect(repairJSON('```json\n{"answer": true}\n```')).toEqual({ answer: true });
  });

  it('extracts an object surrounded by prose', () => {
    expect(repairJSON('Sure! Here it is: {"message": "Hello"} Hope that helps.')).toEqual({ message: 'Hello' });
  });

  it('repairs trailing commas', () => {
    expect(repairJSON('{"tags": ["a", "b",],}')).toEqual({ tags: ['a', 'b'] });
  });

  it('escapes raw newlines inside string values', () => {
    expect(repairJSON('{"message": "line one\nline two"}')).toEqual({ message: 'line one\nline two' });
  });

  it('returns undefined for blank or unrecoverable input', () => {
    expect(repairJSON('   ')).toBeUndefined();
    expect(repairJSON('not json at all')).toBeUndefined();
  });
});
