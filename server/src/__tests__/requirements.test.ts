import { describe, it, expect } from 'vitest';
import { cleanSearchTerms, extractRequirements } from '../agents/requirements.js';
import { isPipelineError } from '../lib/errors.js';
import { CLIENT_ID, makeClient } from './fixtures.js';

describe('cleanSearchTerms', () => {
  it('trims, collapses whitespace and drops blanks and repeats', () => {
    expect(cleanSearchTerms(['  skin   care ', '', 'Makeup', 'makeup', 'SKIN CARE'])).toEqual(['skin care', 'Makeup']);
  });
});

describe('extractRequirements', () => {
  it('normalizes the client configuration', () => {
    const client = makeClient({
      role: '  ',
      search_terms: [' makeup ', 'makeup', 'brow  lamination'],
      preferred_profession: ' Esthetician ',
      preferred_location: null,
    });

    expect(extractRequirements(client)).toEqual({
      client_id: CLIENT_ID,
      client_name: 'Glow Studio',
      client_role: null,
      platform: 'instagram',
      search_terms: ['makeup', 'brow lamination'],
      preferred_profession: 'Esthetician',
      preferred_location: null,
    });
  });

  it('accepts a requested platform that matches regardless of case', () => {
    expect(extractRequirements(makeClient(), ' Instagram ').platform).toBe('instagram');
  });

  it('fails on a platform mismatch instead of correcting it', () => {
    let caught: unknown;
    try {
      extractRequirements(makeClient(), 'linkedin');
    } catch (error) {
      caught = error;
    }
    expect(isPipelineError(caught, 'ChainValidationFailure')).toBe(true);
    expect(caught).toMatchObject({
      message: "Requested platform linkedin does not match the client's registered platform instagram",
    });
  });

  it('rejects an unsupported requested platform', () => {
    expect(() => extractRequirements(makeClient(), 'myspace')).toThrow('Unsupported platform: myspace');
  });

  it('rejects a client registered on an unsupported platform', () => {
    const legacy = Object.assign(makeClient(), { platform: 'myspace' });
    expect(() => extractRequirements(legacy)).toThrow('Unsupported platform: myspace');
  });
});
