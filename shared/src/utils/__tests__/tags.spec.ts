import { describe, it, expect } from 'vitest';
import { normalizeTag, normalizeTagSet, uniqueTags } from '../tags';

describe('normalizeTag', () => {
  it('should lowercase and trim', () => {
    expect(normalizeTag('  Post-Rock ')).toBe('post-rock');
  });

  it('should map country abbreviations to full names', () => {
    expect(normalizeTag('UK')).toBe('united kingdom');
    expect(normalizeTag('u.k.')).toBe('united kingdom');
    expect(normalizeTag('USA')).toBe('united states');
    expect(normalizeTag(' U.S.A. ')).toBe('united states');
  });

  it('should leave other tags alone', () => {
    expect(normalizeTag('ukraine')).toBe('ukraine');
  });
});

describe('normalizeTagSet', () => {
  it('should merge spelling variants and drop empty tags', () => {
    const set = normalizeTagSet(['Rock', 'rock ', 'UK', 'United Kingdom', '   ']);
    expect([...set]).toEqual(['rock', 'united kingdom']);
  });
});

describe('uniqueTags', () => {
  it('should keep the first spelling of each normalized tag', () => {
    expect(uniqueTags(['Rock', 'rock ', ' Jazz', ''])).toEqual(['Rock', 'Jazz']);
  });
});
