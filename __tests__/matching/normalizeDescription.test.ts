/**
 * Tests for Description Normalization
 */

import { normalizeDescription, tokenizeDescription } from '../../src/matching/normalizeDescription';

describe('normalizeDescription', () => {
  it('should uppercase and strip domain suffixes', () => {
    expect(normalizeDescription('NETFLIX.COM')).toBe('NETFLIX');
    expect(normalizeDescription('netflix')).toBe('NETFLIX');
  });

  it('should drop processor noise words', () => {
    expect(normalizeDescription('POS Purchase  Spotify AB')).toBe('SPOTIFY AB');
    expect(normalizeDescription('ACH DEBIT CITY WATER')).toBe('CITY WATER');
  });

  it('should treat punctuation runs as separators', () => {
    expect(normalizeDescription('Amazon*Prime--Video')).toBe('AMAZON PRIME VIDEO');
  });

  it('should keep digits and letters outside ASCII', () => {
    expect(normalizeDescription('Café 24/7')).toBe('CAFÉ 24 7');
  });

  it('should return an empty string for empty or all-noise input', () => {
    expect(normalizeDescription('')).toBe('');
    expect(normalizeDescription('POS DEBIT')).toBe('');
    expect(normalizeDescription('  ...  ')).toBe('');
  });
});

describe('tokenizeDescription', () => {
  it('should return the meaningful tokens in order', () => {
    expect(tokenizeDescription('ACH DEBIT - City Water')).toEqual(['CITY', 'WATER']);
  });

  it('should return no tokens for empty input', () => {
    expect(tokenizeDescription('')).toEqual([]);
  });
});
