import { describe, it, expect } from 'vitest';
import { analyzeContamination, isForeignWord } from '../contamination.js';
import { syntheticLexicons } from '../../__tests__/fixtures.js';

const lexicon = syntheticLexicons().contamination;

describe('isForeignWord', () => {
  it('should flag listed words case-insensitively', () => {
    expect(isForeignWord('The', lexicon)).toBe(true);
  });

  it('should not flag allow-listed words', () => {
    expect(isForeignWord('in', lexicon)).toBe(false);
    expect(isForeignWord('plan', lexicon)).toBe(false);
  });
});

describe('analyzeContamination', () => {
  it('should score 1 - foreign / total', () => {
    const result = analyzeContamination('Vizităm the muzeu and parcul with prietenii', lexicon);

    expect(result.totalWords).toBe(7);
    expect(result.foreignWords).toBe(3);
    expect(result.score).toBeCloseTo(4 / 7, 10);
    expect(result.flagged).toEqual(['the', 'and', 'with']);
  });

  it('should list each flagged word once', () => {
    const result = analyzeContamination('The the THE', lexicon);
    expect(result.foreignWords).toBe(3);
    expect(result.score).toBe(0);
    expect(result.flagged).toEqual(['the']);
  });

  it('should be 1.0 for empty text', () => {
    expect(analyzeContamination('', lexicon)).toEqual({ score: 1, totalWords: 0, foreignWords: 0, flagged: [] });
  });
});
