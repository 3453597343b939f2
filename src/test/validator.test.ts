import { describe, test, expect } from 'vitest';
import { SchemaValidator, bestOptionMatch, similarityScore } from '../utils/validator.js';
import type { Variable } from '../types/coding.types.js';

const sentimentOptions = ['positive', 'neutral', 'negative'];

const sentiment: Variable = {
  kind: 'categorical',
  name: 'sentiment',
  options: sentimentOptions,
};

const variables: Variable[] = [
  sentiment,
  { kind: 'likert', name: 'trust', likertScale: 5 },
  { kind: 'numeric', name: 'speakers' },
  { kind: 'text', name: 'summary' },
];

describe('similarityScore', () => {
  test('scores character-set overlap against the longer string', () => {
    // "positive" has 7 distinct characters, all present in "a. positive"
    expect(similarityScore('Positive', 'A. Positive')).toBeCloseTo(7 / 11, 10);
  });

  test('ignores case for containment and overlap', () => {
    expect(similarityScore('neutral', 'Neutral')).toBe(1);
  });

  test('returns null when neither string contains the other', () => {
    expect(similarityScore('negative', 'bad')).toBeNull();
  });
});

describe('bestOptionMatch', () => {
  test('first option wins on equal scores', () => {
    const match = bestOptionMatch(['abc', 'abd'], 'ab');
    expect(match).toEqual({ option: 'abc', score: 2 / 3 });
  });

  test('returns null when no option is eligible', () => {
    expect(bestOptionMatch(['yes', 'no'], 'maybe')).toBeNull();
  });

  test('is deterministic for a fixed value and option list', () => {
    const options = ['pro', 'contra', 'procedural'];
    const first = bestOptionMatch(options, 'pro-ish');
    for (let i = 0; i < 5; i++) {
      expect(bestOptionMatch(options, 'pro-ish')).toEqual(first);
    }
  });
});

describe('SchemaValidator', () => {
  const validator = new SchemaValidator();

  test('accepts exact categorical options without repairs', () => {
    const { values, repairs } = validator.validate({ sentiment: 'neutral' }, variables);
    expect(values).toEqual({ sentiment: 'neutral' });
    expect(repairs).toEqual([]);
  });

  test('repairs a close categorical answer by fuzzy match', () => {
    const { values, repairs } = validator.validate({ sentiment: 'Neutral' }, variables);
    expect(values.sentiment).toBe('neutral');
    expect(repairs).toHaveLength(1);
    expect(repairs[0].method).toBe('fuzzy');
    expect(repairs[0].original).toBe('Neutral');
  });

  test('falls back to the first option when nothing matches', () => {
    const { values, repairs } = validator.validate({ sentiment: 'ecstatic' }, variables);
    expect(values.sentiment).toBe('positive');
    expect(repairs[0]).toEqual({
      variable: 'sentiment',
      original: 'ecstatic',
      repaired: 'positive',
      method: 'default',
      score: 0,
    });
  });

  test('resolves a decorated answer to a listed option', () => {
    const { values } = validator.validate({ sentiment: 'Positive (strongly)' }, variables);
    expect(values.sentiment).toBe('positive');
  });

  test('defaults non-scalar categorical answers', () => {
    const { values } = validator.validate({ sentiment: ['neutral'] }, variables);
    expect(values.sentiment).toBe('positive');
  });

  test('every categorical result is a listed option', () => {
    const candidates = ['NEGATIVE', 'neg', 42, true, null, { a: 1 }, '', 'negative-ish'];
    for (const candidate of candidates) {
      const { values } = validator.validate({ sentiment: candidate }, variables);
      expect(sentimentOptions).toContain(values.sentiment);
    }
  });

  test('leaves missing variables missing', () => {
    const { values } = validator.validate({ trust: 4 }, variables);
    expect(values).toEqual({ trust: 4 });
    expect('sentiment' in values).toBe(false);
  });

  test('passes non-categorical values through untouched', () => {
    const { values, repairs } = validator.validate(
      { trust: '4', speakers: 3, summary: 'Launch event recap' },
      variables
    );
    expect(values).toEqual({ trust: '4', speakers: 3, summary: 'Launch event recap' });
    expect(repairs).toEqual([]);
  });

  test('drops keys that are not in the coding scheme', () => {
    const { values } = validator.validate({ sentiment: 'negative', unrelated: 'x' }, variables);
    expect(values).toEqual({ sentiment: 'negative' });
  });

  test('respects a custom threshold', () => {
    const strict = new SchemaValidator(0.9);
    const { values, repairs } = strict.validate({ sentiment: 'A. Neutral' }, variables);
    expect(values.sentiment).toBe('positive');
    expect(repairs[0].method).toBe('default');
  });
});
