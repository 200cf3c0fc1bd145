import { describe, expect, test } from 'vitest';
import { AFFIRMATIVE_ANSWERS, FixedAnswerSource, parseBoolean } from './index.ts';

describe('parseBoolean', () => {
  test('should accept every affirmative token', () => {
    for (const token of AFFIRMATIVE_ANSWERS) {
      expect(parseBoolean(token)).toBe(true);
    }
    expect([...AFFIRMATIVE_ANSWERS]).toEqual(['y', 'Y', 'yes', 'Yes', 'YES']);
  });

  test('should reject the empty answer', () => {
    expect(parseBoolean('')).toBe(false);
  });

  test('should not normalize case or whitespace', () => {
    expect(parseBoolean('yEs')).toBe(false);
    expect(parseBoolean(' y')).toBe(false);
    expect(parseBoolean('yes\n')).toBe(false);
  });

  test('should treat unrecognized answers as no', () => {
    expect(parseBoolean('n')).toBe(false);
    expect(parseBoolean('sure')).toBe(false);
    expect(parseBoolean('1')).toBe(false);
  });
});

describe('FixedAnswerSource', () => {
  test('should answer every question with its preset', async () => {
    const answers = new FixedAnswerSource('no');
    expect(await answers.ask('first?')).toBe('no');
    expect(await answers.ask('second?')).toBe('no');
  });
});
