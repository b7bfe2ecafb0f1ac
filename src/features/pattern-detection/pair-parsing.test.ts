import { describe, it, expect } from 'vitest';
import { cleanOutput, splitPair, splitSentences } from './pair-parsing.js';

describe('splitPair', () => {
  it('splits on a unicode arrow', () => {
    expect(splitPair(' 2,4,6→8. ')).toEqual({ input: '2,4,6', output: '8' });
  });

  it('splits on ascii arrows', () => {
    expect(splitPair('cat -> CAT')).toEqual({ input: 'cat', output: 'CAT' });
    expect(splitPair('dog => DOG')).toEqual({ input: 'dog', output: 'DOG' });
  });

  it('reads Input/Output labels, with or without an arrow between them', () => {
    expect(splitPair('Input: abc Output: cba')).toEqual({ input: 'abc', output: 'cba' });
    expect(splitPair('Input: abc → Output: cba')).toEqual({ input: 'abc', output: 'cba' });
  });

  it('returns a null output for an empty or placeholder slot', () => {
    expect(splitPair('Input: x → Output:')).toEqual({ input: 'x', output: null });
    expect(splitPair('5,10,15→?')).toEqual({ input: '5,10,15', output: null });
  });

  it('returns null when there is no pair shape', () => {
    expect(splitPair('just some prose')).toBeNull();
  });
});

describe('cleanOutput', () => {
  it('drops trailing sentence punctuation but keeps decimals', () => {
    expect(cleanOutput('3.5.')).toBe('3.5');
    expect(cleanOutput(' 40; ')).toBe('40');
  });

  it('treats question marks, underscores and "what" as placeholders', () => {
    expect(cleanOutput('??')).toBeNull();
    expect(cleanOutput('___')).toBeNull();
    expect(cleanOutput('what?')).toBeNull();
  });
});

describe('splitSentences', () => {
  it('does not split on decimal points', () => {
    expect(splitSentences('Pi is 3.14. Next one; last!')).toEqual(['Pi is 3.14', 'Next one', 'last']);
  });
});
