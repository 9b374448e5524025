import { describe, it, expect } from 'vitest';
import { addLineNumbers, splitLines } from './lineNumbers.js';

describe('splitLines', () => {
  it('does not count the piece after a trailing newline', () => {
    expect(splitLines('a\nb\n')).toEqual(['a', 'b']);
    expect(splitLines('a\nb')).toEqual(['a', 'b']);
  });

  it('returns no lines for empty content', () => {
    expect(splitLines('')).toEqual([]);
  });

  it('keeps blank lines in the middle', () => {
    expect(splitLines('a\n\n\nb')).toEqual(['a', '', '', 'b']);
  });
});

describe('addLineNumbers', () => {
  it('prefixes each line with its number and two spaces', () => {
    const content = 'First line\nSecond line\nThird line\nFourth line\n';
    expect(addLineNumbers(content)).toBe('1  First line\n2  Second line\n3  Third line\n4  Fourth line');
  });

  it('right-aligns numbers to the width of the last one', () => {
    const content = Array.from({ length: 10 }, (_, i) => `line ${i + 1}`).join('\n');
    const numbered = addLineNumbers(content).split('\n');

    expect(numbered[0]).toBe(' 1  line 1');
    expect(numbered[8]).toBe(' 9  line 9');
    expect(numbered[9]).toBe('10  line 10');
  });

  it('leaves the text of each line untouched', () => {
    expect(addLineNumbers('a\r\n  indented\n')).toBe('1  a\r\n2    indented');
    expect(addLineNumbers('x\n\ny')).toBe('1  x\n2  \n3  y');
  });

  it('produces nothing for empty content', () => {
    expect(addLineNumbers('')).toBe('');
  });
});
