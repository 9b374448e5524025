import { describe, it, expect } from 'vitest';
import { parsePathList } from './stdin.js';

describe('parsePathList', () => {
  it('splits on any whitespace', () => {
    expect(parsePathList('test_dir1/file1.txt\ntest_dir2/file2.txt', false)).toEqual([
      'test_dir1/file1.txt',
      'test_dir2/file2.txt',
    ]);
    expect(parsePathList('  a.txt\tb.txt\r\n\nc\n', false)).toEqual(['a.txt', 'b.txt', 'c']);
  });

  it('splits on NUL only when asked, keeping spaces in names', () => {
    expect(parsePathList('my file.txt\0other dir/b.txt\0', true)).toEqual(['my file.txt', 'other dir/b.txt']);
  });

  it('returns nothing for empty input', () => {
    expect(parsePathList('', false)).toEqual([]);
    expect(parsePathList('\0\0', true)).toEqual([]);
  });
});
