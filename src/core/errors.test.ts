import { describe, it, expect } from 'vitest';
import { errorMessage, OutputError, TraversalError } from './errors.js';

describe('errorMessage', () => {
  it('uses the message of an Error and stringifies anything else', () => {
    expect(errorMessage(new Error('EACCES: permission denied'))).toBe('EACCES: permission denied');
    expect(errorMessage('plain')).toBe('plain');
    expect(errorMessage(42)).toBe('42');
  });
});

describe('TraversalError', () => {
  it('names the path and keeps the cause', () => {
    const cause = new Error('ELOOP: too many symbolic links');
    const error = new TraversalError('src/loop', cause);

    expect(error.message).toBe('Failed to read src/loop: ELOOP: too many symbolic links');
    expect(error.path).toBe('src/loop');
    expect(error.cause).toBe(cause);
    expect(error.name).toBe('TraversalError');
  });
});

describe('OutputError', () => {
  it('names the destination', () => {
    expect(new OutputError('out.txt', 'disk full').message).toBe('Cannot write output to out.txt: disk full');
  });
});
