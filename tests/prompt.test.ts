import { describe, it, expect } from 'vitest';
import { parseConflictAnswer } from '../src/prompt/index.js';

describe('parseConflictAnswer', () => {
  it('maps the first letter to a choice', () => {
    expect(parseConflictAnswer('b', true)).toBe('backup');
    expect(parseConflictAnswer(' Delete ', true)).toBe('delete');
    expect(parseConflictAnswer('a', false)).toBe('abort');
    expect(parseConflictAnswer('s', true)).toBe('skip');
  });

  it('rejects skip when it is not offered, and anything unknown', () => {
    expect(parseConflictAnswer('s', false)).toBeNull();
    expect(parseConflictAnswer('x', true)).toBeNull();
    expect(parseConflictAnswer('', true)).toBeNull();
  });
});
