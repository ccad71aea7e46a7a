import { describe, it, expect } from 'vitest';
import { wrapInBox } from './banner.js';

describe('wrapInBox', () => {
  it('should draw a box sized to the widest content line', () => {
    expect(wrapInBox('ab\nabcd')).toBe(['┌──────┐', '│ ab   │', '│ abcd │', '└──────┘'].join('\n'));
  });

  it('should center footer lines under a separator', () => {
    expect(wrapInBox('abcdef', ['v1'])).toBe(
      ['┌────────┐', '│ abcdef │', '├────────┤', '│   v1   │', '└────────┘'].join('\n')
    );
  });

  it('should clip footer lines wider than the content', () => {
    expect(wrapInBox('abc', ['abcdef'])).toBe(['┌─────┐', '│ abc │', '├─────┤', '│ abc │', '└─────┘'].join('\n'));
  });

  it('should skip blank content lines', () => {
    expect(wrapInBox('\nab\n  \n')).toBe(['┌────┐', '│ ab │', '└────┘'].join('\n'));
  });
});
