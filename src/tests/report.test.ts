import { describe, expect, test } from 'vitest';

import {
  formatFailure,
  formatFailureDetail,
  formatFault,
  formatLabel,
  formatPass
} from '../report';

describe('formatLabel', () => {
  test('pads to the full width before the trailing space', () => {
    const line = formatLabel('sq', { outputLineLength: 60, fillChar: '.' });

    expect(line).toBe(`TESTING sq: ${'.'.repeat(48)} `);
    expect(line).toHaveLength(61);
  });

  test('writes a label of exactly the width without padding', () => {
    expect(formatLabel('abc', { outputLineLength: 13, fillChar: '.' })).toBe(
      'TESTING abc:  '
    );
  });

  test('keeps a label longer than the width intact', () => {
    expect(formatLabel('a-rather-long-name', { outputLineLength: 5, fillChar: '.' })).toBe(
      'TESTING a-rather-long-name:  '
    );
  });

  test('treats a zero width as no padding', () => {
    expect(formatLabel('z', { outputLineLength: 0, fillChar: '*' })).toBe('TESTING z:  ');
  });
});

describe('verdict lines', () => {
  test('formats pass and failure lines with the elapsed time', () => {
    expect(formatPass(0)).toBe('OK (0 ms)\n');
    expect(formatFailure(1234)).toBe('FAILED (1234 ms)\n');
  });

  test('formats the verbose failure detail block', () => {
    expect(formatFailureDetail('9', '10')).toBe(' RESULT:   9\n EXPECTED: 10\n.\n');
  });
});

describe('formatFault', () => {
  test('formats a structured fault as type and message lines', () => {
    expect(
      formatFault({ kind: 'structured', typeName: 'RangeError', message: 'too big' })
    ).toBe('EXCEPTION\nRangeError:\ntoo big\n');
  });

  test('formats an opaque fault as unknown', () => {
    expect(formatFault({ kind: 'opaque' })).toBe('EXCEPTION\nunknown\n');
  });
});
