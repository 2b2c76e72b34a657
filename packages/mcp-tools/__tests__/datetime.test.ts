/**
 * Date handling tests
 */

import { describe, it, expect } from 'vitest';
import {
  formatTimestamp,
  formatWindow,
  lookAheadWindow,
  parseDateTimeArgument,
} from '../src/datetime.js';

describe('parseDateTimeArgument', () => {
  it('should strip every Z before parsing', () => {
    expect(parseDateTimeArgument('2025-08-14T14:00:00Z')).toBe('2025-08-14T14:00:00');
  });

  it('should reject impossible dates and loose formats', () => {
    expect(parseDateTimeArgument('2025-02-30T10:00:00')).toBeNull();
    expect(parseDateTimeArgument('14/08/2025 14:00')).toBeNull();
    expect(parseDateTimeArgument('2025-08-14')).toBeNull();
  });
});

describe('formatTimestamp', () => {
  it('should show offset-bearing values in UTC', () => {
    expect(formatTimestamp('2025-08-14T08:30:00Z')).toBe('2025-08-14 08:30');
    expect(formatTimestamp('2025-08-14T10:30:00+02:00')).toBe('2025-08-14 08:30');
  });

  it('should keep the wall-clock time of naive values', () => {
    expect(formatTimestamp('2025-08-14T09:00:00.0000000')).toBe('2025-08-14 09:00');
  });

  it('should fall back to the raw value', () => {
    expect(formatTimestamp('Unknown')).toBe('Unknown');
  });
});

describe('formatWindow', () => {
  it('should shorten the end on the same day', () => {
    expect(formatWindow('2025-08-14T09:00:00.0000000', '2025-08-14T10:30:00.0000000')).toBe(
      '2025-08-14 09:00 - 10:30'
    );
  });

  it('should show both dates across midnight', () => {
    expect(formatWindow('2025-08-14T23:00:00', '2025-08-15T01:00:00')).toBe(
      '2025-08-14 23:00 - 2025-08-15 01:00'
    );
  });

  it('should show raw values when either side cannot be parsed', () => {
    expect(formatWindow('soon', '2025-08-14T10:00:00')).toBe('soon - 2025-08-14T10:00:00');
  });
});

describe('lookAheadWindow', () => {
  it('should span the given number of days from now in UTC', () => {
    expect(lookAheadWindow(new Date('2025-08-14T12:00:00.000Z'), 7)).toEqual({
      start: '2025-08-14T12:00:00Z',
      end: '2025-08-21T12:00:00Z',
    });
  });
});
