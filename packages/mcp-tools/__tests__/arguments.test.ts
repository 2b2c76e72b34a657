/**
 * Argument normalization tests
 */

import { describe, it, expect } from 'vitest';
import { ValidationFailedError } from '@outlook-connector/core';
import { normalizeArguments } from '../src/arguments.js';
import { getEmailsTool } from '../src/tools/mail/index.js';
import { createCalendarEventTool } from '../src/tools/calendar/index.js';

const emailParams = getEmailsTool.parameters;
const createParams = createCalendarEventTool.parameters;

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected an error');
}

describe('normalizeArguments', () => {
  describe('integers', () => {
    const cases: Array<[Record<string, unknown>, number]> = [
      [{ count: 500 }, 50],
      [JSON.parse('{"count": 1e400}'), 50],
      [{ count: '1e400' }, 50],
      [{ count: Number.NEGATIVE_INFINITY }, 10],
      [{ count: Number.NaN }, 10],
      [{ count: 50 }, 50],
      [{ count: '12' }, 12],
      [{ count: 7.9 }, 7],
      [{ count: 0 }, 10],
      [{ count: -3.5 }, 10],
      [{ count: 'lots' }, 10],
      [{ count: true }, 10],
      [{}, 10],
    ];

    it.each(cases)('should normalize %j to %i', (raw, expected) => {
      expect(normalizeArguments(emailParams, raw).integer('count')).toBe(expected);
    });
  });

  describe('strings', () => {
    it('should keep a non-empty string', () => {
      expect(normalizeArguments(emailParams, { search: 'invoice' }).optionalString('search')).toBe(
        'invoice'
      );
    });

    it('should treat empty and non-string values as absent', () => {
      expect(normalizeArguments(emailParams, { search: '' }).has('search')).toBe(false);
      expect(normalizeArguments(emailParams, { search: 42 }).has('search')).toBe(false);
    });
  });

  describe('string lists', () => {
    const base = {
      subject: 'Planning',
      start_time: '2025-08-14T14:00:00',
      end_time: '2025-08-14T15:00:00',
    };

    it('should wrap a single string', () => {
      const args = normalizeArguments(createParams, { ...base, attendees: 'lee@example.com' });
      expect(args.stringList('attendees')).toEqual(['lee@example.com']);
    });

    it('should keep only non-empty string entries', () => {
      const args = normalizeArguments(createParams, {
        ...base,
        attendees: ['a@example.com', '', 3, 'b@example.com'],
      });
      expect(args.stringList('attendees')).toEqual(['a@example.com', 'b@example.com']);
    });

    it('should drop anything else', () => {
      const args = normalizeArguments(createParams, { ...base, attendees: { to: 'a@example.com' } });
      expect(args.stringList('attendees')).toBeUndefined();
    });
  });

  describe('datetimes', () => {
    it.each([
      ['2025-08-14T14:00:00Z', '2025-08-14T14:00:00'],
      ['2025-08-14 14:00:00', '2025-08-14T14:00:00'],
      ['2025-08-14T14:00', '2025-08-14T14:00:00'],
    ])('should canonicalize %s', (input, expected) => {
      const args = normalizeArguments(createParams, {
        subject: 'Planning',
        start_time: input,
        end_time: '2025-08-14T15:00:00',
      });
      expect(args.string('start_time')).toBe(expected);
    });

    it('should reject an unparsable value with the field and an example', () => {
      const error = captureError(() =>
        normalizeArguments(createParams, {
          subject: 'Planning',
          start_time: '2025-08-14T14:00:00',
          end_time: 'tomorrow 3pm',
        })
      );

      expect(error).toBeInstanceOf(ValidationFailedError);
      expect(error).toMatchObject({
        field: 'end_time',
        expected: '2025-08-14T14:00:00',
        message: 'Could not parse end_time: tomorrow 3pm',
      });
    });
  });

  it('should fail on a missing required parameter', () => {
    const error = captureError(() =>
      normalizeArguments(createParams, {
        start_time: '2025-08-14T14:00:00',
        end_time: '2025-08-14T15:00:00',
      })
    );

    expect(error).toBeInstanceOf(ValidationFailedError);
    expect(error).toMatchObject({ field: 'subject', message: 'Missing required argument: subject' });
  });

  it('should drop undeclared arguments', () => {
    const args = normalizeArguments(emailParams, { count: 5, folder: 'archive' });

    expect(args.toJSON()).toEqual({ count: 5 });
  });
});
