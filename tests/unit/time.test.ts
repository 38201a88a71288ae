/**
 * Unit Tests for time helpers
 */

import { ValidationError } from '../../src/errors';
import {
  DAY_SECONDS,
  MONTH_SECONDS,
  daysUntil,
  durationFromParts,
  formatDate,
  formatUtc,
} from '../../src/utils/time';

describe('Time helpers', () => {
  describe('daysUntil', () => {
    it('should round partial days down', () => {
      expect(daysUntil(1000 + 3 * DAY_SECONDS - 60, 1000)).toBe(2);
      expect(daysUntil(1000 + 3 * DAY_SECONDS, 1000)).toBe(3);
    });

    it('should go negative once the moment has passed', () => {
      expect(daysUntil(1000, 1001)).toBe(-1);
    });
  });

  describe('durationFromParts', () => {
    it('should count months as 30 days', () => {
      expect(durationFromParts({ months: 1 })).toBe(30 * DAY_SECONDS);
      expect(MONTH_SECONDS).toBe(2_592_000);
    });

    it('should add every part', () => {
      expect(durationFromParts({ days: 1, hours: 2, minutes: 3 })).toBe(DAY_SECONDS + 2 * 3600 + 3 * 60);
    });

    it('should reject a zero duration', () => {
      expect(() => durationFromParts({})).toThrow(ValidationError);
      expect(() => durationFromParts({ days: 0 })).toThrow('A duration greater than zero is required');
    });

    it('should reject negative or fractional parts', () => {
      expect(() => durationFromParts({ days: -1 })).toThrow('days must be a non-negative integer');
      expect(() => durationFromParts({ hours: 1.5 })).toThrow(ValidationError);
    });
  });

  describe('formatting', () => {
    it('should format timestamps in UTC', () => {
      expect(formatUtc(1_700_000_000)).toBe('2023-11-14 22:13 UTC');
      expect(formatDate(1_700_000_000)).toBe('2023-11-14');
    });
  });
});
