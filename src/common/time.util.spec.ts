import { addDays, exchangeTimeToUtc, isIsoDate, isWeekend, parseIsoDate, toUtcIso, utcDateOf } from './time.util';

describe('time.util', () => {
  describe('exchangeTimeToUtc', () => {
    it('uses the EST offset before the spring DST change', () => {
      expect(toUtcIso(exchangeTimeToUtc('2025-03-07', '09:30:00'))).toBe('2025-03-07T14:30:00Z');
    });

    it('uses the EDT offset after the spring DST change', () => {
      expect(toUtcIso(exchangeTimeToUtc('2025-03-10', '09:30:00'))).toBe('2025-03-10T13:30:00Z');
    });

    it('switches back to EST after the autumn change', () => {
      expect(toUtcIso(exchangeTimeToUtc('2025-10-31', '16:00:00'))).toBe('2025-10-31T20:00:00Z');
      expect(toUtcIso(exchangeTimeToUtc('2025-11-03', '16:00:00'))).toBe('2025-11-03T21:00:00Z');
    });

    it('converts an early close on the day after Thanksgiving', () => {
      expect(toUtcIso(exchangeTimeToUtc('2025-11-28', '13:00:00'))).toBe('2025-11-28T18:00:00Z');
    });

    it('rejects malformed local times', () => {
      expect(() => exchangeTimeToUtc('2025-11-28', '9:30')).toThrow(RangeError);
    });
  });

  describe('parseIsoDate', () => {
    it('accepts real calendar dates', () => {
      expect(parseIsoDate('2024-02-29')?.toISODate()).toBe('2024-02-29');
    });

    it.each(['2025-02-30', '2025-2-3', '2025-11-28T00:00:00', 'tomorrow', ''])('rejects "%s"', (value) => {
      expect(parseIsoDate(value)).toBeNull();
      expect(isIsoDate(value)).toBe(false);
    });
  });

  describe('addDays', () => {
    it('crosses month, year and leap-day boundaries', () => {
      expect(addDays('2024-02-28', 1)).toBe('2024-02-29');
      expect(addDays('2025-01-01', -1)).toBe('2024-12-31');
      expect(addDays('2025-03-08', 2)).toBe('2025-03-10');
    });
  });

  describe('isWeekend', () => {
    it('flags Saturday and Sunday only', () => {
      expect(isWeekend('2025-07-04')).toBe(false);
      expect(isWeekend('2025-07-05')).toBe(true);
      expect(isWeekend('2025-07-06')).toBe(true);
      expect(isWeekend('2025-07-07')).toBe(false);
    });
  });

  describe('utcDateOf', () => {
    it('returns the UTC calendar date, not the Eastern one', () => {
      expect(utcDateOf(new Date('2025-11-28T23:30:00-05:00'))).toBe('2025-11-29');
      expect(utcDateOf(new Date('2025-11-28T00:00:00Z'))).toBe('2025-11-28');
    });
  });
});
