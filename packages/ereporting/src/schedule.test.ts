import { describe, it, expect } from 'vitest';
import { VAT_REGIMES } from '@einvoice-fr/contracts';
import { endOfFollowingMonth, nextDecadeEnd } from './dates.js';
import { EReportingError } from './errors.js';
import { TRANSMISSION_SCHEDULES, nextDeadline } from './schedule.js';

describe('nextDecadeEnd', () => {
  it.each([
    ['2026-09-01', '2026-09-10'],
    ['2026-09-10', '2026-09-20'],
    ['2026-09-15', '2026-09-20'],
    ['2026-09-20', '2026-09-30'],
    ['2026-09-30', '2026-10-10'],
    ['2026-02-20', '2026-02-28'],
    ['2028-02-20', '2028-02-29'],
    ['2026-12-31', '2027-01-10'],
  ])('should move %s to %s', (date, expected) => {
    expect(nextDecadeEnd(date)).toBe(expected);
  });
});

describe('endOfFollowingMonth', () => {
  it('should return the last day of the next month', () => {
    expect(endOfFollowingMonth('2026-09-15')).toBe('2026-10-31');
    expect(endOfFollowingMonth('2026-01-31')).toBe('2026-02-28');
    expect(endOfFollowingMonth('2028-01-31')).toBe('2028-02-29');
  });

  it('should roll over the year', () => {
    expect(endOfFollowingMonth('2026-12-15')).toBe('2027-01-31');
  });

  it('should reject dates that are not on the calendar', () => {
    expect(() => endOfFollowingMonth('2026-02-30')).toThrow(EReportingError);
    expect(() => nextDecadeEnd('15/09/2026')).toThrow('Invalid date: 15/09/2026');
    expect(() => nextDecadeEnd('20260915')).toThrow('Invalid date: 20260915');
  });
});

describe('TRANSMISSION_SCHEDULES', () => {
  it('should cover every VAT regime', () => {
    expect(Object.keys(TRANSMISSION_SCHEDULES).sort()).toEqual([...VAT_REGIMES].sort());
    for (const regime of VAT_REGIMES) {
      expect(TRANSMISSION_SCHEDULES[regime].vatRegime).toBe(regime);
    }
  });

  it('should report transactions every 10 days under the normal regime', () => {
    expect(TRANSMISSION_SCHEDULES.real_normal_monthly.transactionFrequency).toBe('every_10_days');
    expect(TRANSMISSION_SCHEDULES.real_normal_quarterly.transactionFrequency).toBe('every_10_days');
    expect(TRANSMISSION_SCHEDULES.simplified_real.transactionFrequency).toBe('monthly');
  });

  it('should not report payments under the franchise regime', () => {
    expect(TRANSMISSION_SCHEDULES.franchise.paymentFrequency).toBeNull();
  });
});

describe('nextDeadline', () => {
  it('should dispatch on the frequency', () => {
    expect(nextDeadline('every_10_days', '2026-09-15')).toBe('2026-09-20');
    expect(nextDeadline('monthly', '2026-09-15')).toBe('2026-10-31');
  });
});
