import type { ISODate, TransmissionFrequency, TransmissionSchedule, VatRegime } from '@einvoice-fr/contracts';
import { endOfFollowingMonth, nextDecadeEnd } from './dates.js';

/**
 * Transmission frequencies by VAT regime. Sellers under the franchise
 * regime report no payment data.
 */
export const TRANSMISSION_SCHEDULES: Readonly<Record<VatRegime, TransmissionSchedule>> = {
  real_normal_monthly: {
    vatRegime: 'real_normal_monthly',
    transactionFrequency: 'every_10_days',
    paymentFrequency: 'monthly',
  },
  real_normal_quarterly: {
    vatRegime: 'real_normal_quarterly',
    transactionFrequency: 'every_10_days',
    paymentFrequency: 'monthly',
  },
  simplified_real: {
    vatRegime: 'simplified_real',
    transactionFrequency: 'monthly',
    paymentFrequency: 'monthly',
  },
  franchise: {
    vatRegime: 'franchise',
    transactionFrequency: 'monthly',
    paymentFrequency: null,
  },
};

/**
 * Deadline of the next transmission window that starts after `date`
 */
export function nextDeadline(frequency: TransmissionFrequency, date: ISODate): ISODate {
  switch (frequency) {
    case 'every_10_days':
      return nextDecadeEnd(date);
    case 'monthly':
      return endOfFollowingMonth(date);
  }
}
