import { MIN_PHONE_DIGITS } from '@admissions/shared-kernel';

export function phoneDigits(raw: string): string {
  return raw.replace(/\D/g, '');
}

export function isValidPhone(raw: string): boolean {
  return phoneDigits(raw).length >= MIN_PHONE_DIGITS;
}

/**
 * Brings a phone into international form where the intent is clear.
 * Local 7 and 9 digit numbers get the country prefix, long bare numbers get a `+`.
 */
export function normalizePhone(raw: string, countryPrefix = '+998'): string {
  const cleaned = raw.replace(/[^\d+]/g, '');
  if (cleaned.startsWith('+')) return cleaned;

  const digits = phoneDigits(raw);
  if (digits.length === 7 || digits.length === 9) {
    return `${countryPrefix}${digits}`;
  }
  if (cleaned.length > 10) return `+${cleaned}`;
  return cleaned;
}
