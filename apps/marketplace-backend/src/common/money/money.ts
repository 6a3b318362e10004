/**
 * Monetary amounts travel as decimal strings ("500.00") and are computed in
 * integer cents so no value ever passes through floating point.
 */

/** Matches the numeric(10, 2) columns amounts are stored in. */
export const MONEY_PATTERN = /^\d{1,8}(?:\.\d{1,2})?$/;

export const MAX_AMOUNT = '99999999.99';

export const isMoney = (value: string): boolean => MONEY_PATTERN.test(value);

export const toCents = (value: string): bigint => {
  if (!isMoney(value)) {
    throw new RangeError(`Invalid monetary amount: ${value}`);
  }
  const [whole, fraction = ''] = value.split('.');
  return BigInt(whole) * 100n + BigInt(fraction.padEnd(2, '0'));
};

export const fromCents = (cents: bigint): string => {
  const sign = cents < 0n ? '-' : '';
  const abs = cents < 0n ? -cents : cents;
  const whole = abs / 100n;
  const fraction = (abs % 100n).toString().padStart(2, '0');
  return `${sign}${whole.toString()}.${fraction}`;
};

export const normalizeMoney = (value: string): string =>
  fromCents(toCents(value));

/** Rate per hour times minutes, rounded half-up to the cent. */
export const priceForDuration = (
  hourlyRate: string,
  durationMinutes: number,
): string => {
  const numerator = toCents(hourlyRate) * BigInt(durationMinutes);
  const cents = (numerator * 2n + 60n) / 120n;
  return fromCents(cents);
};
