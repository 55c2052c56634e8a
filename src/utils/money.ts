// NUMERIC(10, 2) columns arrive from pg as strings; amounts are handled in cents
// so that sums stay exact.

export const toCents = (amount: number): number => Math.round(amount * 100);

export const fromCents = (cents: number): number => cents / 100;

export const roundMoney = (amount: number): number => fromCents(toCents(amount));

export const parseMoney = (value: string | number): number =>
  roundMoney(typeof value === 'number' ? value : parseFloat(value));

export const sumMoney = (amounts: number[]): number =>
  fromCents(amounts.reduce((total, amount) => total + toCents(amount), 0));
