/** Rounds to two decimal places, half away from zero. */
export const roundMoney = (value: number): number => {
  const sign = value < 0 ? -1 : 1;
  return (sign * Math.round((Math.abs(value) + Number.EPSILON) * 100)) / 100;
};

export const amountsMatch = (expected: number, received: number, tolerance: number): boolean =>
  Math.abs(expected - received) <= tolerance + 1e-9;

export const sameCurrency = (a: string, b: string): boolean => a.trim().toUpperCase() === b.trim().toUpperCase();
