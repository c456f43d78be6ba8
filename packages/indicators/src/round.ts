/**
 * Decimal rounding through `toFixed` so identical inputs always print and
 * compare identically.
 */
export const roundTo = (value: number, decimals: number): number =>
	Number(value.toFixed(decimals));
