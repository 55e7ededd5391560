/**
 * Rounds to the nearest integer with ties going away from zero.
 * `Math.round` alone sends -0.5 to -0, not -1.
 */
export function roundHalfAwayFromZero(value: number): number {
	return Math.sign(value) * Math.round(Math.abs(value));
}

/** Celsius to Fahrenheit, rounded to two decimals. */
export function celsiusToFahrenheit(celsius: number): number {
	return roundHalfAwayFromZero((celsius * 1.8 + 32) * 100) / 100;
}
