// src/converters.ts

/** Largest 7-bit MIDI data value. */
export const MAX_VALUE_7BIT = 127;

/** Largest 14-bit HUI fader position. */
export const MAX_VALUE_14BIT = 16383;

/**
 * Clamps a value to an inclusive integer range, truncating fractions.
 */
export function clampInt(value: number, min: number, max: number): number {
	const int = Math.trunc(value);
	if (Number.isNaN(int)) return min;
	return Math.max(min, Math.min(max, int));
}

/**
 * Converts a 7-bit controller value (0-127) to a 14-bit fader position (0-16383).
 * Out-of-range input is clamped, never rejected.
 *
 * @param value - The incoming CC value
 * @returns The fader position, `round(value * 16383 / 127)`
 */
export function scale7To14(value: number): number {
	const v = clampInt(value, 0, MAX_VALUE_7BIT);
	return Math.round((v * MAX_VALUE_14BIT) / MAX_VALUE_7BIT);
}

/**
 * Splits a 14-bit value into its high and low 7-bit halves.
 */
export function split14(value14: number): { high: number; low: number } {
	const v = clampInt(value14, 0, MAX_VALUE_14BIT);
	return { high: (v >> 7) & 0x7f, low: v & 0x7f };
}
