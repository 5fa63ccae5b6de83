import { assertPeriod } from "./validation";
import type { AlignedSeries } from "./types";

export interface WindowOptions {
	variance: boolean;
}

export interface WindowState {
	readonly period: number;
	readonly trackVariance: boolean;
	readonly values: readonly number[];
}

export interface WindowStats {
	mean: number;
	/** Population variance (divide by period). `null` for mean-only windows. */
	variance: number | null;
}

export const createWindow = (
	period: number,
	options: WindowOptions = { variance: false }
): WindowState => {
	assertPeriod("window", period);
	return Object.freeze({
		period,
		trackVariance: options.variance,
		values: Object.freeze([]),
	});
};

export const pushWindow = (state: WindowState, value: number): WindowState => {
	const kept =
		state.values.length === state.period
			? state.values.slice(1)
			: state.values.slice();
	kept.push(value);
	return Object.freeze({ ...state, values: Object.freeze(kept) });
};

/**
 * Swaps the newest value for `value` without moving the window. Used when the
 * current bar is repainted. An empty window behaves like `pushWindow`.
 */
export const replaceWindowTail = (
	state: WindowState,
	value: number
): WindowState => {
	const lastIndex = state.values.length - 1;
	if (lastIndex < 0) {
		return pushWindow(state, value);
	}
	const values = state.values.slice();
	values[lastIndex] = value;
	return Object.freeze({ ...state, values: Object.freeze(values) });
};

export const isWindowReady = (state: WindowState): boolean =>
	state.values.length === state.period;

/**
 * Rescans the window on every read. Deviations are taken from the oldest value
 * first, so a constant window yields its value as the mean and a variance of
 * exactly 0.
 */
export const readWindow = (state: WindowState): WindowStats | null => {
	if (!isWindowReady(state)) {
		return null;
	}
	const { values, period } = state;
	const shift = values[0];
	let offsetSum = 0;
	for (const value of values) {
		offsetSum += value - shift;
	}
	const meanOffset = offsetSum / period;
	const mean = shift + meanOffset;
	if (!state.trackVariance) {
		return { mean, variance: null };
	}
	let squaredDeviations = 0;
	for (const value of values) {
		const deviation = value - shift - meanOffset;
		squaredDeviations += deviation * deviation;
	}
	return { mean, variance: squaredDeviations / period };
};

export const windowStats = (
	values: readonly number[],
	period: number,
	options: WindowOptions = { variance: false }
): AlignedSeries<WindowStats> => {
	let state = createWindow(period, options);
	return values.map((value) => {
		state = pushWindow(state, value);
		return readWindow(state);
	});
};
