import { assertPeriod } from "./validation";
import type { AlignedSeries } from "./types";

/**
 * `ema` uses alpha = 2 / (period + 1); `wilder` uses alpha = 1 / period and is
 * evaluated as `(prev * (period - 1) + x) / period`.
 */
export type SmoothingMode = "ema" | "wilder";

export interface SmootherState {
	readonly period: number;
	readonly mode: SmoothingMode;
	readonly alpha: number;
	/** Inputs absorbed so far, one per bar. */
	readonly count: number;
	readonly seedSum: number;
	/** Newest input, needed to undo it during the seeding phase. */
	readonly lastInput: number | null;
	/** Smoothed value before the current bar, `null` while the current value is the seed. */
	readonly previous: number | null;
	readonly current: number | null;
}

export const smoothingAlpha = (period: number, mode: SmoothingMode): number =>
	mode === "ema" ? 2 / (period + 1) : 1 / period;

export const createSmoother = (
	period: number,
	mode: SmoothingMode
): SmootherState => {
	assertPeriod(mode === "ema" ? "EMA" : "Wilder smoother", period);
	return Object.freeze({
		period,
		mode,
		alpha: smoothingAlpha(period, mode),
		count: 0,
		seedSum: 0,
		lastInput: null,
		previous: null,
		current: null,
	});
};

const smooth = (state: SmootherState, prev: number, value: number): number =>
	state.mode === "wilder"
		? (prev * (state.period - 1) + value) / state.period
		: (value - prev) * state.alpha + prev;

export const advanceSmoother = (
	state: SmootherState,
	value: number
): SmootherState => {
	const count = state.count + 1;
	if (state.count < state.period) {
		const seedSum = state.seedSum + value;
		return Object.freeze({
			...state,
			count,
			seedSum,
			lastInput: value,
			previous: null,
			current: count === state.period ? seedSum / state.period : null,
		});
	}

	if (state.current === null) {
		throw new Error("Smoother invariant violated: seeded state has no value");
	}
	return Object.freeze({
		...state,
		count,
		lastInput: value,
		previous: state.current,
		current: smooth(state, state.current, value),
	});
};

/**
 * Recomputes the current output as if the newest input had been `value`.
 * An empty smoother behaves like `advanceSmoother`.
 */
export const replaceSmootherTail = (
	state: SmootherState,
	value: number
): SmootherState => {
	if (state.count === 0 || state.lastInput === null) {
		return advanceSmoother(state, value);
	}

	if (state.count <= state.period) {
		const seedSum = state.seedSum - state.lastInput + value;
		return Object.freeze({
			...state,
			seedSum,
			lastInput: value,
			current: state.count === state.period ? seedSum / state.period : null,
		});
	}

	if (state.previous === null) {
		throw new Error("Smoother invariant violated: smoothed state has no previous value");
	}
	return Object.freeze({
		...state,
		lastInput: value,
		current: smooth(state, state.previous, value),
	});
};

export const smoothSeries = (
	values: readonly number[],
	period: number,
	mode: SmoothingMode
): AlignedSeries<number> => {
	let state = createSmoother(period, mode);
	return values.map((value) => {
		state = advanceSmoother(state, value);
		return state.current;
	});
};
