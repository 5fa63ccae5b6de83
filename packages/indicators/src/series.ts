import type { AlignedSeries, Observation, StepFn } from "./types";

/**
 * Folds a step function over the observations, collecting one output per input.
 */
export const runSeries = <S, T>(
	initial: S,
	step: StepFn<S, T>,
	observations: readonly Observation[]
): AlignedSeries<T> => {
	let state = initial;
	const series: AlignedSeries<T> = [];
	for (const observation of observations) {
		const result = step(state, observation);
		state = result.state;
		series.push(result.value);
	}
	return series;
};

/** Wraps bare closes as observations stamped with their index. */
export const closesToObservations = (closes: readonly number[]): Observation[] =>
	closes.map((close, index) => ({ timestamp: index, close }));

/** Last output of a streaming state, read without advancing it. */
export const currentValue = <T>(state: { readonly current: T | null }): T | null =>
	state.current;
