export interface Observation {
	timestamp: number;
	close: number;
}

/**
 * Output aligned index-for-index with the observations that produced it.
 * `null` marks warm-up positions where the indicator has insufficient history.
 */
export type AlignedSeries<T> = Array<T | null>;

export interface BollingerValue {
	upper: number;
	middle: number;
	lower: number;
}

export interface StepResult<S, T> {
	state: S;
	value: T | null;
}

export type StepFn<S, T> = (state: S, observation: Observation) => StepResult<S, T>;

export interface PeriodOptions {
	period: number;
}
