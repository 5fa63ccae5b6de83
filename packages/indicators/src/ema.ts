import {
	advanceSmoother,
	createSmoother,
	replaceSmootherTail,
	type SmootherState,
} from "./exponentialSmoother";
import { runSeries } from "./series";
import type {
	AlignedSeries,
	Observation,
	PeriodOptions,
	StepResult,
} from "./types";
import { assertPeriod, classifyObservation } from "./validation";

export interface EmaOptions extends PeriodOptions {
	/**
	 * Hold output back until the SMA seed's weight has decayed below 1%,
	 * i.e. for `3 * (period + 1)` bars instead of `period`.
	 */
	enforceConvergence?: boolean;
}

export interface EmaState {
	readonly smoother: SmootherState;
	readonly requiredBars: number;
	readonly barsSeen: number;
	readonly lastTimestamp: number | null;
	readonly current: number | null;
}

export const requiredBarsToConverge = ({
	period,
	enforceConvergence = false,
}: EmaOptions): number => (enforceConvergence ? 3 * (period + 1) : period);

export const createEmaState = (options: EmaOptions): EmaState => {
	assertPeriod("EMA", options.period);
	return Object.freeze({
		smoother: createSmoother(options.period, "ema"),
		requiredBars: requiredBarsToConverge(options),
		barsSeen: 0,
		lastTimestamp: null,
		current: null,
	});
};

export const stepEma = (
	state: EmaState,
	observation: Observation
): StepResult<EmaState, number> => {
	const transition = classifyObservation("EMA", state.lastTimestamp, observation);
	const advancing = transition === "advance";
	const smoother = advancing
		? advanceSmoother(state.smoother, observation.close)
		: replaceSmootherTail(state.smoother, observation.close);
	const barsSeen = advancing ? state.barsSeen + 1 : state.barsSeen;
	const current = barsSeen >= state.requiredBars ? smoother.current : null;

	return {
		state: Object.freeze({
			...state,
			smoother,
			barsSeen,
			lastTimestamp: observation.timestamp,
			current,
		}),
		value: current,
	};
};

export function ema(
	observations: readonly Observation[],
	options: EmaOptions
): AlignedSeries<number> {
	return runSeries(createEmaState(options), stepEma, observations);
}
