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

export const RSI_FLAT_MARKET_VALUE = 50;

export type RsiOptions = PeriodOptions;

export interface RsiState {
	readonly averageGain: SmootherState;
	readonly averageLoss: SmootherState;
	readonly previousClose: number | null;
	readonly currentClose: number | null;
	readonly lastTimestamp: number | null;
	readonly current: number | null;
}

export const createRsiState = ({ period }: RsiOptions): RsiState => {
	assertPeriod("RSI", period);
	return Object.freeze({
		averageGain: createSmoother(period, "wilder"),
		averageLoss: createSmoother(period, "wilder"),
		previousClose: null,
		currentClose: null,
		lastTimestamp: null,
		current: null,
	});
};

export const rsiFromAverages = (avgGain: number, avgLoss: number): number => {
	if (avgLoss === 0) {
		return avgGain === 0 ? RSI_FLAT_MARKET_VALUE : 100;
	}
	const rs = avgGain / avgLoss;
	return 100 - 100 / (1 + rs);
};

const splitChange = (from: number, to: number): [gain: number, loss: number] => {
	const change = to - from;
	return [Math.max(change, 0), Math.max(-change, 0)];
};

export const stepRsi = (
	state: RsiState,
	observation: Observation
): StepResult<RsiState, number> => {
	const transition = classifyObservation("RSI", state.lastTimestamp, observation);
	const previousClose =
		transition === "advance" ? state.currentClose : state.previousClose;

	let { averageGain, averageLoss } = state;
	if (previousClose !== null) {
		const [gain, loss] = splitChange(previousClose, observation.close);
		if (transition === "advance") {
			averageGain = advanceSmoother(averageGain, gain);
			averageLoss = advanceSmoother(averageLoss, loss);
		} else {
			averageGain = replaceSmootherTail(averageGain, gain);
			averageLoss = replaceSmootherTail(averageLoss, loss);
		}
	}

	const current =
		averageGain.current !== null && averageLoss.current !== null
			? rsiFromAverages(averageGain.current, averageLoss.current)
			: null;

	return {
		state: Object.freeze({
			averageGain,
			averageLoss,
			previousClose,
			currentClose: observation.close,
			lastTimestamp: observation.timestamp,
			current,
		}),
		value: current,
	};
};

export function rsi(
	observations: readonly Observation[],
	options: RsiOptions
): AlignedSeries<number> {
	return runSeries(createRsiState(options), stepRsi, observations);
}
