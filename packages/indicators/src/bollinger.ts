import { runSeries } from "./series";
import type {
	AlignedSeries,
	BollingerValue,
	Observation,
	PeriodOptions,
	StepResult,
} from "./types";
import {
	assertMultiplier,
	assertPeriod,
	classifyObservation,
} from "./validation";
import {
	createWindow,
	pushWindow,
	readWindow,
	replaceWindowTail,
	type WindowState,
} from "./windowedAggregator";

export const DEFAULT_BOLLINGER_MULTIPLIER = 2;

export interface BollingerOptions extends PeriodOptions {
	/** Standard deviation multiplier for the outer bands. Defaults to 2. */
	multiplier?: number;
}

export interface BollingerState {
	readonly window: WindowState;
	readonly multiplier: number;
	readonly lastTimestamp: number | null;
	readonly current: BollingerValue | null;
}

export const createBollingerState = ({
	period,
	multiplier = DEFAULT_BOLLINGER_MULTIPLIER,
}: BollingerOptions): BollingerState => {
	assertPeriod("BB", period);
	assertMultiplier(multiplier);
	return Object.freeze({
		window: createWindow(period, { variance: true }),
		multiplier,
		lastTimestamp: null,
		current: null,
	});
};

const toBands = (
	window: WindowState,
	multiplier: number
): BollingerValue | null => {
	const stats = readWindow(window);
	if (!stats || stats.variance === null) {
		return null;
	}
	const offset = multiplier * Math.sqrt(stats.variance);
	return Object.freeze({
		upper: stats.mean + offset,
		middle: stats.mean,
		lower: stats.mean - offset,
	});
};

export const stepBollinger = (
	state: BollingerState,
	observation: Observation
): StepResult<BollingerState, BollingerValue> => {
	const transition = classifyObservation("BB", state.lastTimestamp, observation);
	const window =
		transition === "advance"
			? pushWindow(state.window, observation.close)
			: replaceWindowTail(state.window, observation.close);
	const current = toBands(window, state.multiplier);

	return {
		state: Object.freeze({
			...state,
			window,
			lastTimestamp: observation.timestamp,
			current,
		}),
		value: current,
	};
};

export function bollingerBands(
	observations: readonly Observation[],
	options: BollingerOptions
): AlignedSeries<BollingerValue> {
	return runSeries(createBollingerState(options), stepBollinger, observations);
}

/** Distance between the outer bands; narrow widths mark a squeeze. */
export const bandWidth = (value: BollingerValue): number =>
	value.upper - value.lower;
