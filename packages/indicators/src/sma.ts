import { runSeries } from "./series";
import type {
	AlignedSeries,
	Observation,
	PeriodOptions,
	StepResult,
} from "./types";
import { assertPeriod, classifyObservation } from "./validation";
import {
	createWindow,
	pushWindow,
	readWindow,
	replaceWindowTail,
	type WindowState,
} from "./windowedAggregator";

export type SmaOptions = PeriodOptions;

export interface SmaState {
	readonly window: WindowState;
	readonly lastTimestamp: number | null;
	readonly current: number | null;
}

export const createSmaState = ({ period }: SmaOptions): SmaState => {
	assertPeriod("SMA", period);
	return Object.freeze({
		window: createWindow(period),
		lastTimestamp: null,
		current: null,
	});
};

export const stepSma = (
	state: SmaState,
	observation: Observation
): StepResult<SmaState, number> => {
	const transition = classifyObservation("SMA", state.lastTimestamp, observation);
	const window =
		transition === "advance"
			? pushWindow(state.window, observation.close)
			: replaceWindowTail(state.window, observation.close);
	const current = readWindow(window)?.mean ?? null;

	return {
		state: Object.freeze({
			window,
			lastTimestamp: observation.timestamp,
			current,
		}),
		value: current,
	};
};

export function sma(
	observations: readonly Observation[],
	options: SmaOptions
): AlignedSeries<number> {
	return runSeries(createSmaState(options), stepSma, observations);
}
