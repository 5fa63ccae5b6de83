import {
	InvalidMultiplierError,
	InvalidPeriodError,
	NonFiniteInputError,
	TimestampOrderError,
} from "./errors";
import type { Observation } from "./types";

export type BarTransition = "advance" | "repaint";

export const assertPeriod = (indicator: string, period: number): void => {
	if (!Number.isInteger(period) || period < 1) {
		throw new InvalidPeriodError(indicator, period);
	}
};

export const assertMultiplier = (multiplier: number): void => {
	if (!Number.isFinite(multiplier) || multiplier <= 0) {
		throw new InvalidMultiplierError(multiplier);
	}
};

/**
 * Validates an incoming observation against the last accepted timestamp.
 * A repeated timestamp repaints the current bar; a later one opens a new bar.
 */
export const classifyObservation = (
	indicator: string,
	lastTimestamp: number | null,
	observation: Observation
): BarTransition => {
	const { timestamp, close } = observation;
	if (!Number.isFinite(close)) {
		throw new NonFiniteInputError(indicator, timestamp, close);
	}
	if (lastTimestamp === null) {
		return "advance";
	}
	if (timestamp < lastTimestamp) {
		throw new TimestampOrderError(indicator, lastTimestamp, timestamp);
	}
	return timestamp === lastTimestamp ? "repaint" : "advance";
};
