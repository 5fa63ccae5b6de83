import type { Observation } from "../types";

/**
 * Deterministic random-walk closes around `start`. A small LCG keeps the
 * series identical across runs.
 */
export const pricePath = (length: number, seed = 7, start = 100): number[] => {
	let state = seed >>> 0;
	let price = start;
	const closes: number[] = [];
	for (let i = 0; i < length; i += 1) {
		state = (Math.imul(state, 1664525) + 1013904223) >>> 0;
		const step = (state / 0x1_0000_0000 - 0.5) * 2;
		price = Math.max(1, price + step);
		closes.push(Number(price.toFixed(2)));
	}
	return closes;
};

export const stamp = (pairs: Array<[number, number]>): Observation[] =>
	pairs.map(([timestamp, close]) => ({ timestamp, close }));

export const mean = (values: readonly number[]): number =>
	values.reduce((acc, value) => acc + value, 0) / values.length;

export const populationStdDev = (values: readonly number[]): number => {
	const avg = mean(values);
	return Math.sqrt(
		values.reduce((acc, value) => acc + (value - avg) ** 2, 0) / values.length
	);
};
