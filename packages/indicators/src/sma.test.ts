import { describe, expect, it } from "vitest";
import {
	InvalidPeriodError,
	NonFiniteInputError,
	TimestampOrderError,
} from "./errors";
import { closesToObservations, currentValue } from "./series";
import { createSmaState, sma, stepSma } from "./sma";
import { mean, pricePath, stamp } from "./__tests__/pricePath";

describe("sma", () => {
	it("is entirely null when there are fewer observations than the period", () => {
		const series = sma(closesToObservations([1, 2, 3, 4]), { period: 5 });
		expect(series).toEqual([null, null, null, null]);
	});

	it("keeps the output aligned with the input", () => {
		expect(sma([], { period: 3 })).toEqual([]);
		expect(sma(closesToObservations(pricePath(17)), { period: 4 })).toHaveLength(17);
	});

	it("equals the mean of the trailing window at every defined index", () => {
		const closes = pricePath(80);
		const period = 7;
		const series = sma(closesToObservations(closes), { period });

		series.forEach((value, index) => {
			if (index < period - 1) {
				expect(value).toBeNull();
				return;
			}
			expect(value).toBeCloseTo(mean(closes.slice(index - period + 1, index + 1)), 9);
		});
	});

	it("holds a flat 10 once a period-20 window fills", () => {
		const series = sma(closesToObservations(new Array(30).fill(10)), { period: 20 });
		expect(series.slice(0, 19).every((value) => value === null)).toBe(true);
		expect(series.slice(19)).toEqual(new Array(11).fill(10));
	});

	it("returns the flat close exactly after prices settle", () => {
		const history = pricePath(200).map((close) => Number((close * 500).toFixed(2)));
		const series = sma(
			closesToObservations(history.concat(new Array(20).fill(61234.57))),
			{ period: 20 }
		);
		expect(series[series.length - 1]).toBe(61234.57);
	});

	it("is deterministic across runs", () => {
		const observations = closesToObservations(pricePath(50, 11));
		expect(sma(observations, { period: 6 })).toEqual(sma(observations, { period: 6 }));
	});

	it("streams the same values as the batch form", () => {
		const observations = closesToObservations(pricePath(40, 3));
		let state = createSmaState({ period: 5 });
		const streamed = observations.map((observation) => {
			const result = stepSma(state, observation);
			state = result.state;
			return result.value;
		});

		expect(streamed).toEqual(sma(observations, { period: 5 }));
		expect(currentValue(state)).toBe(streamed[streamed.length - 1]);
	});

	it("repaints the current bar when a timestamp repeats", () => {
		const series = sma(
			stamp([
				[0, 1],
				[1, 2],
				[2, 3],
				[2, 6],
			]),
			{ period: 3 }
		);
		expect(series).toEqual([null, null, 2, 3]);
	});

	it("ends a repainted stream where the closed-bar stream ends", () => {
		const closed = sma(
			stamp([
				[0, 1],
				[1, 2],
				[2, 6],
				[3, 4],
			]),
			{ period: 3 }
		);
		const repainted = sma(
			stamp([
				[0, 1],
				[1, 2],
				[2, 3],
				[2, 6],
				[3, 4],
			]),
			{ period: 3 }
		);
		expect(repainted[repainted.length - 1]).toBe(4);
		expect(closed[closed.length - 1]).toBe(4);
	});

	it("fails fast on an invalid period", () => {
		expect(() => sma([], { period: 0 })).toThrowError(InvalidPeriodError);
		expect(() => createSmaState({ period: -1 })).toThrowError(/SMA period/);
	});

	it("surfaces a non-finite close at ingestion", () => {
		const observations = stamp([
			[0, 1],
			[1, Number.NaN],
		]);
		expect(() => sma(observations, { period: 2 })).toThrowError(NonFiniteInputError);
		expect(() =>
			sma(stamp([[0, Number.POSITIVE_INFINITY]]), { period: 1 })
		).toThrowError(NonFiniteInputError);
	});

	it("rejects timestamps that move backwards", () => {
		const observations = stamp([
			[5, 1],
			[4, 2],
		]);
		expect(() => sma(observations, { period: 2 })).toThrowError(TimestampOrderError);
	});
});
