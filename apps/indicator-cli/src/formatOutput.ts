import {
	DEFAULT_BOLLINGER_MULTIPLIER,
	type IndicatorOutput,
	type IndicatorSpec,
	type Observation,
} from "@candlemath/indicators";

export const outputFileName = (spec: IndicatorSpec): string => {
	if (spec.kind === "bb") {
		return `bb-${spec.period}-${spec.multiplier ?? DEFAULT_BOLLINGER_MULTIPLIER}.csv`;
	}
	return `${spec.kind}-${spec.period}.csv`;
};

const buildRows = (
	output: IndicatorOutput,
	observations: readonly Observation[],
	precision: number
): Record<string, string | number>[] => {
	const rows: Record<string, string | number>[] = [];
	if (output.kind === "scalar") {
		output.values.forEach((value, index) => {
			if (value !== null) {
				rows.push({
					open_time: observations[index].timestamp,
					value: value.toFixed(precision),
				});
			}
		});
		return rows;
	}
	output.values.forEach((bands, index) => {
		if (bands !== null) {
			rows.push({
				open_time: observations[index].timestamp,
				upper: bands.upper.toFixed(precision),
				middle: bands.middle.toFixed(precision),
				lower: bands.lower.toFixed(precision),
			});
		}
	});
	return rows;
};

const headersFor = (output: IndicatorOutput): string[] =>
	output.kind === "scalar"
		? ["open_time", "value"]
		: ["open_time", "upper", "middle", "lower"];

/** Renders defined values only; warm-up positions produce no rows. */
export const formatIndicatorCsv = (
	output: IndicatorOutput,
	observations: readonly Observation[],
	precision: number
): string => {
	const headers = headersFor(output);
	const lines = [headers.join(",")];
	for (const row of buildRows(output, observations, precision)) {
		lines.push(headers.map((header) => String(row[header])).join(","));
	}
	return `${lines.join("\n")}\n`;
};

export const countDefined = (output: IndicatorOutput): number => {
	let count = 0;
	for (const value of output.values) {
		if (value !== null) {
			count += 1;
		}
	}
	return count;
};

export const lastDefined = (
	output: IndicatorOutput,
	precision: number
): string | null => {
	for (let i = output.values.length - 1; i >= 0; i--) {
		const value = output.values[i];
		if (value === null) {
			continue;
		}
		return typeof value === "number"
			? value.toFixed(precision)
			: `${value.lower.toFixed(precision)}/${value.middle.toFixed(precision)}/${value.upper.toFixed(precision)}`;
	}
	return null;
};
