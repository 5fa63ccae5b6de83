import { bollingerBands, DEFAULT_BOLLINGER_MULTIPLIER } from "./bollinger";
import { ema } from "./ema";
import { rsi } from "./rsi";
import { sma } from "./sma";
import type { AlignedSeries, BollingerValue, Observation } from "./types";

export type IndicatorKind = "sma" | "ema" | "bb" | "rsi";

export type IndicatorSpec =
	| { kind: "sma"; period: number }
	| { kind: "ema"; period: number; enforceConvergence?: boolean }
	| { kind: "bb"; period: number; multiplier?: number }
	| { kind: "rsi"; period: number };

export type IndicatorOutput =
	| { kind: "scalar"; label: string; values: AlignedSeries<number> }
	| { kind: "bands"; label: string; values: AlignedSeries<BollingerValue> };

export const INDICATOR_KINDS: readonly IndicatorKind[] = ["sma", "ema", "bb", "rsi"];

export const isIndicatorKind = (value: unknown): value is IndicatorKind =>
	typeof value === "string" && INDICATOR_KINDS.some((kind) => kind === value);

export const indicatorLabel = (spec: IndicatorSpec): string => {
	switch (spec.kind) {
		case "sma":
			return `SMA(${spec.period})`;
		case "ema":
			return `EMA(${spec.period})`;
		case "bb":
			return `BB(${spec.period}, ${spec.multiplier ?? DEFAULT_BOLLINGER_MULTIPLIER})`;
		case "rsi":
			return `RSI(${spec.period})`;
	}
};

export const evaluateIndicator = (
	spec: IndicatorSpec,
	observations: readonly Observation[]
): IndicatorOutput => {
	const label = indicatorLabel(spec);
	switch (spec.kind) {
		case "sma":
			return { kind: "scalar", label, values: sma(observations, spec) };
		case "ema":
			return { kind: "scalar", label, values: ema(observations, spec) };
		case "bb":
			return { kind: "bands", label, values: bollingerBands(observations, spec) };
		case "rsi":
			return { kind: "scalar", label, values: rsi(observations, spec) };
	}
};
