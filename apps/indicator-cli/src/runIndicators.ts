import fs from "node:fs";
import path from "node:path";
import { createLogger, type ModuleLogger } from "@candlemath/core";
import {
	evaluateIndicator,
	type IndicatorSpec,
	type Observation,
} from "@candlemath/indicators";
import {
	countDefined,
	formatIndicatorCsv,
	lastDefined,
	outputFileName,
} from "./formatOutput";
import { parseKlineCsv } from "./klineCsv";

export interface IndicatorRunOptions {
	inputPath: string;
	outputDir: string;
	precision: number;
	indicators: IndicatorSpec[];
	logger?: ModuleLogger;
}

export interface IndicatorRunRow {
	label: string;
	defined: number;
	warmup: number;
	last: string | null;
	output: string;
}

export interface IndicatorRunSummary {
	input: string;
	observations: number;
	indicators: IndicatorRunRow[];
}

const defaultLogger = createLogger("indicator-cli");

export const readObservations = (inputPath: string): Observation[] => {
	if (!fs.existsSync(inputPath)) {
		throw new Error(`Input file not found: ${inputPath}`);
	}
	return parseKlineCsv(fs.readFileSync(inputPath, "utf-8"));
};

export const runIndicators = (options: IndicatorRunOptions): IndicatorRunSummary => {
	const logger = options.logger ?? defaultLogger;
	const observations = readObservations(options.inputPath);
	logger.info("indicator_run_started", {
		input: options.inputPath,
		observations: observations.length,
		indicators: options.indicators.length,
	});

	fs.mkdirSync(options.outputDir, { recursive: true });

	const rows = options.indicators.map((spec): IndicatorRunRow => {
		const output = evaluateIndicator(spec, observations);
		const outputPath = path.join(options.outputDir, outputFileName(spec));
		fs.writeFileSync(
			outputPath,
			formatIndicatorCsv(output, observations, options.precision)
		);
		const defined = countDefined(output);
		logger.debug("indicator_written", { label: output.label, output: outputPath });
		return {
			label: output.label,
			defined,
			warmup: observations.length - defined,
			last: lastDefined(output, options.precision),
			output: outputPath,
		};
	});

	const summary: IndicatorRunSummary = {
		input: options.inputPath,
		observations: observations.length,
		indicators: rows,
	};
	logger.info("indicator_summary", { ...summary });
	return summary;
};
