#!/usr/bin/env node

import path from "node:path";
import process from "node:process";
import {
	createLogger,
	getDefaultConfigDir,
	loadEnvConfig,
	loadIndicatorProfile,
	parsePrecision,
} from "@candlemath/core";
import { IndicatorError } from "@candlemath/indicators";
import { parseCliArgs, readFlag, readStringArg } from "./cliArgs";
import { runIndicators } from "./runIndicators";

const logger = createLogger("indicator-cli");

const USAGE = `Usage:
  npm run indicators -- --input <klines.csv> [options]

Options:
  --input <path>           Kline CSV (open_time,open,high,low,close,...) (required)
  --profile <name>         Indicator profile under config/indicators (default INDICATOR_PROFILE)
  --out <dir>              Output directory (default INDICATOR_OUTPUT_DIR)
  --precision <digits>     Decimal places written per value (default INDICATOR_PRECISION)
  --configDir <path>       Custom config directory
  --envPath <path>         Custom .env path
  --help                   Show this message
`;

const main = (): void => {
	const args = parseCliArgs(process.argv.slice(2));
	if (readFlag(args, "help")) {
		console.log(USAGE);
		return;
	}

	const input = readStringArg(args, "input");
	if (!input) {
		console.error(USAGE);
		throw new Error("Missing required --input <klines.csv>");
	}

	const envPath = readStringArg(args, "envPath");
	const env = envPath ? loadEnvConfig(path.resolve(envPath)) : loadEnvConfig();
	const configDir = readStringArg(args, "configDir");
	const profileName = readStringArg(args, "profile") ?? env.indicatorProfile;
	const profile = loadIndicatorProfile(
		configDir ? path.resolve(configDir) : getDefaultConfigDir(),
		profileName
	);
	const precisionArg = readStringArg(args, "precision");
	const precision =
		precisionArg === undefined ? env.precision : parsePrecision(precisionArg, "--precision");
	const outputDir = readStringArg(args, "out") ?? env.outputDir;

	runIndicators({
		inputPath: path.resolve(input),
		outputDir: path.resolve(outputDir),
		precision,
		indicators: profile.indicators,
		logger,
	});
};

try {
	main();
} catch (error) {
	logger.error("indicator_run_failed", {
		code: error instanceof IndicatorError ? error.code : "CLI_ERROR",
		message: error instanceof Error ? error.message : String(error),
	});
	process.exitCode = 1;
}
