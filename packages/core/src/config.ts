import fs from "node:fs";
import path from "node:path";
import dotenv from "dotenv";
import {
	assertMultiplier,
	assertPeriod,
	isIndicatorKind,
	type IndicatorSpec,
} from "@candlemath/indicators";

export type ConfigSourceType = "file";

export interface ConfigMetadata {
	path?: string;
	source: ConfigSourceType;
	profile?: string;
}

const CONFIG_META_SYMBOL = Symbol.for("candlemath.config.meta");

const isConfigMetadata = (value: unknown): value is ConfigMetadata =>
	typeof value === "object" &&
	value !== null &&
	"source" in value &&
	value.source === "file";

export const getConfigMetadata = (config: unknown): ConfigMetadata | null => {
	if (!config || typeof config !== "object") {
		return null;
	}
	const meta: unknown = Reflect.get(config, CONFIG_META_SYMBOL);
	return isConfigMetadata(meta) ? meta : null;
};

export const withConfigMetadata = <T extends object>(
	config: T,
	metadata: ConfigMetadata
): T => {
	const existing = getConfigMetadata(config);
	Object.defineProperty(config, CONFIG_META_SYMBOL, {
		value: { ...existing, ...metadata },
		enumerable: false,
		configurable: true,
		writable: true,
	});
	return config;
};

let envLoaded = false;
let loadedEnvPath: string | undefined;
let cachedWorkspaceRoot: string | undefined;

const isWorkspaceRoot = (dir: string): boolean => {
	if (fs.existsSync(path.join(dir, ".git"))) {
		return true;
	}
	const manifest = path.join(dir, "package.json");
	if (!fs.existsSync(manifest)) {
		return false;
	}
	const parsed: unknown = JSON.parse(fs.readFileSync(manifest, "utf-8"));
	return typeof parsed === "object" && parsed !== null && "workspaces" in parsed;
};

const findWorkspaceRoot = (): string => {
	if (cachedWorkspaceRoot) {
		return cachedWorkspaceRoot;
	}

	let current = process.cwd();
	while (!isWorkspaceRoot(current)) {
		const parent = path.dirname(current);
		if (parent === current) {
			break;
		}
		current = parent;
	}

	cachedWorkspaceRoot = current;
	return current;
};

export const getDefaultConfigDir = (): string =>
	path.join(findWorkspaceRoot(), "config");

const getDefaultEnvPath = (): string => path.join(findWorkspaceRoot(), ".env");

export interface EnvConfig {
	indicatorProfile: string;
	precision: number;
	outputDir: string;
}

export const DEFAULT_PRECISION = 10;

const getEnvVar = (key: string, fallback: string): string => {
	const value = process.env[key];
	if (value !== undefined && value.trim() !== "") {
		return value.trim();
	}
	return fallback;
};

export const parsePrecision = (value: string, field: string): number => {
	const precision = Number(value);
	if (!Number.isInteger(precision) || precision < 0 || precision > 100) {
		throw new Error(`${field} must be an integer between 0 and 100, got "${value}"`);
	}
	return precision;
};

export const loadEnvConfig = (envPath = getDefaultEnvPath()): EnvConfig => {
	if (!envLoaded || loadedEnvPath !== envPath) {
		dotenv.config({ path: envPath });
		envLoaded = true;
		loadedEnvPath = envPath;
	}

	return {
		indicatorProfile: getEnvVar("INDICATOR_PROFILE", "default"),
		precision: parsePrecision(
			getEnvVar("INDICATOR_PRECISION", String(DEFAULT_PRECISION)),
			"INDICATOR_PRECISION"
		),
		outputDir: getEnvVar("INDICATOR_OUTPUT_DIR", "output"),
	};
};

export interface IndicatorProfile {
	indicators: IndicatorSpec[];
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
	typeof value === "object" && value !== null && !Array.isArray(value);

const ensureNumber = (value: unknown, field: string): number => {
	if (typeof value !== "number" || Number.isNaN(value)) {
		throw new Error(`Required numeric field missing in ${field}`);
	}
	return value;
};

const optionalNumber = (value: unknown, field: string): number | undefined =>
	value === undefined ? undefined : ensureNumber(value, field);

const optionalBoolean = (value: unknown, field: string): boolean | undefined => {
	if (value === undefined) {
		return undefined;
	}
	if (typeof value !== "boolean") {
		throw new Error(`${field} must be a boolean`);
	}
	return value;
};

const parseIndicatorSpec = (raw: unknown, field: string): IndicatorSpec => {
	if (!isRecord(raw)) {
		throw new Error(`${field} must be an object`);
	}
	const { kind } = raw;
	if (!isIndicatorKind(kind)) {
		throw new Error(
			`${field}.kind must be one of sma, ema, bb, rsi, got ${JSON.stringify(kind)}`
		);
	}
	const period = ensureNumber(raw.period, `${field}.period`);
	assertPeriod(kind.toUpperCase(), period);

	switch (kind) {
		case "sma":
		case "rsi":
			return { kind, period };
		case "ema": {
			const enforceConvergence = optionalBoolean(
				raw.enforceConvergence,
				`${field}.enforceConvergence`
			);
			return enforceConvergence === undefined
				? { kind, period }
				: { kind, period, enforceConvergence };
		}
		case "bb": {
			const multiplier = optionalNumber(raw.multiplier, `${field}.multiplier`);
			if (multiplier === undefined) {
				return { kind, period };
			}
			assertMultiplier(multiplier);
			return { kind, period, multiplier };
		}
	}
};

export const parseIndicatorProfile = (
	raw: unknown,
	source: string
): IndicatorProfile => {
	const entries: unknown = isRecord(raw) ? raw.indicators : undefined;
	if (!Array.isArray(entries)) {
		throw new Error(`Indicator profile at ${source} must define an "indicators" array.`);
	}
	if (!entries.length) {
		throw new Error(`Indicator profile at ${source} lists no indicators.`);
	}
	return {
		indicators: entries.map((entry: unknown, index: number) =>
			parseIndicatorSpec(entry, `indicators[${index}]`)
		),
	};
};

export const resolveIndicatorProfilePath = (
	configDir: string,
	profile: string
): string => {
	const fileName = profile.endsWith(".json") ? profile : `${profile}.json`;
	const candidates = [
		path.join(configDir, "indicators", fileName),
		path.join(configDir, fileName),
	];
	for (const candidate of candidates) {
		if (fs.existsSync(candidate)) {
			return candidate;
		}
	}
	throw new Error(
		`Indicator profile not found. Looked for ${candidates.join(", ")}`
	);
};

export const loadIndicatorProfile = (
	configDir = getDefaultConfigDir(),
	profile = "default"
): IndicatorProfile => {
	const profilePath = resolveIndicatorProfilePath(configDir, profile);
	const raw: unknown = JSON.parse(fs.readFileSync(profilePath, "utf-8"));
	return withConfigMetadata(parseIndicatorProfile(raw, profilePath), {
		source: "file",
		path: profilePath,
		profile,
	});
};
