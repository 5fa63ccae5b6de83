export type LogLevel = "debug" | "info" | "warn" | "error";

export interface BaseLogPayload {
	level: LogLevel;
	event: string;
	module: string;
	ts?: string;
	[key: string]: unknown;
}

type Nullable<T> = T | null | undefined;

interface LoggerSettings {
	pretty: boolean;
	json: boolean;
	minLevel: LogLevel;
	moduleFilter: Set<string> | null;
}

const LEVELS: Record<LogLevel, number> = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40,
};

const isLogLevel = (value: string): value is LogLevel =>
	Object.prototype.hasOwnProperty.call(LEVELS, value);

const normalizeLevel = (value?: string): LogLevel => {
	if (!value) {
		return "info";
	}
	const normalized = value.toLowerCase();
	return isLogLevel(normalized) ? normalized : "info";
};

const parseModuleFilter = (raw?: string): Set<string> | null => {
	if (!raw) {
		return null;
	}
	const entries = raw
		.split(",")
		.map((value) => value.trim())
		.filter((value) => value.length > 0);
	return entries.length ? new Set(entries) : null;
};

// Resolved on first use so that a .env loaded at startup is honoured.
let settings: LoggerSettings | null = null;

const resolveSettings = (): LoggerSettings => {
	if (settings) {
		return settings;
	}
	const pretty =
		process.env.LOG_PRETTY === "true" || process.env.NODE_ENV === "development";
	settings = {
		pretty,
		json: process.env.LOG_JSON === "true" || !pretty,
		minLevel: normalizeLevel(process.env.LOG_LEVEL),
		moduleFilter: parseModuleFilter(process.env.LOG_MODULE),
	};
	return settings;
};

/** Drops the cached LOG_* settings; the next log call re-reads process.env. */
export const resetLoggerSettings = (): void => {
	settings = null;
};

const shouldLog = (
	current: LoggerSettings,
	level: LogLevel,
	moduleName: string
): boolean => {
	if (LEVELS[level] < LEVELS[current.minLevel]) {
		return false;
	}
	if (current.moduleFilter && !current.moduleFilter.has(moduleName)) {
		return false;
	}
	return true;
};

export function log(payload: BaseLogPayload): void {
	const current = resolveSettings();
	if (!shouldLog(current, payload.level, payload.module)) {
		return;
	}
	const ts = payload.ts ?? new Date().toISOString();
	const base: BaseLogPayload = { ts, ...payload };

	if (current.pretty) {
		try {
			printPretty(base);
		} catch (error) {
			console.warn(
				`[logger] pretty-print failed: ${
					error instanceof Error ? error.message : "unknown"
				}`
			);
		}
	}

	if (current.json) {
		try {
			const json = JSON.stringify(sanitize(base));
			console.log(json);
		} catch (err) {
			console.log(
				JSON.stringify({
					ts,
					level: "error",
					event: "logging_error",
					module: "logger",
					error: err instanceof Error ? err.message : "serialization_failed",
				})
			);
		}
	}
}

export interface ModuleLogger {
	log: (level: LogLevel, event: string, data?: Record<string, unknown>) => void;
	debug: (event: string, data?: Record<string, unknown>) => void;
	info: (event: string, data?: Record<string, unknown>) => void;
	warn: (event: string, data?: Record<string, unknown>) => void;
	error: (event: string, data?: Record<string, unknown>) => void;
}

export const createLogger = (moduleName: string): ModuleLogger => ({
	log: (level, event, data) =>
		log({ level, event, module: moduleName, ...(data ?? {}) }),
	debug: (event, data) =>
		log({ level: "debug", event, module: moduleName, ...(data ?? {}) }),
	info: (event, data) =>
		log({ level: "info", event, module: moduleName, ...(data ?? {}) }),
	warn: (event, data) =>
		log({ level: "warn", event, module: moduleName, ...(data ?? {}) }),
	error: (event, data) =>
		log({ level: "error", event, module: moduleName, ...(data ?? {}) }),
});

const sanitize = (payload: BaseLogPayload): unknown =>
	sanitizeValue(payload, new WeakSet<object>());

const sanitizeValue = (value: unknown, seen: WeakSet<object>): unknown => {
	if (typeof value === "bigint") {
		return value.toString();
	}
	if (typeof value === "function") {
		return "[function]";
	}
	if (value instanceof Error) {
		return { name: value.name, message: value.message, stack: value.stack };
	}
	if (value instanceof Date) {
		return value.toISOString();
	}
	if (Array.isArray(value)) {
		if (seen.has(value)) {
			return "[circular]";
		}
		seen.add(value);
		const arr = value.map((item) => sanitizeValue(item, seen));
		seen.delete(value);
		return arr;
	}
	if (value && typeof value === "object") {
		if (seen.has(value)) {
			return "[circular]";
		}
		seen.add(value);
		const clone: Record<string, unknown> = {};
		for (const [key, nested] of Object.entries(value)) {
			clone[key] = sanitizeValue(nested, seen);
		}
		seen.delete(value);
		return clone;
	}
	return value;
};

function printPretty(base: BaseLogPayload): void {
	const { level, event, module, ts, ...rest } = base;
	console.log(`[${ts}] [${level.toUpperCase()}] ${module}:${event}`);

	try {
		switch (event) {
			case "indicator_summary": {
				printIndicatorSummary(rest);
				break;
			}
			case "indicator_run_failed": {
				printRunFailure(rest);
				break;
			}
			default:
				break;
		}
	} catch (error) {
		console.warn(
			`[logger] pretty render error: ${
				error instanceof Error ? error.message : "unknown"
			}`
		);
	}
}

const printIndicatorSummary = (rest: Record<string, unknown>): void => {
	const { input, observations, indicators } =
		rest as IndicatorSummaryPrettyPayload;
	if (!indicators?.length) {
		return;
	}
	console.log(
		`Indicators for ${input ?? "n/a"} (${observations ?? 0} observations):`
	);
	console.table(
		indicators.map((row) => ({
			indicator: row.label,
			defined: row.defined,
			warmup: row.warmup,
			last: row.last,
			output: row.output,
		}))
	);
};

const printRunFailure = (rest: Record<string, unknown>): void => {
	const { code, message } = rest as RunFailurePrettyPayload;
	console.log(`  ${code ?? "ERROR"}: ${message ?? "unknown failure"}`);
};

interface IndicatorSummaryPrettyPayload {
	input?: string;
	observations?: number;
	indicators?: Array<{
		label?: string;
		defined?: number;
		warmup?: number;
		last?: Nullable<string | number>;
		output?: string;
	}>;
}

interface RunFailurePrettyPayload {
	code?: string;
	message?: string;
}
