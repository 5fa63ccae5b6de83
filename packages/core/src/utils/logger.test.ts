import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createLogger, resetLoggerSettings } from "./logger";

const LOG_KEYS = ["LOG_LEVEL", "LOG_MODULE", "LOG_JSON", "LOG_PRETTY"];

describe("createLogger", () => {
	const lines = (): Array<Record<string, unknown>> =>
		vi.mocked(console.log).mock.calls.map((call) => JSON.parse(String(call[0])));

	beforeEach(() => {
		for (const key of LOG_KEYS) {
			vi.stubEnv(key, "");
		}
		vi.stubEnv("NODE_ENV", "test");
		resetLoggerSettings();
		vi.spyOn(console, "log").mockImplementation(() => undefined);
	});

	afterEach(() => {
		vi.unstubAllEnvs();
		vi.restoreAllMocks();
		resetLoggerSettings();
	});

	it("writes one JSON line per event with module and level", () => {
		createLogger("indicator-cli").info("indicator_run_started", {
			input: "klines.csv",
			ts: "2025-01-01T00:00:00.000Z",
		});

		expect(lines()).toEqual([
			{
				ts: "2025-01-01T00:00:00.000Z",
				level: "info",
				event: "indicator_run_started",
				module: "indicator-cli",
				input: "klines.csv",
			},
		]);
	});

	it("drops events below LOG_LEVEL", () => {
		vi.stubEnv("LOG_LEVEL", "warn");
		resetLoggerSettings();
		const logger = createLogger("core");

		logger.info("ignored");
		logger.error("kept", { ts: "t" });

		expect(lines()).toEqual([
			{ ts: "t", level: "error", event: "kept", module: "core" },
		]);
	});

	it("filters by LOG_MODULE", () => {
		vi.stubEnv("LOG_MODULE", "config, indicator-cli");
		resetLoggerSettings();

		createLogger("core").info("ignored");
		createLogger("config").info("kept", { ts: "t" });

		expect(lines()).toEqual([
			{ ts: "t", level: "info", event: "kept", module: "config" },
		]);
	});

	it("sanitizes errors, dates, bigints and cycles", () => {
		const cyclic: Record<string, unknown> = { name: "loop" };
		cyclic.self = cyclic;
		const failure = new Error("boom");

		createLogger("core").warn("payload", {
			ts: "t",
			when: new Date(0),
			count: BigInt(42),
			failure,
			cyclic,
		});

		const [line] = lines();
		expect(line.when).toBe("1970-01-01T00:00:00.000Z");
		expect(line.count).toBe("42");
		expect(line.failure).toEqual({
			name: "Error",
			message: "boom",
			stack: failure.stack,
		});
		expect(line.cyclic).toEqual({ name: "loop", self: "[circular]" });
	});
});
