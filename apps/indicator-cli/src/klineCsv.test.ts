import { describe, it, expect } from "vitest";
import { KlineCsvError, parseKlineCsv } from "./klineCsv";

const HEADER = "open_time,open,high,low,close,volume,close_time";

describe("parseKlineCsv", () => {
	it("reads open time and close from each row", () => {
		const csv = [
			HEADER,
			"1700000000000,100.5,101,99.5,100.75,12.5,1700000059999",
			"1700000060000,100.75,102,100,101.25,8,1700000119999",
		].join("\n");

		expect(parseKlineCsv(csv)).toEqual([
			{ timestamp: 1700000000000, close: 100.75 },
			{ timestamp: 1700000060000, close: 101.25 },
		]);
	});

	it("accepts files without a header and with CRLF line endings", () => {
		const csv = "1,10,11,9,10.5,1,2\r\n2,10.5,12,10,11,1,3\r\n";
		expect(parseKlineCsv(csv)).toEqual([
			{ timestamp: 1, close: 10.5 },
			{ timestamp: 2, close: 11 },
		]);
	});

	it("skips blank lines", () => {
		const csv = `${HEADER}\n\n1,1,1,1,5\n\n2,1,1,1,6\n`;
		expect(parseKlineCsv(csv)).toEqual([
			{ timestamp: 1, close: 5 },
			{ timestamp: 2, close: 6 },
		]);
	});

	it("returns no observations for an empty file", () => {
		expect(parseKlineCsv("")).toEqual([]);
		expect(parseKlineCsv(`${HEADER}\n`)).toEqual([]);
	});

	it("reports short rows with their line number", () => {
		const csv = `${HEADER}\n1,1,1,1,5\n2,1,1`;
		expect(() => parseKlineCsv(csv)).toThrowError(
			"Line 3: expected at least 5 columns, got 3"
		);
	});

	it("rejects empty close fields", () => {
		expect(() => parseKlineCsv("1,1,1,1,\n")).toThrowError(KlineCsvError);
		expect(() => parseKlineCsv("1,1,1,1,\n")).toThrowError(
			"Line 1: open_time and close must not be empty"
		);
	});

	it("rejects fractional open times after the first row", () => {
		const csv = "1,1,1,1,5\n2.5,1,1,1,6";
		expect(() => parseKlineCsv(csv)).toThrowError(
			'Line 2: open_time must be an integer, got "2.5"'
		);
	});

	it("accepts only decimal digits as open times", () => {
		expect(() => parseKlineCsv("1,1,1,1,5\n0x1F,1,1,1,6")).toThrowError(
			'Line 2: open_time must be an integer, got "0x1F"'
		);
		expect(() => parseKlineCsv("1e3,1,1,1,5")).toThrowError(
			'Line 1: open_time must be an integer, got "1e3"'
		);
		expect(parseKlineCsv("-60000,1,1,1,5")).toEqual([{ timestamp: -60000, close: 5 }]);
	});

	it("passes unparseable closes through for the engine to reject", () => {
		const [observation] = parseKlineCsv("1,1,1,1,abc");
		expect(observation.timestamp).toBe(1);
		expect(observation.close).toBeNaN();
	});
});
