import type { Observation } from "@candlemath/indicators";

const TIMESTAMP_COLUMN = 0;
const CLOSE_COLUMN = 4;

export class KlineCsvError extends Error {
	constructor(
		message: string,
		public readonly line: number
	) {
		super(`Line ${line}: ${message}`);
		this.name = "KlineCsvError";
	}
}

const DECIMAL_INTEGER = /^-?\d+$/;

const isHeader = (fields: string[]): boolean =>
	fields.length > TIMESTAMP_COLUMN &&
	Number.isNaN(Number(fields[TIMESTAMP_COLUMN].trim()));

/**
 * Parses exchange kline rows (open_time, open, high, low, close, ...) into
 * observations keyed by open time. A leading header row and blank lines are
 * skipped. Close prices are passed through unchecked so the engine reports
 * non-finite input against the offending bar.
 */
export const parseKlineCsv = (text: string): Observation[] => {
	const observations: Observation[] = [];
	const lines = text.split(/\r?\n/);
	let seenRow = false;

	lines.forEach((raw, index) => {
		const lineNumber = index + 1;
		const line = raw.trim();
		if (!line) {
			return;
		}
		const fields = line.split(",");
		if (!seenRow && isHeader(fields)) {
			seenRow = true;
			return;
		}
		seenRow = true;

		if (fields.length <= CLOSE_COLUMN) {
			throw new KlineCsvError(
				`expected at least ${CLOSE_COLUMN + 1} columns, got ${fields.length}`,
				lineNumber
			);
		}
		const timestampField = fields[TIMESTAMP_COLUMN].trim();
		const closeField = fields[CLOSE_COLUMN].trim();
		if (!timestampField || !closeField) {
			throw new KlineCsvError("open_time and close must not be empty", lineNumber);
		}
		const timestamp = Number(timestampField);
		if (!DECIMAL_INTEGER.test(timestampField) || !Number.isSafeInteger(timestamp)) {
			throw new KlineCsvError(
				`open_time must be an integer, got "${timestampField}"`,
				lineNumber
			);
		}
		observations.push({ timestamp, close: Number(closeField) });
	});

	return observations;
};
