export type IndicatorErrorCode =
	| "INVALID_PERIOD"
	| "INVALID_MULTIPLIER"
	| "NON_FINITE_INPUT"
	| "TIMESTAMP_ORDER";

export class IndicatorError extends Error {
	readonly code: IndicatorErrorCode;

	constructor(code: IndicatorErrorCode, message: string) {
		super(message);
		this.name = new.target.name;
		this.code = code;
	}
}

export class InvalidPeriodError extends IndicatorError {
	readonly period: number;

	constructor(indicator: string, period: number) {
		super(
			"INVALID_PERIOD",
			`${indicator} period must be a positive integer, got ${period}`
		);
		this.period = period;
	}
}

export class InvalidMultiplierError extends IndicatorError {
	readonly multiplier: number;

	constructor(multiplier: number) {
		super(
			"INVALID_MULTIPLIER",
			`Bollinger multiplier must be a positive finite number, got ${multiplier}`
		);
		this.multiplier = multiplier;
	}
}

export class NonFiniteInputError extends IndicatorError {
	readonly timestamp: number;
	readonly close: number;

	constructor(indicator: string, timestamp: number, close: number) {
		super(
			"NON_FINITE_INPUT",
			`${indicator} received non-finite close ${close} at timestamp ${timestamp}`
		);
		this.timestamp = timestamp;
		this.close = close;
	}
}

export class TimestampOrderError extends IndicatorError {
	readonly previous: number;
	readonly received: number;

	constructor(indicator: string, previous: number, received: number) {
		super(
			"TIMESTAMP_ORDER",
			`${indicator} timestamps must be non-decreasing: last=${previous}, got=${received}`
		);
		this.previous = previous;
		this.received = received;
	}
}
