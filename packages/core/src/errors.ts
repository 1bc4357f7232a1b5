export type RunStage =
	| "config"
	| "auth"
	| "capital"
	| "market_data"
	| "strategy"
	| "output";

export type SignalErrorCode =
	| "CONFIGURATION_ERROR"
	| "AUTHENTICATION_FAILURE"
	| "CAPITAL_STATE_INVALID"
	| "DATA_UNAVAILABLE"
	| "INDICATOR_WARMUP_INSUFFICIENT"
	| "OUTPUT_WRITE_FAILED";

/**
 * Base class for every failure the signal run classifies. `stage` names the
 * step of the run that raised it so the CLI can report the fatal stage.
 */
export class SignalRunError extends Error {
	constructor(
		message: string,
		readonly code: SignalErrorCode,
		readonly stage: RunStage,
		readonly details: Record<string, unknown> = {}
	) {
		super(message);
		this.name = new.target.name;
	}
}

export class ConfigurationError extends SignalRunError {
	constructor(message: string, details: Record<string, unknown> = {}) {
		super(message, "CONFIGURATION_ERROR", "config", details);
	}
}

export class AuthenticationFailureError extends SignalRunError {
	constructor(message: string, details: Record<string, unknown> = {}) {
		super(message, "AUTHENTICATION_FAILURE", "auth", details);
	}
}

export class CapitalStateInvalidError extends SignalRunError {
	constructor(message: string, details: Record<string, unknown> = {}) {
		super(message, "CAPITAL_STATE_INVALID", "capital", details);
	}
}

export class DataUnavailableError extends SignalRunError {
	constructor(message: string, details: Record<string, unknown> = {}) {
		super(message, "DATA_UNAVAILABLE", "market_data", details);
	}
}

export class IndicatorWarmupError extends SignalRunError {
	constructor(message: string, details: Record<string, unknown> = {}) {
		super(message, "INDICATOR_WARMUP_INSUFFICIENT", "strategy", details);
	}
}

export class OutputWriteError extends SignalRunError {
	constructor(message: string, details: Record<string, unknown> = {}) {
		super(message, "OUTPUT_WRITE_FAILED", "output", details);
	}
}

export const isSignalRunError = (value: unknown): value is SignalRunError =>
	value instanceof SignalRunError;

export const describeError = (value: unknown): string =>
	value instanceof Error ? value.message : String(value);
