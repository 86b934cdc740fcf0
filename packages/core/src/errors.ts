export type PricelensErrorCode =
	| "EmptyInput"
	| "InvalidParameter"
	| "UnsortedInput"
	| "InvalidInput"
	| "ConfigError";

export class PricelensError extends Error {
	public readonly code: PricelensErrorCode;
	public readonly details: Record<string, unknown>;

	constructor(
		code: PricelensErrorCode,
		message: string,
		details: Record<string, unknown> = {}
	) {
		super(message);
		this.name = code;
		this.code = code;
		this.details = details;

		Error.captureStackTrace(this, this.constructor);
	}
}

export class EmptyInputError extends PricelensError {
	constructor(what = "series") {
		super("EmptyInput", `Cannot compute on an empty ${what}`);
	}
}

export class InvalidParameterError extends PricelensError {
	constructor(name: string, value: unknown, expectation: string) {
		super(
			"InvalidParameter",
			`Invalid ${name}: expected ${expectation}, got ${String(value)}`,
			{ parameter: name, value }
		);
	}
}

export class UnsortedInputError extends PricelensError {
	constructor(message: string, index: number) {
		super("UnsortedInput", message, { index });
	}
}

export class InvalidInputError extends PricelensError {
	constructor(message: string, details: Record<string, unknown> = {}) {
		super("InvalidInput", message, details);
	}
}

export class ConfigError extends PricelensError {
	constructor(message: string, details: Record<string, unknown> = {}) {
		super("ConfigError", message, details);
	}
}

export const isPricelensError = (
	value: unknown,
	code?: PricelensErrorCode
): value is PricelensError =>
	value instanceof PricelensError && (code === undefined || value.code === code);

export const describeError = (value: unknown): string =>
	value instanceof Error ? value.message : String(value);
