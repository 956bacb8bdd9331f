/**
 * Error taxonomy shared by every stage of a backtest run. Each error carries a
 * stable machine-readable code so batch reports can record failures per symbol.
 */

export type BacktestErrorCode =
	| "BACKTEST_ERROR"
	| "INSUFFICIENT_DATA"
	| "SCHEMA_ERROR"
	| "INVALID_CONFIGURATION"
	| "UNEXPECTED_ERROR";

export class BacktestError extends Error {
	public readonly code: BacktestErrorCode;
	public readonly context?: Record<string, unknown>;

	constructor(
		message: string,
		code: BacktestErrorCode = "BACKTEST_ERROR",
		context?: Record<string, unknown>
	) {
		super(message);
		this.name = this.constructor.name;
		this.code = code;
		this.context = context;
		Error.captureStackTrace(this, this.constructor);
	}

	toJSON(): Record<string, unknown> {
		return {
			name: this.name,
			message: this.message,
			code: this.code,
			context: this.context,
		};
	}
}

export class InsufficientDataError extends BacktestError {
	public readonly required: number;
	public readonly available: number;

	constructor(required: number, available: number) {
		super(
			`Insufficient data: ${available} bars available, ${required} required`,
			"INSUFFICIENT_DATA",
			{ required, available }
		);
		this.required = required;
		this.available = available;
	}
}

export class SchemaError extends BacktestError {
	public readonly issues: string[];

	constructor(message: string, issues: string[] = []) {
		super(message, "SCHEMA_ERROR", { issues });
		this.issues = issues;
	}
}

export class InvalidConfigurationError extends BacktestError {
	public readonly issues: string[];

	constructor(issues: string[]) {
		super(
			`Invalid configuration: ${issues.join("; ")}`,
			"INVALID_CONFIGURATION",
			{ issues }
		);
		this.issues = issues;
	}
}

export interface ErrorDescription {
	code: BacktestErrorCode;
	message: string;
}

export const isBacktestError = (value: unknown): value is BacktestError =>
	value instanceof BacktestError;

export const describeError = (value: unknown): ErrorDescription => {
	if (isBacktestError(value)) {
		return { code: value.code, message: value.message };
	}
	if (value instanceof Error) {
		return { code: "UNEXPECTED_ERROR", message: value.message };
	}
	return { code: "UNEXPECTED_ERROR", message: String(value) };
};
