/**
 * PayoffError hierarchy: structured error classification.
 *
 * Every error has a category. Input errors are local and recoverable: the
 * caller halts the computation and surfaces the message. Fatal errors mean the
 * simulator itself is misconfigured.
 */

/** Error severity categories. */
export const ErrorCategory = {
	InvalidInput: "invalid_input",
	Fatal: "fatal",
} as const;

export type ErrorCategory = (typeof ErrorCategory)[keyof typeof ErrorCategory];

/** Options for constructing PayoffError subclasses with optional cause chain. */
interface PayoffErrorOptions {
	readonly cause?: unknown;
}

/** Base error class for all simulator operations. */
export class PayoffError extends Error {
	readonly category: ErrorCategory;
	readonly code: string;
	readonly context: Record<string, unknown>;
	readonly hint: string | undefined;

	constructor(
		message: string,
		code: string,
		category: ErrorCategory,
		context: Record<string, unknown> = {},
		hint?: string,
	) {
		super(message);
		this.name = "PayoffError";
		this.category = category;
		this.code = code;
		this.context = context;
		this.hint = hint;
	}

	get isRecoverable(): boolean {
		return this.category === ErrorCategory.InvalidInput;
	}

	toJSON(): Record<string, unknown> {
		return {
			name: this.name,
			message: this.message,
			code: this.code,
			category: this.category,
			...(this.hint !== undefined && { hint: this.hint }),
			recoverable: this.isRecoverable,
			context: this.context,
		};
	}
}

// ── Specific error types ─────────────────────────────────────────────

/** A premium was zero, negative or not a number. */
export class InvalidPremiumError extends PayoffError {
	readonly index: number;
	readonly premium: number;

	constructor(index: number, premium: number, context: Record<string, unknown> = {}) {
		super(
			"All premiums must be positive values.",
			"INVALID_PREMIUM",
			ErrorCategory.InvalidInput,
			{ index, premium, ...context },
			"Enter a premium greater than zero for every leg",
		);
		this.name = "InvalidPremiumError";
		this.index = index;
		this.premium = premium;
	}
}

/** The strike sequence submitted for validation is not non-decreasing. */
export class UnorderedStrikesError extends PayoffError {
	readonly strikes: readonly number[];

	constructor(strikes: readonly number[], context: Record<string, unknown> = {}) {
		super(
			"Strike prices must be in ascending order.",
			"UNORDERED_STRIKES",
			ErrorCategory.InvalidInput,
			{ strikes: [...strikes], ...context },
		);
		this.name = "UnorderedStrikesError";
		this.strikes = strikes;
	}
}

/** Fatal error for invalid or missing configuration. */
export class ConfigError extends PayoffError {
	constructor(message: string, context: Record<string, unknown> & PayoffErrorOptions = {}) {
		const { cause, ...rest } = context;
		super(message, "CONFIG_ERROR", ErrorCategory.Fatal, rest);
		this.name = "ConfigError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** Errors the input validator can report. */
export type InputError = InvalidPremiumError | UnorderedStrikesError;

// ── Type guards ──────────────────────────────────────────────────────

/** Type guard for InvalidPremiumError. */
export function isInvalidPremium(e: unknown): e is InvalidPremiumError {
	return e instanceof InvalidPremiumError;
}

/** Type guard for UnorderedStrikesError. */
export function isUnorderedStrikes(e: unknown): e is UnorderedStrikesError {
	return e instanceof UnorderedStrikesError;
}

/** Type guard for either input validation error. */
export function isInputError(e: unknown): e is InputError {
	return isInvalidPremium(e) || isUnorderedStrikes(e);
}

/** Type guard for ConfigError. */
export function isConfigError(e: unknown): e is ConfigError {
	return e instanceof ConfigError;
}
