/**
 * RiskEngineError hierarchy — structured error classification.
 *
 * Every error has a category. `rejected` and `breach` errors are returned
 * through Result and leave state untouched; `fatal` errors are thrown and
 * abort the whole operation.
 */

/** Error categories that tell callers whether state changed and whether to retry. */
export const ErrorCategory = {
	Rejected: "rejected",
	Breach: "breach",
	Fatal: "fatal",
} as const;

export type ErrorCategory = (typeof ErrorCategory)[keyof typeof ErrorCategory];

/** Options for constructing RiskEngineError subclasses with optional cause chain. */
interface RiskEngineErrorOptions {
	readonly cause?: unknown;
}

type ErrorContext = Record<string, unknown> & RiskEngineErrorOptions;

/** Base error class for every core failure. */
export class RiskEngineError extends Error {
	readonly category: ErrorCategory;
	readonly code: string;
	readonly context: Record<string, unknown>;

	constructor(
		message: string,
		code: string,
		category: ErrorCategory,
		context: ErrorContext = {},
	) {
		super(message);
		const { cause, ...rest } = context;
		this.name = "RiskEngineError";
		this.category = category;
		this.code = code;
		this.context = rest;
		if (cause !== undefined) this.cause = cause;
	}

	get isFatal(): boolean {
		return this.category === ErrorCategory.Fatal;
	}

	toJSON(): Record<string, unknown> {
		return {
			name: this.name,
			message: this.message,
			code: this.code,
			category: this.category,
			context: stringifyBigints(this.context),
		};
	}
}

function stringifyBigints(context: Record<string, unknown>): Record<string, unknown> {
	const out: Record<string, unknown> = {};
	for (const [key, value] of Object.entries(context)) {
		out[key] = typeof value === "bigint" ? value.toString() : value;
	}
	return out;
}

// ── Rejections (no state change) ─────────────────────────────────────

/** Zero or malformed amounts, misplaced stops, unknown symbols or positions. */
export class ValidationError extends RiskEngineError {
	constructor(message: string, context: ErrorContext = {}, code = "VALIDATION_FAILED") {
		super(message, code, ErrorCategory.Rejected, context);
		this.name = "ValidationError";
	}
}

/** Unregistered feed source, wrong account owner, missing role. */
export class AuthorizationError extends RiskEngineError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "UNAUTHORIZED", ErrorCategory.Rejected, context);
		this.name = "AuthorizationError";
	}
}

/** A price older than its heartbeat was needed. Never substituted silently. */
export class StalenessError extends RiskEngineError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "STALE_PRICE", ErrorCategory.Rejected, context);
		this.name = "StalenessError";
	}
}

/** Unknown account, position or feed. */
export class NotFoundError extends RiskEngineError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "NOT_FOUND", ErrorCategory.Rejected, context);
		this.name = "NotFoundError";
	}
}

/** Duplicate evaluation start, duplicate credential, duplicate feed registration. */
export class AlreadyExistsError extends RiskEngineError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "ALREADY_EXISTS", ErrorCategory.Rejected, context);
		this.name = "AlreadyExistsError";
	}
}

/** Invalid or missing configuration. */
export class ConfigError extends RiskEngineError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "CONFIG_ERROR", ErrorCategory.Rejected, context);
		this.name = "ConfigError";
	}
}

// ── Limit breaches ───────────────────────────────────────────────────

/**
 * Drawdown, daily-loss, exposure, collateralization or position-size limit.
 * Returned when an operation is refused because of a limit; when a breach
 * is detected after a committed close, the state machine transitions instead.
 */
export class LimitBreachError extends RiskEngineError {
	readonly limit: string;

	constructor(message: string, limit: string, context: ErrorContext = {}) {
		super(message, "LIMIT_BREACH", ErrorCategory.Breach, { limit, ...context });
		this.name = "LimitBreachError";
		this.limit = limit;
	}
}

// ── Fatal ────────────────────────────────────────────────────────────

/** Scaled-integer arithmetic left the 256-bit signed range. */
export class ArithmeticOverflowError extends RiskEngineError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "ARITHMETIC_OVERFLOW", ErrorCategory.Fatal, context);
		this.name = "ArithmeticOverflowError";
	}
}

/** An internal invariant no longer holds. */
export class InvariantViolationError extends RiskEngineError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "INVARIANT_VIOLATION", ErrorCategory.Fatal, context);
		this.name = "InvariantViolationError";
	}
}

/** A resource was re-entered while a mutation on it was still in flight. */
export class ReentrancyError extends RiskEngineError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "REENTRANCY", ErrorCategory.Fatal, context);
		this.name = "ReentrancyError";
	}
}

// ── Type guards ──────────────────────────────────────────────────────

/** Type guard for ValidationError. */
export function isValidationError(e: unknown): e is ValidationError {
	return e instanceof ValidationError;
}

/** Type guard for AuthorizationError. */
export function isAuthorizationError(e: unknown): e is AuthorizationError {
	return e instanceof AuthorizationError;
}

/** Type guard for StalenessError. */
export function isStalenessError(e: unknown): e is StalenessError {
	return e instanceof StalenessError;
}

/** Type guard for LimitBreachError. */
export function isLimitBreach(e: unknown): e is LimitBreachError {
	return e instanceof LimitBreachError;
}

/** Type guard for NotFoundError. */
export function isNotFoundError(e: unknown): e is NotFoundError {
	return e instanceof NotFoundError;
}

/** Type guard for AlreadyExistsError. */
export function isAlreadyExistsError(e: unknown): e is AlreadyExistsError {
	return e instanceof AlreadyExistsError;
}

/** True for errors that must abort the whole operation. */
export function isFatal(e: unknown): boolean {
	return e instanceof RiskEngineError && e.isFatal;
}
