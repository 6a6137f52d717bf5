/**
 * Logger wrapper — structured logging backed by pino.
 *
 * Redacts opaque capability tokens (anything with `__opaque: true`),
 * renders bigint amounts as decimal strings, and supports path-based
 * redaction for other sensitive fields.
 */

import { pino } from "pino";
import type { DestinationStream, Logger as PinoLogger, LoggerOptions } from "pino";

// ── Types ───────────────────────────────────────────────────────────

/** Log severity levels from least to most severe; `silent` disables output. */
export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

/** Configuration for creating a Logger instance. */
export interface LoggerConfig {
	readonly level: LogLevel;
	readonly redactPaths?: readonly string[] | undefined;
	readonly destination?: { write(msg: string): void } | undefined;
}

/** Structured logger interface used by every engine. */
export interface Logger {
	info(msg: string): void;
	info(obj: Record<string, unknown>, msg: string): void;
	warn(msg: string): void;
	warn(obj: Record<string, unknown>, msg: string): void;
	error(msg: string): void;
	error(obj: Record<string, unknown>, msg: string): void;
	debug(msg: string): void;
	debug(obj: Record<string, unknown>, msg: string): void;
	child(bindings: Record<string, unknown>): Logger;
}

// ── Field preparation ───────────────────────────────────────────────

function isOpaque(value: unknown): boolean {
	return (
		typeof value === "object" &&
		value !== null &&
		"__opaque" in value &&
		value.__opaque === true
	);
}

function prepareValue(value: unknown): unknown {
	if (typeof value === "bigint") return value.toString();
	if (isOpaque(value)) return "[REDACTED]";
	return value;
}

function prepareFields(obj: Record<string, unknown>): Record<string, unknown> {
	if (isOpaque(obj)) return { value: "[REDACTED]" };
	const result: Record<string, unknown> = {};
	for (const [key, value] of Object.entries(obj)) {
		result[key] = prepareValue(value);
	}
	return result;
}

// ── Factory ─────────────────────────────────────────────────────────

type Level = "info" | "warn" | "error" | "debug";

function writer(target: PinoLogger, level: Level) {
	return (msgOrObj: string | Record<string, unknown>, msg?: string): void => {
		if (typeof msgOrObj === "string") {
			target[level](msgOrObj);
		} else {
			target[level](prepareFields(msgOrObj), msg ?? "");
		}
	};
}

function wrapPino(pinoLogger: PinoLogger): Logger {
	return {
		info: writer(pinoLogger, "info"),
		warn: writer(pinoLogger, "warn"),
		error: writer(pinoLogger, "error"),
		debug: writer(pinoLogger, "debug"),
		child(bindings: Record<string, unknown>): Logger {
			return wrapPino(pinoLogger.child(prepareFields(bindings)));
		},
	};
}

/**
 * Creates a Logger backed by pino with auto-redaction and optional custom destination.
 *
 * @example
 * ```ts
 * const logger = createLogger({ level: "info" });
 * logger.info({ accountId: "acct-1", balance: 100_000_000n }, "position closed");
 * ```
 */
export function createLogger(config: LoggerConfig): Logger {
	const pinoOptions: LoggerOptions = {
		level: config.level,
	};

	if (config.redactPaths && config.redactPaths.length > 0) {
		pinoOptions.redact = {
			paths: [...config.redactPaths],
			censor: "[REDACTED]",
		};
	}

	const destination = config.destination;
	if (destination) {
		const stream: DestinationStream = {
			write(chunk: string): void {
				destination.write(chunk);
			},
		};
		return wrapPino(pino(pinoOptions, stream));
	}
	return wrapPino(pino(pinoOptions));
}

/** Logger that discards everything; the default for engines constructed without one. */
export function silentLogger(): Logger {
	return createLogger({ level: "silent" });
}
