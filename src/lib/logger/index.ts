/**
 * Logger wrapper: domain-agnostic structured logging backed by pino.
 *
 * Library calls default to a disabled logger; scripts that want output
 * create one with `createLogger` and pass it in.
 */

import pino from "pino";

// ── Types ───────────────────────────────────────────────────────────

/** Log severity levels from least to most severe. */
export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";

/** Configuration for creating a Logger instance. */
export interface LoggerConfig {
	readonly level: LogLevel;
	readonly redactPaths?: readonly string[];
	readonly destination?: { write(msg: string): void };
}

/** Options for a child logger. */
export interface ChildLoggerOptions {
	/** Minimum severity for the child, independent of its parent */
	readonly level?: LogLevel | undefined;
}

/** Structured logger interface. */
export interface Logger {
	info(msg: string): void;
	info(obj: Record<string, unknown>, msg: string): void;
	warn(msg: string): void;
	warn(obj: Record<string, unknown>, msg: string): void;
	error(msg: string): void;
	error(obj: Record<string, unknown>, msg: string): void;
	debug(msg: string): void;
	debug(obj: Record<string, unknown>, msg: string): void;
	child(bindings: Record<string, unknown>, options?: ChildLoggerOptions): Logger;
}

// ── Factory ─────────────────────────────────────────────────────────

type LogMethod = "info" | "warn" | "error" | "debug";

function forward(pinoLogger: pino.Logger, method: LogMethod, msgOrObj: unknown, msg?: string): void {
	if (typeof msgOrObj === "object" && msgOrObj !== null) {
		pinoLogger[method](msgOrObj, msg ?? "");
	} else {
		pinoLogger[method](String(msgOrObj ?? ""));
	}
}

/** A disabled logger ignores child levels so it never starts writing. */
function wrapPino(pinoLogger: pino.Logger, enabled = true): Logger {
	return {
		info(msgOrObj: unknown, msg?: string): void {
			forward(pinoLogger, "info", msgOrObj, msg);
		},
		warn(msgOrObj: unknown, msg?: string): void {
			forward(pinoLogger, "warn", msgOrObj, msg);
		},
		error(msgOrObj: unknown, msg?: string): void {
			forward(pinoLogger, "error", msgOrObj, msg);
		},
		debug(msgOrObj: unknown, msg?: string): void {
			forward(pinoLogger, "debug", msgOrObj, msg);
		},
		child(bindings: Record<string, unknown>, options: ChildLoggerOptions = {}): Logger {
			if (!enabled || options.level === undefined) {
				return wrapPino(pinoLogger.child(bindings), enabled);
			}
			return wrapPino(pinoLogger.child(bindings, { level: options.level }), enabled);
		},
	};
}

/**
 * Creates a Logger backed by pino with optional path redaction and custom destination.
 *
 * @example
 * ```ts
 * const logger = createLogger({ level: "debug" });
 * logger.debug({ strategy: "iron_condor" }, "Payoff computed");
 * ```
 */
export function createLogger(config: LoggerConfig): Logger {
	const pinoOptions: pino.LoggerOptions = {
		level: config.level,
	};

	if (config.redactPaths && config.redactPaths.length > 0) {
		pinoOptions.redact = {
			paths: [...config.redactPaths],
			censor: "[REDACTED]",
		};
	}

	let pinoLogger: pino.Logger;

	if (config.destination) {
		// Create a writable-like stream from the destination config
		const stream = {
			write(chunk: string): boolean {
				config.destination?.write(chunk);
				return true;
			},
		};
		pinoLogger = pino(pinoOptions, stream);
	} else {
		pinoLogger = pino(pinoOptions);
	}

	return wrapPino(pinoLogger);
}

/** Logger that discards everything; the default for library calls. */
export function createSilentLogger(): Logger {
	return wrapPino(pino({ enabled: false }), false);
}
