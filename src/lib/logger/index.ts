/**
 * Logger wrapper — structured logging backed by pino.
 *
 * Wei amounts are bigints, which JSON cannot carry, so field values are
 * normalized to decimal strings before they reach pino. Objects tagged
 * `__opaque: true` are replaced with "[REDACTED]".
 */

import pino from "pino";

// ── Types ───────────────────────────────────────────────────────────

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

export interface LoggerConfig {
	readonly level: LogLevel;
	readonly redactPaths?: readonly string[];
	readonly destination?: { write(msg: string): void };
	readonly bindings?: Record<string, unknown>;
}

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

// ── Field normalization ─────────────────────────────────────────────

function isOpaque(value: unknown): boolean {
	return (
		typeof value === "object" &&
		value !== null &&
		"__opaque" in value &&
		(value as { __opaque: unknown }).__opaque === true
	);
}

function normalizeValue(value: unknown, depth: number): unknown {
	if (typeof value === "bigint") return value.toString();
	if (value === null || typeof value !== "object") return value;
	if (isOpaque(value)) return "[REDACTED]";
	if (depth >= 4) return value;
	if (Array.isArray(value)) return value.map((v) => normalizeValue(v, depth + 1));
	if (value instanceof Error) return value;

	return normalizeFields(value, depth);
}

function normalizeFields(obj: object, depth = 0): Record<string, unknown> {
	const out: Record<string, unknown> = {};
	for (const [key, value] of Object.entries(obj)) {
		out[key] = value === obj ? "[Circular]" : normalizeValue(value, depth + 1);
	}
	return out;
}

// ── Factory ─────────────────────────────────────────────────────────

type Level = "info" | "warn" | "error" | "debug";

function emit(target: pino.Logger, level: Level, msgOrObj: unknown, msg?: string): void {
	if (typeof msgOrObj === "string" || msgOrObj === undefined || msgOrObj === null) {
		target[level](String(msgOrObj ?? ""));
		return;
	}
	if (typeof msgOrObj === "object") {
		target[level](normalizeFields(msgOrObj), msg ?? "");
		return;
	}
	target[level](String(msgOrObj));
}

function wrapPino(pinoLogger: pino.Logger): Logger {
	return {
		info(msgOrObj: unknown, msg?: string): void {
			emit(pinoLogger, "info", msgOrObj, msg);
		},
		warn(msgOrObj: unknown, msg?: string): void {
			emit(pinoLogger, "warn", msgOrObj, msg);
		},
		error(msgOrObj: unknown, msg?: string): void {
			emit(pinoLogger, "error", msgOrObj, msg);
		},
		debug(msgOrObj: unknown, msg?: string): void {
			emit(pinoLogger, "debug", msgOrObj, msg);
		},
		child(bindings: Record<string, unknown>): Logger {
			return wrapPino(pinoLogger.child(normalizeFields(bindings)));
		},
	};
}

/**
 * Creates a Logger backed by pino.
 *
 * @example
 * ```ts
 * const logger = createLogger({ level: "info" }).child({ component: "deposit-queue" });
 * logger.info({ depositId, amount: 4n * 10n ** 18n }, "Deposit queued");
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
		const destination = config.destination;
		const stream: pino.DestinationStream = {
			write(chunk: string): void {
				destination.write(chunk);
			},
		};
		pinoLogger = pino(pinoOptions, stream);
	} else {
		pinoLogger = pino(pinoOptions);
	}

	const logger = wrapPino(pinoLogger);
	return config.bindings ? logger.child(config.bindings) : logger;
}

/** Logger that discards everything; the default for components built without one. */
export function silentLogger(): Logger {
	return createLogger({ level: "silent" });
}
