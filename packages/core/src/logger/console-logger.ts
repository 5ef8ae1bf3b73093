// =============================================================================
// CONSOLE LOGGER -- Human-readable LedgerLogger for development
// =============================================================================

import pc from "picocolors";
import type { LedgerLogger } from "../types/config.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LEVEL_PRIORITY: Record<LogLevel, number> = {
	debug: 0,
	info: 1,
	warn: 2,
	error: 3,
};

const LEVEL_COLOR: Record<LogLevel, (s: string) => string> = {
	debug: pc.magenta,
	info: pc.blue,
	warn: pc.yellow,
	error: pc.red,
};

// =============================================================================
// SECRET MASKING
// =============================================================================

const DEFAULT_SECRET_KEYS = ["pin", "pinHash", "authorization", "secret", "password", "token"];

/** Lower-cased lookup set. Caller keys replace the defaults. */
export function secretKeySet(keys: readonly string[] = DEFAULT_SECRET_KEYS): ReadonlySet<string> {
	return new Set(keys.map((key) => key.toLowerCase()));
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
	if (typeof value !== "object" || value === null) return false;
	const proto: unknown = Object.getPrototypeOf(value);
	return proto === Object.prototype || proto === null;
}

function maskValue(value: unknown, keys: ReadonlySet<string>): unknown {
	if (Array.isArray(value)) {
		let changed = false;
		const items = value.map((item: unknown) => {
			const masked = maskValue(item, keys);
			if (masked !== item) changed = true;
			return masked;
		});
		return changed ? items : value;
	}
	return isPlainObject(value) ? maskSecrets(value, keys) : value;
}

/**
 * Copy of `data` with every secret key's value replaced by "[REDACTED]", at
 * any depth of plain objects and arrays. Keys match case-insensitively;
 * class instances such as errors are left alone. Returns `data` itself when
 * nothing was masked.
 */
export function maskSecrets(
	data: Record<string, unknown>,
	keys: ReadonlySet<string>,
): Record<string, unknown> {
	let masked: Record<string, unknown> | undefined;
	for (const [key, value] of Object.entries(data)) {
		const next = keys.has(key.toLowerCase()) ? "[REDACTED]" : maskValue(value, keys);
		if (next === value) continue;
		if (!masked) masked = { ...data };
		masked[key] = next;
	}
	return masked ?? data;
}

// =============================================================================
// CONSOLE LOGGER
// =============================================================================

export interface ConsoleLoggerOptions {
	/** Minimum log level to emit. Default: `"info"` */
	level?: LogLevel;
	/** Prefix shown before each message. Default: `"Fundline"` */
	prefix?: string;
	/** Whether to include ISO timestamps. Default: `true` */
	timestamps?: boolean;
	/** Keys masked in log data, matched case-insensitively. Default: PIN and credential keys */
	redactKeys?: string[];
}

/**
 * Create a console-based logger implementing `LedgerLogger`.
 *
 * @example
 * ```ts
 * import { createConsoleLogger } from "@fundline/core/logger";
 *
 * const logger = createConsoleLogger({ level: "debug" });
 * ```
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): LedgerLogger {
	const { level = "info", prefix = "Fundline", timestamps = true } = options;
	const minPriority = LEVEL_PRIORITY[level];
	const secretKeys = secretKeySet(options.redactKeys);

	function emit(lvl: LogLevel, message: string, data?: Record<string, unknown>) {
		if (LEVEL_PRIORITY[lvl] < minPriority) return;

		const parts: string[] = [];
		if (timestamps) parts.push(pc.dim(new Date().toISOString()));
		parts.push(LEVEL_COLOR[lvl](pc.bold(lvl.toUpperCase().padEnd(5))));
		parts.push(`[${prefix}]:`);
		parts.push(message);

		const line = parts.join(" ");
		const method = lvl === "error" ? "error" : lvl === "warn" ? "warn" : "log";

		const safeData = data ? maskSecrets(data, secretKeys) : undefined;
		if (safeData && Object.keys(safeData).length > 0) {
			console[method](line, safeData);
		} else {
			console[method](line);
		}
	}

	return {
		debug: (message, data) => emit("debug", message, data),
		info: (message, data) => emit("info", message, data),
		warn: (message, data) => emit("warn", message, data),
		error: (message, data) => emit("error", message, data),
	};
}

/** Logger that drops everything. Handy for tests and embedded use. */
export const silentLogger: LedgerLogger = {
	debug: () => {},
	info: () => {},
	warn: () => {},
	error: () => {},
};
