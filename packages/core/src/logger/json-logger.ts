// =============================================================================
// JSON LOGGER -- Structured single-line logs for production
// =============================================================================

import stringify from "safe-stable-stringify";
import type { LedgerLogger } from "../types/config.js";
import { LEVEL_PRIORITY, type LogLevel, maskSecrets, secretKeySet } from "./console-logger.js";

export interface JsonLoggerOptions {
	/** Minimum log level to emit. Default: `"info"` */
	level?: LogLevel;
	/** Service name for structured output. Default: `"fundline"` */
	service?: string;
	/** Keys masked in log data, matched case-insensitively. Default: PIN and credential keys */
	redactKeys?: string[];
	/** Line sink. Default: stdout, or stderr for warn/error */
	write?: (line: string, level: LogLevel) => void;
}

function defaultWrite(line: string, level: LogLevel): void {
	const stream = level === "error" || level === "warn" ? process.stderr : process.stdout;
	stream.write(`${line}\n`);
}

/**
 * Create a structured JSON logger implementing `LedgerLogger`.
 *
 * Each entry is one JSON object per line with sorted keys. Errors inside
 * `data` are flattened to `{ name, message }`; stacks stay out of the log.
 */
export function createJsonLogger(options: JsonLoggerOptions = {}): LedgerLogger {
	const { level = "info", service = "fundline", write = defaultWrite } = options;
	const minPriority = LEVEL_PRIORITY[level];
	const secretKeys = secretKeySet(options.redactKeys);

	function emit(lvl: LogLevel, message: string, data?: Record<string, unknown>) {
		if (LEVEL_PRIORITY[lvl] < minPriority) return;

		const safeData = data ? maskSecrets(data, secretKeys) : undefined;
		const entry: Record<string, unknown> = {
			timestamp: new Date().toISOString(),
			level: lvl,
			service,
			message,
			...safeData,
		};

		const line = stringify(entry, (_key, value: unknown) =>
			value instanceof Error ? { name: value.name, message: value.message } : value,
		);
		if (line !== undefined) write(line, lvl);
	}

	return {
		debug: (message, data) => emit("debug", message, data),
		info: (message, data) => emit("info", message, data),
		warn: (message, data) => emit("warn", message, data),
		error: (message, data) => emit("error", message, data),
	};
}
