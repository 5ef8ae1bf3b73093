export {
	type ConsoleLoggerOptions,
	createConsoleLogger,
	type LogLevel,
	maskSecrets,
	secretKeySet,
	silentLogger,
} from "./console-logger.js";
export { createJsonLogger, type JsonLoggerOptions } from "./json-logger.js";
