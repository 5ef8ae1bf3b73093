export { generateId } from "./id.js";
export {
	addMinor,
	compareMinor,
	getCurrencyPrecision,
	getDecimalPlaces,
	isPositiveMinor,
	minorToDecimal,
	subtractMinor,
	toMinorUnits,
} from "./money.js";
export { backoffDelay, sleep } from "./retry.js";
