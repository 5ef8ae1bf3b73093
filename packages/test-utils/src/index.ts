export { assertAccountBalance, assertLedgerIdentity, expectLedgerError } from "./assertions.js";
export {
	createTestIdentity,
	getTestInstance,
	type TestInstance,
	type TestInstanceOptions,
} from "./get-test-instance.js";
export { type SeedAccountParams, seedAccount } from "./seed.js";
