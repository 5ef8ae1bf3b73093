export type {
	AccountWrite,
	LedgerRecordStore,
	LedgerStoreReader,
	LedgerStoreTransaction,
	LedgerStoreWriter,
	TransactionListParams,
} from "./store.js";
