// =============================================================================
// ROW MAPPERS -- snake_case rows <-> domain records
// =============================================================================

import type {
	Account,
	AccountStatus,
	AuditAction,
	AuditLogEntry,
	LedgerTransaction,
	TransactionCategory,
	TransactionStatus,
	TransactionType,
} from "@fundline/core";
import { ACCOUNT_STATUSES } from "@fundline/core";
import stringify from "safe-stable-stringify";
import type {
	AccountRow,
	AuditLogRow,
	NewAccountRow,
	NewTransactionRow,
	TransactionRow,
} from "./schema.js";

const TRANSACTION_TYPES: readonly TransactionType[] = ["CREDIT", "DEBIT"];
const TRANSACTION_STATUSES: readonly TransactionStatus[] = [
	"PENDING",
	"COMPLETED",
	"FAILED",
	"CANCELLED",
];
const TRANSACTION_CATEGORIES: readonly TransactionCategory[] = ["transfer", "deposit"];
const AUDIT_ACTIONS: readonly AuditAction[] = [
	"LOGIN",
	"LOGOUT",
	"TRANSACTION",
	"ACCOUNT_UPDATE",
	"PASSWORD_CHANGE",
	"CARD_OPERATION",
	"BENEFICIARY_OP",
];

function oneOf<T extends string>(allowed: readonly T[], value: string, column: string): T {
	const match = allowed.find((candidate) => candidate === value);
	if (match === undefined) {
		throw new Error(`Unexpected ${column} value in database: "${value}"`);
	}
	return match;
}

export function toNumber(value: number | string | bigint): number {
	const n = Number(value);
	if (!Number.isSafeInteger(n)) {
		throw new Error(`Stored amount ${String(value)} is not a safe integer`);
	}
	return n;
}

export function toDate(value: Date | string): Date {
	return value instanceof Date ? value : new Date(value);
}

function toJsonObject(value: Record<string, unknown> | string): Record<string, unknown> {
	if (typeof value !== "string") return value;
	const parsed: unknown = JSON.parse(value);
	if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
		return {};
	}
	return Object.fromEntries(Object.entries(parsed));
}

// =============================================================================
// ACCOUNT
// =============================================================================

export function rowToAccount(row: AccountRow): Account {
	return {
		id: row.id,
		accountNumber: row.account_number,
		ownerId: row.owner_id,
		accountTypeId: row.account_type_id,
		currency: row.currency,
		balance: toNumber(row.balance),
		availableBalance: toNumber(row.available_balance),
		status: oneOf<AccountStatus>(ACCOUNT_STATUSES, row.status, "status"),
		isPrimary: Number(row.is_primary) === 1,
		version: toNumber(row.version),
		createdAt: toDate(row.created_at),
		updatedAt: toDate(row.updated_at),
	};
}

export function accountToRow(account: Account): NewAccountRow {
	return {
		id: account.id,
		account_number: account.accountNumber,
		owner_id: account.ownerId,
		account_type_id: account.accountTypeId,
		currency: account.currency,
		balance: account.balance,
		available_balance: account.availableBalance,
		status: account.status,
		is_primary: account.isPrimary ? 1 : 0,
		version: account.version,
		created_at: account.createdAt.toISOString(),
		updated_at: account.updatedAt.toISOString(),
	};
}

// =============================================================================
// TRANSACTION
// =============================================================================

export function rowToTransaction(row: TransactionRow): LedgerTransaction {
	return {
		id: row.id,
		referenceNumber: row.reference_number,
		accountId: row.account_id,
		type: oneOf(TRANSACTION_TYPES, row.type, "type"),
		category: oneOf(TRANSACTION_CATEGORIES, row.category, "category"),
		amount: toNumber(row.amount),
		balanceBefore: toNumber(row.balance_before),
		balanceAfter: toNumber(row.balance_after),
		description: row.description,
		status: oneOf(TRANSACTION_STATUSES, row.status, "status"),
		counterpartyAccountNumber: row.counterparty_account_number,
		counterpartyName: row.counterparty_name,
		correlationId: row.correlation_id,
		counterpartReference: row.counterpart_reference,
		ipAddress: row.ip_address,
		userAgent: row.user_agent,
		createdAt: toDate(row.created_at),
	};
}

export function transactionToRow(txn: LedgerTransaction): NewTransactionRow {
	return {
		id: txn.id,
		reference_number: txn.referenceNumber,
		account_id: txn.accountId,
		type: txn.type,
		category: txn.category,
		amount: txn.amount,
		balance_before: txn.balanceBefore,
		balance_after: txn.balanceAfter,
		description: txn.description,
		status: txn.status,
		counterparty_account_number: txn.counterpartyAccountNumber,
		counterparty_name: txn.counterpartyName,
		correlation_id: txn.correlationId,
		counterpart_reference: txn.counterpartReference,
		ip_address: txn.ipAddress,
		user_agent: txn.userAgent,
		created_at: txn.createdAt.toISOString(),
	};
}

// =============================================================================
// AUDIT
// =============================================================================

export function rowToAuditEntry(row: AuditLogRow): AuditLogEntry {
	return {
		id: row.id,
		actorId: row.actor_id,
		action: oneOf(AUDIT_ACTIONS, row.action, "action"),
		description: row.description,
		ipAddress: row.ip_address,
		userAgent: row.user_agent,
		additionalData: toJsonObject(row.additional_data),
		createdAt: toDate(row.created_at),
	};
}

/** Deterministic JSON so identical payloads store identical text. */
export function serializeAdditionalData(data: Record<string, unknown>): string {
	return stringify(data) ?? "{}";
}
