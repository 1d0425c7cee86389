/**
 * Transaction Classifier
 *
 * Pure mapping from a ledger transaction type to the remote operation class
 * that records it. No network access, so it can run over the whole file
 * before anything is written remotely.
 */

import { ClassificationError } from './errors';

export type OperationClass = 'trade' | 'payout' | 'cash' | 'merge';

export const TRANSACTION_TYPES = {
    BUY: 'trade',
    SELL: 'trade',
    SPLIT: 'trade',
    BONUS: 'trade',
    CONSOLD: 'trade',
    CANCEL: 'trade',
    CAPITAL_RETURN: 'trade',
    CAPITAL_CALL: 'trade',
    OPENING_BALANCE: 'trade',
    ADJUST_COST_BASE: 'trade',

    DIVIDEND: 'payout',
    DISTRIBUTION: 'payout',

    DEPOSIT: 'cash',
    WITHDRAWAL: 'cash',
    INTEREST_PAYMENT: 'cash',
    INTEREST_CHARGED: 'cash',
    FEE: 'cash',
    FEE_REIMBURSEMENT: 'cash',

    MERGE_CANCEL: 'merge',
    MERGE_BUY: 'merge',
} as const satisfies Record<string, OperationClass>;

export type TransactionType = keyof typeof TRANSACTION_TYPES;

export interface Classification {
    kind: OperationClass;
    transactionType: TransactionType;
}

/** Types whose rows never move cash, whatever their amount column says */
export const NON_CASH_TYPES: ReadonlySet<string> = new Set<TransactionType>([
    'OPENING_BALANCE',
    'CANCEL',
    'CONSOLD',
    'BONUS',
    'SPLIT',
    'MERGE_CANCEL',
    'MERGE_BUY',
]);

/** Trades whose cash effect is never posted automatically by the service */
export const CAPITAL_FLOW_TYPES: ReadonlySet<string> = new Set<TransactionType>([
    'CAPITAL_CALL',
    'CAPITAL_RETURN',
]);

export function isTransactionType(value: string): value is TransactionType {
    return Object.prototype.hasOwnProperty.call(TRANSACTION_TYPES, value);
}

/**
 * Classify one ledger row.
 * Throws ClassificationError for an unknown literal: skipping it would leave
 * later rows pointing at records that were never created.
 */
export function classifyTransaction(transactionType: string, lineNumber: number): Classification {
    const normalized = transactionType.trim().toUpperCase();
    if (!isTransactionType(normalized)) {
        throw new ClassificationError(transactionType, lineNumber);
    }
    return { kind: TRANSACTION_TYPES[normalized], transactionType: normalized };
}
