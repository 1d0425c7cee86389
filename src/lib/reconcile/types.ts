/**
 * Reconciliation Engine Types
 */

import type { PriceRow } from '../ledger/types';

/** `holdings` clears holdings and cash transactions; `portfolio` deletes and recreates the portfolio */
export type ResetMode = 'none' | 'holdings' | 'portfolio';

/** Which leg of a merge pair comes first in the ledger */
export type MergeOrder = 'cancel-first' | 'buy-first';

export interface EngineOptions {
    portfolioName: string;
    countryCode: string;
    reset: ResetMode;
    minDate?: string;
    minLine?: number;
    maxLine?: number;
    /** Abort (rather than log and continue) when a payout or merge names an unknown holding */
    strict: boolean;
    mergeOrder: MergeOrder;
    prices?: PriceRow[];
    /** Seed the portfolio with opening balances from another portfolio's valuation at minDate */
    seedFrom?: string;
}

export interface CustomInstrumentDefinition {
    symbol: string;
    name: string;
    countryCode: string;
    currency: string;
    investmentType: string;
    lineNumber: number;
}

export interface RunSummary {
    rowsProcessed: number;
    created: number;
    duplicates: number;
    failed: number;
    skipped: number;
    warnings: number;
    resyncedCashAccounts: number;
}

export function emptySummary(): RunSummary {
    return {
        rowsProcessed: 0,
        created: 0,
        duplicates: 0,
        failed: 0,
        skipped: 0,
        warnings: 0,
        resyncedCashAccounts: 0,
    };
}
