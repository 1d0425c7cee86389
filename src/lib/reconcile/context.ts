/**
 * Reconciliation Context
 *
 * The in-memory indexes for one run: cash accounts, holdings, payouts and
 * custom instruments. Rebuilt from the remote state on every run and
 * mutated only by the row loop.
 */

import type { CustomInvestment, LedgerApi, Portfolio } from '../gateway/types';
import type { LedgerRow } from '../ledger/types';
import { UnresolvedCashAccountError } from './errors';
import { cashAccountKey, customInstrumentKey, holdingKey, payoutKey } from './keys';
import { emptySummary, type CustomInstrumentDefinition, type EngineOptions, type RunSummary } from './types';

export class ReconciliationContext {
    private readonly cashAccounts = new Map<string, number>();
    private readonly holdings = new Map<string, number>();
    private readonly payouts = new Set<string>();
    private readonly customInstruments = new Map<string, CustomInvestment>();

    /** Custom instrument definitions collected from the ledger scan */
    readonly customDefinitions = new Map<string, CustomInstrumentDefinition>();
    /** Cash accounts written to during the run, resynced once at the end */
    readonly touchedCashAccounts = new Set<number>();
    readonly summary: RunSummary = emptySummary();

    constructor(
        readonly api: LedgerApi,
        readonly portfolio: Portfolio,
        readonly options: EngineOptions,
        readonly baseCurrency: string,
    ) {}

    get portfolioId(): number {
        return this.portfolio.id;
    }

    get countryCode(): string {
        return this.options.countryCode.toUpperCase();
    }

    // ── Cash accounts ──────────────────────────────────────────────────

    registerCashAccount(currency: string, accountName: string, cashAccountId: number): void {
        this.cashAccounts.set(cashAccountKey(currency, accountName), cashAccountId);
    }

    hasCashAccount(currency: string, accountName: string): boolean {
        return this.cashAccounts.has(cashAccountKey(currency, accountName));
    }

    /** Throws when the pair was never created during setup */
    resolveCashAccount(currency: string, accountName: string, lineNumber: number): number {
        const id = this.cashAccounts.get(cashAccountKey(currency, accountName));
        if (id === undefined) {
            throw new UnresolvedCashAccountError(currency, accountName, lineNumber);
        }
        return id;
    }

    // ── Holdings ───────────────────────────────────────────────────────

    recordHolding(market: string, symbol: string, holdingId: number): void {
        this.holdings.set(holdingKey(this.portfolioId, market, symbol), holdingId);
    }

    resolveHolding(market: string, symbol: string): number | undefined {
        return this.holdings.get(holdingKey(this.portfolioId, market, symbol));
    }

    forgetHolding(market: string, symbol: string): void {
        this.holdings.delete(holdingKey(this.portfolioId, market, symbol));
    }

    // ── Payouts ────────────────────────────────────────────────────────

    recordPayout(holdingId: number, paidOn: string): void {
        this.payouts.add(payoutKey(this.portfolioId, holdingId, paidOn));
    }

    hasPayout(holdingId: number, paidOn: string): boolean {
        return this.payouts.has(payoutKey(this.portfolioId, holdingId, paidOn));
    }

    // ── Custom instruments ─────────────────────────────────────────────

    recordCustomInstrument(instrument: CustomInvestment): void {
        this.customInstruments.set(customInstrumentKey(this.portfolioId, instrument.code), instrument);
    }

    findCustomInstrument(symbol: string): CustomInvestment | undefined {
        return this.customInstruments.get(customInstrumentKey(this.portfolioId, symbol));
    }

    forgetCustomInstrument(symbol: string): void {
        this.customInstruments.delete(customInstrumentKey(this.portfolioId, symbol));
    }

    findCustomDefinition(symbol: string): CustomInstrumentDefinition | undefined {
        return this.customDefinitions.get(customInstrumentKey(this.portfolioId, symbol));
    }

    // ── Logging ────────────────────────────────────────────────────────

    warn(message: string): void {
        this.summary.warnings++;
        console.warn(message);
    }
}

/** Log prefix correlating a message with its ledger line */
export function rowPrefix(row: LedgerRow): string {
    return row.lineNumber > 0
        ? `Line ${row.lineNumber} (${row.transactionType})`
        : `Opening balance (${row.transactionType})`;
}
