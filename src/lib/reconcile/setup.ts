/**
 * Setup Phase
 *
 * Runs once before row iteration:
 * 1. Scan the ledger for cash-account pairs and custom instrument definitions
 * 2. Find (or reset, or create) the portfolio and its cash accounts
 * 3. Bring custom instruments in line with the ledger
 * 4. Sync the optional prices file
 * 5. Pre-load existing holdings and payouts into the context
 */

import Decimal from 'decimal.js';
import type { CashAccount, LedgerApi, Portfolio } from '../gateway/types';
import { isCustomMarket, type LedgerRow } from '../ledger/types';
import { classifyTransaction, NON_CASH_TYPES } from './classifier';
import { ReconciliationContext } from './context';
import { baseCurrencyFor } from './currency';
import { definitionFromRow, syncCustomInstruments } from './instruments';
import { cashAccountKey, cashAccountName, customInstrumentKey } from './keys';
import { syncPrices } from './price-sync';
import type { CustomInstrumentDefinition, EngineOptions } from './types';

export const PAYOUT_HISTORY_START = '1900-01-01';

export interface CashAccountPair {
    currency: string;
    accountName: string;
}

export interface LedgerScan {
    cashAccounts: CashAccountPair[];
    /** Keyed by upper-cased symbol; the last definition in the file wins */
    customInstruments: Map<string, CustomInstrumentDefinition>;
}

// =============================================================================
// Scan
// =============================================================================

/** Rows whose handler may post to a cash account: a cash amount, or accrued income split off a trade */
function touchesCash(row: LedgerRow): boolean {
    if (NON_CASH_TYPES.has(row.transactionType)) return false;
    return row.amount !== '' || (row.accruedIncome !== '' && !new Decimal(row.accruedIncome).isZero());
}

/**
 * One pass over the full ledger (range filters do not apply).
 * Every row is classified here, so an unknown type aborts the run before
 * anything is written remotely.
 */
export function scanLedger(rows: readonly LedgerRow[], baseCurrency: string): LedgerScan {
    const pairs = new Map<string, CashAccountPair>();
    const customInstruments = new Map<string, CustomInstrumentDefinition>();

    pairs.set(cashAccountKey(baseCurrency, ''), { currency: baseCurrency, accountName: '' });

    for (const row of rows) {
        classifyTransaction(row.transactionType, row.lineNumber);

        if (touchesCash(row)) {
            const currency = row.amountCurrency || baseCurrency;
            const key = cashAccountKey(currency, row.cashAccount);
            if (!pairs.has(key)) {
                pairs.set(key, { currency, accountName: row.cashAccount.trim() });
            }
        }

        if (isCustomMarket(row.market) && row.symbol && row.symbolName) {
            customInstruments.set(row.symbol.toUpperCase(), definitionFromRow(row));
        }
    }

    return { cashAccounts: [...pairs.values()], customInstruments };
}

// =============================================================================
// Portfolio & cash accounts
// =============================================================================

async function resolvePortfolio(api: LedgerApi, options: EngineOptions): Promise<Portfolio> {
    const portfolios = await api.listPortfolios();
    let portfolio = portfolios.find((p) => p.name === options.portfolioName) ?? null;

    if (portfolio && options.reset === 'portfolio') {
        console.log(`[Setup] Removing portfolio ${portfolio.id}`);
        await api.deletePortfolio(portfolio.id);
        portfolio = null;
    } else if (portfolio && options.reset === 'holdings') {
        await clearPortfolio(api, portfolio.id);
    }

    if (portfolio) {
        console.log(`[Setup] Using portfolio ${portfolio.id} "${portfolio.name}"`);
        return portfolio;
    }

    console.log(`[Setup] Creating portfolio "${options.portfolioName}"`);
    const created = await api.createPortfolio({
        name: options.portfolioName,
        country_code: options.countryCode.toUpperCase(),
        disable_automatic_transactions: true,
        broker_email_api_enabled: false,
    });
    console.log(`[Setup] Created portfolio ${created.id}`);
    return created;
}

/** Delete every holding and every cash transaction, keeping the portfolio */
async function clearPortfolio(api: LedgerApi, portfolioId: number): Promise<void> {
    const holdings = await api.listHoldings(portfolioId);
    console.log(`[Setup] Deleting ${holdings.length} holding(s) from portfolio ${portfolioId}`);
    for (const holding of holdings) {
        await api.deleteHolding(holding.id);
    }

    for (const account of await api.listCashAccounts(portfolioId)) {
        const transactions = await api.listCashTransactions(account.id);
        console.log(`[Setup] Deleting ${transactions.length} transaction(s) from cash account ${account.id}`);
        for (const transaction of transactions) {
            await api.deleteCashTransaction(transaction.id);
        }
    }
}

function matchesPair(account: CashAccount, portfolioName: string, { currency, accountName }: CashAccountPair): boolean {
    if (account.currency.toUpperCase() !== currency) return false;
    const name = account.name.toLowerCase();
    return name === cashAccountName(portfolioName, currency, accountName).toLowerCase()
        || (accountName !== '' && name === accountName.toLowerCase());
}

/**
 * Match by expected name (or a named account's bare name). A default account
 * with no name match falls back to the currency's only account that no other
 * ledger pair claims.
 */
function findCashAccount(
    accounts: CashAccount[],
    portfolioName: string,
    pair: CashAccountPair,
    pairs: CashAccountPair[],
): CashAccount | undefined {
    const expected = cashAccountName(portfolioName, pair.currency, pair.accountName).toLowerCase();
    const found = accounts.find((a) => matchesPair(a, portfolioName, pair) && a.name.toLowerCase() === expected)
        ?? accounts.find((a) => matchesPair(a, portfolioName, pair));
    if (found || pair.accountName !== '') return found;

    const unclaimed = accounts.filter((a) => a.currency.toUpperCase() === pair.currency
        && !pairs.some((other) => other !== pair && matchesPair(a, portfolioName, other)));
    return unclaimed.length === 1 ? unclaimed[0] : undefined;
}

async function ensureCashAccounts(ctx: ReconciliationContext, pairs: CashAccountPair[]): Promise<void> {
    const existing = await ctx.api.listCashAccounts(ctx.portfolioId);

    for (const pair of pairs) {
        const found = findCashAccount(existing, ctx.options.portfolioName, pair, pairs);
        if (found) {
            if (!matchesPair(found, ctx.options.portfolioName, pair)) {
                console.log(`[Setup] Using cash account ${found.id} "${found.name}" as the default ${pair.currency} account`);
            }
            ctx.registerCashAccount(pair.currency, pair.accountName, found.id);
            continue;
        }

        const name = cashAccountName(ctx.options.portfolioName, pair.currency, pair.accountName);
        const created = await ctx.api.createCashAccount(ctx.portfolioId, { name, currency: pair.currency });
        console.log(`[Setup] Created cash account ${created.id} "${name}"`);
        ctx.registerCashAccount(pair.currency, pair.accountName, created.id);
    }
}

// =============================================================================
// Pre-load
// =============================================================================

async function preloadIndexes(ctx: ReconciliationContext, today: string): Promise<void> {
    const holdings = await ctx.api.listHoldings(ctx.portfolioId);
    for (const holding of holdings) {
        ctx.recordHolding(holding.instrument.market_code, holding.instrument.code, holding.id);
    }

    const payouts = await ctx.api.listPayouts(ctx.portfolioId, PAYOUT_HISTORY_START, today);
    for (const payout of payouts) {
        ctx.recordPayout(payout.holding_id, payout.paid_on);
    }

    console.log(`[Setup] Pre-loaded ${holdings.length} holding(s) and ${payouts.length} payout(s)`);
}

// =============================================================================
// Entry point
// =============================================================================

export async function preparePortfolio(
    api: LedgerApi,
    options: EngineOptions,
    scan: LedgerScan,
    today: string,
): Promise<ReconciliationContext> {
    const baseCurrency = baseCurrencyFor(options.countryCode);
    const portfolio = await resolvePortfolio(api, options);
    const ctx = new ReconciliationContext(api, portfolio, options, baseCurrency);

    await ensureCashAccounts(ctx, scan.cashAccounts);

    for (const instrument of await api.listCustomInvestments(portfolio.id)) {
        ctx.recordCustomInstrument(instrument);
    }
    for (const def of scan.customInstruments.values()) {
        ctx.customDefinitions.set(customInstrumentKey(portfolio.id, def.symbol), def);
    }
    await syncCustomInstruments(ctx);

    if (options.prices && options.prices.length > 0) {
        await syncPrices(ctx, options.prices);
    }

    await preloadIndexes(ctx, today);
    return ctx;
}
