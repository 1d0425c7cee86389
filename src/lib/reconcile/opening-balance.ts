/**
 * Opening Balance Seeding
 *
 * Turns another portfolio's valuation into a synthetic batch that runs ahead
 * of the real rows: one OPENING_BALANCE per holding and one DEPOSIT per cash
 * account, dated the day before the cutoff. Synthetic rows have line number 0.
 */

import Decimal from 'decimal.js';
import type { Valuation } from '../gateway/types';
import type { LedgerRow } from '../ledger/types';
import { NON_CASH_TYPES } from './classifier';

export const OPENING_BALANCE_PREFIX = 'opening-balance';

export interface OpeningBalanceBatch {
    rows: LedgerRow[];
    warnings: string[];
}

/** YYYY-MM-DD of the day before `date` */
export function previousDay(date: string): string {
    const d = new Date(`${date}T00:00:00.000Z`);
    d.setUTCDate(d.getUTCDate() - 1);
    return d.toISOString().slice(0, 10);
}

function syntheticRow(fields: Partial<LedgerRow> & Pick<LedgerRow, 'uniqueIdentifier' | 'transactionType' | 'transactionDate'>): LedgerRow {
    return {
        lineNumber: 0,
        symbol: '',
        market: '',
        quantity: '',
        price: '',
        amount: '',
        amountCurrency: '',
        brokerage: '',
        exchangeRate: '',
        cashAccount: '',
        goesExOn: '',
        description: '',
        comments: '',
        accruedIncome: '',
        symbolName: '',
        instrumentCountryCode: '',
        instrumentCurrency: '',
        symbolType: '',
        raw: {},
        ...fields,
    };
}

/** Sum of cash movements per currency for rows dated before the cutoff */
function ledgerCashTotals(ledger: readonly LedgerRow[], cutoff: string, baseCurrency: string): Map<string, Decimal> {
    const totals = new Map<string, Decimal>();
    for (const row of ledger) {
        if (row.transactionDate >= cutoff) continue;
        if (NON_CASH_TYPES.has(row.transactionType) || row.amount === '') continue;
        const currency = row.amountCurrency || baseCurrency;
        totals.set(currency, (totals.get(currency) ?? new Decimal(0)).plus(row.amount));
    }
    return totals;
}

export function buildOpeningBalanceRows(
    snapshot: Valuation,
    ledger: readonly LedgerRow[],
    cutoff: string,
    baseCurrency: string,
): OpeningBalanceBatch {
    const date = previousDay(cutoff);
    const rows: LedgerRow[] = [];
    const warnings: string[] = [];

    for (const holding of snapshot.holdings) {
        const quantity = new Decimal(holding.quantity);
        if (quantity.isZero()) continue;

        const value = new Decimal(holding.value);
        rows.push(syntheticRow({
            uniqueIdentifier: `${OPENING_BALANCE_PREFIX}-${holding.market}-${holding.symbol}`.toLowerCase(),
            transactionType: 'OPENING_BALANCE',
            transactionDate: date,
            symbol: holding.symbol,
            market: holding.market,
            quantity: quantity.toString(),
            price: value.dividedBy(quantity).toString(),
            amount: value.toString(),
        }));
    }

    const snapshotCash = new Map<string, Decimal>();
    snapshot.cash_accounts.forEach((account, index) => {
        const currency = account.currency.toUpperCase();
        const value = new Decimal(account.value);
        snapshotCash.set(currency, (snapshotCash.get(currency) ?? new Decimal(0)).plus(value));
        if (value.isZero()) return;

        rows.push(syntheticRow({
            uniqueIdentifier: `${OPENING_BALANCE_PREFIX}-cash-${currency}-${index}`.toLowerCase(),
            transactionType: 'DEPOSIT',
            transactionDate: date,
            amount: value.toString(),
            amountCurrency: currency,
            description: `Opening balance from ${account.name}`,
        }));
    });

    const ledgerCash = ledgerCashTotals(ledger, cutoff, baseCurrency);
    for (const [currency, expected] of snapshotCash) {
        const derived = ledgerCash.get(currency) ?? new Decimal(0);
        if (!derived.equals(expected)) {
            warnings.push(
                `[Seed] ${currency} cash diverges: snapshot ${expected.toString()}, `
                + `ledger before ${cutoff} ${derived.toString()}`,
            );
        }
    }

    return { rows, warnings };
}
