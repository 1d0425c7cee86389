/**
 * Cash Handler
 *
 * Posts cash account transactions, both for cash-class rows and for the cash
 * side of trades and payouts the service does not post by itself.
 * Remote de-duplication is by foreign_identifier (the row's unique id).
 */

import Decimal from 'decimal.js';
import type { CashTransactionPayload } from '../../gateway/types';
import type { LedgerRow } from '../../ledger/types';
import { NON_CASH_TYPES } from '../classifier';
import { rowPrefix, type ReconciliationContext } from '../context';
import { reportOutcome, type OutcomeKind } from '../outcome';

function isNonZero(amount: string): boolean {
    return amount !== '' && !new Decimal(amount).isZero();
}

/**
 * Post the row's cash effect.
 * Returns null when nothing was submitted.
 */
export async function postCash(
    ctx: ReconciliationContext,
    row: LedgerRow,
    prefix: string = rowPrefix(row),
): Promise<OutcomeKind | null> {
    if (NON_CASH_TYPES.has(row.transactionType)) {
        // an opening balance's amount is its cost base, not a cash movement
        if (row.transactionType !== 'OPENING_BALANCE' && isNonZero(row.amount)) {
            ctx.warn(`${prefix}: non-cash transaction carries amount ${row.amount}, not posted to cash`);
        }
        return null;
    }

    if (row.amount === '') {
        ctx.summary.skipped++;
        ctx.warn(`${prefix}: no amount, cash posting skipped`);
        return null;
    }

    const currency = row.amountCurrency || ctx.baseCurrency;
    const cashAccountId = ctx.resolveCashAccount(currency, row.cashAccount, row.lineNumber);

    const payload: CashTransactionPayload = {
        date_time: row.transactionDate,
        amount: row.amount,
        type_name: row.transactionType,
        foreign_identifier: row.uniqueIdentifier,
    };
    if (row.description) payload.description = row.description;

    ctx.touchedCashAccounts.add(cashAccountId);
    const res = await ctx.api.tryCreateCashTransaction(cashAccountId, payload);
    return reportOutcome(ctx, `${prefix} cash`, res, payload);
}

export async function processCash(ctx: ReconciliationContext, row: LedgerRow): Promise<void> {
    await postCash(ctx, row);
}
