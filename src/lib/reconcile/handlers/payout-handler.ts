/**
 * Payout Handler
 *
 * DIVIDEND / DISTRIBUTION rows. The holding must already exist (created by an
 * earlier trade or pre-loaded), and a payout is created at most once per
 * (portfolio, holding, paid_on).
 */

import type { PayoutPayload } from '../../gateway/types';
import type { LedgerRow } from '../../ledger/types';
import { rowPrefix, type ReconciliationContext } from '../context';
import { UnresolvedHoldingError } from '../errors';
import { isSuccess, reportOutcome } from '../outcome';
import { postCash } from './cash-handler';
import { exchangeRateFor } from './fields';

/**
 * AU portfolios, and payouts paid in a currency other than the base
 * currency, are not mirrored into the cash account by the service.
 */
function postsPayoutCash(ctx: ReconciliationContext, row: LedgerRow): boolean {
    const currency = row.amountCurrency || ctx.baseCurrency;
    return ctx.countryCode === 'AU' || currency !== ctx.baseCurrency;
}

export function buildPayoutPayload(ctx: ReconciliationContext, row: LedgerRow, holdingId: number): PayoutPayload {
    const payload: PayoutPayload = {
        portfolio_id: ctx.portfolioId,
        holding_id: holdingId,
        paid_on: row.transactionDate,
        amount: row.amount,
    };
    if (row.amountCurrency) payload.currency_code = row.amountCurrency;
    if (row.goesExOn) payload.goes_ex_on = row.goesExOn;

    const exchangeRate = exchangeRateFor(ctx, row);
    if (exchangeRate) payload.exchange_rate = exchangeRate;
    if (row.comments) payload.comments = row.comments;

    return payload;
}

export async function processPayout(ctx: ReconciliationContext, row: LedgerRow): Promise<void> {
    const prefix = rowPrefix(row);

    const holdingId = ctx.resolveHolding(row.market, row.symbol);
    if (holdingId === undefined) {
        if (ctx.options.strict) {
            throw new UnresolvedHoldingError(row.symbol, row.market, row.lineNumber);
        }
        ctx.summary.failed++;
        console.error(`${prefix}: Unable to find holding id matching ${row.symbol}, ${row.market}, skipping payout`);
        return;
    }

    if (ctx.hasPayout(holdingId, row.transactionDate)) {
        ctx.summary.duplicates++;
        console.log(`${prefix}: Skipped (duplicate payout for ${row.symbol} on ${row.transactionDate})`);
    } else {
        const payload = buildPayoutPayload(ctx, row, holdingId);
        const res = await ctx.api.tryCreatePayout(payload);
        const kind = reportOutcome(ctx, prefix, res, payload);
        if (!isSuccess(kind)) return;
        ctx.recordPayout(holdingId, row.transactionDate);
    }

    // cash postings de-duplicate independently, by foreign identifier
    if (postsPayoutCash(ctx, row)) {
        await postCash(ctx, row, prefix);
    }
}
