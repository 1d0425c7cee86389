/**
 * Merge Handler
 *
 * MERGE_CANCEL / MERGE_BUY rows are consumed as an adjacent pair: the cancel
 * leg names the holding being replaced, the buy leg the instrument it becomes.
 * A broken pair is a structural ledger error; the lookahead never moves past
 * the one partner row.
 */

import type { HoldingMergePayload } from '../../gateway/types';
import { extractHoldingId } from '../../gateway/types';
import type { RowSource } from '../../ledger/row-source';
import { isCustomMarket, type LedgerRow } from '../../ledger/types';
import { rowPrefix, type ReconciliationContext } from '../context';
import { MergePairingError, UnresolvedHoldingError } from '../errors';
import { ensureCustomInstrument } from '../instruments';
import { inspectResponse, isSuccess, reportOutcome } from '../outcome';

export interface MergePair {
    cancel: LedgerRow;
    buy: LedgerRow;
}

/**
 * Take the partner of `first` from the source.
 * The partner is only consumed once it has been checked.
 */
export function takeMergePair(ctx: ReconciliationContext, first: LedgerRow, source: RowSource): MergePair {
    const [leading, trailing] = ctx.options.mergeOrder === 'buy-first'
        ? ['MERGE_BUY', 'MERGE_CANCEL']
        : ['MERGE_CANCEL', 'MERGE_BUY'];

    if (first.transactionType !== leading) {
        throw new MergePairingError(`${first.transactionType} found where ${leading} should start a merge pair`, first.lineNumber);
    }

    const partner = source.peek();
    if (!partner || partner.transactionType !== trailing) {
        const found = partner ? `${partner.transactionType} on line ${partner.lineNumber}` : 'end of ledger';
        throw new MergePairingError(`${leading} must be followed by ${trailing}, found ${found}`, first.lineNumber);
    }
    source.next();

    return leading === 'MERGE_CANCEL'
        ? { cancel: first, buy: partner }
        : { cancel: partner, buy: first };
}

export function buildMergePayload(
    ctx: ReconciliationContext,
    { cancel, buy }: MergePair,
    holdingId: number,
): HoldingMergePayload {
    const payload: HoldingMergePayload = {
        portfolio_id: ctx.portfolioId,
        holding_id: holdingId,
        merge_date: buy.transactionDate,
        quantity: buy.quantity,
        symbol: buy.symbol,
        market: buy.market.toUpperCase(),
        unique_identifier: buy.uniqueIdentifier,
    };
    if (cancel.price) payload.cancelled_price = cancel.price;
    if (isCustomMarket(buy.market)) {
        const instrument = ctx.findCustomInstrument(buy.symbol);
        if (instrument) payload.custom_investment_id = instrument.id;
    }
    const comments = buy.comments || cancel.comments;
    if (comments) payload.comments = comments;
    return payload;
}

export async function processMerge(ctx: ReconciliationContext, first: LedgerRow, source: RowSource): Promise<void> {
    const pair = takeMergePair(ctx, first, source);
    const { cancel, buy } = pair;
    const prefix = `${rowPrefix(cancel)}+${buy.lineNumber}`;

    const holdingId = ctx.resolveHolding(cancel.market, cancel.symbol);
    if (holdingId === undefined) {
        // a rerun finds only the merged-into holding
        if (ctx.resolveHolding(buy.market, buy.symbol) !== undefined) {
            ctx.summary.duplicates++;
            console.log(`${prefix}: Skipped (duplicate, ${cancel.symbol} already merged into ${buy.symbol})`);
            return;
        }
        if (ctx.options.strict) {
            throw new UnresolvedHoldingError(cancel.symbol, cancel.market, cancel.lineNumber);
        }
        ctx.summary.failed++;
        console.error(`${prefix}: Unable to find holding id matching ${cancel.symbol}, ${cancel.market}, skipping merge`);
        return;
    }

    let payload = buildMergePayload(ctx, pair, holdingId);
    let res = await ctx.api.tryCreateHoldingMerge(payload);

    if (inspectResponse(res) === 'unknown-instrument') {
        const instrument = await ensureCustomInstrument(ctx, buy, prefix);
        if (instrument) {
            payload = { ...payload, custom_investment_id: instrument.id };
            res = await ctx.api.tryCreateHoldingMerge(payload);
            if (inspectResponse(res) === 'unknown-instrument') {
                console.error(`${prefix}: instrument ${buy.symbol} still not found after creating it`);
            }
        }
    }

    const kind = reportOutcome(ctx, prefix, res, payload);
    if (!isSuccess(kind)) return;

    ctx.forgetHolding(cancel.market, cancel.symbol);
    ctx.recordHolding(buy.market, buy.symbol, extractHoldingId(res.body, 'holding_merge') ?? holdingId);
}
