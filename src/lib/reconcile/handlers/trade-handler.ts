/**
 * Trade Handler
 *
 * BUY/SELL and every other holding-changing row. Fallbacks, each tried once:
 * - unknown instrument → create the custom instrument, resubmit
 * - OPENING_BALANCE without historical price → resubmit as BUY
 *
 * Successful trades record their holding id, post any cash effect the service
 * does not post itself, and split accrued income into its own record.
 */

import Decimal from 'decimal.js';
import type { TradePayload } from '../../gateway/types';
import { extractHoldingId } from '../../gateway/types';
import { currencyColumn, isCustomMarket, type LedgerRow } from '../../ledger/types';
import { CAPITAL_FLOW_TYPES } from '../classifier';
import { rowPrefix, type ReconciliationContext } from '../context';
import { ensureCustomInstrument } from '../instruments';
import { inspectResponse, isSuccess, reportOutcome } from '../outcome';
import { postCash } from './cash-handler';
import { exchangeRateFor } from './fields';
import { processPayout } from './payout-handler';

export const ACCRUED_INCOME_SUFFIX = '-accrued_income';

export function buildTradePayload(ctx: ReconciliationContext, row: LedgerRow): TradePayload {
    const payload: TradePayload = {
        unique_identifier: row.uniqueIdentifier,
        transaction_type: row.transactionType,
        transaction_date: row.transactionDate,
        portfolio_id: ctx.portfolioId,
        symbol: row.symbol,
        market: row.market.toUpperCase(),
        quantity: row.quantity,
        price: row.price,
    };

    if (isCustomMarket(row.market)) {
        const instrument = ctx.findCustomInstrument(row.symbol);
        if (instrument) payload.custom_investment_id = instrument.id;
    }
    if (row.goesExOn) payload.goes_ex_on = row.goesExOn;
    if (row.brokerage) {
        payload.brokerage = row.brokerage;
        payload.brokerage_currency_code = ctx.baseCurrency;
    }

    const exchangeRate = exchangeRateFor(ctx, row);
    if (exchangeRate) payload.exchange_rate = exchangeRate;

    if (row.transactionType === 'OPENING_BALANCE') {
        const costBase = currencyColumn(row, 'amount_in_', ctx.baseCurrency) || row.amount;
        if (costBase) payload.cost_base = costBase;
    }
    if (CAPITAL_FLOW_TYPES.has(row.transactionType) && row.amount) {
        payload.capital_return_value = new Decimal(row.amount).abs().toString();
        payload.paid_on = row.transactionDate;
    }
    if (row.comments) payload.comments = row.comments;

    return payload;
}

/** AU portfolios get no automatic cash postings for trades */
function postsTradeCash(ctx: ReconciliationContext, row: LedgerRow): boolean {
    return CAPITAL_FLOW_TYPES.has(row.transactionType) || ctx.countryCode === 'AU';
}

export async function processTrade(ctx: ReconciliationContext, row: LedgerRow): Promise<void> {
    const prefix = rowPrefix(row);

    if (row.quantity && new Decimal(row.quantity).isNegative()) {
        ctx.warn(`${prefix}: negative quantity ${row.quantity} for ${row.symbol}; short positions are not supported`);
    }

    let payload = buildTradePayload(ctx, row);
    let res = await ctx.api.tryCreateTrade(payload);

    if (inspectResponse(res) === 'unknown-instrument') {
        const instrument = await ensureCustomInstrument(ctx, row, prefix);
        if (instrument) {
            payload = { ...payload, custom_investment_id: instrument.id };
            res = await ctx.api.tryCreateTrade(payload);
            if (inspectResponse(res) === 'unknown-instrument') {
                console.error(`${prefix}: instrument ${row.symbol} still not found after creating it`);
            }
        }
    }

    if (row.transactionType === 'OPENING_BALANCE' && inspectResponse(res) === 'missing-price') {
        ctx.warn(
            `${prefix}: no historical price for ${row.symbol}, falling back to BUY. `
            + 'This transaction needs correcting to an opening balance in Sharesight',
        );
        payload = { ...payload, transaction_type: 'BUY' };
        res = await ctx.api.tryCreateTrade(payload);
    }

    const kind = reportOutcome(ctx, prefix, res, payload);
    if (!isSuccess(kind)) return;

    const holdingId = extractHoldingId(res.body, 'trade');
    if (holdingId !== null) {
        ctx.recordHolding(row.market, row.symbol, holdingId);
    } else if (kind === 'created') {
        ctx.warn(`${prefix}: response carried no holding id for ${row.symbol}`);
    }

    if (postsTradeCash(ctx, row)) {
        await postCash(ctx, row, prefix);
    }

    await splitAccruedIncome(ctx, row, prefix);
}

/**
 * A SELL's accrued income becomes a payout; a BUY's becomes a CAPITAL_CALL.
 * Both carry `<id>-accrued_income` so the trade row's cash posting is untouched.
 */
async function splitAccruedIncome(ctx: ReconciliationContext, row: LedgerRow, prefix: string): Promise<void> {
    if (!row.accruedIncome || new Decimal(row.accruedIncome).isZero()) return;

    const derived: LedgerRow = {
        ...row,
        uniqueIdentifier: `${row.uniqueIdentifier}${ACCRUED_INCOME_SUFFIX}`,
        amount: row.accruedIncome,
        accruedIncome: '',
        brokerage: '',
    };

    if (row.transactionType === 'SELL') {
        console.log(`${prefix}: posting accrued income ${row.accruedIncome} as a payout`);
        await processPayout(ctx, { ...derived, transactionType: 'DIVIDEND', quantity: '', price: '' });
    } else if (row.transactionType === 'BUY') {
        console.log(`${prefix}: posting accrued income ${row.accruedIncome} as a capital call`);
        await processTrade(ctx, { ...derived, transactionType: 'CAPITAL_CALL', quantity: '0', price: '0' });
    } else {
        ctx.warn(`${prefix}: accrued income is only split for BUY and SELL, ignoring ${row.accruedIncome}`);
    }
}
