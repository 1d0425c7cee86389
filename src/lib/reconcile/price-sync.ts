/**
 * Custom Instrument Prices
 *
 * Upserts one price per (instrument, date) from the optional prices file.
 * Only custom instruments carry prices we can write.
 */

import Decimal from 'decimal.js';
import type { PriceRow } from '../ledger/types';
import type { ReconciliationContext } from './context';

export interface PriceSyncResult {
    created: number;
    updated: number;
    unchanged: number;
    skipped: number;
}

export async function syncPrices(ctx: ReconciliationContext, prices: readonly PriceRow[]): Promise<PriceSyncResult> {
    const result: PriceSyncResult = { created: 0, updated: 0, unchanged: 0, skipped: 0 };

    for (const row of prices) {
        const instrument = ctx.findCustomInstrument(row.symbol);
        if (!instrument) {
            result.skipped++;
            ctx.warn(`[Prices] Line ${row.lineNumber}: ${row.symbol} is not a custom instrument, skipping price`);
            continue;
        }

        const payload = { last_traded_on: row.date, last_traded_price: row.price };
        const existing = (await ctx.api.listPrices(instrument.id, row.date, row.date))
            .find((p) => p.last_traded_on.slice(0, 10) === row.date);

        if (!existing) {
            await ctx.api.createPrice(instrument.id, payload);
            result.created++;
            console.log(`[Prices] ${row.symbol} ${row.date}: created ${row.price}`);
        } else if (!new Decimal(existing.last_traded_price).equals(row.price)) {
            await ctx.api.updatePrice(existing.id, payload);
            result.updated++;
            console.log(`[Prices] ${row.symbol} ${row.date}: updated ${existing.last_traded_price} -> ${row.price}`);
        } else {
            result.unchanged++;
        }
    }

    console.log(
        `[Prices] ${result.created} created, ${result.updated} updated, `
        + `${result.unchanged} unchanged, ${result.skipped} skipped`,
    );
    return result;
}
