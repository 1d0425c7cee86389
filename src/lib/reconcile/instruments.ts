/**
 * Custom Instruments
 *
 * Keeps the portfolio's user-defined instruments (market "other") in line with
 * the definitions found in the ledger, and creates missing ones on demand
 * when a trade or merge is rejected for an unknown instrument.
 */

import { GatewayError } from '../gateway/errors';
import type { CustomInvestment, CustomInvestmentPayload } from '../gateway/types';
import { isCustomMarket, type LedgerRow } from '../ledger/types';
import type { ReconciliationContext } from './context';
import type { CustomInstrumentDefinition } from './types';

const DEFAULT_INVESTMENT_TYPE = 'ORDINARY';

export function definitionFromRow(row: LedgerRow): CustomInstrumentDefinition {
    return {
        symbol: row.symbol,
        name: row.symbolName || row.symbol,
        countryCode: row.instrumentCountryCode,
        currency: row.instrumentCurrency,
        investmentType: row.symbolType || DEFAULT_INVESTMENT_TYPE,
        lineNumber: row.lineNumber,
    };
}

function toPayload(ctx: ReconciliationContext, def: CustomInstrumentDefinition): CustomInvestmentPayload {
    const payload: CustomInvestmentPayload = {
        portfolio_id: ctx.portfolioId,
        code: def.symbol,
        name: def.name,
        country_code: def.countryCode || ctx.countryCode,
        investment_type: def.investmentType,
    };
    if (def.currency) payload.currency_code = def.currency;
    return payload;
}

/** Attributes the service cannot change in place */
function needsRecreate(ctx: ReconciliationContext, existing: CustomInvestment, def: CustomInstrumentDefinition): boolean {
    const countryChanged = existing.country_code.toUpperCase() !== (def.countryCode || ctx.countryCode);
    const typeChanged = existing.investment_type.toUpperCase() !== def.investmentType;
    const currencyChanged = Boolean(def.currency && existing.currency_code && existing.currency_code.toUpperCase() !== def.currency);
    return countryChanged || typeChanged || currencyChanged;
}

export async function createCustomInstrument(
    ctx: ReconciliationContext,
    def: CustomInstrumentDefinition,
): Promise<CustomInvestment> {
    const created = await ctx.api.createCustomInvestment(toPayload(ctx, def));
    ctx.recordCustomInstrument(created);
    console.log(`[Instruments] Created custom instrument ${created.code} (${created.id})`);

    if (def.currency && created.currency_code && created.currency_code.toUpperCase() !== def.currency) {
        ctx.warn(
            `[Instruments] ${def.symbol}: requested currency ${def.currency} `
            + `but the service assigned ${created.currency_code}`,
        );
    }
    return created;
}

/**
 * Create, update or recreate every custom instrument defined in the ledger.
 * Country, type and currency can only change by delete + create; a name-only
 * difference is updated in place.
 */
export async function syncCustomInstruments(ctx: ReconciliationContext): Promise<void> {
    for (const def of ctx.customDefinitions.values()) {
        const existing = ctx.findCustomInstrument(def.symbol);

        if (!existing) {
            await createCustomInstrument(ctx, def);
            continue;
        }

        if (needsRecreate(ctx, existing, def)) {
            console.log(`[Instruments] Recreating ${def.symbol}: country, type or currency changed`);
            await ctx.api.deleteCustomInvestment(existing.id);
            ctx.forgetCustomInstrument(def.symbol);
            await createCustomInstrument(ctx, def);
        } else if (existing.name !== def.name) {
            console.log(`[Instruments] Renaming ${def.symbol}: "${existing.name}" → "${def.name}"`);
            const updated = await ctx.api.updateCustomInvestment(existing.id, toPayload(ctx, def));
            ctx.recordCustomInstrument(updated);
        }
    }
}

/**
 * Fallback for an unknown-instrument rejection.
 * Returns the instrument to retry with, or null when none can be made.
 */
export async function ensureCustomInstrument(
    ctx: ReconciliationContext,
    row: LedgerRow,
    prefix: string,
): Promise<CustomInvestment | null> {
    if (!isCustomMarket(row.market)) {
        console.error(`${prefix}: instrument ${row.symbol} on ${row.market} is unknown to the service`);
        return null;
    }

    const known = ctx.findCustomInstrument(row.symbol);
    if (known) return known;

    const def = ctx.findCustomDefinition(row.symbol) ?? definitionFromRow(row);
    console.log(`${prefix}: creating missing custom instrument ${row.symbol}`);
    try {
        return await createCustomInstrument(ctx, def);
    } catch (err: unknown) {
        if (err instanceof GatewayError) {
            console.error(`${prefix}: could not create custom instrument ${row.symbol}: ${err.message}`);
            return null;
        }
        throw err;
    }
}
