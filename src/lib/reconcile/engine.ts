/**
 * Reconciliation Engine
 *
 * Drives one run: scan, setup, row loop, cash resync.
 *
 * RULES:
 * - Every row is classified before the first remote write
 * - Rows are processed in file order; merge pairs are consumed together
 * - Remote rejections are logged and counted, never thrown
 * - Structural errors (ReconciliationError) abort the run
 * - Each touched cash account is resynced exactly once, after the loop;
 *   a failed resync is a warning
 */

import { GatewayError } from '../gateway/errors';
import type { LedgerApi } from '../gateway/types';
import { RowSource } from '../ledger/row-source';
import type { LedgerRow } from '../ledger/types';
import { classifyTransaction } from './classifier';
import type { ReconciliationContext } from './context';
import { baseCurrencyFor } from './currency';
import { OptionsConflictError, ReconciliationError } from './errors';
import { processCash } from './handlers/cash-handler';
import { processMerge } from './handlers/merge-handler';
import { processPayout } from './handlers/payout-handler';
import { processTrade } from './handlers/trade-handler';
import { buildOpeningBalanceRows, previousDay, type OpeningBalanceBatch } from './opening-balance';
import { preparePortfolio, scanLedger } from './setup';
import type { EngineOptions, RunSummary } from './types';

// =============================================================================
// Options
// =============================================================================

/** Reset with a partial range would delete history the run then skips */
export function assertCompatibleOptions(options: EngineOptions): void {
    const ranged = options.minDate !== undefined
        || options.minLine !== undefined
        || options.maxLine !== undefined;

    if (options.reset !== 'none' && ranged) {
        throw new OptionsConflictError('A reset cannot be combined with --min-date, --min-line or --max-line');
    }
    if (options.seedFrom !== undefined && options.minDate === undefined) {
        throw new OptionsConflictError('--seed-from needs --min-date to pick the snapshot date');
    }
    if (options.minLine !== undefined && options.maxLine !== undefined && options.minLine > options.maxLine) {
        throw new OptionsConflictError(`--min-line ${options.minLine} is after --max-line ${options.maxLine}`);
    }
}

/** Line bounds are inclusive; rows dated strictly before minDate are dropped */
export function filterRows(rows: readonly LedgerRow[], options: EngineOptions): LedgerRow[] {
    return rows.filter((row) => {
        if (options.minLine !== undefined && row.lineNumber < options.minLine) return false;
        if (options.maxLine !== undefined && row.lineNumber > options.maxLine) return false;
        if (options.minDate !== undefined && row.transactionDate < options.minDate) return false;
        return true;
    });
}

// =============================================================================
// Seeding
// =============================================================================

async function loadSeedBatch(
    api: LedgerApi,
    ledger: readonly LedgerRow[],
    options: EngineOptions,
    baseCurrency: string,
): Promise<OpeningBalanceBatch> {
    if (options.seedFrom === undefined || options.minDate === undefined) {
        return { rows: [], warnings: [] };
    }

    const source = (await api.listPortfolios()).find((p) => p.name === options.seedFrom);
    if (!source) {
        throw new ReconciliationError(`Seed portfolio "${options.seedFrom}" not found`);
    }

    const snapshotDate = previousDay(options.minDate);
    console.log(`[Engine] Seeding from portfolio ${source.id} "${source.name}" as of ${snapshotDate}`);
    const snapshot = await api.getValuation(source.id, snapshotDate);
    return buildOpeningBalanceRows(snapshot, ledger, options.minDate, baseCurrency);
}

// =============================================================================
// Row loop
// =============================================================================

async function processRows(ctx: ReconciliationContext, source: RowSource): Promise<void> {
    for (let row = source.next(); row !== null; row = source.next()) {
        const { kind } = classifyTransaction(row.transactionType, row.lineNumber);

        switch (kind) {
            case 'trade':
                await processTrade(ctx, row);
                ctx.summary.rowsProcessed++;
                break;
            case 'payout':
                await processPayout(ctx, row);
                ctx.summary.rowsProcessed++;
                break;
            case 'cash':
                await processCash(ctx, row);
                ctx.summary.rowsProcessed++;
                break;
            case 'merge':
                await processMerge(ctx, row, source);
                ctx.summary.rowsProcessed += 2;
                break;
        }
    }
}

async function resyncCashAccounts(ctx: ReconciliationContext): Promise<void> {
    for (const cashAccountId of ctx.touchedCashAccounts) {
        try {
            await ctx.api.resyncCashAccount(cashAccountId);
        } catch (err: unknown) {
            if (!(err instanceof GatewayError)) throw err;
            ctx.warn(`[Engine] Resync of cash account ${cashAccountId} failed: ${err.message}`);
            continue;
        }
        ctx.summary.resyncedCashAccounts++;
        console.log(`[Engine] Resynced cash account ${cashAccountId}`);
    }
}

// =============================================================================
// Entry point
// =============================================================================

export async function runReconciliation(
    api: LedgerApi,
    ledger: readonly LedgerRow[],
    options: EngineOptions,
    today: string = new Date().toISOString().slice(0, 10),
): Promise<RunSummary> {
    assertCompatibleOptions(options);
    const baseCurrency = baseCurrencyFor(options.countryCode);

    const seed = await loadSeedBatch(api, ledger, options, baseCurrency);
    const scan = scanLedger([...seed.rows, ...ledger], baseCurrency);

    const ctx = await preparePortfolio(api, options, scan, today);
    for (const warning of seed.warnings) {
        ctx.warn(warning);
    }

    const rows = [...seed.rows, ...filterRows(ledger, options)];
    console.log(`[Engine] Processing ${rows.length} of ${ledger.length + seed.rows.length} row(s)`);

    await processRows(ctx, new RowSource(rows));
    await resyncCashAccounts(ctx);

    return ctx.summary;
}
