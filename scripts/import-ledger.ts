#!/usr/bin/env node
/**
 * Ledger Import CLI
 *
 * Reconciles a ledger CSV into a Sharesight portfolio. Safe to re-run: rows
 * already recorded remotely are reported as duplicates.
 *
 * Usage: npm run import -- --portfolio "My Portfolio" --file ledger.csv --country AU
 *
 * Requires: SHARESIGHT_CLIENT_ID / SHARESIGHT_CLIENT_SECRET in .env.local or .env
 * (or --client-id / --client-secret)
 */

import * as dotenv from 'dotenv';
import * as path from 'path';
import { parseImportArgs, USAGE, UsageError } from '../src/lib/cli/args';
import { loadRemoteConfig } from '../src/lib/config/env';
import { LedgerGateway } from '../src/lib/gateway/gateway-client';
import { readLedgerFile, readPricesFile } from '../src/lib/ledger/ledger-reader';
import { runReconciliation } from '../src/lib/reconcile/engine';
import type { RunSummary } from '../src/lib/reconcile/types';

// .env.local wins: dotenv never overwrites a variable that is already set
dotenv.config({ path: path.join(process.cwd(), '.env.local') });
dotenv.config({ path: path.join(process.cwd(), '.env') });

const RULE = '═══════════════════════════════════════════════════════════════';

function printSummary(summary: RunSummary): void {
    console.log();
    console.log(RULE);
    console.log('  Import Summary');
    console.log(RULE);
    console.log(`Rows processed:         ${summary.rowsProcessed}`);
    console.log(`Created:                ${summary.created}`);
    console.log(`Duplicates:             ${summary.duplicates}`);
    console.log(`Failed:                 ${summary.failed}`);
    console.log(`Skipped:                ${summary.skipped}`);
    console.log(`Warnings:               ${summary.warnings}`);
    console.log(`Cash accounts resynced: ${summary.resyncedCashAccounts}`);
}

async function main(): Promise<void> {
    const parsed = parseImportArgs(process.argv.slice(2));
    if (parsed.kind === 'help') {
        console.log(USAGE);
        return;
    }
    const { options } = parsed;

    console.log(RULE);
    console.log('  Ledger Import');
    console.log(RULE);
    console.log(`Portfolio: ${options.engine.portfolioName} (${options.engine.countryCode})`);
    console.log(`Ledger:    ${options.file}`);
    if (options.engine.reset !== 'none') console.log(`Reset:     ${options.engine.reset}`);
    console.log();

    const ledger = readLedgerFile(options.file);
    const prices = options.pricesFile ? readPricesFile(options.pricesFile) : undefined;
    console.log(`Read ${ledger.length} ledger row(s)${prices ? ` and ${prices.length} price(s)` : ''}`);

    const config = loadRemoteConfig(process.env, {
        clientId: options.clientId,
        clientSecret: options.clientSecret,
    });
    const gateway = await LedgerGateway.authenticate(
        { clientId: config.clientId, clientSecret: config.clientSecret },
        { apiUrl: config.apiUrl, tokenUrl: config.tokenUrl, debug: options.debug },
    );

    const summary = await runReconciliation(gateway, ledger, { ...options.engine, prices });
    printSummary(summary);
}

main().catch((error: unknown) => {
    if (error instanceof UsageError) {
        console.error(`ERROR: ${error.message}`);
        console.error();
        console.error(USAGE);
    } else {
        console.error('Import failed:', error instanceof Error ? error.message : error);
    }
    process.exit(1);
});
