/**
 * Ledger Reader
 *
 * Header-driven CSV parsing for the ledger and prices files.
 * - UTF-8 with or without a byte-order mark
 * - Cells trimmed, blank lines skipped
 * - Physical line numbers preserved for range filters and log correlation
 */

import { readFileSync } from 'fs';
import { CsvError, parse } from 'csv-parse/sync';
import { z } from 'zod';
import type { LedgerRow, PriceRow } from './types';

export class LedgerFormatError extends Error {
    constructor(readonly lineNumber: number, message: string) {
        super(`Line ${lineNumber}: ${message}`);
        this.name = 'LedgerFormatError';
    }
}

const ISO_DATE = /^\d{4}-\d{2}-\d{2}/;
const DECIMAL = /^[-+]?(\d+\.?\d*|\.\d+)([eE][-+]?\d+)?$/;

const parsedRecordsSchema = z.array(z.object({
    record: z.record(z.string()),
    info: z.object({ lines: z.number() }),
}));

interface CsvRecord {
    lineNumber: number;
    cells: Record<string, string>;
}

function parseRaw(content: string): unknown {
    try {
        return parse(content, {
            columns: (header: string[]) => header.map((h) => h.trim().toLowerCase()),
            bom: true,
            info: true,
            skip_empty_lines: true,
            trim: true,
        });
    } catch (err) {
        if (err instanceof CsvError) {
            const line = z.number().safeParse(err.lines);
            throw new LedgerFormatError(line.success ? line.data : 0, err.message);
        }
        throw err;
    }
}

function parseCsv(content: string, required: string[]): CsvRecord[] {
    const parsed = parsedRecordsSchema.parse(parseRaw(content));

    const records = parsed.map(({ record, info }) => ({ lineNumber: info.lines, cells: record }));

    if (records.length > 0) {
        const missing = required.filter((column) => !(column in records[0].cells));
        if (missing.length > 0) {
            throw new LedgerFormatError(1, `missing column(s): ${missing.join(', ')}`);
        }
    }

    return records;
}

// =============================================================================
// Ledger
// =============================================================================

const REQUIRED_LEDGER_COLUMNS = ['unique_identifier', 'transaction_type', 'transaction_date'];
const NUMERIC_LEDGER_COLUMNS = ['quantity', 'price', 'amount', 'brokerage', 'exchange_rate', 'accrued_income'];

function toLedgerRow({ lineNumber, cells }: CsvRecord): LedgerRow {
    const cell = (name: string): string => cells[name] ?? '';

    const uniqueIdentifier = cell('unique_identifier');
    const transactionType = cell('transaction_type').toUpperCase();
    const transactionDate = cell('transaction_date');

    if (!uniqueIdentifier) {
        throw new LedgerFormatError(lineNumber, 'unique_identifier is empty');
    }
    if (!transactionType) {
        throw new LedgerFormatError(lineNumber, 'transaction_type is empty');
    }
    if (!ISO_DATE.test(transactionDate)) {
        throw new LedgerFormatError(lineNumber, `transaction_date "${transactionDate}" is not YYYY-MM-DD`);
    }
    for (const column of NUMERIC_LEDGER_COLUMNS) {
        const value = cell(column);
        if (value !== '' && !DECIMAL.test(value)) {
            throw new LedgerFormatError(lineNumber, `${column} "${value}" is not a number`);
        }
    }

    return {
        lineNumber,
        uniqueIdentifier,
        transactionType,
        transactionDate: transactionDate.slice(0, 10),
        symbol: cell('symbol'),
        market: cell('market'),
        quantity: cell('quantity'),
        price: cell('price'),
        amount: cell('amount'),
        amountCurrency: cell('amount_currency').toUpperCase(),
        brokerage: cell('brokerage'),
        exchangeRate: cell('exchange_rate'),
        cashAccount: cell('cash_account'),
        goesExOn: cell('goes_ex_on'),
        description: cell('description'),
        comments: cell('comments'),
        accruedIncome: cell('accrued_income'),
        symbolName: cell('symbol_name'),
        instrumentCountryCode: cell('instrument_country_code').toUpperCase(),
        instrumentCurrency: cell('instrument_currency').toUpperCase(),
        symbolType: cell('symbol_type').toUpperCase(),
        raw: cells,
    };
}

export function parseLedger(content: string): LedgerRow[] {
    return parseCsv(content, REQUIRED_LEDGER_COLUMNS).map(toLedgerRow);
}

export function readLedgerFile(filePath: string): LedgerRow[] {
    return parseLedger(readFileSync(filePath, 'utf-8'));
}

// =============================================================================
// Prices
// =============================================================================

const REQUIRED_PRICE_COLUMNS = ['symbol', 'date', 'price'];

export function parsePrices(content: string): PriceRow[] {
    return parseCsv(content, REQUIRED_PRICE_COLUMNS).map(({ lineNumber, cells }) => {
        const date = cells.date ?? '';
        const price = cells.price ?? '';
        if (!ISO_DATE.test(date)) {
            throw new LedgerFormatError(lineNumber, `date "${date}" is not YYYY-MM-DD`);
        }
        if (!DECIMAL.test(price)) {
            throw new LedgerFormatError(lineNumber, `price "${price}" is not a number`);
        }
        return { lineNumber, symbol: cells.symbol ?? '', date: date.slice(0, 10), price };
    });
}

export function readPricesFile(filePath: string): PriceRow[] {
    return parsePrices(readFileSync(filePath, 'utf-8'));
}
