/**
 * Ledger Reader Tests
 */

import { LedgerFormatError, parseLedger, parsePrices } from '../ledger-reader';
import { currencyColumn, isCustomMarket } from '../types';

const HEADER = 'unique_identifier,transaction_type,transaction_date,symbol,market,quantity,price,amount,amount_currency';

// =============================================================================
// parseLedger
// =============================================================================

describe('parseLedger', () => {
    it('maps columns onto a row and normalizes codes', () => {
        const [row] = parseLedger(`${HEADER}\nt-1,buy,2024-01-02,FOO,NYSE,10,100,-1000,usd\n`);

        expect(row).toMatchObject({
            lineNumber: 2,
            uniqueIdentifier: 't-1',
            transactionType: 'BUY',
            transactionDate: '2024-01-02',
            symbol: 'FOO',
            market: 'NYSE',
            quantity: '10',
            price: '100',
            amount: '-1000',
            amountCurrency: 'USD',
            brokerage: '',
            cashAccount: '',
        });
    });

    it('keeps physical line numbers across blank lines', () => {
        const rows = parseLedger([
            HEADER,
            't-1,BUY,2024-01-02,FOO,NYSE,10,100,,',
            '',
            't-2,SELL,2024-02-02,FOO,NYSE,5,110,,',
        ].join('\n'));

        expect(rows.map((r) => r.lineNumber)).toEqual([2, 4]);
    });

    it('tolerates a byte-order mark and untidy headers', () => {
        const [row] = parseLedger('\uFEFF Unique_Identifier ,Transaction_Type,TRANSACTION_DATE\nd-1,DEPOSIT,2024-03-01\n');

        expect(row.uniqueIdentifier).toBe('d-1');
        expect(row.transactionType).toBe('DEPOSIT');
    });

    it('trims cells and drops a time component from the date', () => {
        const [row] = parseLedger('unique_identifier,transaction_type,transaction_date\n  x-1 , DIVIDEND ,2024-03-01T10:00:00\n');

        expect(row.uniqueIdentifier).toBe('x-1');
        expect(row.transactionType).toBe('DIVIDEND');
        expect(row.transactionDate).toBe('2024-03-01');
    });

    it('exposes currency-suffixed columns through raw', () => {
        const [row] = parseLedger('unique_identifier,transaction_type,transaction_date,amount_in_gbp\no-1,OPENING_BALANCE,2024-01-01,750.25\n');

        expect(currencyColumn(row, 'amount_in_', 'GBP')).toBe('750.25');
        expect(currencyColumn(row, 'amount_in_', 'USD')).toBe('');
    });

    it('reports a missing mandatory column at the header line', () => {
        expect(() => parseLedger('unique_identifier,transaction_type\nt-1,BUY\n'))
            .toThrow('Line 1: missing column(s): transaction_date');
    });

    it('rejects an empty unique identifier', () => {
        expect(() => parseLedger(`${HEADER}\n,BUY,2024-01-02,FOO,NYSE,10,100,,\n`))
            .toThrow('Line 2: unique_identifier is empty');
    });

    it('rejects a date that is not ISO', () => {
        expect(() => parseLedger(`${HEADER}\nt-1,BUY,02/01/2024,FOO,NYSE,10,100,,\n`))
            .toThrow('Line 2: transaction_date "02/01/2024" is not YYYY-MM-DD');
    });

    it('rejects a non-numeric amount column', () => {
        expect(() => parseLedger(`${HEADER}\nt-1,BUY,2024-01-02,FOO,NYSE,ten,100,,\n`))
            .toThrow('Line 2: quantity "ten" is not a number');
    });

    it('turns malformed CSV into a LedgerFormatError', () => {
        expect(() => parseLedger(`${HEADER}\nt-1,BUY\n`)).toThrow(LedgerFormatError);
    });

    it('returns nothing for a header-only file', () => {
        expect(parseLedger(`${HEADER}\n`)).toEqual([]);
    });
});

// =============================================================================
// parsePrices
// =============================================================================

describe('parsePrices', () => {
    it('reads symbol, date and price', () => {
        expect(parsePrices('symbol,date,price\nPRIV,2024-06-30,12.5\n')).toEqual([
            { lineNumber: 2, symbol: 'PRIV', date: '2024-06-30', price: '12.5' },
        ]);
    });

    it('rejects a missing price', () => {
        expect(() => parsePrices('symbol,date,price\nPRIV,2024-06-30,\n'))
            .toThrow('Line 2: price "" is not a number');
    });
});

describe('isCustomMarket', () => {
    it('matches "other" in any case', () => {
        expect(isCustomMarket('OTHER')).toBe(true);
        expect(isCustomMarket(' other ')).toBe(true);
        expect(isCustomMarket('NYSE')).toBe(false);
    });
});
