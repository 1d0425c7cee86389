/**
 * Ledger Types
 *
 * One parsed CSV record per financial event. Numeric columns stay as the
 * strings the file carried; they are only interpreted where arithmetic is
 * needed.
 */

export const CUSTOM_MARKET = 'other';

export interface LedgerRow {
    /** 1-based physical line number in the source file; 0 for synthetic rows */
    lineNumber: number;
    uniqueIdentifier: string;
    transactionType: string;
    transactionDate: string; // YYYY-MM-DD
    symbol: string;
    market: string;
    quantity: string;
    price: string;
    amount: string;
    amountCurrency: string;
    brokerage: string;
    exchangeRate: string;
    cashAccount: string;
    goesExOn: string;
    description: string;
    comments: string;
    accruedIncome: string;

    // Custom instrument definition (market = "other" rows only)
    symbolName: string;
    instrumentCountryCode: string;
    instrumentCurrency: string;
    symbolType: string;

    /** Every column as read, for the amount_in_<ccy> / exchange_rate_<ccy> variants */
    raw: Record<string, string>;
}

export interface PriceRow {
    lineNumber: number;
    symbol: string;
    date: string;
    price: string;
}

export function isCustomMarket(market: string): boolean {
    return market.trim().toLowerCase() === CUSTOM_MARKET;
}

/** Reads a currency-suffixed column such as amount_in_gbp or exchange_rate_aud */
export function currencyColumn(row: LedgerRow, prefix: string, currency: string): string {
    return row.raw[`${prefix}${currency.toLowerCase()}`]?.trim() ?? '';
}
