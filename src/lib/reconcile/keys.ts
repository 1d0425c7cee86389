/**
 * Lookup keys for the in-memory reconciliation indexes.
 * All keys are case-insensitive on codes and names.
 */

export function holdingKey(portfolioId: number, market: string, symbol: string): string {
    return `${portfolioId}-${market.trim()}-${symbol.trim()}`.toLowerCase();
}

/** Payouts carry no caller-supplied id remotely, so they are keyed by holding and pay date */
export function payoutKey(portfolioId: number, holdingId: number, paidOn: string): string {
    return `${portfolioId}-${holdingId}-${paidOn.slice(0, 10)}`;
}

export function cashAccountKey(currency: string, accountName: string): string {
    return `${currency.trim().toUpperCase()}|${accountName.trim().toLowerCase()}`;
}

/**
 * Custom instruments sharing a code across portfolios confuse the service's
 * merge lookup, so the key is always qualified with the portfolio id.
 */
export function customInstrumentKey(portfolioId: number, symbol: string): string {
    return `${portfolioId}-${symbol.trim()}`.toLowerCase();
}

/** Remote name of the cash account backing a (currency, logical name) pair */
export function cashAccountName(portfolioName: string, currency: string, accountName: string): string {
    const logical = accountName.trim();
    return logical
        ? `${portfolioName} ${currency.toUpperCase()} ${logical}`
        : `${portfolioName} ${currency.toUpperCase()}`;
}
