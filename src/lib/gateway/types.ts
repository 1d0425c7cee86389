/**
 * Remote Ledger Types
 *
 * Request payloads, response shapes (validated with zod), and the LedgerApi
 * contract the reconciliation engine talks to. Decimal values travel as
 * strings in both directions so nothing is rounded on the way through.
 */

import { z } from 'zod';

// =============================================================================
// Transport
// =============================================================================

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

/** Status of a request that never got an HTTP response (network error, timeout) */
export const NETWORK_FAILURE_STATUS = 0;

/** Unchecked response, returned by non-strict calls for the caller to inspect */
export interface RawResponse {
    method: HttpMethod;
    url: string;
    status: number;
    ok: boolean;
    body: unknown;
}

// =============================================================================
// Response Shapes
// =============================================================================

const decimalSchema = z.union([z.number(), z.string()]).transform((v) => String(v));

export const portfolioSchema = z.object({
    id: z.number(),
    name: z.string(),
    country_code: z.string().nullish(),
    currency_code: z.string().nullish(),
});

export const cashAccountSchema = z.object({
    id: z.number(),
    name: z.string(),
    currency: z.string(),
});

export const cashTransactionSchema = z.object({
    id: z.number(),
    foreign_identifier: z.string().nullish(),
});

export const holdingSchema = z.object({
    id: z.number(),
    instrument: z.object({
        code: z.string(),
        market_code: z.string(),
    }),
});

export const payoutSchema = z.object({
    id: z.number(),
    holding_id: z.number(),
    paid_on: z.string(),
});

export const customInvestmentSchema = z.object({
    id: z.number(),
    code: z.string(),
    name: z.string(),
    country_code: z.string(),
    investment_type: z.string(),
    currency_code: z.string().nullish(),
});

export const priceSchema = z.object({
    id: z.number(),
    last_traded_on: z.string(),
    last_traded_price: decimalSchema,
});

export const valuationSchema = z.object({
    holdings: z.array(z.object({
        symbol: z.string(),
        market: z.string(),
        quantity: decimalSchema,
        value: decimalSchema,
    })),
    cash_accounts: z.array(z.object({
        name: z.string(),
        currency: z.string(),
        value: decimalSchema,
    })),
});

export type Portfolio = z.infer<typeof portfolioSchema>;
export type CashAccount = z.infer<typeof cashAccountSchema>;
export type CashTransaction = z.infer<typeof cashTransactionSchema>;
export type Holding = z.infer<typeof holdingSchema>;
export type Payout = z.infer<typeof payoutSchema>;
export type CustomInvestment = z.infer<typeof customInvestmentSchema>;
export type Price = z.infer<typeof priceSchema>;
export type Valuation = z.infer<typeof valuationSchema>;

const createdHoldingSchema = z.object({ holding_id: z.number().nullish() });

/**
 * Pull the holding id out of a trade or holding-merge create response.
 * Returns null when the body does not carry one.
 */
export function extractHoldingId(body: unknown, key: 'trade' | 'holding_merge'): number | null {
    const parsed = z.record(z.unknown()).safeParse(body);
    if (!parsed.success) return null;
    const inner = createdHoldingSchema.safeParse(parsed.data[key]);
    return inner.success ? inner.data.holding_id ?? null : null;
}

// =============================================================================
// Request Payloads
// =============================================================================

export interface PortfolioPayload {
    name: string;
    country_code: string;
    disable_automatic_transactions: boolean;
    broker_email_api_enabled: boolean;
}

export interface CashAccountPayload {
    name: string;
    currency: string;
}

export interface TradePayload {
    unique_identifier: string;
    transaction_type: string;
    transaction_date: string;
    portfolio_id: number;
    symbol: string;
    market: string;
    quantity: string;
    price: string;
    custom_investment_id?: number;
    goes_ex_on?: string;
    brokerage?: string;
    brokerage_currency_code?: string;
    exchange_rate?: string;
    cost_base?: string;
    capital_return_value?: string;
    paid_on?: string;
    comments?: string;
}

export interface PayoutPayload {
    portfolio_id: number;
    holding_id: number;
    paid_on: string;
    amount: string;
    currency_code?: string;
    goes_ex_on?: string;
    exchange_rate?: string;
    comments?: string;
}

export interface CashTransactionPayload {
    date_time: string;
    description?: string;
    amount: string;
    type_name: string;
    foreign_identifier: string;
}

export interface HoldingMergePayload {
    portfolio_id: number;
    holding_id: number;
    merge_date: string;
    quantity: string;
    symbol: string;
    market: string;
    unique_identifier: string;
    cancelled_price?: string;
    custom_investment_id?: number;
    comments?: string;
}

export interface CustomInvestmentPayload {
    portfolio_id: number;
    code: string;
    name: string;
    country_code: string;
    investment_type: string;
    currency_code?: string;
}

export interface PricePayload {
    last_traded_on: string;
    last_traded_price: string;
}

// =============================================================================
// Contract
// =============================================================================

/**
 * Everything the reconciliation engine needs from the remote service.
 * Setup calls are strict and throw on failure; `tryCreate*` calls return the
 * raw response so duplicates can be told apart from real rejections.
 */
export interface LedgerApi {
    listPortfolios(): Promise<Portfolio[]>;
    createPortfolio(payload: PortfolioPayload): Promise<Portfolio>;
    deletePortfolio(portfolioId: number): Promise<void>;

    listCashAccounts(portfolioId: number): Promise<CashAccount[]>;
    createCashAccount(portfolioId: number, payload: CashAccountPayload): Promise<CashAccount>;
    listCashTransactions(cashAccountId: number): Promise<CashTransaction[]>;
    deleteCashTransaction(transactionId: number): Promise<void>;
    resyncCashAccount(cashAccountId: number): Promise<void>;

    listHoldings(portfolioId: number): Promise<Holding[]>;
    deleteHolding(holdingId: number): Promise<void>;
    listPayouts(portfolioId: number, startDate: string, endDate: string): Promise<Payout[]>;
    getValuation(portfolioId: number, balanceDate: string): Promise<Valuation>;

    listCustomInvestments(portfolioId: number): Promise<CustomInvestment[]>;
    createCustomInvestment(payload: CustomInvestmentPayload): Promise<CustomInvestment>;
    updateCustomInvestment(customInvestmentId: number, payload: CustomInvestmentPayload): Promise<CustomInvestment>;
    deleteCustomInvestment(customInvestmentId: number): Promise<void>;

    listPrices(customInvestmentId: number, startDate: string, endDate: string): Promise<Price[]>;
    createPrice(customInvestmentId: number, payload: PricePayload): Promise<Price>;
    updatePrice(priceId: number, payload: PricePayload): Promise<Price>;

    tryCreateTrade(payload: TradePayload): Promise<RawResponse>;
    tryCreatePayout(payload: PayoutPayload): Promise<RawResponse>;
    tryCreateCashTransaction(cashAccountId: number, payload: CashTransactionPayload): Promise<RawResponse>;
    tryCreateHoldingMerge(payload: HoldingMergePayload): Promise<RawResponse>;
}
