/**
 * Ledger Gateway
 *
 * Typed REST client for the Sharesight v2/v3 API.
 * - Client-credentials token fetched once per run (valid ~30 minutes, never refreshed)
 * - 30 second timeout on all requests
 * - Retries 502/503/504 and network failures up to 3 attempts with doubling backoff
 * - A network failure that outlasts the retries comes back as status 0
 * - Strict calls throw GatewayError; tryCreate* calls hand back the raw response
 * - --debug echoes every request as a curl command (token redacted)
 */

import { z } from 'zod';
import { toCurl } from './curl';
import { AuthenticationError, GatewayError, previewBody } from './errors';
import {
    NETWORK_FAILURE_STATUS,
    cashAccountSchema,
    cashTransactionSchema,
    customInvestmentSchema,
    holdingSchema,
    payoutSchema,
    portfolioSchema,
    priceSchema,
    valuationSchema,
    type CashAccount,
    type CashAccountPayload,
    type CashTransaction,
    type CashTransactionPayload,
    type CustomInvestment,
    type CustomInvestmentPayload,
    type Holding,
    type HoldingMergePayload,
    type HttpMethod,
    type LedgerApi,
    type Payout,
    type PayoutPayload,
    type Portfolio,
    type PortfolioPayload,
    type Price,
    type PricePayload,
    type RawResponse,
    type TradePayload,
    type Valuation,
} from './types';

// =============================================================================
// Options
// =============================================================================

export interface GatewayCredentials {
    clientId: string;
    clientSecret: string;
}

export interface GatewayOptions {
    apiUrl: string;
    tokenUrl: string;
    debug?: boolean;
    maxAttempts?: number;
    retryDelayMs?: number;
    timeoutMs?: number;
}

type ResolvedOptions = Required<GatewayOptions>;

const TIMEOUT_MS = 30_000;
const MAX_ATTEMPTS = 3;
const RETRY_DELAY_MS = 1000;
const RETRY_STATUS_CODES = [NETWORK_FAILURE_STATUS, 502, 503, 504];

const REDIRECT_URI = 'urn:ietf:wg:oauth:2.0:oob';
const RESYNC_START_DATE = '"2000-01-01T00:00:00.000Z"';

const tokenSchema = z.object({ access_token: z.string().min(1) });

function resolveOptions(options: GatewayOptions): ResolvedOptions {
    return {
        apiUrl: options.apiUrl,
        tokenUrl: options.tokenUrl,
        debug: options.debug ?? false,
        maxAttempts: options.maxAttempts ?? MAX_ATTEMPTS,
        retryDelayMs: options.retryDelayMs ?? RETRY_DELAY_MS,
        timeoutMs: options.timeoutMs ?? TIMEOUT_MS,
    };
}

// =============================================================================
// Request Wrapper
// =============================================================================

async function readBody(res: Response): Promise<unknown> {
    const text = await res.text();
    if (text === '') return null;
    try {
        return JSON.parse(text);
    } catch {
        // non-JSON error pages (e.g. an HTML 502) are kept as text
        return text;
    }
}

async function fetchOnce(
    options: ResolvedOptions,
    method: HttpMethod,
    url: string,
    headers: Record<string, string>,
    body: unknown,
): Promise<RawResponse> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), options.timeoutMs);

    try {
        const res = await fetch(url, {
            method,
            headers,
            body: body === undefined ? undefined : JSON.stringify(body),
            signal: controller.signal,
        });
        return {
            method,
            url,
            status: res.status,
            ok: res.ok,
            body: await readBody(res),
        };
    } catch (err: unknown) {
        const reason = err instanceof Error && err.name === 'AbortError'
            ? `timed out after ${options.timeoutMs}ms`
            : err instanceof Error ? err.message : String(err);
        return { method, url, status: NETWORK_FAILURE_STATUS, ok: false, body: `Request failed: ${reason}` };
    } finally {
        clearTimeout(timer);
    }
}

/**
 * Issue one HTTP call, retrying transient gateway statuses.
 * After the last attempt the failed response is returned as-is.
 */
async function send(
    options: ResolvedOptions,
    method: HttpMethod,
    url: string,
    body: unknown,
    accessToken: string | null,
): Promise<RawResponse> {
    const headers: Record<string, string> = {
        'Content-Type': 'application/json',
        'Accept': 'application/json',
    };
    if (accessToken) {
        headers.Authorization = `Bearer ${accessToken}`;
    }

    // the token exchange carries the client secret and is never echoed
    if (options.debug && accessToken !== null) {
        console.log(`[Gateway] ${toCurl(method, url, body)}`);
    }

    let response = await fetchOnce(options, method, url, headers, body);

    for (let attempt = 1; attempt < options.maxAttempts; attempt++) {
        if (!RETRY_STATUS_CODES.includes(response.status)) break;

        // Exponential backoff: 1s, 2s
        const delayMs = options.retryDelayMs * 2 ** (attempt - 1);
        const failure = response.status === NETWORK_FAILURE_STATUS ? String(response.body) : `returned ${response.status}`;
        console.warn(`[Gateway] ${method} ${url} ${failure}, retrying in ${delayMs}ms`);
        await new Promise(resolve => setTimeout(resolve, delayMs));

        response = await fetchOnce(options, method, url, headers, body);
    }

    return response;
}

// =============================================================================
// Client
// =============================================================================

export class LedgerGateway implements LedgerApi {
    private constructor(
        private readonly accessToken: string,
        private readonly options: ResolvedOptions,
    ) {}

    /** Exchange client credentials for a bearer token */
    static async authenticate(credentials: GatewayCredentials, options: GatewayOptions): Promise<LedgerGateway> {
        const resolved = resolveOptions(options);
        const res = await send(resolved, 'POST', resolved.tokenUrl, {
            grant_type: 'client_credentials',
            client_id: credentials.clientId,
            client_secret: credentials.clientSecret,
            redirect_uri: REDIRECT_URI,
        }, null);

        if (!res.ok) {
            throw new AuthenticationError(res.status, previewBody(res.body));
        }
        const token = tokenSchema.safeParse(res.body);
        if (!token.success) {
            throw new AuthenticationError(res.status, 'response carried no access_token');
        }
        return new LedgerGateway(token.data.access_token, resolved);
    }

    /** Non-strict: the caller inspects status and body */
    request(method: HttpMethod, path: string, body?: unknown): Promise<RawResponse> {
        const url = new URL(path, this.options.apiUrl).toString();
        return send(this.options, method, url, body, this.accessToken);
    }

    /** Strict: throws GatewayError on non-2xx or an unexpected body */
    async requestStrict<S extends z.ZodTypeAny>(
        method: HttpMethod,
        path: string,
        schema: S,
        body?: unknown,
    ): Promise<z.output<S>> {
        const res = await this.request(method, path, body);
        if (!res.ok) {
            throw new GatewayError(res.method, res.url, res.status, res.body);
        }
        const parsed = schema.safeParse(res.body);
        if (!parsed.success) {
            throw new GatewayError(res.method, res.url, res.status, `unexpected response: ${parsed.error.message}`);
        }
        return parsed.data;
    }

    // ── Portfolios ─────────────────────────────────────────────────────

    async listPortfolios(): Promise<Portfolio[]> {
        const res = await this.requestStrict('GET', '/api/v2/portfolios.json',
            z.object({ portfolios: z.array(portfolioSchema) }));
        return res.portfolios;
    }

    createPortfolio(payload: PortfolioPayload): Promise<Portfolio> {
        return this.requestStrict('POST', '/api/v2/portfolios.json',
            z.object({ portfolio: portfolioSchema }).transform((r) => r.portfolio).or(portfolioSchema),
            { portfolio: payload });
    }

    async deletePortfolio(portfolioId: number): Promise<void> {
        await this.requestStrict('DELETE', `/api/v2/portfolios/${portfolioId}.json`, z.unknown());
    }

    async getValuation(portfolioId: number, balanceDate: string): Promise<Valuation> {
        const query = new URLSearchParams({ balance_date: balanceDate });
        return this.requestStrict('GET', `/api/v2/portfolios/${portfolioId}/valuation.json?${query}`, valuationSchema);
    }

    // ── Cash accounts ──────────────────────────────────────────────────

    async listCashAccounts(portfolioId: number): Promise<CashAccount[]> {
        const res = await this.requestStrict('GET', `/api/v2/portfolios/${portfolioId}/cash_accounts.json`,
            z.object({ cash_accounts: z.array(cashAccountSchema) }));
        return res.cash_accounts;
    }

    async createCashAccount(portfolioId: number, payload: CashAccountPayload): Promise<CashAccount> {
        const res = await this.requestStrict('POST', `/api/v2/portfolios/${portfolioId}/cash_accounts.json`,
            z.object({ cash_account: cashAccountSchema }), { cash_account: payload });
        return res.cash_account;
    }

    async listCashTransactions(cashAccountId: number): Promise<CashTransaction[]> {
        const res = await this.requestStrict('GET', `/api/v2/cash_accounts/${cashAccountId}/cash_account_transactions.json`,
            z.object({ cash_account_transactions: z.array(cashTransactionSchema) }));
        return res.cash_account_transactions;
    }

    async deleteCashTransaction(transactionId: number): Promise<void> {
        await this.requestStrict('DELETE', `/api/v2/cash_account_transactions/${transactionId}.json`, z.unknown());
    }

    /** Recomputes the account balance (undocumented endpoint) */
    async resyncCashAccount(cashAccountId: number): Promise<void> {
        const startDate = encodeURIComponent(RESYNC_START_DATE);
        await this.requestStrict('POST', `/api/v2/cash_accounts/${cashAccountId}/reset.json?start_date=${startDate}`, z.unknown());
    }

    // ── Holdings & payouts ─────────────────────────────────────────────

    async listHoldings(portfolioId: number): Promise<Holding[]> {
        const res = await this.requestStrict('GET', `/api/v3/portfolios/${portfolioId}/holdings`,
            z.object({ holdings: z.array(holdingSchema) }));
        return res.holdings;
    }

    async deleteHolding(holdingId: number): Promise<void> {
        await this.requestStrict('DELETE', `/api/v3/holdings/${holdingId}`, z.unknown());
    }

    async listPayouts(portfolioId: number, startDate: string, endDate: string): Promise<Payout[]> {
        const query = new URLSearchParams({ start_date: startDate, end_date: endDate });
        const res = await this.requestStrict('GET', `/api/v2/portfolios/${portfolioId}/payouts.json?${query}`,
            z.object({ payouts: z.array(payoutSchema) }));
        return res.payouts;
    }

    // ── Custom investments & prices ────────────────────────────────────

    async listCustomInvestments(portfolioId: number): Promise<CustomInvestment[]> {
        const query = new URLSearchParams({ portfolio_id: String(portfolioId) });
        const res = await this.requestStrict('GET', `/api/v3/custom_investments?${query}`,
            z.object({ custom_investments: z.array(customInvestmentSchema) }));
        return res.custom_investments;
    }

    createCustomInvestment(payload: CustomInvestmentPayload): Promise<CustomInvestment> {
        return this.requestStrict('POST', '/api/v3/custom_investments',
            z.object({ custom_investment: customInvestmentSchema }).transform((r) => r.custom_investment).or(customInvestmentSchema),
            { custom_investment: payload });
    }

    updateCustomInvestment(customInvestmentId: number, payload: CustomInvestmentPayload): Promise<CustomInvestment> {
        return this.requestStrict('PUT', `/api/v3/custom_investments/${customInvestmentId}`,
            z.object({ custom_investment: customInvestmentSchema }).transform((r) => r.custom_investment).or(customInvestmentSchema),
            { custom_investment: payload });
    }

    async deleteCustomInvestment(customInvestmentId: number): Promise<void> {
        await this.requestStrict('DELETE', `/api/v3/custom_investments/${customInvestmentId}`, z.unknown());
    }

    async listPrices(customInvestmentId: number, startDate: string, endDate: string): Promise<Price[]> {
        const query = new URLSearchParams({ start_date: startDate, end_date: endDate });
        const res = await this.requestStrict('GET', `/api/v3/custom_investment/${customInvestmentId}/prices?${query}`,
            z.object({ prices: z.array(priceSchema) }));
        return res.prices;
    }

    createPrice(customInvestmentId: number, payload: PricePayload): Promise<Price> {
        return this.requestStrict('POST', `/api/v3/custom_investment/${customInvestmentId}/prices`,
            z.object({ price: priceSchema }).transform((r) => r.price).or(priceSchema),
            { price: payload });
    }

    updatePrice(priceId: number, payload: PricePayload): Promise<Price> {
        return this.requestStrict('PUT', `/api/v3/prices/${priceId}`,
            z.object({ price: priceSchema }).transform((r) => r.price).or(priceSchema),
            { price: payload });
    }

    // ── Record creation (non-strict) ───────────────────────────────────

    tryCreateTrade(payload: TradePayload): Promise<RawResponse> {
        return this.request('POST', '/api/v2/trades.json', { trade: payload });
    }

    tryCreatePayout(payload: PayoutPayload): Promise<RawResponse> {
        return this.request('POST', '/api/v2/payouts.json', { payout: payload });
    }

    tryCreateCashTransaction(cashAccountId: number, payload: CashTransactionPayload): Promise<RawResponse> {
        return this.request('POST', `/api/v2/cash_accounts/${cashAccountId}/cash_account_transactions.json`,
            { cash_account_transaction: payload });
    }

    tryCreateHoldingMerge(payload: HoldingMergePayload): Promise<RawResponse> {
        return this.request('POST', '/api/v2/holding_merges.json', { holding_merge: payload });
    }
}
