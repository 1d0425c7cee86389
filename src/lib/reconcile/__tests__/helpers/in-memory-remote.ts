/**
 * In-memory stand-in for the remote ledger service.
 *
 * Implements the same LedgerApi the gateway does and mimics the service's
 * rejection bodies for duplicates, unknown instruments and missing prices.
 */

import type {
    CashAccount,
    CashAccountPayload,
    CashTransaction,
    CashTransactionPayload,
    CustomInvestment,
    CustomInvestmentPayload,
    Holding,
    HoldingMergePayload,
    LedgerApi,
    Payout,
    PayoutPayload,
    Portfolio,
    PortfolioPayload,
    Price,
    PricePayload,
    RawResponse,
    TradePayload,
    Valuation,
} from '../../../gateway/types';
import { GatewayError } from '../../../gateway/errors';

interface StoredCashAccount extends CashAccount {
    portfolioId: number;
}

interface StoredCashTransaction extends CashTransactionPayload {
    id: number;
    cashAccountId: number;
}

interface StoredHolding extends Holding {
    portfolioId: number;
}

interface StoredPayout extends PayoutPayload {
    id: number;
}

interface StoredPrice extends Price {
    customInvestmentId: number;
}

const LISTED_MARKETS = new Set(['NYSE', 'NASDAQ', 'ASX', 'LSE', 'NZX']);

function ok(method: RawResponse['method'], url: string, body: unknown): RawResponse {
    return { method, url, status: 200, ok: true, body };
}

function rejected(method: RawResponse['method'], url: string, status: number, body: unknown): RawResponse {
    return { method, url, status, ok: false, body };
}

export class InMemoryRemote implements LedgerApi {
    private nextId = 100;

    readonly portfolios: Portfolio[] = [];
    readonly cashAccounts: StoredCashAccount[] = [];
    readonly cashTransactions: StoredCashTransaction[] = [];
    readonly holdings: StoredHolding[] = [];
    readonly trades: TradePayload[] = [];
    readonly payouts: StoredPayout[] = [];
    readonly merges: HoldingMergePayload[] = [];
    readonly customInvestments: CustomInvestment[] = [];
    readonly prices: StoredPrice[] = [];
    readonly resyncs: number[] = [];

    /** Every trade submission, including rejected ones */
    readonly tradeRequests: TradePayload[] = [];
    readonly payoutRequests: PayoutPayload[] = [];
    readonly mergeRequests: HoldingMergePayload[] = [];

    /** Symbols with no price history: OPENING_BALANCE on them is rejected */
    readonly unpricedSymbols = new Set<string>();
    readonly valuations = new Map<number, Valuation>();
    /** Cash account ids whose resync answers 500 */
    readonly failingResyncs = new Set<number>();

    /** custom investment id → owning portfolio id */
    private readonly owners = new Map<number, number>();

    private id(): number {
        return this.nextId++;
    }

    // ── Seeding helpers ────────────────────────────────────────────────

    addPortfolio(name: string, countryCode: string): Portfolio {
        const portfolio = { id: this.id(), name, country_code: countryCode };
        this.portfolios.push(portfolio);
        return portfolio;
    }

    addHolding(portfolioId: number, market: string, code: string): StoredHolding {
        const holding = { id: this.id(), portfolioId, instrument: { code, market_code: market } };
        this.holdings.push(holding);
        return holding;
    }

    cashTransactionsIn(cashAccountName: string): StoredCashTransaction[] {
        const account = this.cashAccounts.find((a) => a.name === cashAccountName);
        return account ? this.cashTransactions.filter((t) => t.cashAccountId === account.id) : [];
    }

    // ── Portfolios ─────────────────────────────────────────────────────

    async listPortfolios(): Promise<Portfolio[]> {
        return [...this.portfolios];
    }

    async createPortfolio(payload: PortfolioPayload): Promise<Portfolio> {
        return this.addPortfolio(payload.name, payload.country_code);
    }

    async deletePortfolio(portfolioId: number): Promise<void> {
        const index = this.portfolios.findIndex((p) => p.id === portfolioId);
        if (index >= 0) this.portfolios.splice(index, 1);
        for (const holding of this.holdings.filter((h) => h.portfolioId === portfolioId)) {
            await this.deleteHolding(holding.id);
        }
        for (const account of this.cashAccounts.filter((a) => a.portfolioId === portfolioId)) {
            this.cashAccounts.splice(this.cashAccounts.indexOf(account), 1);
            for (const transaction of this.cashTransactions.filter((t) => t.cashAccountId === account.id)) {
                await this.deleteCashTransaction(transaction.id);
            }
        }
    }

    async getValuation(portfolioId: number): Promise<Valuation> {
        return this.valuations.get(portfolioId) ?? { holdings: [], cash_accounts: [] };
    }

    // ── Cash accounts ──────────────────────────────────────────────────

    async listCashAccounts(portfolioId: number): Promise<CashAccount[]> {
        return this.cashAccounts
            .filter((a) => a.portfolioId === portfolioId)
            .map(({ id, name, currency }) => ({ id, name, currency }));
    }

    async createCashAccount(portfolioId: number, payload: CashAccountPayload): Promise<CashAccount> {
        const account = { id: this.id(), portfolioId, ...payload };
        this.cashAccounts.push(account);
        return { id: account.id, name: account.name, currency: account.currency };
    }

    async listCashTransactions(cashAccountId: number): Promise<CashTransaction[]> {
        return this.cashTransactions
            .filter((t) => t.cashAccountId === cashAccountId)
            .map(({ id, foreign_identifier }) => ({ id, foreign_identifier }));
    }

    async deleteCashTransaction(transactionId: number): Promise<void> {
        const index = this.cashTransactions.findIndex((t) => t.id === transactionId);
        if (index >= 0) this.cashTransactions.splice(index, 1);
    }

    async resyncCashAccount(cashAccountId: number): Promise<void> {
        if (this.failingResyncs.has(cashAccountId)) {
            throw new GatewayError('POST', `/api/v2/cash_accounts/${cashAccountId}/reset.json`, 500, { error: 'boom' });
        }
        this.resyncs.push(cashAccountId);
    }

    // ── Holdings & payouts ─────────────────────────────────────────────

    async listHoldings(portfolioId: number): Promise<Holding[]> {
        return this.holdings
            .filter((h) => h.portfolioId === portfolioId)
            .map(({ id, instrument }) => ({ id, instrument }));
    }

    async deleteHolding(holdingId: number): Promise<void> {
        const index = this.holdings.findIndex((h) => h.id === holdingId);
        if (index >= 0) this.holdings.splice(index, 1);
        for (let i = this.payouts.length - 1; i >= 0; i--) {
            if (this.payouts[i].holding_id === holdingId) this.payouts.splice(i, 1);
        }
    }

    async listPayouts(portfolioId: number, startDate: string, endDate: string): Promise<Payout[]> {
        return this.payouts
            .filter((p) => p.portfolio_id === portfolioId && p.paid_on >= startDate && p.paid_on <= endDate)
            .map(({ id, holding_id, paid_on }) => ({ id, holding_id, paid_on }));
    }

    // ── Custom investments & prices ────────────────────────────────────

    async listCustomInvestments(portfolioId: number): Promise<CustomInvestment[]> {
        return this.customInvestments.filter((c) => this.ownerOf(c) === portfolioId);
    }

    private ownerOf(instrument: CustomInvestment): number | undefined {
        return this.owners.get(instrument.id);
    }

    async createCustomInvestment(payload: CustomInvestmentPayload): Promise<CustomInvestment> {
        const instrument: CustomInvestment = {
            id: this.id(),
            code: payload.code,
            name: payload.name,
            country_code: payload.country_code,
            investment_type: payload.investment_type,
            currency_code: payload.currency_code,
        };
        this.customInvestments.push(instrument);
        this.owners.set(instrument.id, payload.portfolio_id);
        return instrument;
    }

    async updateCustomInvestment(customInvestmentId: number, payload: CustomInvestmentPayload): Promise<CustomInvestment> {
        const instrument = this.customInvestments.find((c) => c.id === customInvestmentId);
        if (!instrument) throw new Error(`custom investment ${customInvestmentId} not found`);
        instrument.name = payload.name;
        return { ...instrument };
    }

    async deleteCustomInvestment(customInvestmentId: number): Promise<void> {
        const index = this.customInvestments.findIndex((c) => c.id === customInvestmentId);
        if (index >= 0) this.customInvestments.splice(index, 1);
    }

    async listPrices(customInvestmentId: number, startDate: string, endDate: string): Promise<Price[]> {
        return this.prices
            .filter((p) => p.customInvestmentId === customInvestmentId
                && p.last_traded_on >= startDate && p.last_traded_on <= endDate)
            .map(({ id, last_traded_on, last_traded_price }) => ({ id, last_traded_on, last_traded_price }));
    }

    async createPrice(customInvestmentId: number, payload: PricePayload): Promise<Price> {
        const price = {
            id: this.id(),
            customInvestmentId,
            last_traded_on: payload.last_traded_on,
            last_traded_price: payload.last_traded_price,
        };
        this.prices.push(price);
        return { id: price.id, last_traded_on: price.last_traded_on, last_traded_price: price.last_traded_price };
    }

    async updatePrice(priceId: number, payload: PricePayload): Promise<Price> {
        const price = this.prices.find((p) => p.id === priceId);
        if (!price) throw new Error(`price ${priceId} not found`);
        price.last_traded_price = payload.last_traded_price;
        return { id: price.id, last_traded_on: price.last_traded_on, last_traded_price: price.last_traded_price };
    }

    // ── Record creation ────────────────────────────────────────────────

    private findHolding(portfolioId: number, market: string, code: string): StoredHolding | undefined {
        return this.holdings.find((h) => h.portfolioId === portfolioId
            && h.instrument.market_code.toUpperCase() === market.toUpperCase()
            && h.instrument.code.toUpperCase() === code.toUpperCase());
    }

    private instrumentKnown(portfolioId: number, market: string, customInvestmentId: number | undefined): boolean {
        if (LISTED_MARKETS.has(market.toUpperCase())) return true;
        return this.customInvestments.some((c) => c.id === customInvestmentId && this.ownerOf(c) === portfolioId);
    }

    async tryCreateTrade(payload: TradePayload): Promise<RawResponse> {
        const url = 'memory://trades';
        this.tradeRequests.push(payload);

        if (this.trades.some((t) => t.unique_identifier === payload.unique_identifier)) {
            return rejected('POST', url, 422, { errors: { unique_identifier: ['already exists'] } });
        }
        if (!this.instrumentKnown(payload.portfolio_id, payload.market, payload.custom_investment_id)) {
            return rejected('POST', url, 422, { errors: { base: [`Instrument ${payload.symbol} not found`] } });
        }
        if (payload.transaction_type === 'OPENING_BALANCE' && this.unpricedSymbols.has(payload.symbol)) {
            return rejected('POST', url, 422, { errors: { base: ['Historical price data is not available'] } });
        }

        this.trades.push(payload);
        const holding = this.findHolding(payload.portfolio_id, payload.market, payload.symbol)
            ?? this.addHolding(payload.portfolio_id, payload.market, payload.symbol);
        return ok('POST', url, { trade: { id: this.id(), holding_id: holding.id } });
    }

    async tryCreatePayout(payload: PayoutPayload): Promise<RawResponse> {
        const url = 'memory://payouts';
        this.payoutRequests.push(payload);

        if (!this.holdings.some((h) => h.id === payload.holding_id)) {
            return rejected('POST', url, 422, { errors: { holding_id: ['not found'] } });
        }
        const payout = { id: this.id(), ...payload };
        this.payouts.push(payout);
        return ok('POST', url, { payout: { id: payout.id } });
    }

    async tryCreateCashTransaction(cashAccountId: number, payload: CashTransactionPayload): Promise<RawResponse> {
        const url = `memory://cash_accounts/${cashAccountId}`;
        if (!this.cashAccounts.some((a) => a.id === cashAccountId)) {
            return rejected('POST', url, 404, { error: 'Cash account not found' });
        }
        const taken = this.cashTransactions.some((t) =>
            t.cashAccountId === cashAccountId && t.foreign_identifier === payload.foreign_identifier);
        if (taken) {
            return rejected('POST', url, 422, { errors: { foreign_identifier: ['has already been taken'] } });
        }

        const transaction = { id: this.id(), cashAccountId, ...payload };
        this.cashTransactions.push(transaction);
        return ok('POST', url, { cash_account_transaction: { id: transaction.id } });
    }

    async tryCreateHoldingMerge(payload: HoldingMergePayload): Promise<RawResponse> {
        const url = 'memory://holding_merges';
        this.mergeRequests.push(payload);

        if (this.merges.some((m) => m.unique_identifier === payload.unique_identifier)) {
            return rejected('POST', url, 422, { errors: { unique_identifier: ['already exists'] } });
        }
        const source = this.holdings.find((h) => h.id === payload.holding_id);
        if (!source) {
            return rejected('POST', url, 422, { errors: { holding_id: ['not found'] } });
        }
        if (!this.instrumentKnown(payload.portfolio_id, payload.market, payload.custom_investment_id)) {
            return rejected('POST', url, 422, { errors: { symbol: ['not found'] } });
        }

        // the merged holding keeps its id and takes the new instrument
        this.merges.push(payload);
        source.instrument = { code: payload.symbol, market_code: payload.market };
        return ok('POST', url, { holding_merge: { id: this.id(), holding_id: source.id } });
    }
}
