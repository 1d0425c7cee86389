/**
 * Row Source
 *
 * Ordered cursor over ledger rows with one row of lookahead, so merge pairs
 * can be checked and consumed together without losing line bookkeeping.
 */

import type { LedgerRow } from './types';

export class RowSource {
    private index = 0;

    constructor(private readonly rows: readonly LedgerRow[]) {}

    next(): LedgerRow | null {
        if (this.index >= this.rows.length) return null;
        return this.rows[this.index++];
    }

    peek(): LedgerRow | null {
        return this.index < this.rows.length ? this.rows[this.index] : null;
    }
}
