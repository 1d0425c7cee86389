/**
 * Payload fields shared by trade and payout requests.
 */

import { currencyColumn, type LedgerRow } from '../../ledger/types';
import type { ReconciliationContext } from '../context';

/** Row value, else the exchange_rate_<base> column, else left for the service to derive */
export function exchangeRateFor(ctx: ReconciliationContext, row: LedgerRow): string | undefined {
    return row.exchangeRate || currencyColumn(row, 'exchange_rate_', ctx.baseCurrency) || undefined;
}
