/**
 * Response Inspector
 *
 * Sorts a non-strict create response into an outcome the handlers act on.
 * The service reports validation problems as `{ errors: { field: [message] } }`.
 */

import { z } from 'zod';
import { NETWORK_FAILURE_STATUS, type RawResponse } from '../gateway/types';
import type { ReconciliationContext } from './context';

export type OutcomeKind =
    | 'created'
    | 'duplicate'            // unique/foreign identifier already used: treated as success
    | 'unknown-instrument'   // eligible for create-instrument-and-retry
    | 'missing-price'        // eligible for the OPENING_BALANCE → BUY fallback
    | 'failed';

export interface ErrorMessage {
    field: string;
    message: string;
}

const DUPLICATE_TRADE = /already exists/i;
const DUPLICATE_CASH = /has already been taken/i;
const NOT_FOUND = /(not found|could not be found|unknown|does ?n[o']t exist)/i;
const INSTRUMENT_FIELDS = new Set(['symbol', 'market', 'instrument', 'base', 'custom_investment', 'custom_investment_id']);
const MISSING_PRICE = /(histor|not available|unavailable|no price|missing)/i;

const messagesSchema = z.union([z.array(z.string()), z.string()]);
const fieldErrorsSchema = z.object({ errors: z.record(messagesSchema) });
const listErrorsSchema = z.object({ errors: z.array(z.string()) });
const singleErrorSchema = z.object({ error: z.string() });

/** Flatten the several error body shapes the service uses */
export function errorMessages(body: unknown): ErrorMessage[] {
    const fieldErrors = fieldErrorsSchema.safeParse(body);
    if (fieldErrors.success) {
        return Object.entries(fieldErrors.data.errors).flatMap(([field, messages]) =>
            (Array.isArray(messages) ? messages : [messages]).map((message) => ({ field, message })));
    }
    const listErrors = listErrorsSchema.safeParse(body);
    if (listErrors.success) {
        return listErrors.data.errors.map((message) => ({ field: '', message }));
    }
    const singleError = singleErrorSchema.safeParse(body);
    if (singleError.success) {
        return [{ field: '', message: singleError.data.error }];
    }
    return typeof body === 'string' && body ? [{ field: '', message: body }] : [];
}

export function inspectResponse(res: RawResponse): OutcomeKind {
    if (res.ok) return 'created';
    if (res.status === NETWORK_FAILURE_STATUS) return 'failed';

    const messages = errorMessages(res.body);

    const isDuplicate = messages.some(({ field, message }) =>
        (field === 'unique_identifier' && DUPLICATE_TRADE.test(message))
        || (field === 'foreign_identifier' && DUPLICATE_CASH.test(message)));
    if (isDuplicate) return 'duplicate';

    const isMissingPrice = messages.some(({ message }) => /price/i.test(message) && MISSING_PRICE.test(message));
    if (isMissingPrice) return 'missing-price';

    const isUnknownInstrument = messages.some(({ field, message }) =>
        NOT_FOUND.test(message) && (INSTRUMENT_FIELDS.has(field) || /instrument|investment/i.test(message)));
    if (isUnknownInstrument) return 'unknown-instrument';

    return 'failed';
}

/**
 * Log the final outcome of a submission and count it.
 * Failures carry the full request and response for triage.
 */
export function reportOutcome(
    ctx: ReconciliationContext,
    prefix: string,
    res: RawResponse,
    payload: unknown,
): OutcomeKind {
    const kind = inspectResponse(res);

    switch (kind) {
        case 'created':
            ctx.summary.created++;
            console.log(`${prefix}: Success`);
            break;
        case 'duplicate':
            ctx.summary.duplicates++;
            console.log(`${prefix}: Skipped (duplicate)`);
            break;
        default:
            ctx.summary.failed++;
            console.error(
                `${prefix}: Failed (${res.status}) ${res.method} ${res.url} `
                + `response=${JSON.stringify(res.body)} request=${JSON.stringify(payload)}`,
            );
    }

    return kind;
}

export function isSuccess(kind: OutcomeKind): boolean {
    return kind === 'created' || kind === 'duplicate';
}
