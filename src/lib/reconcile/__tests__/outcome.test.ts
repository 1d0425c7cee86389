/**
 * Response Inspector Tests
 */

import type { RawResponse } from '../../gateway/types';
import { errorMessages, inspectResponse } from '../outcome';

function response(status: number, body: unknown): RawResponse {
    return { method: 'POST', url: 'memory://test', status, ok: status >= 200 && status < 300, body };
}

describe('errorMessages', () => {
    it('flattens field errors', () => {
        expect(errorMessages({ errors: { symbol: ['not found', 'invalid'], base: 'bad' } })).toEqual([
            { field: 'symbol', message: 'not found' },
            { field: 'symbol', message: 'invalid' },
            { field: 'base', message: 'bad' },
        ]);
    });

    it('reads list, single and text bodies', () => {
        expect(errorMessages({ errors: ['one'] })).toEqual([{ field: '', message: 'one' }]);
        expect(errorMessages({ error: 'two' })).toEqual([{ field: '', message: 'two' }]);
        expect(errorMessages('three')).toEqual([{ field: '', message: 'three' }]);
        expect(errorMessages(null)).toEqual([]);
    });
});

describe('inspectResponse', () => {
    it('treats 2xx as created', () => {
        expect(inspectResponse(response(200, { trade: { id: 1 } }))).toBe('created');
    });

    it('treats a request that got no response as failed', () => {
        expect(inspectResponse(response(0, 'Request failed: instrument lookup not found'))).toBe('failed');
    });

    it('recognizes a duplicate trade identifier', () => {
        expect(inspectResponse(response(422, { errors: { unique_identifier: ['already exists'] } }))).toBe('duplicate');
    });

    it('recognizes a duplicate cash foreign identifier', () => {
        expect(inspectResponse(response(422, { errors: { foreign_identifier: ['has already been taken'] } })))
            .toBe('duplicate');
    });

    it('does not mistake another field\'s "already exists" for a duplicate', () => {
        expect(inspectResponse(response(422, { errors: { portfolio: ['already exists'] } }))).toBe('failed');
    });

    it('recognizes a missing historical price', () => {
        expect(inspectResponse(response(422, { errors: { base: ['Historical price data is not available'] } })))
            .toBe('missing-price');
    });

    it('recognizes an unknown instrument by field or wording', () => {
        expect(inspectResponse(response(422, { errors: { symbol: ['not found'] } }))).toBe('unknown-instrument');
        expect(inspectResponse(response(404, { error: 'Instrument could not be found' }))).toBe('unknown-instrument');
    });

    it('leaves everything else as failed', () => {
        expect(inspectResponse(response(422, { errors: { holding_id: ['not found'] } }))).toBe('failed');
        expect(inspectResponse(response(500, '<html>oops</html>'))).toBe('failed');
    });
});
