/**
 * Row Source Tests
 */

import { parseLedger } from '../ledger-reader';
import { RowSource } from '../row-source';

const rows = parseLedger([
    'unique_identifier,transaction_type,transaction_date',
    'a,MERGE_CANCEL,2024-01-01',
    'b,MERGE_BUY,2024-01-01',
].join('\n'));

describe('RowSource', () => {
    it('yields rows in order, then null', () => {
        const source = new RowSource(rows);
        expect(source.next()?.uniqueIdentifier).toBe('a');
        expect(source.next()?.uniqueIdentifier).toBe('b');
        expect(source.next()).toBeNull();
    });

    it('peeks without consuming', () => {
        const source = new RowSource(rows);
        source.next();
        expect(source.peek()?.uniqueIdentifier).toBe('b');
        expect(source.next()?.uniqueIdentifier).toBe('b');
        expect(source.peek()).toBeNull();
    });
});
