/**
 * Transaction Classifier Tests
 */

import { classifyTransaction, NON_CASH_TYPES, TRANSACTION_TYPES } from '../classifier';
import { ClassificationError } from '../errors';

describe('classifyTransaction', () => {
    const expected: Array<[string, string]> = [
        ['BUY', 'trade'],
        ['SELL', 'trade'],
        ['SPLIT', 'trade'],
        ['BONUS', 'trade'],
        ['CONSOLD', 'trade'],
        ['CANCEL', 'trade'],
        ['CAPITAL_RETURN', 'trade'],
        ['CAPITAL_CALL', 'trade'],
        ['OPENING_BALANCE', 'trade'],
        ['ADJUST_COST_BASE', 'trade'],
        ['DIVIDEND', 'payout'],
        ['DISTRIBUTION', 'payout'],
        ['DEPOSIT', 'cash'],
        ['WITHDRAWAL', 'cash'],
        ['INTEREST_PAYMENT', 'cash'],
        ['INTEREST_CHARGED', 'cash'],
        ['FEE', 'cash'],
        ['FEE_REIMBURSEMENT', 'cash'],
        ['MERGE_CANCEL', 'merge'],
        ['MERGE_BUY', 'merge'],
    ];

    it.each(expected)('maps %s to %s', (type, kind) => {
        expect(classifyTransaction(type, 2)).toEqual({ kind, transactionType: type });
    });

    it('covers every known type', () => {
        expect(Object.keys(TRANSACTION_TYPES).sort()).toEqual(expected.map(([type]) => type).sort());
    });

    it('normalizes case and whitespace', () => {
        expect(classifyTransaction(' dividend ', 5)).toEqual({ kind: 'payout', transactionType: 'DIVIDEND' });
    });

    it('throws for an unknown type with its line', () => {
        expect(() => classifyTransaction('TRANSFER', 7)).toThrow(ClassificationError);
        expect(() => classifyTransaction('TRANSFER', 7))
            .toThrow('Line 7: Unable to map transaction type "TRANSFER" to an operation');
    });
});

describe('NON_CASH_TYPES', () => {
    it('holds only trade and merge types', () => {
        for (const type of NON_CASH_TYPES) {
            expect(['trade', 'merge']).toContain(classifyTransaction(type, 1).kind);
        }
    });
});
