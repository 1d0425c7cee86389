/**
 * Base Currency Tests
 */

import { baseCurrencyFor } from '../currency';
import { ReconciliationError } from '../errors';

describe('baseCurrencyFor', () => {
    it('maps a country to its currency', () => {
        expect(baseCurrencyFor('AU')).toBe('AUD');
        expect(baseCurrencyFor('US')).toBe('USD');
        expect(baseCurrencyFor('DE')).toBe('EUR');
    });

    it('accepts lower case and padding', () => {
        expect(baseCurrencyFor(' nz ')).toBe('NZD');
    });

    it('rejects an unknown country', () => {
        expect(() => baseCurrencyFor('XX')).toThrow(ReconciliationError);
        expect(() => baseCurrencyFor('XX')).toThrow('No base currency known for country code "XX"');
    });
});
