/**
 * Portfolio base currency by country of domicile.
 */

import { ReconciliationError } from './errors';

const BASE_CURRENCY_BY_COUNTRY: Record<string, string> = {
    AU: 'AUD',
    CA: 'CAD',
    GB: 'GBP',
    HK: 'HKD',
    NZ: 'NZD',
    SG: 'SGD',
    US: 'USD',
    ZA: 'ZAR',
    AT: 'EUR',
    BE: 'EUR',
    DE: 'EUR',
    ES: 'EUR',
    FI: 'EUR',
    FR: 'EUR',
    IE: 'EUR',
    IT: 'EUR',
    NL: 'EUR',
    PT: 'EUR',
};

export function baseCurrencyFor(countryCode: string): string {
    const currency = BASE_CURRENCY_BY_COUNTRY[countryCode.trim().toUpperCase()];
    if (!currency) {
        throw new ReconciliationError(`No base currency known for country code "${countryCode}"`);
    }
    return currency;
}
