/**
 * Decides which records are worth a model call. Only records with an obvious
 * problem are sent.
 */

import { DEFAULT_COUNTRY } from '../constants';
import { isProbablyUkPostcode } from '../parser/postcode';
import type { AddressRecord } from '../parser/types';

const LOOSE_POSTCODE = /^[A-Z0-9][A-Z0-9\s-]{2,12}$/;

const COUNTRY_TYPOS = new Set([
    'UNITED KINGSOM',
    'UNITED KINDGOM',
    'UNTIED KINGDOM',
    'UNITED STAES',
    'UNITED STATSE',
    'UNITED ARAB EMRITES',
]);

const TEXT_FIELDS = [
    'full_name',
    'address_line_1',
    'address_line_2',
    'town_city',
    'county',
    'postcode',
    'country',
] as const;

const looksUnknown = (value: string): boolean =>
    value.includes('?') || value.toUpperCase().includes('UNKNOWN');

export const reviewReasons = (record: AddressRecord): string[] => {
    const reasons: string[] = [];
    const country = record.country.trim().toUpperCase();
    const postcode = record.postcode.trim().toUpperCase();

    if (!postcode) {
        reasons.push('missing postcode');
    } else if (country === DEFAULT_COUNTRY ? !isProbablyUkPostcode(postcode) : !LOOSE_POSTCODE.test(postcode)) {
        reasons.push('invalid postcode');
    }
    if (!country) {
        reasons.push('missing country');
    } else if (COUNTRY_TYPOS.has(country)) {
        reasons.push('country typo');
    }
    if (TEXT_FIELDS.some(field => looksUnknown(record[field]))) {
        reasons.push('unknown value');
    }
    return reasons;
};

export const needsReview = (record: AddressRecord): boolean => reviewReasons(record).length > 0;
