/**
 * Record Parser
 *
 * Turns pasted shipment notes into address records. Input is split into
 * blocks on blank lines; each block is one recipient. The first line is the
 * name, a recognised country line sets the country, UK postcodes are pulled
 * out wherever they appear and the remaining lines are assigned to address
 * fields by position.
 *
 * Parsing is lazy and deterministic: iterating the result twice yields the
 * same outcomes.
 */

import { DEFAULT_COUNTRY } from '../constants';
import { isDirectiveLine } from '../matching';
import { extractPostcode } from './postcode';
import { cleanLine, normalizeCase, splitOnCommas } from './text';
import type { AddressRecord, ParseOutcome, ParserConfig } from './types';

export interface ParserInstance {
    parse(rawText: string): Iterable<ParseOutcome>;
}

const UK_COUNTRY_VARIANTS = new Set([
    'UK',
    'U.K',
    'U.K.',
    'UNITED KINGDOM',
    'GREAT BRITAIN',
    'GB',
    'BRITAIN',
    'ENGLAND',
    'SCOTLAND',
    'WALES',
    'NORTHERN IRELAND',
]);

const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;
const PHONE_PATTERN = /^(?:(?:tel|phone|mobile|mob)\s*:?\s*)?(\+?[\d\s()-]+)$/i;
const MIN_PHONE_DIGITS = 10;
const INLINE_DIRECTIVE = /\bSERVICE\s*=\s*\S+/gi;

export const splitBlocks = (rawText: string): string[] =>
    rawText
        .replace(/\r\n?/g, '\n')
        .split(/\n\s*\n+/)
        .map(block => block.trim())
        .filter(block => block.length > 0);

export const isCountryLine = (line: string): boolean =>
    UK_COUNTRY_VARIANTS.has(line.trim().toUpperCase());

const asPhone = (line: string): string | null => {
    const found = PHONE_PATTERN.exec(line);
    if (!found) return null;
    const digits = found[1].replace(/\D/g, '');
    return digits.length >= MIN_PHONE_DIGITS ? found[1].trim() : null;
};

interface AddressParts {
    address_line_1: string;
    address_line_2: string;
    town_city: string;
    county: string;
}

/** 1 → line 1; 2 → line 1, town; 3 → line 1, line 2, town; 4+ → line 1, line 2 (+ middle), town, county */
export const assignAddressParts = (parts: string[]): AddressParts => {
    const empty = { address_line_1: '', address_line_2: '', town_city: '', county: '' };
    switch (parts.length) {
        case 0:
            return empty;
        case 1:
            return { ...empty, address_line_1: parts[0] };
        case 2:
            return { ...empty, address_line_1: parts[0], town_city: parts[1] };
        case 3:
            return { ...empty, address_line_1: parts[0], address_line_2: parts[1], town_city: parts[2] };
        default:
            return {
                address_line_1: parts[0],
                address_line_2: parts.slice(1, -2).join(', '),
                town_city: parts[parts.length - 2],
                county: parts[parts.length - 1],
            };
    }
};

export const create = (config: ParserConfig): ParserInstance => {
    const serviceTags = (config.serviceTags ?? []).map(tag => tag.trim()).filter(Boolean);
    const bracketedTags = serviceTags.map(tag =>
        new RegExp(`[[(]\\s*${tag.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')}\\s*[\\])]`, 'gi'));
    const defaultCountry = (config.defaults.country || DEFAULT_COUNTRY).toUpperCase();

    const stripDirectives = (line: string): string =>
        cleanLine(bracketedTags.reduce(
            (current, pattern) => current.replace(pattern, ' '),
            line.replace(INLINE_DIRECTIVE, ' '),
        ));

    const contentLines = (block: string): string[] =>
        block.split('\n')
            .map(cleanLine)
            .filter(line => line.length > 0 && !isDirectiveLine(line, serviceTags))
            .map(stripDirectives)
            .filter(line => line.length > 0);

    const parseBlock = (block: string, blockIndex: number, recordNumber: number): ParseOutcome => {
        const lines = contentLines(block);
        const warn = (reason: string): ParseOutcome => ({
            kind: 'warning',
            warning: { block_index: blockIndex, line_count: lines.length, reason },
        });

        if (lines.length === 0) {
            return warn('Block has no content besides service directives');
        }

        let nameLine: string;
        let rest: string[];
        if (lines.length === 1) {
            const parts = splitOnCommas(lines[0]);
            if (parts.length < 2) {
                return warn('Single line block with no address fields');
            }
            [nameLine, ...rest] = parts;
        } else {
            nameLine = lines[0];
            rest = lines.slice(1).flatMap(splitOnCommas);
        }

        let postcode = '';
        let country = '';
        let phone: string | undefined;
        let email: string | undefined;
        const addressParts: string[] = [];

        for (const part of rest) {
            if (EMAIL_PATTERN.test(part)) {
                email = part.toLowerCase();
                continue;
            }
            const phoneValue = asPhone(part);
            if (phoneValue) {
                phone = phoneValue;
                continue;
            }
            if (isCountryLine(part)) {
                country = DEFAULT_COUNTRY;
                continue;
            }
            const extracted = extractPostcode(part);
            if (extracted.postcode) {
                postcode = extracted.postcode;
            }
            if (extracted.remaining) {
                addressParts.push(normalizeCase(extracted.remaining));
            }
        }

        if (addressParts.length === 0 && !postcode) {
            return warn('Block has no address lines or postcode');
        }

        const record: AddressRecord = {
            full_name: normalizeCase(nameLine),
            ...assignAddressParts(addressParts),
            postcode,
            country: country || defaultCountry,
            service: config.defaults.service,
            weight_kg: config.defaults.weight_kg,
            notes: '',
        };
        if (config.defaults.reference_prefix) {
            record.reference = `${config.defaults.reference_prefix}${recordNumber}`;
        }
        if (phone) record.phone = phone;
        if (email) record.email = email;

        return { kind: 'record', block: { index: blockIndex, text: block, record } };
    };

    function* generate(rawText: string): Generator<ParseOutcome> {
        let recordNumber = 0;
        const blocks = splitBlocks(rawText);
        for (let index = 0; index < blocks.length; index++) {
            const outcome = parseBlock(blocks[index], index, recordNumber + 1);
            if (outcome.kind === 'record') recordNumber++;
            yield outcome;
        }
    }

    const parse = (rawText: string): Iterable<ParseOutcome> => ({
        [Symbol.iterator]: () => generate(rawText),
    });

    return { parse };
};
